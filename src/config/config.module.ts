import { DynamicModule, Global, Module } from '@nestjs/common';
import { PipelineConfig } from './pipeline.config';

@Global()
@Module({})
export class PipelineConfigModule {
  static forRoot(config: PipelineConfig): DynamicModule {
    return {
      module: PipelineConfigModule,
      providers: [{ provide: PipelineConfig, useValue: config }],
      exports: [PipelineConfig],
    };
  }
}
