import { DynamicModule, Module } from '@nestjs/common';
import { BatchModule } from './batch/batch.module';
import { PipelineConfigModule } from './config/config.module';
import { PipelineConfig } from './config/pipeline.config';

@Module({})
export class AppModule {
  static forRoot(config: PipelineConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [PipelineConfigModule.forRoot(config), BatchModule],
    };
  }
}
