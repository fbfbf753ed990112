#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { TradeImportService } from './batch/trade-import.service';
import { loadPipelineConfig, logLevelsFor } from './config/pipeline.config';

async function bootstrap(): Promise<void> {
  const config = loadPipelineConfig();
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(config), {
    logger: logLevelsFor(config),
  });

  try {
    await app.get(TradeImportService).run();
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
