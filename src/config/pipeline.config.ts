import { LogLevel } from '@nestjs/common';
import { plainToInstance, Transform } from 'class-transformer';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, validateSync } from 'class-validator';

// Input/output locations for one import run, passed explicitly to AppModule.forRoot.
export class PipelineConfig {
  @IsString()
  @IsNotEmpty()
  documentsDir!: string;

  @IsString()
  @IsNotEmpty()
  ledgerFile!: string;

  // Consumed documents are moved here instead of being deleted
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  archiveDir?: string;

  @IsBoolean()
  @Transform(({ value }) => value === true || value === '1' || value === 'true')
  debug!: boolean;
}

/**
 * Builds and validates the run configuration from environment variables.
 * @throws Error listing every invalid setting
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const config = plainToInstance(PipelineConfig, {
    documentsDir: env.TRADE_DOCUMENTS_DIR ?? './pdfs',
    ledgerFile: env.TRADE_LEDGER_FILE ?? './Trading.xlsx',
    archiveDir: env.TRADE_ARCHIVE_DIR,
    debug: env.TRADE_IMPORT_DEBUG ?? false,
  });

  const errors = validateSync(config);
  if (errors.length > 0) {
    const details = errors
      .map((error) => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid configuration - ${details}`);
  }
  return config;
}

export function logLevelsFor(config: Pick<PipelineConfig, 'debug'>): LogLevel[] {
  return config.debug ? ['error', 'warn', 'log', 'debug'] : ['error', 'warn', 'log'];
}
