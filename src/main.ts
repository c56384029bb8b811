#!/usr/bin/env node
import 'reflect-metadata';
import { Logger, LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseCommand, stepsFor } from './modules/pipeline/etl-command';
import { EtlPipelineService } from './modules/pipeline/etl-pipeline.service';
import { describeError } from './modules/utils/etl-errors';

const logger = new Logger('Bootstrap');

function resolveLogLevels(): LogLevel[] {
  const logLevel = process.env.LOG_LEVEL || 'log';
  return logLevel === 'debug'
    ? ['log', 'error', 'warn', 'debug', 'verbose']
    : ['log', 'error', 'warn'];
}

async function bootstrap(): Promise<void> {
  const command = parseCommand(process.argv[2]);

  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot({ scheduled: command === 'schedule' }),
    { logger: resolveLogLevels() },
  );

  if (command === 'schedule') {
    app.enableShutdownHooks();
    logger.log('Running in schedule mode (hourly)');
    return;
  }

  try {
    await app.get(EtlPipelineService).run(stepsFor(command));
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  logger.error(`Weather ETL failed: ${describeError(error)}`);
  process.exitCode = 1;
});
