import { INestApplicationContext, Type } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { config } from 'dotenv';
import { LoggingService } from '../modules/logging/logging.service';

config();

/**
 * Boot a Nest application context, run the command body and close the
 * context. The body's return value becomes the process exit code.
 */
export async function runCommand(
  module: Type<unknown>,
  body: (app: INestApplicationContext) => Promise<number>,
): Promise<void> {
  const logger = new LoggingService();
  let app: INestApplicationContext | undefined;

  try {
    app = await NestFactory.createApplicationContext(module, { logger });
    process.exitCode = await body(app);
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    logger.error(error, error instanceof Error ? error.stack : undefined, 'Command');
    process.exitCode = 1;
  }

  if (app) {
    await app.close().catch((error: unknown) => {
      logger.error(error, error instanceof Error ? error.stack : undefined, 'Command');
    });
  }
}
