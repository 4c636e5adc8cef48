import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { envSchema } from '@libs/core';
import { resolveLogLevels } from './log-levels';
import { WorkerModule } from './worker.module';

async function bootstrap(): Promise<void> {
  // Logs are buffered until LOG_LEVEL is known, which may come from .env.
  const app = await NestFactory.create(WorkerModule, { bufferLogs: true });
  const configService = app.get(ConfigService);
  app.useLogger(resolveLogLevels(configService.get<string>('LOG_LEVEL')));
  app.enableShutdownHooks();

  const port = envSchema.shape.WORKER_PORT.parse(configService.get<string>('WORKER_PORT'));
  const host = '0.0.0.0';
  const logger = new Logger('WorkerBootstrap');

  await app.listen(port, host);
  logger.log(`Worker listening on ${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  new Logger('WorkerBootstrap').error(`Worker failed to start: ${message}`);
  process.exitCode = 1;
});
