import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { formatErrorMessage } from './common/errors';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule);
  // SIGINT/SIGTERM stop the collector after its current tick
  app.enableShutdownHooks();
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Failed to start: ${formatErrorMessage(error)}`);
  process.exit(1);
});
