import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';

/**
 * Boots the Nest context with the pino logger installed. `AppModule` is
 * loaded here rather than at import time: `ConfigModule.forRoot` validates
 * the environment while the module is evaluated, and that failure has to
 * reject this promise like any bootstrap error.
 */
export async function createAppContext(): Promise<INestApplicationContext> {
  const { AppModule } = await import('./app.module');
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
    abortOnError: false,
  });
  app.useLogger(app.get(Logger));
  return app;
}
