import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { SESSION_ID_HEADER } from '@special-sits/shared/types';
import { AppModule } from './app/app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  app.enableCors({
    origin: '*',
    exposedHeaders: [SESSION_ID_HEADER],
  });

  const port = process.env.PORT || 3002;
  const host = '::';

  await app.listen(port, host);

  Logger.log(`Memo API running on ${host}:${port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
    'Bootstrap'
  );
  process.exit(1);
});
