import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import type { EnvironmentVariables } from './config/env.validation';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  const configService = app.get<
    ConfigService,
    ConfigService<EnvironmentVariables, true>
  >(ConfigService);

  configureApp(app);

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get('API_GATEWAY_CORS_ORIGIN', { infer: true }),
    credentials: true,
  });

  // ── Start ─────────────────────────────────────────────
  const port = configService.get('API_GATEWAY_PORT', { infer: true });
  await app.listen(port);

  logger.log(`🚀 API Gateway running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(
    'Failed to start API Gateway',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
