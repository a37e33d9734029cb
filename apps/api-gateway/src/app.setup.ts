import { INestApplication, ValidationPipe } from '@nestjs/common';
import cookieParser from 'cookie-parser';

/**
 * HTTP-level wiring shared by bootstrap and the e2e tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  // ── Cookies ───────────────────────────────────────────
  app.use(cookieParser());

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  return app;
}
