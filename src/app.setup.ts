// src/app.setup.ts
import { Logger, ValidationPipe, type INestApplication } from '@nestjs/common';
import type { CatalogConfig } from './config/catalog.config';

type CorsOriginCallback = (err: Error | null, allow?: boolean) => void;

const logger = new Logger('AppSetup');

/**
 * HTTP-level wiring shared by main.ts and the e2e tests:
 * CORS policy and DTO validation.
 */
export function configureApp(
  app: INestApplication,
  cfg: Pick<CatalogConfig, 'corsOrigins'>,
): void {
  const allowAll = cfg.corsOrigins.includes('*');
  const allowed = new Set(cfg.corsOrigins);

  app.enableCors({
    origin(origin: string | undefined, cb: CorsOriginCallback): void {
      // Requests without Origin (curl, server-to-server)
      if (origin == null || allowAll || allowed.has(origin)) {
        cb(null, true);
        return;
      }
      logger.debug(`CORS: origin not allowed → ${origin}`);
      cb(null, false);
    },
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    credentials: !allowAll,
    maxAge: 86_400,
  });

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidUnknownValues: false,
    }),
  );
}
