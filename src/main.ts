// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { catalogConfig, type CatalogConfig } from './config/catalog.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { cors: false });
  app.enableShutdownHooks();

  const cfg = app.get<CatalogConfig>(catalogConfig.KEY);
  configureApp(app, cfg);

  await app.listen(cfg.port);
  Logger.log(
    `Listening on :${cfg.port} (regex=${cfg.regexMode}, maxLimit=${cfg.maxLimit})`,
    'Bootstrap',
  );
}

bootstrap().catch((err: unknown) => {
  Logger.error(
    err instanceof Error ? (err.stack ?? err.message) : String(err),
    undefined,
    'Bootstrap',
  );
  process.exitCode = 1;
});
