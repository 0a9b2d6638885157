import 'reflect-metadata';
import 'dotenv/config';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter } from '@nestjs/platform-fastify';
import type { NestFastifyApplication } from '@nestjs/platform-fastify';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';

import { AppModule } from './app.module.js';
import { loadAppConfig, resolveLogLevels } from './config/app-config.js';

async function bootstrap() {
  const config = loadAppConfig();

  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule.register(config),
    new FastifyAdapter(),
    { logger: resolveLogLevels(config) },
  );

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const doc = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle(config.apiTitle)
      .setDescription('Per-repository summary of a GitHub user\'s recent public activity')
      .setVersion(config.apiVersion)
      .build(),
  );
  SwaggerModule.setup('docs', app, doc);

  await app.listen(config.apiPort, config.apiHost);

  const logger = new Logger('Bootstrap');
  logger.log(`Listening on http://${config.apiHost}:${config.apiPort}`);
  logger.log(`Swagger documentation: http://localhost:${config.apiPort}/docs`);
  logger.log(
    `Events cache: ttl=${config.cacheTtlSeconds}s, maxSize=${config.cacheMaxSize}; upstream=${config.githubApiBaseUrl}`,
  );
}

bootstrap().catch((err) => {
  console.error('Application failed to start:', err);
  process.exit(1);
});
