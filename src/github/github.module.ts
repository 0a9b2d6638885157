import { Logger, Module } from '@nestjs/common';
import { Octokit } from '@octokit/rest';

import { APP_CONFIG, AppConfig } from '../config/app-config.js';
import { TtlCache } from '../cache/ttl-cache.js';
import { GithubEventsClient } from './github-events.client.js';
import type { GithubEvent } from './github-events.types.js';
import { EVENTS_CACHE, OCTOKIT } from './github.tokens.js';

function createOctokit(config: AppConfig) {
  const logger = new Logger('Octokit');
  return new Octokit({
    baseUrl: config.githubApiBaseUrl,
    userAgent: `github-activity-tracker/${config.apiVersion}`,
    log: {
      debug: (message: string) => logger.verbose(message),
      info: (message: string) => logger.debug(message),
      warn: (message: string) => logger.warn(message),
      error: (message: string) => logger.error(message),
    },
  });
}

@Module({
  providers: [
    { provide: OCTOKIT, inject: [APP_CONFIG], useFactory: createOctokit },
    {
      provide: EVENTS_CACHE,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) =>
        new TtlCache<readonly GithubEvent[]>({
          ttlSeconds: config.cacheTtlSeconds,
          maxSize: config.cacheMaxSize,
        }),
    },
    GithubEventsClient,
  ],
  exports: [GithubEventsClient],
})
export class GithubModule {}
