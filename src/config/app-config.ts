import type { LogLevel } from '@nestjs/common';
import { plainToInstance, Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsPositive,
  IsString,
  IsUrl,
  Max,
  Min,
  validateSync,
} from 'class-validator';

export const APP_CONFIG = Symbol('APP_CONFIG');

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export class AppConfig {
  @IsString()
  @IsNotEmpty()
  apiTitle = 'GitHub Activity Tracker';

  @IsString()
  @IsNotEmpty()
  apiVersion = '1.0.0';

  @Transform(({ value }) =>
    typeof value === 'string' ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : value,
  )
  @IsBoolean()
  debug = false;

  @Transform(({ value }) => (typeof value === 'string' ? value.trim().toUpperCase() : value))
  @IsIn(LOG_LEVEL_NAMES, { message: `logLevel must be one of: ${LOG_LEVEL_NAMES.join(', ')}` })
  logLevel: LogLevelName = 'INFO';

  @IsUrl({ require_protocol: true, require_tld: false, protocols: ['http', 'https'] })
  githubApiBaseUrl = 'https://api.github.com';

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  cacheTtlSeconds = 600;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  cacheMaxSize = 1000;

  @Type(() => Number)
  @IsInt()
  @IsPositive()
  requestTimeoutSeconds = 30;

  @IsString()
  @IsNotEmpty()
  apiHost = '0.0.0.0';

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  apiPort = 8000;
}

// env var -> config field
const ENV_KEYS: Record<string, keyof AppConfig> = {
  API_TITLE: 'apiTitle',
  API_VERSION: 'apiVersion',
  DEBUG: 'debug',
  LOG_LEVEL: 'logLevel',
  GITHUB_API_BASE_URL: 'githubApiBaseUrl',
  CACHE_TTL_SECONDS: 'cacheTtlSeconds',
  CACHE_MAX_SIZE: 'cacheMaxSize',
  REQUEST_TIMEOUT_SECONDS: 'requestTimeoutSeconds',
  API_HOST: 'apiHost',
  API_PORT: 'apiPort',
};

/**
 * Build the application config from environment variables.
 * Unset variables keep their defaults; any invalid value throws, listing all problems.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const raw: Record<string, string> = {};
  for (const [envKey, field] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') raw[field] = value;
  }

  const config = plainToInstance(AppConfig, raw);
  const errors = validateSync(config);
  if (errors.length) {
    const problems = errors.flatMap((e) => Object.values(e.constraints ?? {}));
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return config;
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel[]> = {
  DEBUG: ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'],
  INFO: ['fatal', 'error', 'warn', 'log'],
  WARNING: ['fatal', 'error', 'warn'],
  ERROR: ['fatal', 'error'],
  CRITICAL: ['fatal', 'error'],
};

export function resolveLogLevels(config: Pick<AppConfig, 'logLevel' | 'debug'>): LogLevel[] {
  return LEVELS_BY_NAME[config.debug ? 'DEBUG' : config.logLevel];
}
