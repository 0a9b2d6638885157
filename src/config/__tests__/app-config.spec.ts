import { loadAppConfig, resolveLogLevels } from '../app-config.js';

describe('loadAppConfig', () => {
  it('falls back to defaults for unset variables', () => {
    const config = loadAppConfig({});

    expect(config.apiTitle).toBe('GitHub Activity Tracker');
    expect(config.githubApiBaseUrl).toBe('https://api.github.com');
    expect(config.cacheTtlSeconds).toBe(600);
    expect(config.cacheMaxSize).toBe(1000);
    expect(config.requestTimeoutSeconds).toBe(30);
    expect(config.apiPort).toBe(8000);
    expect(config.logLevel).toBe('INFO');
    expect(config.debug).toBe(false);
  });

  it('converts numeric and boolean variables', () => {
    const config = loadAppConfig({
      CACHE_TTL_SECONDS: '120',
      CACHE_MAX_SIZE: '50',
      REQUEST_TIMEOUT_SECONDS: '5',
      API_PORT: '3000',
      DEBUG: 'true',
    });

    expect(config.cacheTtlSeconds).toBe(120);
    expect(config.cacheMaxSize).toBe(50);
    expect(config.requestTimeoutSeconds).toBe(5);
    expect(config.apiPort).toBe(3000);
    expect(config.debug).toBe(true);
  });

  it('normalizes the log level to upper case', () => {
    expect(loadAppConfig({ LOG_LEVEL: 'warning' }).logLevel).toBe('WARNING');
  });

  it('accepts a local base url without a tld', () => {
    const config = loadAppConfig({ GITHUB_API_BASE_URL: 'http://localhost:8080' });
    expect(config.githubApiBaseUrl).toBe('http://localhost:8080');
  });

  it('rejects non-positive cache and timeout settings', () => {
    expect(() => loadAppConfig({ CACHE_TTL_SECONDS: '0' })).toThrow(
      'cacheTtlSeconds must be a positive number',
    );
    expect(() => loadAppConfig({ CACHE_MAX_SIZE: '-1' })).toThrow(
      'cacheMaxSize must be a positive number',
    );
    expect(() => loadAppConfig({ REQUEST_TIMEOUT_SECONDS: 'soon' })).toThrow(
      'Invalid configuration',
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => loadAppConfig({ LOG_LEVEL: 'loud' })).toThrow(
      'logLevel must be one of: DEBUG, INFO, WARNING, ERROR, CRITICAL',
    );
  });

  it('rejects a base url without a scheme', () => {
    expect(() => loadAppConfig({ GITHUB_API_BASE_URL: 'api.github.com' })).toThrow(
      'githubApiBaseUrl must be a URL address',
    );
  });
});

describe('resolveLogLevels', () => {
  it('maps level names to Nest log levels', () => {
    expect(resolveLogLevels({ logLevel: 'INFO', debug: false })).toEqual([
      'fatal',
      'error',
      'warn',
      'log',
    ]);
    expect(resolveLogLevels({ logLevel: 'ERROR', debug: false })).toEqual(['fatal', 'error']);
  });

  it('debug mode enables every level', () => {
    expect(resolveLogLevels({ logLevel: 'ERROR', debug: true })).toContain('verbose');
  });
});
