import { Inject, Injectable, Logger } from '@nestjs/common';
import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';

import { APP_CONFIG, AppConfig } from '../config/app-config.js';
import { TtlCache } from '../cache/ttl-cache.js';
import { parseGithubEvents } from './github-event.payload.js';
import { EVENTS_CACHE, OCTOKIT } from './github.tokens.js';
import type {
  FetchEventsOptions,
  FetchEventsResult,
  GithubEvent,
  GithubEventsError,
} from './github-events.types.js';

export function eventsCacheKey(username: string) {
  return `github_events:${username}`;
}

/** Seconds from a Retry-After header: delta-seconds or an HTTP date. */
export function parseRetryAfter(raw: string | number | undefined): number | undefined {
  if (raw == null || raw === '') return undefined;
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) return Math.max(0, Math.floor(seconds));
  const at = Date.parse(String(raw));
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, Math.ceil((at - Date.now()) / 1000));
}

function rateLimitMessage(retryAfterSeconds?: number) {
  const base = 'GitHub API rate limit exceeded';
  return retryAfterSeconds ? `${base}. Retry after ${retryAfterSeconds} seconds` : base;
}

// AbortError is a DOMException, which may not pass instanceof Error across realms
function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}

function toEventsError(err: unknown, username: string): GithubEventsError {
  // A RequestError without a response is a transport failure wrapped by Octokit
  if (err instanceof RequestError && err.response) {
    const { status, headers } = err.response;
    if (status === 404) {
      return { code: 'NOT_FOUND', username, message: `User '${username}' not found` };
    }
    if (status === 429) {
      const retryAfterSeconds = parseRetryAfter(headers['retry-after']);
      return { code: 'RATE_LIMIT', retryAfterSeconds, message: rateLimitMessage(retryAfterSeconds) };
    }
    return { code: 'UPSTREAM', status, message: `GitHub API error: ${err.message}` };
  }
  return { code: 'UPSTREAM', message: `Request error: ${errorMessage(err)}` };
}

/**
 * Reads a user's public events feed, one upstream page per cache miss.
 * Failures come back as a typed result; nothing here retries.
 */
@Injectable()
export class GithubEventsClient {
  private readonly logger = new Logger(GithubEventsClient.name);

  constructor(
    @Inject(OCTOKIT) private readonly octokit: Octokit,
    @Inject(EVENTS_CACHE) private readonly cache: TtlCache<readonly GithubEvent[]>,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
  ) {}

  async fetchEvents(username: string, options: FetchEventsOptions = {}): Promise<FetchEventsResult> {
    const key = eventsCacheKey(username);
    const cached = this.cache.get(key);
    if (cached) {
      this.logger.debug(`cache hit for ${username} (${cached.length} events)`);
      return { ok: true, data: cached };
    }

    this.logger.debug(`cache miss for ${username}, requesting events`);
    const result = await this.requestEvents(username, options.signal);
    if (!result.ok) {
      this.logger.warn(`[events(${username})] ${result.error.message}`);
      return result;
    }

    this.cache.set(key, result.data);
    return result;
  }

  cacheStats() {
    return { entries: this.cache.size, maxSize: this.cache.maxSize };
  }

  private async requestEvents(username: string, signal?: AbortSignal): Promise<FetchEventsResult> {
    const timeout = AbortSignal.timeout(this.config.requestTimeoutSeconds * 1000);

    let payload: unknown;
    try {
      const response = await this.octokit.request('GET /users/{username}/events', {
        username,
        request: { signal: signal ? AbortSignal.any([signal, timeout]) : timeout },
      });
      payload = response.data;
    } catch (err) {
      return { ok: false, error: toEventsError(err, username) };
    }

    // response raced an abort: treat it as abandoned
    if (signal?.aborted) {
      return { ok: false, error: { code: 'UPSTREAM', message: 'Request error: aborted' } };
    }

    const parsed = parseGithubEvents(payload);
    if (!parsed.ok) {
      return {
        ok: false,
        error: { code: 'UPSTREAM', message: `Malformed events payload: ${parsed.error}` },
      };
    }
    return parsed;
  }
}
