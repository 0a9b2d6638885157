import { plainToInstance, Transform, Type } from 'class-transformer';
import type { TransformFnParams } from 'class-transformer';
import {
  IsDefined,
  IsISO8601,
  IsInt,
  IsString,
  ValidateNested,
  validateSync,
} from 'class-validator';
import type { ValidationError } from 'class-validator';
import type { GithubEvent, Result } from './github-events.types.js';

// GitHub sends event ids as numeric strings; ids past 2^53 would round, so they fail IsInt
const toInteger = ({ value }: TransformFnParams): unknown => {
  const id: unknown = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  return typeof id === 'number' && Number.isInteger(id) && !Number.isSafeInteger(id) ? NaN : id;
};

export class GithubActorPayload {
  @IsString()
  login!: string;

  @Transform(toInteger)
  @IsInt()
  id!: number;
}

export class GithubRepoPayload {
  @Transform(toInteger)
  @IsInt()
  id!: number;

  @IsString()
  name!: string; // "owner/name"

  @IsString()
  url!: string;
}

/** One element of GET /users/{username}/events, restricted to the fields we read. */
export class GithubEventPayload {
  @Transform(toInteger)
  @IsInt()
  id!: number;

  @IsString()
  type!: string;

  @IsDefined()
  @ValidateNested()
  @Type(() => GithubActorPayload)
  actor!: GithubActorPayload;

  @IsDefined()
  @ValidateNested()
  @Type(() => GithubRepoPayload)
  repo!: GithubRepoPayload;

  @IsISO8601({ strict: true })
  created_at!: string;
}

function flattenErrors(errors: ValidationError[], path: string): string[] {
  return errors.flatMap((err) => {
    const own = Object.values(err.constraints ?? {}).map((msg) => `${path}: ${msg}`);
    const nested = flattenErrors(err.children ?? [], `${path}.${err.property}`);
    return [...own, ...nested];
  });
}

/** ISO-8601 with a trailing `Z` read as +00:00. */
export function parseTimestamp(iso: string): Date | null {
  const date = new Date(iso.replace(/Z$/, '+00:00'));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Validate a raw events payload and map it to domain events.
 * The first malformed record fails the whole payload.
 */
export function parseGithubEvents(payload: unknown): Result<GithubEvent[], string> {
  if (!Array.isArray(payload)) {
    return { ok: false, error: `expected an array of events, got ${typeof payload}` };
  }

  const events: GithubEvent[] = [];
  for (let index = 0; index < payload.length; index++) {
    const item: unknown = payload[index];
    const label = `event[${index}]`;
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      return { ok: false, error: `${label} is not an object` };
    }

    const dto = plainToInstance(GithubEventPayload, item);
    const problems = flattenErrors(validateSync(dto), label);
    if (problems.length) {
      return { ok: false, error: problems.join('; ') };
    }

    const createdAt = parseTimestamp(dto.created_at);
    if (!createdAt) {
      return { ok: false, error: `${label}: created_at is not a valid timestamp` };
    }

    events.push({
      id: dto.id,
      activityType: dto.type,
      actorLogin: dto.actor.login,
      actorId: dto.actor.id,
      repository: { id: dto.repo.id, fullName: dto.repo.name, url: dto.repo.url },
      createdAt,
    });
  }
  return { ok: true, data: events };
}
