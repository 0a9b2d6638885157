// Domain types for the GitHub events feed consumed by the activity report

export interface RepositoryRef {
  readonly id: number;
  readonly fullName: string; // owner/name
  readonly url: string;
}

export interface GithubEvent {
  readonly id: number;
  readonly activityType: string; // e.g. PushEvent; open-ended, GitHub defines it
  readonly actorLogin: string;
  readonly actorId: number;
  readonly repository: RepositoryRef;
  readonly createdAt: Date;
}

/** Owner login derived from `owner/name`; empty when the name has no slash. */
export function repositoryOwner(repo: Pick<RepositoryRef, 'fullName'>): string {
  const slash = repo.fullName.indexOf('/');
  return slash === -1 ? '' : repo.fullName.slice(0, slash);
}

export type GithubEventsError =
  | { code: 'NOT_FOUND'; username: string; message: string }
  | { code: 'RATE_LIMIT'; retryAfterSeconds?: number; message: string }
  | { code: 'UPSTREAM'; status?: number; message: string };

export type Result<T, E> = { ok: true; data: T } | { ok: false; error: E };

export type FetchEventsResult = Result<readonly GithubEvent[], GithubEventsError>;

export interface FetchEventsOptions {
  /** Aborts the upstream call; combined with the configured timeout. */
  signal?: AbortSignal;
}
