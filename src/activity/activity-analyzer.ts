import { repositoryOwner } from '../github/github-events.types.js';
import type { GithubEvent, RepositoryRef } from '../github/github-events.types.js';
import { TOP_ACTIVITY_TYPES } from './activity.types.js';
import type {
  ActivityTypeCount,
  RepositoryActivitySummary,
  UserActivityReport,
} from './activity.types.js';

interface RepositoryGroup {
  repository: RepositoryRef;
  events: GithubEvent[];
}

/** Group events by repository full name; Map keeps first-seen order. */
export function groupByRepository(events: readonly GithubEvent[]): RepositoryGroup[] {
  const groups = new Map<string, RepositoryGroup>();
  for (const event of events) {
    const key = event.repository.fullName;
    const group = groups.get(key);
    if (group) {
      group.events.push(event);
    } else {
      groups.set(key, { repository: event.repository, events: [event] });
    }
  }
  return Array.from(groups.values());
}

/**
 * Count activity types and keep the `limit` most frequent.
 * Equal counts keep the order in which the types first appeared.
 */
export function topActivityTypes(
  events: readonly GithubEvent[],
  limit = TOP_ACTIVITY_TYPES,
): ActivityTypeCount[] {
  const counts = new Map<string, number>();
  for (const { activityType } of events) {
    counts.set(activityType, (counts.get(activityType) ?? 0) + 1);
  }
  // Array#sort is stable
  return Array.from(counts, ([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function isRepositoryOwner(repository: RepositoryRef, username: string): boolean {
  return repositoryOwner(repository).toLowerCase() === username.toLowerCase();
}

export function analyzeUserActivity(
  events: readonly GithubEvent[],
  username: string,
): UserActivityReport {
  const repositories: RepositoryActivitySummary[] = groupByRepository(events).map((group) => ({
    repositoryName: group.repository.fullName,
    isOwner: isRepositoryOwner(group.repository, username),
    topActivityTypes: topActivityTypes(group.events),
  }));

  return {
    username,
    repositories,
    totalRepositories: repositories.length,
    totalEvents: events.length,
  };
}
