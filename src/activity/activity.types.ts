export interface ActivityTypeCount {
  type: string;
  count: number;
}

export interface RepositoryActivitySummary {
  repositoryName: string; // owner/name
  isOwner: boolean;
  topActivityTypes: ActivityTypeCount[]; // at most TOP_ACTIVITY_TYPES entries
}

export interface UserActivityReport {
  username: string;
  repositories: RepositoryActivitySummary[]; // first-seen order
  totalRepositories: number;
  totalEvents: number;
}

export const TOP_ACTIVITY_TYPES = 3;
