import { Injectable, Logger } from '@nestjs/common';

import { GithubEventsClient } from '../github/github-events.client.js';
import type {
  FetchEventsOptions,
  GithubEventsError,
  Result,
} from '../github/github-events.types.js';
import { analyzeUserActivity } from './activity-analyzer.js';
import type { UserActivityReport } from './activity.types.js';

@Injectable()
export class ActivityService {
  private readonly logger = new Logger(ActivityService.name);

  constructor(private readonly events: GithubEventsClient) {}

  /**
   * Fetch (or reuse cached) events for `username` and summarise them per repository.
   */
  async getUserActivity(
    username: string,
    options: FetchEventsOptions = {},
  ): Promise<Result<UserActivityReport, GithubEventsError>> {
    const fetched = await this.events.fetchEvents(username, options);
    if (!fetched.ok) return fetched;

    const report = analyzeUserActivity(fetched.data, username);
    this.logger.log(
      `analyzed ${report.totalEvents} events across ${report.totalRepositories} repositories for ${username}`,
    );
    return { ok: true, data: report };
  }
}
