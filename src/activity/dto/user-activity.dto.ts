import { ApiProperty } from '@nestjs/swagger';
import { Matches } from 'class-validator';
import type { UserActivityReport } from '../activity.types.js';

// GitHub logins: alphanumerics and single hyphens, no leading/trailing hyphen, max 39 chars
const GITHUB_LOGIN_RE = /^(?=.{1,39}$)[A-Za-z0-9](?:-?[A-Za-z0-9])*$/;

export class UsernameParamDto {
  @ApiProperty({ example: 'octocat' })
  @Matches(GITHUB_LOGIN_RE, { message: 'username must be a valid GitHub login' })
  username!: string;
}

export class ActivityTypeDto {
  @ApiProperty({ example: 'PushEvent' })
  type!: string;

  @ApiProperty({ example: 4 })
  count!: number;
}

export class RepositoryActivityDto {
  @ApiProperty({ example: 'octocat/hello-world', description: 'Full repository name (owner/repo)' })
  repository_name!: string;

  @ApiProperty({ description: 'Whether the user owns the repository' })
  is_owner!: boolean;

  @ApiProperty({ type: [ActivityTypeDto], maxItems: 3, description: 'Top 3 activity types' })
  top_activity_types!: ActivityTypeDto[];
}

export class UserActivityResponseDto {
  @ApiProperty({ example: 'octocat' })
  username!: string;

  @ApiProperty({ type: [RepositoryActivityDto] })
  repositories!: RepositoryActivityDto[];

  @ApiProperty({ example: 2 })
  total_repositories!: number;

  @ApiProperty({ example: 7 })
  total_events!: number;
}

export function toUserActivityResponse(report: UserActivityReport): UserActivityResponseDto {
  return {
    username: report.username,
    repositories: report.repositories.map((repo) => ({
      repository_name: repo.repositoryName,
      is_owner: repo.isOwner,
      top_activity_types: repo.topActivityTypes.map(({ type, count }) => ({ type, count })),
    })),
    total_repositories: report.totalRepositories,
    total_events: report.totalEvents,
  };
}
