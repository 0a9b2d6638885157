import {
  Controller,
  Get,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Param,
  Res,
} from '@nestjs/common';
import {
  ApiInternalServerErrorResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiTooManyRequestsResponse,
} from '@nestjs/swagger';
import type { FastifyReply } from 'fastify';

import type { GithubEventsError } from '../github/github-events.types.js';
import { ActivityService } from './activity.service.js';
import {
  toUserActivityResponse,
  UserActivityResponseDto,
  UsernameParamDto,
} from './dto/user-activity.dto.js';

@ApiTags('activity')
@Controller('api/v1')
export class ActivityController {
  private readonly logger = new Logger(ActivityController.name);

  constructor(private readonly activity: ActivityService) {}

  // GET /api/v1/users/octocat/activity
  @Get('users/:username/activity')
  @ApiOperation({
    summary: 'Get user activity analysis',
    description: 'Analyze GitHub user activity and return top 3 activity types per repository',
  })
  @ApiOkResponse({ type: UserActivityResponseDto })
  @ApiNotFoundResponse({ description: 'GitHub user does not exist' })
  @ApiTooManyRequestsResponse({ description: 'GitHub rate limit hit; see Retry-After' })
  @ApiInternalServerErrorResponse({ description: 'Upstream or internal failure' })
  async getUserActivity(
    @Param() params: UsernameParamDto,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<UserActivityResponseDto> {
    const { username } = params;

    // client went away before we answered: stop waiting on GitHub
    const abort = new AbortController();
    const abandon = () => {
      if (!reply.raw.writableEnded) abort.abort();
    };
    reply.raw.once('close', abandon);

    let result: Awaited<ReturnType<ActivityService['getUserActivity']>>;
    try {
      result = await this.activity.getUserActivity(username, { signal: abort.signal });
    } catch (err) {
      this.logger.error(
        `Unexpected error processing request for user ${username}`,
        err instanceof Error ? err.stack : String(err),
      );
      throw new InternalServerErrorException('Internal server error');
    } finally {
      reply.raw.off('close', abandon);
    }

    if (result.ok) return toUserActivityResponse(result.data);
    throw this.toHttpException(result.error, username, reply);
  }

  private toHttpException(error: GithubEventsError, username: string, reply: FastifyReply) {
    switch (error.code) {
      case 'NOT_FOUND':
        this.logger.log(`User not found: ${username}`);
        return new NotFoundException(error.message);
      case 'RATE_LIMIT':
        if (error.retryAfterSeconds) reply.header('Retry-After', String(error.retryAfterSeconds));
        return new HttpException(error.message, HttpStatus.TOO_MANY_REQUESTS);
      case 'UPSTREAM': {
        this.logger.warn(`GitHub API error for user ${username}: ${error.message} (status=${error.status})`);
        const status = error.status && error.status >= 400 ? error.status : HttpStatus.INTERNAL_SERVER_ERROR;
        return new HttpException(error.message, status);
      }
    }
  }
}
