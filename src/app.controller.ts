import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { GithubEventsClient } from './github/github-events.client.js';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(private readonly events: GithubEventsClient) {}

  @Get('health')
  @ApiOperation({ summary: 'Liveness probe with events cache occupancy' })
  getHealth() {
    return {
      status: 'ok' as const,
      timestamp: new Date().toISOString(),
      eventsCache: this.events.cacheStats(),
    };
  }
}
