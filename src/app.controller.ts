import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RefreshSchedulerService } from './scheduler/refresh-scheduler.service';
import { StateStoreService } from './state/state-store.service';
import { VERSION } from './version';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(
    private readonly store: StateStoreService,
    private readonly scheduler: RefreshSchedulerService,
  ) {}

  @Get('health')
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({ status: 200, description: 'Service is up; status is degraded while refreshes keep failing' })
  health() {
    return {
      status: this.scheduler.failures > 0 ? 'degraded' : 'ok',
      timestamp: new Date().toISOString(),
      scheduler: this.scheduler.state,
      consecutiveFailures: this.scheduler.failures,
      lastRefreshAt: this.store.current().refreshedAt ?? null,
    };
  }

  @Get()
  @ApiOperation({ summary: 'Service root endpoint' })
  @ApiResponse({ status: 200, description: 'Service information' })
  root() {
    return {
      name: 'ifwatch',
      version: VERSION,
      description: 'Network interface change monitor',
      endpoints: ['/interfaces', '/diff', '/metrics', '/health'],
    };
  }
}
