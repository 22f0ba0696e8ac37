import { Controller, Get, Header } from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import { Registry } from 'prom-client';
import { MetricsService } from '../metrics/metrics.service';
import { StateStoreService } from '../state/state-store.service';
import type { DiffMap, Snapshot } from '../types/snapshot';

/**
 * Read-only views of the refresh state.
 * Each handler reads the published state once, so a response never mixes
 * two cycles.
 */
@ApiTags('Monitor')
@Controller()
export class MonitorController {
  constructor(
    private readonly store: StateStoreService,
    private readonly metrics: MetricsService,
  ) {}

  @Get('interfaces')
  @ApiOperation({ summary: 'Current interface snapshot' })
  @ApiResponse({ status: 200, description: 'Interface name to addresses by family; {} before any data' })
  interfaces(): Snapshot {
    return this.store.current().new ?? {};
  }

  @Get('diff')
  @ApiOperation({ summary: 'Changed signal per differ from the latest cycle' })
  @ApiResponse({ status: 200, description: 'Differ name to 0 or 1; {} before the first cycle' })
  diff(): DiffMap {
    return this.store.current().diff;
  }

  @Get('metrics')
  @Header('Content-Type', Registry.PROMETHEUS_CONTENT_TYPE)
  @ApiOperation({ summary: 'Prometheus scrape endpoint' })
  @ApiProduces(Registry.PROMETHEUS_CONTENT_TYPE)
  metricsText(): Promise<string> {
    return this.metrics.render();
  }
}
