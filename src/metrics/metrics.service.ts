import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { collectDefaultMetrics, Gauge, Registry } from 'prom-client';
import { ConfigService } from '../config/config.service';

/**
 * Owns the Prometheus registry of the application context.
 * Metrics go to this Registry, never to prom-client's global one.
 */
@Injectable()
export class MetricsService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(MetricsService.name);
  readonly registry = new Registry();

  constructor(private readonly config: ConfigService) {}

  onModuleInit() {
    if (this.config.defaultMetricsEnabled) {
      collectDefaultMetrics({ register: this.registry });
      this.logger.log('Default process metrics enabled');
    }
  }

  onModuleDestroy() {
    this.registry.clear();
  }

  /**
   * Register a gauge, or return the one already registered under that name
   */
  gauge(name: string, help: string): Gauge {
    const existing = this.registry.getSingleMetric(name);
    if (existing instanceof Gauge) {
      return existing;
    }
    return new Gauge({ name, help, registers: [this.registry] });
  }

  /**
   * Prometheus text exposition of every registered metric
   */
  render(): Promise<string> {
    return this.registry.metrics();
  }
}
