import { Injectable, LogLevel } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import { EnvConfig, LOG_LEVELS, secondsToMs } from './env.validation';

/**
 * Typed access to the validated environment.
 * Read once at startup; nothing here changes while the process runs.
 */
@Injectable()
export class ConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  get nodeEnv(): string {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): number {
    return parseInt(this.configService.get('PORT', { infer: true }), 10);
  }

  get host(): string {
    return this.configService.get('HOST', { infer: true });
  }

  get interfaceName(): string {
    return this.configService.get('INTERFACE', { infer: true });
  }

  get prefixLength(): number {
    return parseInt(this.configService.get('PREFIX_LENGTH', { infer: true }), 10);
  }

  get pollingIntervalMs(): number {
    return secondsToMs(this.configService.get('POLLING_INTERVAL', { infer: true }));
  }

  /**
   * Path of the persisted snapshot, or null when persistence is disabled
   */
  get stateFile(): string | null {
    const path = this.configService.get('STATE_FILE', { infer: true }).trim();
    return path.length > 0 ? path : null;
  }

  get schedulerEnabled(): boolean {
    return parseBoolean(this.configService.get('SCHEDULER_ENABLED', { infer: true }));
  }

  get defaultMetricsEnabled(): boolean {
    return parseBoolean(this.configService.get('METRICS_DEFAULT_COLLECTORS', { infer: true }));
  }

  /**
   * LOG_LEVEL and every level more severe than it
   */
  get logLevels(): LogLevel[] {
    const level = this.configService.get('LOG_LEVEL', { infer: true });
    return LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(level) + 1);
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}

function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value === '1';
}
