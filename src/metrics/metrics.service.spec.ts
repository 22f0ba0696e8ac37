import { Logger } from '@nestjs/common';
import { collectDefaultMetrics } from 'prom-client';
import { ConfigService } from '../config/config.service';
import { MetricsService } from './metrics.service';

jest.mock('prom-client', () => ({
  ...jest.requireActual('prom-client'),
  collectDefaultMetrics: jest.fn(),
}));

function createService(defaultMetricsEnabled: boolean): MetricsService {
  return new MetricsService({ defaultMetricsEnabled } as unknown as ConfigService);
}

describe('MetricsService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should render registered gauges', async () => {
    const service = createService(false);
    service.gauge('ipv6_prefix_eth0_64_changed', 'help text').set(1);

    await expect(service.render()).resolves.toBe(
      [
        '# HELP ipv6_prefix_eth0_64_changed help text',
        '# TYPE ipv6_prefix_eth0_64_changed gauge',
        'ipv6_prefix_eth0_64_changed 1',
        '',
      ].join('\n'),
    );
  });

  it('should return the existing gauge for a registered name', () => {
    const service = createService(false);

    expect(service.gauge('a_changed', 'a')).toBe(service.gauge('a_changed', 'a'));
  });

  it('should keep registries of separate instances apart', async () => {
    const first = createService(false);
    const second = createService(false);
    first.gauge('only_in_first', 'help');

    await expect(second.render()).resolves.not.toContain('only_in_first');
  });

  it('should collect process metrics into its own registry when enabled', () => {
    const service = createService(true);

    service.onModuleInit();

    expect(collectDefaultMetrics).toHaveBeenCalledWith({ register: service.registry });
  });

  it('should not collect process metrics when disabled', () => {
    createService(false).onModuleInit();

    expect(collectDefaultMetrics).not.toHaveBeenCalled();
  });

  it('should clear its registry on shutdown', async () => {
    const service = createService(false);
    service.gauge('a_changed', 'a').set(1);

    service.onModuleDestroy();

    await expect(service.render()).resolves.not.toContain('a_changed');
  });
});
