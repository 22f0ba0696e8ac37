import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { MetricsService } from '../metrics/metrics.service';
import { changeGaugeName } from './change-gauge';
import { Differ } from './differ';
import { Ipv6PrefixDiffer, Ipv6PrefixDifferOptions } from './ipv6-prefix.differ';

/**
 * Ordered set of differs, built once from configuration.
 * The state store runs them in this order on every refresh.
 */
@Injectable()
export class DifferRegistry {
  private readonly logger = new Logger(DifferRegistry.name);
  readonly differs: ReadonlyArray<Differ<unknown>>;

  constructor(config: ConfigService, metrics: MetricsService) {
    const ipv6Prefix: Ipv6PrefixDifferOptions = {
      interfaceName: config.interfaceName,
      prefixLength: config.prefixLength,
    };

    this.differs = Object.freeze([
      new Ipv6PrefixDiffer(
        ipv6Prefix,
        metrics.gauge(
          changeGaugeName(Ipv6PrefixDiffer.nameFor(ipv6Prefix)),
          Ipv6PrefixDiffer.helpFor(ipv6Prefix),
        ),
      ),
    ]);

    this.logger.log(`Registered differs: ${this.names().join(', ')}`);
  }

  names(): string[] {
    return this.differs.map((differ) => differ.name());
  }
}
