import { Gauge } from 'prom-client';
import type { AddressEntry, DiffResult, Snapshot } from '../types/snapshot';
import { reportChange } from './change-gauge';
import { Differ } from './differ';
import { ipv6NetworkPrefix, metricSafe } from './ipv6';

export interface Ipv6PrefixDifferOptions {
  interfaceName: string;
  prefixLength: number;
}

/**
 * Tracks the network prefix of an interface's first IPv6 address.
 *
 * The prefix is derived by masking the assigned address, which assumes its
 * leading bits match the delegated prefix. Nothing guarantees that; a router
 * advertisement or DHCPv6 lease would be the authoritative source. Later
 * addresses of the family are ignored.
 */
export class Ipv6PrefixDiffer implements Differ<string> {
  private readonly differName: string;

  constructor(
    private readonly options: Ipv6PrefixDifferOptions,
    private readonly gauge: Gauge,
  ) {
    this.differName = Ipv6PrefixDiffer.nameFor(options);
  }

  static nameFor({ interfaceName, prefixLength }: Ipv6PrefixDifferOptions): string {
    return `ipv6_prefix_${metricSafe(interfaceName)}_${prefixLength}`;
  }

  static helpFor({ interfaceName }: Ipv6PrefixDifferOptions): string {
    return `First IPv6 address of the ${interfaceName} network interface changed`;
  }

  name(): string {
    return this.differName;
  }

  get(snapshot: Snapshot | undefined): string | undefined {
    if (!snapshot) return undefined;

    if (!Object.prototype.hasOwnProperty.call(snapshot, this.options.interfaceName)) return undefined;
    const record = snapshot[this.options.interfaceName];
    if (!record) return undefined;

    const addresses = record.IPv6;
    if (!addresses || addresses.length === 0) return undefined;

    const first: AddressEntry | undefined = addresses[0];
    const address = first?.address;
    if (!address) return undefined;

    return ipv6NetworkPrefix(address, this.options.prefixLength);
  }

  diff(oldValue: string | undefined, newValue: string | undefined): DiffResult {
    return reportChange(this.gauge, oldValue, newValue);
  }
}
