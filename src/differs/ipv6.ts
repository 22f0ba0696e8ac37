import { IPv6 } from 'ipaddr.js';

/**
 * Network prefix of an IPv6 address, as a compressed (RFC 5952) string.
 * Returns undefined when the address is not IPv6 or the length is out of range.
 *
 * Zone ids (`fe80::1%eth0`) are dropped before parsing.
 */
export function ipv6NetworkPrefix(address: string, prefixLength: number): string | undefined {
  const [bare] = address.split('%');
  if (!bare || !IPv6.isValid(bare)) return undefined;
  if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > 128) return undefined;

  return IPv6.networkAddressFromCIDR(`${bare}/${prefixLength}`).toRFC5952String();
}

/**
 * Make an interface name usable inside a Prometheus metric name
 */
export function metricSafe(value: string): string {
  return value.replace(/[^a-zA-Z0-9_]/g, '_');
}
