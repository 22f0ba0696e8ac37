import { Gauge } from 'prom-client';
import type { DiffResult } from '../types/snapshot';

export type Equality<V> = (a: V, b: V) => boolean;

const strictEquality = <V>(a: V, b: V): boolean => a === b;

/**
 * Compare two extracted values and publish the result on a gauge.
 * Shared by every differ variant; absent only equals absent.
 */
export function reportChange<V>(
  gauge: Gauge,
  oldValue: V | undefined,
  newValue: V | undefined,
  equals: Equality<V> = strictEquality,
): DiffResult {
  const changed = !sameValue(oldValue, newValue, equals);
  const result: DiffResult = changed ? 1 : 0;
  gauge.set(result);
  return result;
}

function sameValue<V>(a: V | undefined, b: V | undefined, equals: Equality<V>): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return equals(a, b);
}

/**
 * Gauge metric name for a differ
 */
export function changeGaugeName(differName: string): string {
  return `${differName}_changed`;
}
