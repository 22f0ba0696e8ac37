import type { DiffResult, Snapshot } from '../types/snapshot';

/**
 * A named extraction + comparison unit.
 *
 * `get` is total: every missing link on the way to the value yields
 * undefined, never an exception. `diff` treats undefined as a value of its
 * own, so appearing and disappearing both count as a change.
 */
export interface Differ<V> {
  name(): string;
  get(snapshot: Snapshot | undefined): V | undefined;
  diff(oldValue: V | undefined, newValue: V | undefined): DiffResult;
}
