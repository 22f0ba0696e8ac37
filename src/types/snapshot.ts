/**
 * Snapshot and refresh state types
 *
 * A Snapshot is a point-in-time capture of every interface and its addresses.
 * RefreshState is what the HTTP read surface observes; it is replaced wholesale
 * on every refresh cycle and never mutated after publication.
 */

export type AddressFamily = 'IPv4' | 'IPv6';

export const ADDRESS_FAMILIES: readonly AddressFamily[] = ['IPv4', 'IPv6'];

export interface AddressEntry {
  /** Absent only in hand-edited or legacy state files */
  address?: string;
  netmask?: string;
  broadcast?: string;
  cidr?: string | null;
  mac?: string;
  scopeid?: number;
  internal?: boolean;
}

/** Addresses of one interface, grouped by family in OS order */
export type AddressRecord = Partial<Record<AddressFamily, readonly AddressEntry[]>>;

export type Snapshot = Readonly<Record<string, AddressRecord>>;

/** 1 when the extracted value changed between two snapshots, 0 otherwise */
export type DiffResult = 0 | 1;

export type DiffMap = Readonly<Record<string, DiffResult>>;

export interface RefreshState {
  /** `new` of the previous cycle, or the persisted baseline */
  readonly old?: Snapshot;
  /** Most recently completed capture */
  readonly new?: Snapshot;
  readonly diff: DiffMap;
  /** ISO 8601 timestamp of the cycle that produced this state */
  readonly refreshedAt?: string;
}

/**
 * Freeze a snapshot, its records and their entries in place
 */
export function freezeSnapshot(snapshot: Record<string, AddressRecord>): Snapshot {
  for (const record of Object.values(snapshot)) {
    for (const family of ADDRESS_FAMILIES) {
      const entries = record[family];
      if (!entries) continue;
      entries.forEach((entry) => Object.freeze(entry));
      Object.freeze(entries);
    }
    Object.freeze(record);
  }
  return Object.freeze(snapshot);
}
