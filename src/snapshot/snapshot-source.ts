import type { Snapshot } from '../types/snapshot';

/**
 * Produces a fresh Snapshot of the host's interfaces.
 * Implementations throw SnapshotCaptureError when the OS query fails.
 */
export interface SnapshotSource {
  capture(): Promise<Snapshot>;
}

export const SNAPSHOT_SOURCE = Symbol('SNAPSHOT_SOURCE');
