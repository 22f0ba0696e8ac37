import { Injectable } from '@nestjs/common';
import { networkInterfaces, NetworkInterfaceInfo } from 'os';
import { AddressEntry, AddressFamily, AddressRecord, Snapshot, freezeSnapshot } from '../types/snapshot';
import { SnapshotCaptureError, errorMessage } from '../types/error-taxonomy';
import { SnapshotSource } from './snapshot-source';

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

/**
 * Snapshot source backed by os.networkInterfaces()
 */
@Injectable()
export class OsSnapshotSource implements SnapshotSource {
  async capture(): Promise<Snapshot> {
    let table: InterfaceTable;
    try {
      table = networkInterfaces();
    } catch (error) {
      throw new SnapshotCaptureError(`networkInterfaces() failed: ${errorMessage(error)}`, error);
    }
    return buildSnapshot(table);
  }
}

/**
 * Group each interface's addresses by family, keeping OS order within a family.
 * The result is deeply frozen.
 */
export function buildSnapshot(table: InterfaceTable): Snapshot {
  const snapshot: Record<string, AddressRecord> = {};

  for (const name of Object.keys(table).sort()) {
    const byFamily: Partial<Record<AddressFamily, AddressEntry[]>> = {};

    for (const info of table[name] ?? []) {
      const family = toFamily(info.family);
      if (!family) continue;

      const entries = byFamily[family] ?? [];
      entries.push(toEntry(info));
      byFamily[family] = entries;
    }

    snapshot[name] = byFamily;
  }

  return freezeSnapshot(snapshot);
}

// Node 18.0-18.3 reported the family as a number
function toFamily(family: string | number): AddressFamily | null {
  if (family === 'IPv4' || family === 4) return 'IPv4';
  if (family === 'IPv6' || family === 6) return 'IPv6';
  return null;
}

function toEntry(info: NetworkInterfaceInfo): AddressEntry {
  const entry: AddressEntry = {
    address: info.address,
    netmask: info.netmask,
    cidr: info.cidr,
    mac: info.mac,
    internal: info.internal,
  };
  if (info.family === 'IPv6') {
    entry.scopeid = info.scopeid;
  }
  return entry;
}
