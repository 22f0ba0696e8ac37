import { z } from 'zod';

export const addressEntrySchema = z.object({
  address: z.string().optional(),
  netmask: z.string().optional(),
  broadcast: z.string().optional(),
  cidr: z.string().nullable().optional(),
  mac: z.string().optional(),
  scopeid: z.number().optional(),
  internal: z.boolean().optional(),
});

export const addressRecordSchema = z.object({
  IPv4: z.array(addressEntrySchema).optional(),
  IPv6: z.array(addressEntrySchema).optional(),
});

/** Persisted form of a Snapshot: interface name -> addresses by family */
export const snapshotSchema = z.record(z.string(), addressRecordSchema);

export type PersistedSnapshot = z.infer<typeof snapshotSchema>;
