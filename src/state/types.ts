import { z } from 'zod';

export const STATE_VERSION = '1.0.0';

/**
 * Mapping between a source record and the card the sync created for it
 */
export const SyncMappingSchema = z.object({
  sourceId: z.string().min(1),
  cardId: z.string().min(1),
  /** Timestamp of the source record when it was last seen */
  sourceTimestamp: z.string(),
  syncedAt: z.string(),
  /** True when the sync itself archived the card */
  archivedBySync: z.boolean().default(false),
});

export type SyncMapping = z.infer<typeof SyncMappingSchema>;

/**
 * Persisted sync state for one job
 */
export const SyncStateSchema = z.object({
  version: z.string().default(STATE_VERSION),
  lastSyncAt: z.string().optional(),
  mappings: z.record(z.string(), SyncMappingSchema),
});

export type SyncState = z.infer<typeof SyncStateSchema>;

/**
 * Key-value store of mappings, keyed by source record id.
 *
 * Passed to the reconciler at construction. Writes are buffered until
 * `flush()` so a dry run can use the same store without persisting.
 */
export interface SyncStateStore {
  /** Read the persisted state into memory; later reads see local writes */
  load(): Promise<void>;
  get(sourceId: string): SyncMapping | undefined;
  list(): SyncMapping[];
  set(mapping: SyncMapping): void;
  delete(sourceId: string): void;
  /** Persist buffered writes */
  flush(): Promise<void>;
}
