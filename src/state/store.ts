import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import type { Logger } from '../logging/logger.js';
import { acquireLock, releaseLock, type LockOptions } from './lock.js';
import {
  STATE_VERSION,
  SyncStateSchema,
  type SyncMapping,
  type SyncState,
  type SyncStateStore,
} from './types.js';

/**
 * Create an empty sync state
 */
export function createEmptySyncState(): SyncState {
  return {
    version: STATE_VERSION,
    lastSyncAt: undefined,
    mappings: {},
  };
}

/**
 * Add or replace a mapping.
 *
 * A card belongs to one source record only: any other mapping that points
 * at the same card is dropped.
 */
export function addMapping(state: SyncState, mapping: SyncMapping): SyncState {
  const mappings: Record<string, SyncMapping> = {};
  for (const [sourceId, existing] of Object.entries(state.mappings)) {
    if (existing.cardId !== mapping.cardId || sourceId === mapping.sourceId) {
      mappings[sourceId] = existing;
    }
  }
  mappings[mapping.sourceId] = mapping;
  return { ...state, mappings };
}

/**
 * Remove a mapping from the sync state
 */
export function removeMapping(state: SyncState, sourceId: string): SyncState {
  const { [sourceId]: _removed, ...remaining } = state.mappings;
  return { ...state, mappings: remaining };
}

/**
 * Check for mappings whose key disagrees with their source id, and for cards
 * claimed by more than one source record
 */
export function verifyStateIntegrity(state: SyncState): { valid: boolean; issues: string[] } {
  const issues: string[] = [];
  const owners = new Map<string, string>();

  for (const [sourceId, mapping] of Object.entries(state.mappings)) {
    if (mapping.sourceId !== sourceId) {
      issues.push(`Mapping key '${sourceId}' does not match sourceId '${mapping.sourceId}'`);
    }
    const owner = owners.get(mapping.cardId);
    if (owner !== undefined) {
      issues.push(`Card ${mapping.cardId} is mapped from both '${owner}' and '${sourceId}'`);
    } else {
      owners.set(mapping.cardId, sourceId);
    }
  }

  return { valid: issues.length === 0, issues };
}

/**
 * In-memory store for tests and one-off runs
 */
export class MemorySyncStateStore implements SyncStateStore {
  private state: SyncState;
  /** Number of times flush() was called */
  flushCount = 0;

  constructor(initial: SyncState = createEmptySyncState()) {
    this.state = initial;
  }

  async load(): Promise<void> {
    // Nothing to read
  }

  get(sourceId: string): SyncMapping | undefined {
    return this.state.mappings[sourceId];
  }

  list(): SyncMapping[] {
    return Object.values(this.state.mappings);
  }

  set(mapping: SyncMapping): void {
    this.state = addMapping(this.state, mapping);
  }

  delete(sourceId: string): void {
    this.state = removeMapping(this.state, sourceId);
  }

  async flush(): Promise<void> {
    this.flushCount++;
    this.state = { ...this.state, lastSyncAt: new Date().toISOString() };
  }

  /** Current state, for inspection */
  snapshot(): SyncState {
    return this.state;
  }
}

export interface FileSyncStateStoreOptions {
  logger?: Logger;
  lock?: LockOptions;
}

/**
 * Read a state file; a missing file is an empty state, a corrupt one is
 * logged and replaced by an empty state
 */
export function readSyncStateFile(filePath: string, logger?: Logger): SyncState {
  const absolutePath = path.resolve(filePath);
  if (!fs.existsSync(absolutePath)) {
    return createEmptySyncState();
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  try {
    return SyncStateSchema.parse(JSON.parse(content));
  } catch (error) {
    logger?.warn(
      { statePath: absolutePath, err: error },
      'Could not parse sync state file, starting fresh'
    );
    return createEmptySyncState();
  }
}

/**
 * Write the state using an atomic write (temp file + rename)
 */
export function writeSyncStateFile(filePath: string, state: SyncState): void {
  const absolutePath = path.resolve(filePath);
  fs.mkdirSync(path.dirname(absolutePath), { recursive: true });

  const tempPath = `${absolutePath}.${crypto.randomUUID()}.tmp`;
  try {
    fs.writeFileSync(tempPath, JSON.stringify(state, null, 2), 'utf-8');
    fs.renameSync(tempPath, absolutePath);
  } catch (error) {
    fs.rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * JSON file store.
 *
 * Local writes are kept as pending operations; `flush()` re-reads the file
 * under a lock and replays them, so two overlapping runs merge their
 * mappings instead of the later one overwriting the earlier one.
 */
export class FileSyncStateStore implements SyncStateStore {
  private state: SyncState = createEmptySyncState();
  /** Source id -> mapping to write, or null to delete */
  private pending = new Map<string, SyncMapping | null>();

  constructor(
    readonly filePath: string,
    private readonly options: FileSyncStateStoreOptions = {}
  ) {}

  async load(): Promise<void> {
    this.state = readSyncStateFile(this.filePath, this.options.logger);
    this.pending.clear();
  }

  get(sourceId: string): SyncMapping | undefined {
    return this.state.mappings[sourceId];
  }

  list(): SyncMapping[] {
    return Object.values(this.state.mappings);
  }

  set(mapping: SyncMapping): void {
    this.state = addMapping(this.state, mapping);
    this.pending.set(mapping.sourceId, mapping);
  }

  delete(sourceId: string): void {
    this.state = removeMapping(this.state, sourceId);
    this.pending.set(sourceId, null);
  }

  async flush(): Promise<void> {
    const lockId = await acquireLock(this.filePath, this.options.lock);
    try {
      let merged = readSyncStateFile(this.filePath, this.options.logger);
      for (const [sourceId, mapping] of this.pending) {
        merged = mapping ? addMapping(merged, mapping) : removeMapping(merged, sourceId);
      }
      merged = { ...merged, lastSyncAt: new Date().toISOString() };
      writeSyncStateFile(this.filePath, merged);
      this.state = merged;
      this.pending.clear();
    } finally {
      releaseLock(this.filePath, lockId);
    }
  }
}

/**
 * State file path for a job inside the state directory
 */
export function stateFilePath(stateDir: string, job: string): string {
  return path.join(stateDir, `${job}.json`);
}
