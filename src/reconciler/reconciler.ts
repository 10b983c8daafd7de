import type { Logger } from '../logging/logger.js';
import type { SyncMapping, SyncStateStore } from '../state/types.js';
import {
  ApplyError,
  AuthError,
  FetchError,
  SyncError,
  errorMessage,
} from '../types/errors.js';
import { computePlan } from './plan.js';
import type {
  DestinationAdapter,
  DestinationCard,
  ErrorRecord,
  PlannedChange,
  RunnableJob,
  RunResult,
  SourceAdapter,
  SourceRecord,
  SourceSnapshot,
} from './types.js';

export interface ReconcilerOptions {
  /** Marker namespace; also the job name */
  namespace: string;
  source: SourceAdapter;
  destination: DestinationAdapter;
  store: SyncStateStore;
  logger: Logger;
  /** Persist the state after every applied change instead of once at the end */
  saveAfterEachChange?: boolean;
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * Turn an error thrown while reading into the sync taxonomy.
 * API clients flag rejected credentials with `isAuthError`.
 */
export function classifyError(error: unknown, context: string): SyncError {
  if (error instanceof SyncError) {
    return error;
  }
  const message = `${context}: ${errorMessage(error)}`;
  if (typeof error === 'object' && error !== null && 'isAuthError' in error && error.isAuthError === true) {
    return new AuthError(message, error);
  }
  return new FetchError(message, error);
}

async function guard<T>(context: string, operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw classifyError(error, context);
  }
}

function emptyResult(dryRun: boolean): RunResult {
  return {
    created: 0,
    updated: 0,
    archived: 0,
    unchanged: 0,
    errors: [],
    dryRun,
    changes: [],
  };
}

/**
 * Reads a source, diffs it against the destination board and applies the
 * difference.
 *
 * Reading failures abort the run before anything is mutated. A failed
 * mutation becomes an ErrorRecord and the remaining changes still apply.
 */
export class Reconciler implements RunnableJob {
  private readonly now: () => Date;

  constructor(private readonly options: ReconcilerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async run(dryRun: boolean): Promise<RunResult> {
    const { namespace, source, destination, store, logger } = this.options;
    const result = emptyResult(dryRun);

    logger.info({ job: namespace, dryRun }, 'Starting sync run');

    await guard('Loading sync state failed', () => store.load());

    await guard('Source credential check failed', async () => {
      await source.verify?.();
    });
    await guard('Destination credential check failed', async () => {
      await destination.verify?.();
    });

    const snapshot: SourceSnapshot = await guard('Reading source failed', () => source.fetch());
    const cards: DestinationCard[] = await guard('Listing destination cards failed', () =>
      destination.listCards(namespace)
    );

    logger.info(
      { records: snapshot.records.length, cards: cards.length, windowStart: snapshot.windowStart },
      'Fetched source and destination'
    );

    const plan = computePlan({ namespace, snapshot, cards, mappings: store.list() });
    result.changes = plan.changes;
    result.unchanged = plan.unchanged;
    if (plan.skipped > 0) {
      logger.info({ skipped: plan.skipped }, 'Skipped records already handled at the source');
    }

    if (dryRun) {
      for (const change of plan.changes) {
        logger.info({ change }, `Dry run: would ${change.type} ${change.sourceId}`);
        this.count(result, change);
      }
      logger.info(
        { created: result.created, updated: result.updated, archived: result.archived },
        'Dry run finished; nothing was changed'
      );
      return result;
    }

    const syncedAt = this.now().toISOString();

    for (const sourceId of plan.staleMappings) {
      logger.warn({ sourceId }, 'Mapped card no longer exists; dropping mapping');
      store.delete(sourceId);
    }
    for (const sourceId of plan.expiredMappings) {
      logger.debug({ sourceId }, 'Source record left the read window; forgetting its card');
      store.delete(sourceId);
    }
    for (const adoption of plan.adoptions) {
      logger.info(adoption, 'Adopting card found by its sync marker');
      store.set({ ...adoption, syncedAt, archivedBySync: false });
    }

    const recordsById = new Map(snapshot.records.map((record) => [record.id, record]));
    const createdRecords: SourceRecord[] = [];

    for (const change of plan.changes) {
      try {
        const mapping = await this.apply(change, syncedAt);
        if (mapping) {
          store.set(mapping);
        }
        this.count(result, change);
        if (change.type === 'create') {
          const record = recordsById.get(change.sourceId);
          if (record) {
            createdRecords.push(record);
          }
        }
      } catch (error) {
        const cardId = change.type === 'create' ? undefined : change.cardId;
        result.errors.push(this.recordError(change.type, change.sourceId, error, cardId));
        continue;
      }

      if (this.options.saveAfterEachChange) {
        await this.persist(result);
      }
    }

    if (source.acknowledge) {
      for (const record of createdRecords) {
        try {
          await source.acknowledge(record);
        } catch (error) {
          result.errors.push(this.recordError('acknowledge', record.id, error));
        }
      }
    }

    await this.persist(result);

    logger.info(
      {
        created: result.created,
        updated: result.updated,
        archived: result.archived,
        unchanged: result.unchanged,
        errors: result.errors.length,
      },
      'Sync run finished'
    );

    return result;
  }

  /**
   * Apply one change; returns the mapping to store for it
   */
  private async apply(change: PlannedChange, syncedAt: string): Promise<SyncMapping | undefined> {
    const { destination, store, logger } = this.options;

    switch (change.type) {
      case 'create': {
        const card = await destination.createCard(change.content);
        logger.info({ sourceId: change.sourceId, cardId: card.id }, `Created card "${card.name}"`);
        return {
          sourceId: change.sourceId,
          cardId: card.id,
          sourceTimestamp: change.sourceTimestamp,
          syncedAt,
          archivedBySync: false,
        };
      }
      case 'update': {
        await destination.updateCard(change.cardId, change.patch);
        logger.info(
          { sourceId: change.sourceId, cardId: change.cardId, fields: Object.keys(change.patch) },
          `Updated card "${change.cardName}"`
        );
        return {
          sourceId: change.sourceId,
          cardId: change.cardId,
          sourceTimestamp: change.sourceTimestamp,
          syncedAt,
          archivedBySync: false,
        };
      }
      case 'archive': {
        await destination.archiveCard(change.cardId, change.moveToListId);
        logger.info(
          { sourceId: change.sourceId, cardId: change.cardId, reason: change.reason },
          `Archived card "${change.cardName}"`
        );
        if (change.reason === 'duplicate') {
          return undefined;
        }
        const mapping = store.get(change.sourceId);
        if (!mapping) {
          // Found by its marker only; record it so the card is reopened, not orphaned
          return {
            sourceId: change.sourceId,
            cardId: change.cardId,
            sourceTimestamp: syncedAt,
            syncedAt,
            archivedBySync: true,
          };
        }
        if (mapping.cardId !== change.cardId) {
          return undefined;
        }
        return { ...mapping, syncedAt, archivedBySync: true };
      }
    }
  }

  private count(result: RunResult, change: PlannedChange): void {
    switch (change.type) {
      case 'create':
        result.created++;
        break;
      case 'update':
        result.updated++;
        break;
      case 'archive':
        result.archived++;
        break;
    }
  }

  private recordError(
    operation: ErrorRecord['operation'],
    sourceId: string,
    error: unknown,
    cardId?: string
  ): ErrorRecord {
    const applyError = new ApplyError(`${operation} failed for ${sourceId}: ${errorMessage(error)}`, sourceId, error);
    this.options.logger.error({ err: applyError, sourceId, cardId }, applyError.message);
    return {
      kind: 'apply',
      operation,
      sourceId,
      cardId,
      message: applyError.message,
    };
  }

  private async persist(result: RunResult): Promise<void> {
    try {
      await this.options.store.flush();
    } catch (error) {
      result.errors.push(this.recordError('persist', this.options.namespace, error));
    }
  }
}
