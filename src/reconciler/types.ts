/**
 * Types shared by every reconciliation job
 */

/**
 * A destination list, by id or by name (matched case-insensitively)
 */
export type ListRef = { id: string } | { name: string };

/**
 * A checklist copied onto a card when it is created
 */
export interface ChecklistContent {
  name: string;
  items: Array<{ name: string; checked: boolean }>;
}

/**
 * The desired state of a card
 */
export interface CardContent {
  name: string;
  description: string;
  list: ListRef;
  due: string | null;
  /** URLs attached when the card is created */
  attachments: string[];
  /** Comment posted when the card is created */
  comment?: string;
  /** Checklists added when the card is created */
  checklists?: ChecklistContent[];
  /** Member ids assigned when the card is created */
  members?: string[];
}

/**
 * An item from the upstream system
 */
export interface SourceRecord {
  /** Stable identifier, unique within a job */
  id: string;
  /** ISO timestamp of the item */
  timestamp: string;
  content: CardContent;
  /**
   * Already dealt with at the source: no card is created for it, but a card
   * it already has is kept in sync
   */
  handled?: boolean;
}

/**
 * The result of one source read
 */
export interface SourceSnapshot {
  records: SourceRecord[];
  /**
   * ISO start of the time window the read covered. Mapped records older than
   * this are out of view and left alone. Unset means the read saw everything.
   */
  windowStart?: string;
}

/**
 * A card as listed on the destination board
 */
export interface DestinationCard {
  id: string;
  name: string;
  description: string;
  listId: string;
  listName: string;
  due: string | null;
  closed: boolean;
  /** Record id from the sync marker in the description, for this job's namespace */
  sourceId: string | undefined;
}

/**
 * Field changes for an existing card; absent fields are left as they are
 */
export interface CardPatch {
  name?: string;
  description?: string;
  list?: ListRef;
  due?: string | null;
  /** Only ever false: reopening a card the sync archived */
  closed?: false;
}

export interface SourceAdapter {
  /** Check the credentials before anything is read */
  verify?(): Promise<void>;
  fetch(): Promise<SourceSnapshot>;
  /** Mark a record as handled upstream once its card exists */
  acknowledge?(record: SourceRecord): Promise<void>;
}

export type CreatedCard = Pick<DestinationCard, 'id' | 'name'>;

export interface DestinationAdapter {
  /** Check the credentials before anything is read */
  verify?(): Promise<void>;
  /** Every card on the destination, archived ones included */
  listCards(namespace: string): Promise<DestinationCard[]>;
  /** Create a card; content.description already carries the sync marker */
  createCard(content: CardContent): Promise<CreatedCard>;
  updateCard(cardId: string, patch: CardPatch): Promise<void>;
  /** Archive a card, optionally moving it to another list first */
  archiveCard(cardId: string, moveToListId?: string): Promise<void>;
}

export type ArchiveReason = 'no-longer-qualifies' | 'duplicate' | 'completed';

export interface CreateChange {
  type: 'create';
  sourceId: string;
  sourceTimestamp: string;
  content: CardContent;
}

export interface UpdateChange {
  type: 'update';
  sourceId: string;
  sourceTimestamp: string;
  cardId: string;
  cardName: string;
  patch: CardPatch;
}

export interface ArchiveChange {
  type: 'archive';
  sourceId: string;
  cardId: string;
  cardName: string;
  reason: ArchiveReason;
  /** List to move the card into before archiving */
  moveToListId?: string;
}

export type PlannedChange = CreateChange | UpdateChange | ArchiveChange;

export type ErrorOperation = PlannedChange['type'] | 'acknowledge' | 'persist';

/**
 * A failed mutation; the run carried on
 */
export interface ErrorRecord {
  kind: 'apply';
  operation: ErrorOperation;
  sourceId: string;
  cardId?: string;
  message: string;
}

export interface RunResult {
  created: number;
  updated: number;
  archived: number;
  unchanged: number;
  errors: ErrorRecord[];
  dryRun: boolean;
  /** Planned changes, in the order they were (or would be) applied */
  changes: PlannedChange[];
}

/**
 * A job that can be run by the CLI
 */
export interface RunnableJob {
  run(dryRun: boolean): Promise<RunResult>;
}
