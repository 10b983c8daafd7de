import type { SyncMapping } from '../state/types.js';
import { withMarker } from './marker.js';
import type {
  ArchiveChange,
  CardContent,
  CardPatch,
  CreateChange,
  DestinationCard,
  ListRef,
  SourceRecord,
  SourceSnapshot,
  UpdateChange,
} from './types.js';

export interface PlanInput {
  namespace: string;
  snapshot: SourceSnapshot;
  cards: DestinationCard[];
  mappings: SyncMapping[];
}

/**
 * A card found through its marker instead of the persisted state
 */
export interface Adoption {
  sourceId: string;
  cardId: string;
  sourceTimestamp: string;
}

export interface Plan {
  /** Duplicate archives, then creates, updates and archives */
  changes: Array<CreateChange | UpdateChange | ArchiveChange>;
  adoptions: Adoption[];
  /** Source ids whose mapped card no longer exists */
  staleMappings: string[];
  /** Source ids whose record is older than the read window; it cannot come back */
  expiredMappings: string[];
  unchanged: number;
  /** Handled records without a card */
  skipped: number;
}

/**
 * Normalize a list name for comparison
 */
export function normalizeListName(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Whether a card sits in the referenced list
 */
export function isInList(card: DestinationCard, ref: ListRef): boolean {
  if ('id' in ref) {
    return card.listId === ref.id;
  }
  return normalizeListName(card.listName) === normalizeListName(ref.name);
}

/**
 * Compare two due dates as instants; Trello returns milliseconds even when
 * the date was sent without them
 */
export function isSameDue(a: string | null, b: string | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  const left = Date.parse(a);
  const right = Date.parse(b);
  if (Number.isNaN(left) || Number.isNaN(right)) {
    return a === b;
  }
  return left === right;
}

/**
 * The fields of a card that differ from the desired content
 */
export function diffCard(card: DestinationCard, desired: CardContent): CardPatch {
  const patch: CardPatch = {};
  if (card.name !== desired.name) {
    patch.name = desired.name;
  }
  if (card.description !== desired.description) {
    patch.description = desired.description;
  }
  if (!isInList(card, desired.list)) {
    patch.list = desired.list;
  }
  if (!isSameDue(card.due, desired.due)) {
    patch.due = desired.due;
  }
  return patch;
}

function isEmptyPatch(patch: CardPatch): boolean {
  return Object.keys(patch).length === 0;
}

function isInWindow(timestamp: string, windowStart: string | undefined): boolean {
  if (windowStart === undefined) {
    return true;
  }
  return Date.parse(timestamp) >= Date.parse(windowStart);
}

/**
 * Trello ids start with the creation time in hex, so sorting by id puts the
 * oldest card first
 */
function byAge(a: DestinationCard, b: DestinationCard): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Compute the changes that bring the destination in line with the snapshot.
 *
 * Pure: nothing is read or written, so a dry run and a live run plan the same.
 */
export function computePlan(input: PlanInput): Plan {
  const { namespace, snapshot, cards, mappings } = input;

  const cardsById = new Map(cards.map((card) => [card.id, card]));
  const mappingsBySource = new Map(mappings.map((mapping) => [mapping.sourceId, mapping]));

  // Cards owned by a live mapping are never adopted or treated as duplicates
  const claimed = new Set(
    mappings.filter((mapping) => cardsById.has(mapping.cardId)).map((mapping) => mapping.cardId)
  );

  const markedBySource = new Map<string, DestinationCard[]>();
  for (const card of [...cards].sort(byAge)) {
    if (card.sourceId === undefined || claimed.has(card.id)) {
      continue;
    }
    const marked = markedBySource.get(card.sourceId) ?? [];
    marked.push(card);
    markedBySource.set(card.sourceId, marked);
  }

  const duplicates: ArchiveChange[] = [];
  const creates: CreateChange[] = [];
  const updates: UpdateChange[] = [];
  const archives: ArchiveChange[] = [];
  const adoptions: Adoption[] = [];
  const staleMappings: string[] = [];
  const expiredMappings: string[] = [];
  let unchanged = 0;
  let skipped = 0;

  const recordIds = new Set<string>();

  for (const record of snapshot.records) {
    if (recordIds.has(record.id)) {
      continue;
    }
    recordIds.add(record.id);

    const desired = desiredContent(record, namespace);
    const mapping = mappingsBySource.get(record.id);
    let card = mapping ? cardsById.get(mapping.cardId) : undefined;
    let archivedBySync = mapping?.archivedBySync ?? false;

    if (mapping && !card) {
      staleMappings.push(record.id);
    }

    const marked = markedBySource.get(record.id) ?? [];
    if (!card && marked.length > 0) {
      // Prefer an open card; a closed one was archived by someone
      card = marked.find((candidate) => !candidate.closed) ?? marked[0];
      archivedBySync = false;
      adoptions.push({ sourceId: record.id, cardId: card.id, sourceTimestamp: record.timestamp });
    }

    for (const extra of marked) {
      if (extra !== card && !extra.closed) {
        duplicates.push({
          type: 'archive',
          sourceId: record.id,
          cardId: extra.id,
          cardName: extra.name,
          reason: 'duplicate',
        });
      }
    }

    if (!card && record.handled) {
      skipped++;
      continue;
    }

    if (!card) {
      creates.push({
        type: 'create',
        sourceId: record.id,
        sourceTimestamp: record.timestamp,
        content: desired,
      });
      continue;
    }

    if (card.closed && !archivedBySync) {
      unchanged++;
      continue;
    }

    const patch = diffCard(card, desired);
    if (card.closed) {
      patch.closed = false;
    }

    if (isEmptyPatch(patch)) {
      unchanged++;
      continue;
    }

    updates.push({
      type: 'update',
      sourceId: record.id,
      sourceTimestamp: record.timestamp,
      cardId: card.id,
      cardName: card.name,
      patch,
    });
  }

  for (const mapping of mappings) {
    if (recordIds.has(mapping.sourceId)) {
      continue;
    }
    if (!isInWindow(mapping.sourceTimestamp, snapshot.windowStart)) {
      expiredMappings.push(mapping.sourceId);
      continue;
    }
    const card = cardsById.get(mapping.cardId);
    if (!card) {
      staleMappings.push(mapping.sourceId);
      continue;
    }
    if (!card.closed) {
      archives.push({
        type: 'archive',
        sourceId: mapping.sourceId,
        cardId: card.id,
        cardName: card.name,
        reason: 'no-longer-qualifies',
      });
    }
  }

  // Marked cards nobody maps: only an exhaustive read can tell they are gone
  if (snapshot.windowStart === undefined) {
    for (const [sourceId, marked] of markedBySource) {
      if (recordIds.has(sourceId)) {
        continue;
      }
      for (const card of marked) {
        if (!card.closed) {
          archives.push({
            type: 'archive',
            sourceId,
            cardId: card.id,
            cardName: card.name,
            reason: 'no-longer-qualifies',
          });
        }
      }
    }
  }

  return {
    changes: [...duplicates, ...creates, ...updates, ...archives],
    adoptions,
    staleMappings,
    expiredMappings,
    unchanged,
    skipped,
  };
}

function desiredContent(record: SourceRecord, namespace: string): CardContent {
  return {
    ...record.content,
    description: withMarker(record.content.description, namespace, record.id),
  };
}
