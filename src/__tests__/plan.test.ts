import { describe, it, expect } from 'vitest';
import { computePlan, diffCard, isSameDue } from '../reconciler/plan.js';
import { formatMarker, parseMarker, stripMarker, withMarker } from '../reconciler/marker.js';
import type { DestinationCard } from '../reconciler/types.js';
import type { SyncMapping } from '../state/types.js';
import { record } from './helpers/fixtures.js';

function card(id: string, fields: Partial<DestinationCard> = {}): DestinationCard {
  return {
    id,
    name: 'Card',
    description: '',
    listId: 'list1',
    listName: 'Inbox',
    due: null,
    closed: false,
    sourceId: undefined,
    ...fields,
  };
}

function mapping(sourceId: string, cardId: string, fields: Partial<SyncMapping> = {}): SyncMapping {
  return {
    sourceId,
    cardId,
    sourceTimestamp: '2024-06-01T12:00:00.000Z',
    syncedAt: '2024-06-01T12:05:00.000Z',
    archivedBySync: false,
    ...fields,
  };
}

describe('sync marker', () => {
  it('formats and parses a marker for its namespace only', () => {
    const description = `Details\n\n${formatMarker('mirror-cards', 'b1:c1')}`;

    expect(parseMarker(description, 'mirror-cards')).toBe('b1:c1');
    expect(parseMarker(description, 'slack-to-trello')).toBeUndefined();
    expect(parseMarker('No marker here', 'mirror-cards')).toBeUndefined();
  });

  it('replaces an existing marker instead of stacking them', () => {
    const once = withMarker('Details', 'job', 'A');
    const twice = withMarker(once, 'job', 'B');

    expect(once).toBe('Details\n\n[sync-ref:job:A]');
    expect(twice).toBe('Details\n\n[sync-ref:job:B]');
    expect(stripMarker(twice)).toBe('Details');
  });

  it('uses the marker alone for an empty description', () => {
    expect(withMarker('  ', 'job', 'C123:1719000000.000100:0')).toBe('[sync-ref:job:C123:1719000000.000100:0]');
    expect(parseMarker('[sync-ref:job:C123:1719000000.000100:0]', 'job')).toBe('C123:1719000000.000100:0');
  });
});

describe('diffCard', () => {
  it('returns only differing fields', () => {
    const existing = card('c1', { name: 'Alpha', description: 'Old', listName: 'Inbox', due: null });

    expect(
      diffCard(existing, {
        name: 'Alpha',
        description: 'New',
        list: { name: 'Done' },
        due: '2024-07-01T00:00:00.000Z',
        attachments: ['https://nsf.gov'],
      })
    ).toEqual({
      description: 'New',
      list: { name: 'Done' },
      due: '2024-07-01T00:00:00.000Z',
    });
  });

  it('compares list references by id when given an id', () => {
    const existing = card('c1', { listId: 'list1', listName: 'Whatever' });

    expect(diffCard(existing, { name: 'Card', description: '', list: { id: 'list1' }, due: null, attachments: [] })).toEqual({});
    expect(diffCard(existing, { name: 'Card', description: '', list: { id: 'list2' }, due: null, attachments: [] })).toEqual({
      list: { id: 'list2' },
    });
  });
});

describe('isSameDue', () => {
  it('compares instants', () => {
    expect(isSameDue('2024-07-01T17:00:00Z', '2024-07-01T17:00:00.000Z')).toBe(true);
    expect(isSameDue('2024-07-01T17:00:00Z', '2024-07-02T17:00:00Z')).toBe(false);
    expect(isSameDue(null, null)).toBe(true);
    expect(isSameDue(null, '2024-07-01T17:00:00Z')).toBe(false);
  });
});

describe('computePlan', () => {
  it('plans a create for every unmapped record on an empty board', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [record('A', 'Alpha'), record('B', 'Beta')] },
      cards: [],
      mappings: [],
    });

    expect(plan.changes.map((change) => `${change.type}:${change.sourceId}`)).toEqual(['create:A', 'create:B']);
    expect(plan.unchanged).toBe(0);
  });

  it('orders duplicate archives, creates, updates, then archives', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [record('A', 'Alpha'), record('B', 'Beta'), record('C', 'Gamma')] },
      cards: [
        card('c1', { name: 'Alpha (old)', description: 'About Alpha\n\n[sync-ref:job:A]', sourceId: 'A' }),
        card('c2', { name: 'Gone', description: '[sync-ref:job:D]', sourceId: 'D' }),
        card('c3', { name: 'Gamma', description: 'About Gamma\n\n[sync-ref:job:C]', sourceId: 'C' }),
        card('c4', { name: 'Gamma', description: 'About Gamma\n\n[sync-ref:job:C]', sourceId: 'C' }),
      ],
      mappings: [mapping('A', 'c1'), mapping('D', 'c2')],
    });

    expect(plan.changes.map((change) => `${change.type}:${change.sourceId}`)).toEqual([
      'archive:C',
      'create:B',
      'update:A',
      'archive:D',
    ]);
    expect(plan.adoptions).toEqual([{ sourceId: 'C', cardId: 'c3', sourceTimestamp: '2024-06-01T12:00:00.000Z' }]);
    expect(plan.unchanged).toBe(1);
  });

  it('ignores records listed twice', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [record('A', 'Alpha'), record('A', 'Alpha')] },
      cards: [],
      mappings: [],
    });

    expect(plan.changes).toHaveLength(1);
  });

  it('adopts a closed marked card without reopening it', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [record('A', 'Alpha')] },
      cards: [card('c1', { name: 'Alpha', closed: true, description: 'About Alpha\n\n[sync-ref:job:A]', sourceId: 'A' })],
      mappings: [],
    });

    expect(plan.changes).toEqual([]);
    expect(plan.adoptions).toHaveLength(1);
    expect(plan.unchanged).toBe(1);
  });

  it('drops mappings to cards that no longer exist', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [record('A', 'Alpha')] },
      cards: [],
      mappings: [mapping('A', 'deleted1'), mapping('B', 'deleted2')],
    });

    expect(plan.staleMappings).toEqual(['A', 'B']);
    expect(plan.changes.map((change) => change.type)).toEqual(['create']);
  });

  it('leaves unmapped marked cards alone when the read was windowed', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [], windowStart: '2024-06-01T00:00:00.000Z' },
      cards: [card('c1', { description: '[sync-ref:job:Z]', sourceId: 'Z' })],
      mappings: [],
    });

    expect(plan.changes).toEqual([]);
  });

  it('expires mappings older than the read window', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [], windowStart: '2024-06-01T00:00:00.000Z' },
      cards: [card('c1'), card('c2')],
      mappings: [
        mapping('old', 'c1', { sourceTimestamp: '2024-05-20T00:00:00.000Z' }),
        mapping('recent', 'c2', { sourceTimestamp: '2024-06-01T12:00:00.000Z' }),
      ],
    });

    expect(plan.expiredMappings).toEqual(['old']);
    expect(plan.changes.map((change) => [change.type, change.sourceId])).toEqual([['archive', 'recent']]);
  });

  it('skips handled records that have no card', () => {
    const plan = computePlan({
      namespace: 'job',
      snapshot: { records: [{ ...record('A', 'Alpha'), handled: true }, { ...record('B', 'Beta'), handled: true }] },
      cards: [card('c1', { name: 'Beta', description: 'About Beta\n\n[sync-ref:job:B]', sourceId: 'B' })],
      mappings: [],
    });

    expect(plan.changes).toEqual([]);
    expect(plan.skipped).toBe(1);
    expect(plan.adoptions).toEqual([{ sourceId: 'B', cardId: 'c1', sourceTimestamp: record('B', 'Beta').timestamp }]);
  });
});
