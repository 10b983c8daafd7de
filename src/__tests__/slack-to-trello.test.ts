import { describe, it, expect, beforeEach } from 'vitest';
import {
  SlackChannelSource,
  dateToSlackTs,
  messageToRecords,
  slackTsToIso,
} from '../jobs/slack-to-trello.js';
import { TrelloBoardDestination } from '../jobs/trello-destination.js';
import { Reconciler } from '../reconciler/reconciler.js';
import { MemorySyncStateStore } from '../state/store.js';
import type { HistoryOptions, SlackApi, SlackIdentity, SlackMessage } from '../slack/types.js';
import type { NormalizedSlackToTrelloConfig } from '../types/config.js';
import type { TrelloBoard } from '../trello/types.js';
import { FakeTrello } from './helpers/fake-trello.js';
import { silentLogger } from './helpers/fixtures.js';

const NOW = new Date('2024-06-22T00:00:00.000Z');

class FakeSlack implements SlackApi {
  messages: SlackMessage[] = [];
  historyCalls: Array<{ channel: string; options: HistoryOptions }> = [];
  reactionsAdded: string[] = [];

  async verify(): Promise<SlackIdentity> {
    return { userId: 'U1', team: 'Research' };
  }

  async fetchHistory(channel: string, options: HistoryOptions): Promise<SlackMessage[]> {
    this.historyCalls.push({ channel, options });
    return this.messages.slice(0, options.limit).map((message) => ({ ...message, reactions: [...message.reactions] }));
  }

  async addReaction(channel: string, ts: string, name: string): Promise<void> {
    this.reactionsAdded.push(`${channel}:${ts}:${name}`);
    const message = this.messages.find((candidate) => candidate.ts === ts);
    message?.reactions.push(name);
  }
}

const ANNOUNCEMENT = [
  'NSF Opportunities',
  'Cyber Grant',
  '  Due in March, details on nsf.gov',
  'Data Science Award',
  '  Rolling deadline',
].join('\n');

describe('slack-to-trello', () => {
  describe('timestamps', () => {
    it('converts Slack timestamps to ISO and back', () => {
      expect(slackTsToIso('1719000000.000100')).toBe('2024-06-21T20:00:00.000Z');
      expect(dateToSlackTs(new Date('2024-06-19T00:00:00.000Z'))).toBe('1718755200.000000');
    });
  });

  describe('messageToRecords', () => {
    it('creates one record per card entry', () => {
      const records = messageToRecords('C1', { ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] });

      expect(records).toEqual([
        {
          id: 'C1:1719000000.000100:0',
          timestamp: '2024-06-21T20:00:00.000Z',
          content: {
            name: 'Cyber Grant',
            description: 'Due in March, details on nsf.gov',
            list: { name: 'NSF Opportunities' },
            due: null,
            attachments: ['https://nsf.gov'],
          },
        },
        {
          id: 'C1:1719000000.000100:1',
          timestamp: '2024-06-21T20:00:00.000Z',
          content: {
            name: 'Data Science Award',
            description: 'Rolling deadline',
            list: { name: 'NSF Opportunities' },
            due: null,
            attachments: [],
          },
        },
      ]);
    });

    it('skips messages without text', () => {
      expect(messageToRecords('C1', { ts: '1', text: '', reactions: [] })).toEqual([]);
    });
  });

  describe('SlackChannelSource', () => {
    let slack: FakeSlack;
    let config: NormalizedSlackToTrelloConfig;

    beforeEach(() => {
      slack = new FakeSlack();
      config = {
        channelId: 'C1',
        boardId: 'board1',
        lookbackHours: 72,
        historyLimit: 200,
        ackReaction: 'white_check_mark',
      };
    });

    it('reads the lookback window', async () => {
      slack.messages = [{ ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] }];
      const source = new SlackChannelSource({ slack, config, logger: silentLogger, now: () => NOW });

      const snapshot = await source.fetch();

      expect(slack.historyCalls).toEqual([
        { channel: 'C1', options: { oldest: '1718755200.000000', limit: 200 } },
      ]);
      expect(snapshot.windowStart).toBe('2024-06-19T00:00:00.000Z');
      expect(snapshot.records).toHaveLength(2);
    });

    it('narrows the window to the oldest message read when the limit is hit', async () => {
      config.historyLimit = 2;
      slack.messages = [
        { ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] },
        { ts: '1718900000.000200', text: 'List\nCard', reactions: [] },
      ];
      const source = new SlackChannelSource({ slack, config, logger: silentLogger, now: () => NOW });

      const snapshot = await source.fetch();

      expect(snapshot.windowStart).toBe('2024-06-20T16:13:20.000Z');
    });

    it('reacts once per message and skips messages already marked', async () => {
      slack.messages = [
        { ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] },
        { ts: '1718900000.000200', text: 'List\nCard', reactions: ['white_check_mark'] },
      ];
      const source = new SlackChannelSource({ slack, config, logger: silentLogger, now: () => NOW });
      const { records } = await source.fetch();

      for (const record of records) {
        await source.acknowledge(record);
      }

      expect(slack.reactionsAdded).toEqual(['C1:1719000000.000100:white_check_mark']);
    });

    it('flags the records of messages already acknowledged', async () => {
      slack.messages = [
        { ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] },
        { ts: '1718900000.000200', text: 'List\nCard', reactions: ['white_check_mark'] },
      ];
      const source = new SlackChannelSource({ slack, config, logger: silentLogger, now: () => NOW });

      const { records } = await source.fetch();

      expect(records.map((record) => [record.id, record.handled === true])).toEqual([
        ['C1:1719000000.000100:0', false],
        ['C1:1719000000.000100:1', false],
        ['C1:1718900000.000200:0', true],
      ]);
    });

    it('does not react when acknowledgement is off', async () => {
      config.ackReaction = null;
      slack.messages = [{ ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] }];
      const source = new SlackChannelSource({ slack, config, logger: silentLogger, now: () => NOW });
      const { records } = await source.fetch();

      await source.acknowledge(records[0]);

      expect(slack.reactionsAdded).toEqual([]);
    });
  });

  describe('end to end', () => {
    let slack: FakeSlack;
    let trello: FakeTrello;
    let board: TrelloBoard;
    let store: MemorySyncStateStore;

    const reconciler = (): Reconciler =>
      new Reconciler({
        namespace: 'slack-to-trello',
        source: new SlackChannelSource({
          slack,
          config: {
            channelId: 'C1',
            boardId: board.id,
            lookbackHours: 72,
            historyLimit: 200,
            ackReaction: 'white_check_mark',
          },
          logger: silentLogger,
          now: () => NOW,
        }),
        destination: new TrelloBoardDestination({ api: trello, boardId: board.id, logger: silentLogger }),
        store,
        logger: silentLogger,
        now: () => NOW,
      });

    beforeEach(() => {
      slack = new FakeSlack();
      slack.messages = [{ ts: '1719000000.000100', text: ANNOUNCEMENT, reactions: [] }];
      trello = new FakeTrello();
      board = trello.addBoard('Funding');
      trello.addList(board.id, 'Inbox');
      store = new MemorySyncStateStore();
    });

    it('creates the list, the cards and their attachments, then acknowledges', async () => {
      const result = await reconciler().run(false);

      expect(result.created).toBe(2);
      const list = trello.lists.find((candidate) => candidate.name === 'NSF Opportunities');
      expect(list).toBeDefined();

      const [cyber, data] = trello.openCards(board.id);
      expect(cyber.name).toBe('Cyber Grant');
      expect(cyber.idList).toBe(list?.id);
      expect(cyber.desc).toBe('Due in March, details on nsf.gov\n\n[sync-ref:slack-to-trello:C1:1719000000.000100:0]');
      expect(trello.attachments.get(cyber.id)?.map((attachment) => attachment.url)).toEqual(['https://nsf.gov']);
      expect(data.desc).toBe('Rolling deadline\n\n[sync-ref:slack-to-trello:C1:1719000000.000100:1]');
      expect(slack.reactionsAdded).toEqual(['C1:1719000000.000100:white_check_mark']);
    });

    it('is idempotent across runs', async () => {
      await reconciler().run(false);
      const second = await reconciler().run(false);

      expect([second.created, second.updated, second.archived]).toEqual([0, 0, 0]);
      expect(slack.reactionsAdded).toHaveLength(1);
      expect(trello.lists).toHaveLength(2);
    });

    it('archives the cards of a message deleted inside the window', async () => {
      await reconciler().run(false);
      slack.messages = [];

      const result = await reconciler().run(false);

      expect(result.archived).toBe(2);
      expect(trello.openCards(board.id)).toEqual([]);
    });

    it('does not recreate cards of an acknowledged message when the state is lost', async () => {
      slack.messages[0].reactions.push('white_check_mark');

      const result = await reconciler().run(false);

      expect([result.created, result.updated, result.archived]).toEqual([0, 0, 0]);
      expect(trello.openCards(board.id)).toEqual([]);
      expect(slack.reactionsAdded).toEqual([]);
    });

    it('keeps syncing the cards of acknowledged messages it created', async () => {
      await reconciler().run(false);
      slack.messages[0].text = ANNOUNCEMENT.replace('Rolling deadline', 'Closes in May');

      const result = await reconciler().run(false);

      expect([result.created, result.updated, result.archived]).toEqual([0, 1, 0]);
      expect(trello.openCards(board.id).map((card) => card.desc)).toEqual([
        'Due in March, details on nsf.gov\n\n[sync-ref:slack-to-trello:C1:1719000000.000100:0]',
        'Closes in May\n\n[sync-ref:slack-to-trello:C1:1719000000.000100:1]',
      ]);
    });

    it('plans without creating lists, cards or reactions in a dry run', async () => {
      const result = await reconciler().run(true);

      expect(result.created).toBe(2);
      expect(trello.mutations).toEqual([]);
      expect(trello.lists.map((list) => list.name)).toEqual(['Inbox']);
      expect(slack.reactionsAdded).toEqual([]);
    });
  });
});
