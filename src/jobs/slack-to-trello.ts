/**
 * Slack channel -> Trello board
 *
 * Every message in the channel is a funding announcement: its first line
 * names a Trello list and the following entries become cards in that list.
 */

import type { Logger } from '../logging/logger.js';
import type { NormalizedSlackToTrelloConfig } from '../types/config.js';
import { parseFundingMessage } from '../slack/parser.js';
import type { SlackApi, SlackMessage } from '../slack/types.js';
import type { SourceAdapter, SourceRecord, SourceSnapshot } from '../reconciler/types.js';

export const SLACK_TO_TRELLO_JOB = 'slack-to-trello';

export interface SlackChannelSourceOptions {
  slack: SlackApi;
  config: NormalizedSlackToTrelloConfig;
  logger: Logger;
  now?: () => Date;
}

/**
 * Convert a Slack message timestamp ("1719000000.000100") to ISO
 */
export function slackTsToIso(ts: string): string {
  return new Date(Math.floor(Number(ts) * 1000)).toISOString();
}

/**
 * Convert a date to the Slack timestamp format accepted by `oldest`
 */
export function dateToSlackTs(date: Date): string {
  return (date.getTime() / 1000).toFixed(6);
}

/**
 * The source records of one message: one per card entry
 */
export function messageToRecords(channelId: string, message: SlackMessage): SourceRecord[] {
  const parsed = parseFundingMessage(message.text);
  if (parsed.listTitle === '') {
    return [];
  }

  const timestamp = slackTsToIso(message.ts);
  return parsed.cards.map((entry, index) => ({
    id: `${channelId}:${message.ts}:${index}`,
    timestamp,
    content: {
      name: entry.title,
      description: entry.description,
      list: { name: parsed.listTitle },
      due: null,
      attachments: entry.attachments,
    },
  }));
}

/**
 * Reads the recent history of one channel
 */
export class SlackChannelSource implements SourceAdapter {
  private readonly now: () => Date;
  /** Record id -> message it came from, filled by fetch() */
  private readonly messagesByRecord = new Map<string, SlackMessage>();
  private readonly acknowledged = new Set<string>();

  constructor(private readonly options: SlackChannelSourceOptions) {
    this.now = options.now ?? (() => new Date());
  }

  async verify(): Promise<void> {
    const identity = await this.options.slack.verify();
    this.options.logger.debug(identity, 'Slack token verified');
  }

  async fetch(): Promise<SourceSnapshot> {
    const { config, logger } = this.options;
    const since = new Date(this.now().getTime() - config.lookbackHours * 60 * 60 * 1000);

    const messages = await this.options.slack.fetchHistory(config.channelId, {
      oldest: dateToSlackTs(since),
      limit: config.historyLimit,
    });

    let windowStart = since.toISOString();
    // A full page means older messages in the window were cut off; only the
    // span actually read may decide what disappeared
    if (messages.length >= config.historyLimit && messages.length > 0) {
      const oldest = messages.reduce((min, message) => (Number(message.ts) < Number(min.ts) ? message : min));
      windowStart = slackTsToIso(oldest.ts);
      logger.warn({ limit: config.historyLimit, windowStart }, 'History limit reached; narrowing the sync window');
    }

    this.messagesByRecord.clear();
    const records: SourceRecord[] = [];
    for (const message of messages) {
      const messageRecords = messageToRecords(config.channelId, message);
      if (messageRecords.length === 0) {
        logger.debug({ ts: message.ts }, 'Message has no card entries');
      }
      // Reacted to already: its cards were made, and maybe deleted on purpose
      const handled = config.ackReaction !== null && message.reactions.includes(config.ackReaction);
      for (const record of messageRecords) {
        this.messagesByRecord.set(record.id, message);
        records.push(handled ? { ...record, handled } : record);
      }
    }

    return { records, windowStart };
  }

  /**
   * React to the message a created card came from, once per message
   */
  async acknowledge(record: SourceRecord): Promise<void> {
    const reaction = this.options.config.ackReaction;
    const message = this.messagesByRecord.get(record.id);
    if (reaction === null || !message) {
      return;
    }
    if (message.reactions.includes(reaction) || this.acknowledged.has(message.ts)) {
      return;
    }
    await this.options.slack.addReaction(this.options.config.channelId, message.ts, reaction);
    this.acknowledged.add(message.ts);
  }
}
