/**
 * Types for reading a Slack channel
 */

/**
 * A channel message reduced to what the sync needs
 */
export interface SlackMessage {
  /** Slack message timestamp, unique within the channel ("1719000000.000100") */
  ts: string;
  text: string;
  /** Names of the reactions on the message */
  reactions: string[];
}

export interface HistoryOptions {
  /** Only messages after this Slack timestamp */
  oldest?: string;
  /** Maximum number of messages to return across all pages */
  limit: number;
}

export interface SlackIdentity {
  userId: string;
  team: string;
}

/**
 * The subset of the Slack Web API the jobs depend on
 */
export interface SlackApi {
  verify(): Promise<SlackIdentity>;
  fetchHistory(channel: string, options: HistoryOptions): Promise<SlackMessage[]>;
  addReaction(channel: string, ts: string, name: string): Promise<void>;
}

/**
 * A card entry parsed from a funding announcement
 */
export interface ParsedCardEntry {
  title: string;
  description: string;
  /** https URLs of the .gov domains mentioned in the description */
  attachments: string[];
}

/**
 * A funding announcement: the first line names the list, the rest are cards
 */
export interface ParsedFundingMessage {
  listTitle: string;
  cards: ParsedCardEntry[];
}

/**
 * Slack error codes meaning the token is unusable
 */
export const SLACK_AUTH_ERROR_CODES: readonly string[] = [
  'not_authed',
  'invalid_auth',
  'account_inactive',
  'token_revoked',
  'token_expired',
  'no_permission',
  'missing_scope',
];
