export {
  SlackClient,
  SlackApiError,
  createSlackClient,
  type SlackClientOptions,
} from './client.js';

export {
  parseFundingMessage,
  decodeSlackText,
  extractGovLinks,
} from './parser.js';

export { SLACK_AUTH_ERROR_CODES } from './types.js';

export type {
  SlackApi,
  SlackMessage,
  SlackIdentity,
  HistoryOptions,
  ParsedCardEntry,
  ParsedFundingMessage,
} from './types.js';
