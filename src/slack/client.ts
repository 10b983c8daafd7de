import { WebClient, ErrorCode, LogLevel, type ConversationsHistoryResponse } from '@slack/web-api';
import {
  SLACK_AUTH_ERROR_CODES,
  type HistoryOptions,
  type SlackApi,
  type SlackIdentity,
  type SlackMessage,
} from './types.js';

/**
 * Largest page conversations.history accepts without a warning
 */
const MAX_PAGE_SIZE = 200;

export interface SlackClientOptions {
  token: string;
}

export class SlackApiError extends Error {
  constructor(
    message: string,
    /** Slack's error code, e.g. "channel_not_found" */
    public readonly code: string
  ) {
    super(message);
    this.name = 'SlackApiError';
  }

  /** The token was rejected or lacks a scope */
  get isAuthError(): boolean {
    return SLACK_AUTH_ERROR_CODES.includes(this.code);
  }
}

/**
 * Read the Slack error code from a platform error thrown by WebClient
 */
function platformErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if (!('code' in error) || error.code !== ErrorCode.PlatformError || !('data' in error)) {
    return undefined;
  }
  const data = error.data;
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  return undefined;
}

/**
 * Wrap errors in SlackApiError
 */
function wrapError(error: unknown, operation: string): SlackApiError {
  if (error instanceof SlackApiError) {
    return error;
  }
  const code = platformErrorCode(error);
  if (code) {
    return new SlackApiError(`Slack ${operation} failed: ${code}`, code);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SlackApiError(`Slack ${operation} failed: ${message}`, 'request_failed');
}

/**
 * Slack Web API wrapper; rate limits are retried by WebClient itself
 */
export class SlackClient implements SlackApi {
  private client: WebClient;

  constructor(options: SlackClientOptions) {
    this.client = new WebClient(options.token, { logLevel: LogLevel.ERROR });
  }

  /**
   * Validate the token
   */
  async verify(): Promise<SlackIdentity> {
    try {
      const response = await this.client.auth.test();
      return { userId: response.user_id ?? '', team: response.team ?? '' };
    } catch (error) {
      throw wrapError(error, 'auth.test');
    }
  }

  /**
   * Fetch channel history newest first, following cursors until the limit is reached
   */
  async fetchHistory(channel: string, options: HistoryOptions): Promise<SlackMessage[]> {
    const messages: SlackMessage[] = [];
    let cursor: string | undefined = undefined;

    try {
      do {
        const remaining = options.limit - messages.length;
        const response: ConversationsHistoryResponse = await this.client.conversations.history({
          channel,
          oldest: options.oldest,
          limit: Math.min(remaining, MAX_PAGE_SIZE),
          cursor,
        });

        for (const message of response.messages ?? []) {
          if (!message.ts) {
            continue;
          }
          messages.push({
            ts: message.ts,
            text: message.text ?? '',
            reactions: (message.reactions ?? [])
              .map((reaction) => reaction.name)
              .filter((name): name is string => typeof name === 'string'),
          });
        }

        cursor = response.has_more ? response.response_metadata?.next_cursor || undefined : undefined;
      } while (cursor && messages.length < options.limit);
    } catch (error) {
      throw wrapError(error, 'conversations.history');
    }

    return messages.slice(0, options.limit);
  }

  /**
   * Add a reaction; a reaction that is already there counts as success
   */
  async addReaction(channel: string, ts: string, name: string): Promise<void> {
    try {
      await this.client.reactions.add({ channel, timestamp: ts, name });
    } catch (error) {
      const wrapped = wrapError(error, 'reactions.add');
      if (wrapped.code === 'already_reacted') {
        return;
      }
      throw wrapped;
    }
  }
}

/**
 * Create a Slack client with the provided bot token
 */
export function createSlackClient(token: string): SlackClient {
  if (!token) {
    throw new SlackApiError('Slack bot token is required', 'not_authed');
  }
  return new SlackClient({ token });
}
