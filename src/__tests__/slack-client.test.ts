import { describe, it, expect, beforeEach, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  authTest: vi.fn(),
  history: vi.fn(),
  reactionsAdd: vi.fn(),
}));

vi.mock('@slack/web-api', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@slack/web-api')>();
  return {
    ...actual,
    WebClient: class {
      auth = { test: mocks.authTest };
      conversations = { history: mocks.history };
      reactions = { add: mocks.reactionsAdd };
    },
  };
});

import { SlackApiError, SlackClient, createSlackClient } from '../slack/client.js';

function platformError(code: string): Error {
  return Object.assign(new Error(`An API error occurred: ${code}`), {
    code: 'slack_webapi_platform_error',
    data: { ok: false, error: code },
  });
}

describe('SlackClient', () => {
  let client: SlackClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new SlackClient({ token: 'test-token' });
  });

  describe('verify', () => {
    it('returns the bot identity', async () => {
      mocks.authTest.mockResolvedValue({ ok: true, user_id: 'U1', team: 'Research' });

      await expect(client.verify()).resolves.toEqual({ userId: 'U1', team: 'Research' });
    });

    it('flags a rejected token as an auth error', async () => {
      mocks.authTest.mockRejectedValue(platformError('invalid_auth'));

      const error = await client.verify().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SlackApiError);
      expect(error).toMatchObject({ code: 'invalid_auth', message: 'Slack auth.test failed: invalid_auth' });
      expect(error instanceof SlackApiError && error.isAuthError).toBe(true);
    });
  });

  describe('fetchHistory', () => {
    it('follows cursors and keeps only messages with a timestamp', async () => {
      mocks.history
        .mockResolvedValueOnce({
          ok: true,
          messages: [
            { ts: '1719000002.000100', text: 'b', reactions: [{ name: 'white_check_mark', count: 1 }] },
            { text: 'no timestamp' },
          ],
          has_more: true,
          response_metadata: { next_cursor: 'next' },
        })
        .mockResolvedValueOnce({
          ok: true,
          messages: [{ ts: '1719000001.000100', text: 'a' }],
          has_more: false,
        });

      const messages = await client.fetchHistory('C1', { oldest: '1718990000.000000', limit: 10 });

      expect(messages).toEqual([
        { ts: '1719000002.000100', text: 'b', reactions: ['white_check_mark'] },
        { ts: '1719000001.000100', text: 'a', reactions: [] },
      ]);
      expect(mocks.history).toHaveBeenNthCalledWith(1, {
        channel: 'C1',
        oldest: '1718990000.000000',
        limit: 10,
        cursor: undefined,
      });
      expect(mocks.history).toHaveBeenNthCalledWith(2, {
        channel: 'C1',
        oldest: '1718990000.000000',
        limit: 9,
        cursor: 'next',
      });
    });

    it('stops once the limit is reached', async () => {
      mocks.history.mockResolvedValue({
        ok: true,
        messages: [{ ts: '1719000001.000100', text: 'a' }],
        has_more: true,
        response_metadata: { next_cursor: 'next' },
      });

      const messages = await client.fetchHistory('C1', { limit: 1 });

      expect(messages).toHaveLength(1);
      expect(mocks.history).toHaveBeenCalledTimes(1);
    });

    it('wraps platform errors', async () => {
      mocks.history.mockRejectedValue(platformError('channel_not_found'));

      await expect(client.fetchHistory('C404', { limit: 5 })).rejects.toThrow(
        'Slack conversations.history failed: channel_not_found'
      );
    });
  });

  describe('addReaction', () => {
    it('treats an existing reaction as success', async () => {
      mocks.reactionsAdd.mockRejectedValue(platformError('already_reacted'));

      await expect(client.addReaction('C1', '1719000001.000100', 'white_check_mark')).resolves.toBeUndefined();
      expect(mocks.reactionsAdd).toHaveBeenCalledWith({
        channel: 'C1',
        timestamp: '1719000001.000100',
        name: 'white_check_mark',
      });
    });

    it('rethrows other failures', async () => {
      mocks.reactionsAdd.mockRejectedValue(platformError('missing_scope'));

      const error = await client.addReaction('C1', '1', 'eyes').catch((caught: unknown) => caught);

      expect(error).toMatchObject({ code: 'missing_scope' });
      expect(error instanceof SlackApiError && error.isAuthError).toBe(true);
    });
  });

  it('refuses to build a client without a token', () => {
    expect(() => createSlackClient('')).toThrow('Slack bot token is required');
  });
});
