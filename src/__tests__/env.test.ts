import { describe, it, expect } from 'vitest';
import { parseDryRunFlag, parseEnvironment } from '../config/env.js';
import { ConfigError } from '../types/errors.js';

const CREDENTIALS = { TRELLO_API_KEY: 'test-key', TRELLO_TOKEN: 'test-token' };

describe('parseDryRunFlag', () => {
  it('treats unset and empty as a live run', () => {
    expect(parseDryRunFlag(undefined)).toBe(false);
    expect(parseDryRunFlag('')).toBe(false);
    expect(parseDryRunFlag('  ')).toBe(false);
  });

  it('accepts true and false in any case', () => {
    expect(parseDryRunFlag('true')).toBe(true);
    expect(parseDryRunFlag('TRUE')).toBe(true);
    expect(parseDryRunFlag('False')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => parseDryRunFlag('yes')).toThrow(new ConfigError('DRY_RUN must be "true" or "false", got "yes"'));
  });
});

describe('parseEnvironment', () => {
  it('reads credentials and switches', () => {
    const env = parseEnvironment(
      { ...CREDENTIALS, DRY_RUN: 'true', SYNC_CONFIG: 'jobs.yaml', LOG_LEVEL: 'DEBUG', LOG_FILE: ' ' },
      'mirror-cards'
    );

    expect(env).toEqual({
      trelloApiKey: 'test-key',
      trelloToken: 'test-token',
      slackBotToken: undefined,
      dryRun: true,
      configPath: 'jobs.yaml',
      logLevel: 'debug',
      logFile: undefined,
    });
  });

  it('requires the Slack token only for the Slack job', () => {
    expect(parseEnvironment({ ...CREDENTIALS }, 'card-maintenance').slackBotToken).toBeUndefined();
    expect(parseEnvironment({ ...CREDENTIALS, SLACK_BOT_TOKEN: 'test-slack-token' }, 'slack-to-trello').slackBotToken).toBe(
      'test-slack-token'
    );
    expect(() => parseEnvironment({ ...CREDENTIALS }, 'slack-to-trello')).toThrow(
      'Missing required environment variables: SLACK_BOT_TOKEN'
    );
  });

  it('lists every missing variable at once', () => {
    expect(() => parseEnvironment({ TRELLO_TOKEN: '' }, 'slack-to-trello')).toThrow(
      'Missing required environment variables: TRELLO_API_KEY, TRELLO_TOKEN, SLACK_BOT_TOKEN'
    );
  });

  it('rejects an unknown log level', () => {
    expect(() => parseEnvironment({ ...CREDENTIALS, LOG_LEVEL: 'loud' }, 'mirror-cards')).toThrow(
      'LOG_LEVEL must be one of: trace, debug, info, warn, error, fatal, silent'
    );
  });
});
