import type { JobName, LogLevel } from '../types/config.js';
import { ConfigError } from '../types/errors.js';

/**
 * Credentials and switches read from the process environment
 */
export interface SyncEnvironment {
  trelloApiKey: string;
  trelloToken: string;
  /** Only present for jobs that read Slack */
  slackBotToken: string | undefined;
  dryRun: boolean;
  configPath: string | undefined;
  logLevel: LogLevel | undefined;
  logFile: string | undefined;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Parse the DRY_RUN flag.
 *
 * Schedulers pass an empty string when a manual input was not given, so
 * empty and unset both mean a live run.
 */
export function parseDryRunFlag(value: string | undefined): boolean {
  if (value === undefined) {
    return false;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === '' || normalized === 'false') {
    return false;
  }
  if (normalized === 'true') {
    return true;
  }
  throw new ConfigError(`DRY_RUN must be "true" or "false", got "${value}"`);
}

function readOptional(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Read the environment for a job.
 *
 * @throws ConfigError listing every missing variable, or for a malformed flag
 */
export function parseEnvironment(env: NodeJS.ProcessEnv, job: JobName): SyncEnvironment {
  const required = ['TRELLO_API_KEY', 'TRELLO_TOKEN'];
  if (job === 'slack-to-trello') {
    required.push('SLACK_BOT_TOKEN');
  }

  const missing = required.filter((name) => readOptional(env, name) === undefined);
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const dryRun = parseDryRunFlag(env.DRY_RUN);

  const rawLevel = readOptional(env, 'LOG_LEVEL')?.toLowerCase();
  const logLevel = LOG_LEVELS.find((level) => level === rawLevel);
  if (rawLevel !== undefined && logLevel === undefined) {
    throw new ConfigError(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  return {
    trelloApiKey: readOptional(env, 'TRELLO_API_KEY') ?? '',
    trelloToken: readOptional(env, 'TRELLO_TOKEN') ?? '',
    slackBotToken: job === 'slack-to-trello' ? readOptional(env, 'SLACK_BOT_TOKEN') : undefined,
    dryRun,
    configPath: readOptional(env, 'SYNC_CONFIG'),
    logLevel,
    logFile: readOptional(env, 'LOG_FILE'),
  };
}
