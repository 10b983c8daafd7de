import { parseConfigFile, DEFAULT_CONFIG_PATH } from '../config/parser.js';
import { parseEnvironment, type SyncEnvironment } from '../config/env.js';
import { createLogger, defaultLogFile, type Logger } from '../logging/logger.js';
import { Reconciler } from '../reconciler/reconciler.js';
import type { RunnableJob, RunResult } from '../reconciler/types.js';
import { createSlackClient } from '../slack/client.js';
import type { SlackApi } from '../slack/types.js';
import { FileSyncStateStore, stateFilePath } from '../state/store.js';
import type { SyncStateStore } from '../state/types.js';
import { createTrelloClient } from '../trello/client.js';
import type { TrelloApi } from '../trello/types.js';
import type { JobName, NormalizedConfig } from '../types/config.js';
import { ConfigError, SyncError, errorMessage } from '../types/errors.js';
import { CardMaintenanceJob } from './card-maintenance.js';
import { MirrorCardsSource } from './mirror-cards.js';
import { SlackChannelSource } from './slack-to-trello.js';
import { TrelloBoardDestination } from './trello-destination.js';

export const EXIT_OK = 0;
export const EXIT_ERRORS = 1;
export const EXIT_ABORTED = 2;

export interface JobContext {
  config: NormalizedConfig;
  logger: Logger;
  trello: TrelloApi;
  /** Required by slack-to-trello only */
  slack?: SlackApi;
  store: SyncStateStore;
  now?: () => Date;
}

/**
 * Wire a job from its configuration section
 *
 * @throws ConfigError when the job's section or client is missing
 */
export function buildJob(job: JobName, context: JobContext): RunnableJob {
  const { config, logger, trello, store, now } = context;
  const saveAfterEachChange = config.state.saveAfterEachChange;

  switch (job) {
    case 'slack-to-trello': {
      const section = config.slackToTrello;
      if (!section) {
        throw new ConfigError('Configuration section "slack_to_trello" is required for job slack-to-trello');
      }
      if (!context.slack) {
        throw new ConfigError('A Slack client is required for job slack-to-trello');
      }
      return new Reconciler({
        namespace: job,
        source: new SlackChannelSource({
          slack: context.slack,
          config: section,
          logger: logger.child({ component: 'slack' }),
          now,
        }),
        destination: new TrelloBoardDestination({
          api: trello,
          boardId: section.boardId,
          logger: logger.child({ component: 'trello' }),
        }),
        store,
        logger,
        saveAfterEachChange,
        now,
      });
    }
    case 'mirror-cards': {
      const section = config.mirrorCards;
      if (!section) {
        throw new ConfigError('Configuration section "mirror_cards" is required for job mirror-cards');
      }
      return new Reconciler({
        namespace: job,
        source: new MirrorCardsSource({ api: trello, config: section, logger: logger.child({ component: 'source-boards' }) }),
        destination: new TrelloBoardDestination({
          api: trello,
          boardId: section.masterBoardId,
          logger: logger.child({ component: 'master-board' }),
        }),
        store,
        logger,
        saveAfterEachChange,
        now,
      });
    }
    case 'card-maintenance': {
      const section = config.cardMaintenance;
      if (!section) {
        throw new ConfigError('Configuration section "card_maintenance" is required for job card-maintenance');
      }
      return new CardMaintenanceJob({ api: trello, config: section, logger, now });
    }
  }
}

export interface RunJobOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Overrides SYNC_CONFIG */
  configPath?: string;
  /** Forces a dry run regardless of DRY_RUN */
  dryRun?: boolean;
  /** Overrides state.dir */
  stateDir?: string;
  /** Injected in tests */
  logger?: Logger;
  trello?: TrelloApi;
  slack?: SlackApi;
  store?: SyncStateStore;
  now?: () => Date;
}

export interface RunOutcome {
  exitCode: number;
  result?: RunResult;
  /** The error that aborted the run */
  error?: Error;
}

/**
 * Exit code for a finished run
 */
export function exitCodeFor(result: RunResult): number {
  return result.errors.length > 0 ? EXIT_ERRORS : EXIT_OK;
}

/**
 * Run one job end to end: environment, configuration, clients, run.
 * Never throws; failures are reported through the outcome.
 */
export async function runJob(job: JobName, options: RunJobOptions = {}): Promise<RunOutcome> {
  const envVars = options.env ?? process.env;
  let logger = options.logger;

  try {
    const env: SyncEnvironment = parseEnvironment(envVars, job);
    const config = parseConfigFile(options.configPath ?? env.configPath ?? DEFAULT_CONFIG_PATH);

    logger ??= createLogger(job, {
      level: env.logLevel ?? config.logging.level,
      file: env.logFile ?? config.logging.file ?? defaultLogFile(job),
    });

    const trello = options.trello ?? createTrelloClient({
      apiKey: env.trelloApiKey,
      token: env.trelloToken,
      baseUrl: config.trello.baseUrl,
      maxRetries: config.trello.maxRetries,
      baseDelayMs: config.trello.baseDelayMs,
    });
    const slack = options.slack ?? (env.slackBotToken ? createSlackClient(env.slackBotToken) : undefined);
    const store = options.store ?? new FileSyncStateStore(
      stateFilePath(options.stateDir ?? config.state.dir, job),
      { logger }
    );

    const runnable = buildJob(job, { config, logger, trello, slack, store, now: options.now });
    const dryRun = options.dryRun === true || env.dryRun;
    const result = await runnable.run(dryRun);

    const exitCode = exitCodeFor(result);
    if (exitCode !== EXIT_OK) {
      logger.warn({ errors: result.errors.length }, 'Run finished with errors');
    }
    return { exitCode, result };
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(errorMessage(error));
    // Configuration may have failed before the job logger existed
    logger ??= createLogger(job, { file: defaultLogFile(job) });
    const kind = failure instanceof SyncError ? failure.kind : 'unexpected';
    logger.fatal({ err: failure, kind }, `Run aborted: ${failure.message}`);
    return { exitCode: EXIT_ABORTED, error: failure };
  }
}
