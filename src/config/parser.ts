import * as yaml from 'js-yaml';
import * as fs from 'fs';
import * as path from 'path';
import {
  ConfigSchema,
  Config,
  NormalizedConfig,
  NormalizedMirrorSource,
} from '../types/config.js';
import { ConfigError, errorMessage } from '../types/errors.js';

/**
 * Default path of the YAML configuration file
 */
export const DEFAULT_CONFIG_PATH = 'sync.config.yaml';

// Default values for optional config fields
const DEFAULT_TRELLO = {
  baseUrl: 'https://api.trello.com/1',
  maxRetries: 5,
  baseDelayMs: 500,
} as const;

const DEFAULT_STATE_DIR = '.sync-state';

const DEFAULT_SLACK_TO_TRELLO = {
  lookbackHours: 72,
  historyLimit: 200,
  ackReaction: 'white_check_mark',
} as const;

const DEFAULT_MIRROR_SOURCE = {
  priorityList: 'Priority IV',
  checklistThreshold: 0.75,
  match: 'all',
} as const;

const DEFAULT_CARD_MAINTENANCE = {
  overdueDays: 3,
  completedLabelPrefix: 'Completed',
} as const;

/**
 * Parse and validate YAML configuration string
 */
export function parseConfigString(yamlContent: string): NormalizedConfig {
  let rawConfig: unknown;
  try {
    rawConfig = yaml.load(yamlContent);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in configuration: ${errorMessage(error)}`, error);
  }

  // An empty file means "all defaults"
  if (rawConfig === undefined || rawConfig === null) {
    rawConfig = {};
  }

  if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
    throw new ConfigError('Configuration must be a valid YAML object');
  }

  const validationResult = ConfigSchema.safeParse(rawConfig);

  if (!validationResult.success) {
    const issues = validationResult.error.issues;
    const errors = issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  return normalizeConfig(validationResult.data);
}

/**
 * Parse configuration from a file path
 */
export function parseConfigFile(filePath: string = DEFAULT_CONFIG_PATH): NormalizedConfig {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Configuration file not found: ${absolutePath}`);
  }

  const content = fs.readFileSync(absolutePath, 'utf-8');
  return parseConfigString(content);
}

/**
 * Normalize validated config to consistent format
 */
function normalizeConfig(config: Config): NormalizedConfig {
  const slack = config.slack_to_trello;
  const mirror = config.mirror_cards;
  const maintenance = config.card_maintenance;

  return {
    trello: {
      baseUrl: config.trello?.base_url ?? DEFAULT_TRELLO.baseUrl,
      maxRetries: config.trello?.max_retries ?? DEFAULT_TRELLO.maxRetries,
      baseDelayMs: config.trello?.base_delay_ms ?? DEFAULT_TRELLO.baseDelayMs,
    },
    state: {
      dir: config.state?.dir ?? DEFAULT_STATE_DIR,
      saveAfterEachChange: config.state?.save_after_each_change ?? false,
    },
    logging: {
      level: config.logging?.level ?? 'info',
      file: config.logging?.file,
    },
    slackToTrello: slack
      ? {
          channelId: slack.channel_id,
          boardId: slack.board_id,
          lookbackHours: slack.lookback_hours ?? DEFAULT_SLACK_TO_TRELLO.lookbackHours,
          historyLimit: slack.history_limit ?? DEFAULT_SLACK_TO_TRELLO.historyLimit,
          // null in YAML explicitly turns acknowledgement off
          ackReaction: slack.ack_reaction === undefined
            ? DEFAULT_SLACK_TO_TRELLO.ackReaction
            : slack.ack_reaction,
        }
      : undefined,
    mirrorCards: mirror
      ? {
          masterBoardId: mirror.master_board_id,
          sources: mirror.sources.map(normalizeMirrorSource),
        }
      : undefined,
    cardMaintenance: maintenance
      ? {
          boardId: maintenance.board_id,
          boardName: maintenance.board_name,
          overdueDays: maintenance.overdue_days ?? DEFAULT_CARD_MAINTENANCE.overdueDays,
          completedLabelPrefix:
            maintenance.completed_label_prefix ?? DEFAULT_CARD_MAINTENANCE.completedLabelPrefix,
        }
      : undefined,
  };
}

/**
 * Normalize a single mirror source
 */
function normalizeMirrorSource(
  source: NonNullable<Config['mirror_cards']>['sources'][number]
): NormalizedMirrorSource {
  return {
    boardId: source.board_id,
    masterListId: source.master_list_id,
    priorityList: source.priority_list ?? DEFAULT_MIRROR_SOURCE.priorityList,
    checklistThreshold: source.checklist_threshold ?? DEFAULT_MIRROR_SOURCE.checklistThreshold,
    checklistName: source.checklist_name,
    match: source.match ?? DEFAULT_MIRROR_SOURCE.match,
  };
}
