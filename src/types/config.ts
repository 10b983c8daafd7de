import { z } from 'zod';

/**
 * Jobs that can be scheduled
 */
export const JOB_NAMES = ['slack-to-trello', 'mirror-cards', 'card-maintenance'] as const;

export type JobName = (typeof JOB_NAMES)[number];

// Zod schema for Trello API settings
export const TrelloConfigSchema = z.object({
  base_url: z.string().url('Trello base_url must be a URL').optional(),
  max_retries: z.number().int().min(0, 'max_retries must be >= 0').optional(),
  base_delay_ms: z.number().int().min(0, 'base_delay_ms must be >= 0').optional(),
});

// Zod schema for persisted sync state location
export const StateConfigSchema = z.object({
  dir: z.string().min(1, 'State directory must not be empty').optional(),
  save_after_each_change: z.boolean().optional(),
});

// Zod schema for logging
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  file: z.string().min(1, 'Log file path must not be empty').optional(),
});

// Zod schema for the Slack channel -> Trello board job
export const SlackToTrelloConfigSchema = z.object({
  channel_id: z.string().min(1, 'Slack channel_id is required'),
  board_id: z.string().min(1, 'Trello board_id is required'),
  lookback_hours: z.number().positive('lookback_hours must be positive').optional(),
  history_limit: z.number().int().positive('history_limit must be a positive integer').optional(),
  ack_reaction: z.string().min(1).nullable().optional(),
});

// Zod schema for a single board mirrored into the master board
export const MirrorSourceConfigSchema = z.object({
  board_id: z.string().min(1, 'Source board_id is required'),
  master_list_id: z.string().min(1, 'master_list_id is required'),
  priority_list: z.string().min(1).optional(),
  checklist_threshold: z.number().min(0).max(1, 'checklist_threshold must be between 0 and 1').optional(),
  checklist_name: z.string().min(1).optional(),
  match: z.enum(['all', 'any']).optional(),
});

// Zod schema for the mirror job
export const MirrorCardsConfigSchema = z.object({
  master_board_id: z.string().min(1, 'master_board_id is required'),
  sources: z.array(MirrorSourceConfigSchema).min(1, 'At least one mirror source must be configured'),
});

// Zod schema for the card maintenance job
export const CardMaintenanceConfigSchema = z.object({
  board_id: z.string().min(1).optional(),
  board_name: z.string().min(1).optional(),
  overdue_days: z.number().int().positive('overdue_days must be a positive integer').optional(),
  completed_label_prefix: z.string().min(1).optional(),
}).refine(
  (data) => data.board_id !== undefined || data.board_name !== undefined,
  { message: 'Either "board_id" or "board_name" must be provided' }
);

// Complete configuration schema
export const ConfigSchema = z.object({
  trello: TrelloConfigSchema.optional(),
  state: StateConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
  slack_to_trello: SlackToTrelloConfigSchema.optional(),
  mirror_cards: MirrorCardsConfigSchema.optional(),
  card_maintenance: CardMaintenanceConfigSchema.optional(),
});

// TypeScript types derived from Zod schemas
export type TrelloConfig = z.infer<typeof TrelloConfigSchema>;
export type StateConfig = z.infer<typeof StateConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type SlackToTrelloConfig = z.infer<typeof SlackToTrelloConfigSchema>;
export type MirrorSourceConfig = z.infer<typeof MirrorSourceConfigSchema>;
export type MirrorCardsConfig = z.infer<typeof MirrorCardsConfigSchema>;
export type CardMaintenanceConfig = z.infer<typeof CardMaintenanceConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export type LogLevel = NonNullable<LoggingConfig['level']>;

export interface NormalizedSlackToTrelloConfig {
  channelId: string;
  boardId: string;
  lookbackHours: number;
  historyLimit: number;
  /** Reaction added to processed messages; null disables acknowledgement */
  ackReaction: string | null;
}

export type MirrorMatch = 'all' | 'any';

export interface NormalizedMirrorSource {
  boardId: string;
  masterListId: string;
  priorityList: string;
  checklistThreshold: number;
  checklistName: string | undefined;
  /**
   * 'all': in the priority list and checklists at the threshold.
   * 'any': either one.
   */
  match: MirrorMatch;
}

export interface NormalizedMirrorCardsConfig {
  masterBoardId: string;
  sources: NormalizedMirrorSource[];
}

export interface NormalizedCardMaintenanceConfig {
  boardId: string | undefined;
  boardName: string | undefined;
  overdueDays: number;
  completedLabelPrefix: string;
}

// Normalized complete config
export interface NormalizedConfig {
  trello: {
    baseUrl: string;
    maxRetries: number;
    baseDelayMs: number;
  };
  state: {
    dir: string;
    saveAfterEachChange: boolean;
  };
  logging: {
    level: LogLevel;
    file: string | undefined;
  };
  slackToTrello: NormalizedSlackToTrelloConfig | undefined;
  mirrorCards: NormalizedMirrorCardsConfig | undefined;
  cardMaintenance: NormalizedCardMaintenanceConfig | undefined;
}
