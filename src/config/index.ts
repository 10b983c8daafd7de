export {
  DEFAULT_CONFIG_PATH,
  parseConfigString,
  parseConfigFile,
} from './parser.js';

export {
  parseDryRunFlag,
  parseEnvironment,
  type SyncEnvironment,
} from './env.js';

export type {
  Config,
  JobName,
  LogLevel,
  NormalizedConfig,
  NormalizedSlackToTrelloConfig,
  NormalizedMirrorCardsConfig,
  NormalizedMirrorSource,
  MirrorMatch,
  NormalizedCardMaintenanceConfig,
} from '../types/config.js';

export {
  JOB_NAMES,
  ConfigSchema,
  TrelloConfigSchema,
  StateConfigSchema,
  LoggingConfigSchema,
  SlackToTrelloConfigSchema,
  MirrorCardsConfigSchema,
  MirrorSourceConfigSchema,
  CardMaintenanceConfigSchema,
} from '../types/config.js';
