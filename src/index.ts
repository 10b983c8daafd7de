/**
 * Board sync jobs
 *
 * Idempotent reconciliation of Trello boards against Slack channels and
 * other boards, run on a schedule.
 */

export * from './config/index.js';
export * from './reconciler/index.js';
export * from './state/index.js';
export * from './trello/index.js';
export * from './slack/index.js';
export * from './jobs/index.js';
export {
  SyncError,
  AuthError,
  FetchError,
  ApplyError,
  ConfigError,
  errorMessage,
  type SyncErrorKind,
} from './types/errors.js';
export {
  createLogger,
  createSilentLogger,
  defaultLogFile,
  type Logger,
  type LoggerOptions,
} from './logging/logger.js';
export { createProgram, isJobName, type ProgramIo } from './cli/program.js';
