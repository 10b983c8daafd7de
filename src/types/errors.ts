/**
 * Error taxonomy shared by every sync job.
 *
 * Auth, fetch and config errors abort a run before anything is mutated.
 * Apply errors are recorded per item and the run carries on.
 */

export type SyncErrorKind = 'auth' | 'fetch' | 'apply' | 'config';

export class SyncError extends Error {
  constructor(
    message: string,
    public readonly kind: SyncErrorKind,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SyncError';
  }

  /** Whether this error must stop the run */
  get isFatal(): boolean {
    return this.kind !== 'apply';
  }
}

/**
 * A credential is invalid, expired or lacks the required scopes
 */
export class AuthError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'auth', cause);
    this.name = 'AuthError';
  }
}

/**
 * The source or destination could not be listed
 */
export class FetchError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'fetch', cause);
    this.name = 'FetchError';
  }
}

/**
 * A single mutation on the destination failed
 */
export class ApplyError extends SyncError {
  constructor(
    message: string,
    public readonly sourceId: string,
    cause?: unknown
  ) {
    super(message, 'apply', cause);
    this.name = 'ApplyError';
  }
}

/**
 * Malformed flag, missing variable or invalid configuration file
 */
export class ConfigError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(message, 'config', cause);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
