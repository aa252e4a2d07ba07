/**
 * Error taxonomy for context generation.
 *
 * ConfigurationError is fatal and always reaches the caller.
 * ReadError is per-file; TreeBuilder turns it into a warning and moves on.
 */

export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export type ReadFailure =
  | 'permission-denied'
  | 'io-error'
  | 'binary'
  | 'broken-symlink'
  | 'symlinked-directory'
  | 'unreadable-directory';

/** A path left out of the output because it could not be read */
export interface ReadWarning {
  path: string;
  reason: ReadFailure;
  message: string;
}

export class ReadError extends Error {
  readonly path: string;
  readonly reason: ReadFailure;

  constructor(path: string, reason: ReadFailure, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReadError';
    this.path = path;
    this.reason = reason;
  }
}

/** Map a Node fs error code to the read failure it represents. */
export function readFailureFromCode(code: string | undefined): ReadFailure {
  if (code === 'EACCES' || code === 'EPERM') return 'permission-denied';
  if (code === 'ENOENT' || code === 'ELOOP') return 'broken-symlink';
  return 'io-error';
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toWarning(error: ReadError): ReadWarning {
  return { path: error.path, reason: error.reason, message: error.message };
}
