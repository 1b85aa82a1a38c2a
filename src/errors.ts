/**
 * Error taxonomy
 *
 * Every failure the CLI reports carries a stable code, and the entry point
 * maps that code to the process exit status.
 */

export type ErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'SOURCE_UNREADABLE'
  | 'PLAYER_LAUNCH_FAILED'
  | 'CANCELLED_BY_USER'
  | 'CONFIG_INVALID'
  | 'USAGE';

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Cancelled: 1,
  SourceError: 2,
  InvalidInput: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class SyncedLyricsError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Lyric file does not exist */
export class SourceNotFoundError extends SyncedLyricsError {
  readonly filePath: string;

  constructor(filePath: string, options?: { cause?: unknown }) {
    super('SOURCE_NOT_FOUND', `.lrc file not found at: ${filePath}`, options);
    this.filePath = filePath;
  }
}

/** Lyric file exists but could not be read or decoded */
export class SourceUnreadableError extends SyncedLyricsError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, options?: { cause?: unknown }) {
    super('SOURCE_UNREADABLE', `Error reading .lrc file ${filePath}: ${reason}`, options);
    this.filePath = filePath;
  }
}

export class PlayerLaunchFailedError extends SyncedLyricsError {
  readonly command: readonly string[];

  constructor(command: readonly string[], reason: string, options?: { cause?: unknown }) {
    const executable = command[0] ?? '(none)';
    super('PLAYER_LAUNCH_FAILED', `Could not launch audio player "${executable}": ${reason}`, options);
    this.command = command;
  }
}

export class CancelledByUserError extends SyncedLyricsError {
  constructor(message = 'Interrupted.') {
    super('CANCELLED_BY_USER', message);
  }
}

export class ConfigError extends SyncedLyricsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}

export class UsageError extends SyncedLyricsError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

/** Process exit status for a failure that reached the entry point */
export function exitCodeFor(error: unknown): ExitCode {
  if (!(error instanceof SyncedLyricsError)) return ExitCode.Failure;

  switch (error.code) {
    case 'SOURCE_NOT_FOUND':
    case 'SOURCE_UNREADABLE':
      return ExitCode.SourceError;
    case 'CANCELLED_BY_USER':
      return ExitCode.Cancelled;
    case 'CONFIG_INVALID':
    case 'USAGE':
      return ExitCode.InvalidInput;
    case 'PLAYER_LAUNCH_FAILED':
      return ExitCode.Failure;
  }
}

/** Node system errors carry a string `code` such as ENOENT */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
