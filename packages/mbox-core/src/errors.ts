import type { LoadErrorInfo } from '@mbox-search/shared';

export type MboxErrorCode =
  | 'IO_FAILURE'
  | 'MALFORMED_MESSAGE'
  | 'NO_INDEX_LOADED'
  | 'SESSION_NOT_FOUND'
  | 'MESSAGE_NOT_FOUND'
  | 'INVALID_STATE';

export class MboxError extends Error {
  readonly code: MboxErrorCode;

  constructor(code: MboxErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MboxError';
    this.code = code;
  }

  toJSON(): LoadErrorInfo {
    return { code: this.code, message: this.message };
  }
}

/** The archive is missing, unreadable, or disappeared while being read. */
export class IOFailureError extends MboxError {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    super('IO_FAILURE', `Cannot read ${filePath}: ${describeCause(cause)}`, { cause });
    this.name = 'IOFailureError';
    this.filePath = filePath;
  }
}

/**
 * A single message could not be parsed cleanly. Recovered where it happens:
 * the message is still indexed and the problem is recorded on it.
 */
export class MalformedMessageError extends MboxError {
  readonly offset: number;

  constructor(offset: number, detail: string) {
    super('MALFORMED_MESSAGE', `Malformed message at byte ${offset}: ${detail}`);
    this.name = 'MalformedMessageError';
    this.offset = offset;
  }
}

export class NoIndexLoadedError extends MboxError {
  constructor() {
    super('NO_INDEX_LOADED', 'No mbox file has been loaded');
    this.name = 'NoIndexLoadedError';
  }
}

export class SessionNotFoundError extends MboxError {
  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Invalid MBOX session: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

export class MessageNotFoundError extends MboxError {
  constructor(what: string) {
    super('MESSAGE_NOT_FOUND', `Message not found: ${what}`);
    this.name = 'MessageNotFoundError';
  }
}

export class InvalidStateError extends MboxError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function toLoadErrorInfo(err: unknown): LoadErrorInfo {
  if (err instanceof MboxError) return err.toJSON();
  return { code: 'IO_FAILURE', message: describeCause(err) };
}
