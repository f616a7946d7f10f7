// Runtime error types

import type { RequiredHeader } from '@engine-watch/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Base class for everything parsePgn can fail with.
 * Parse failures are deterministic: the same text always fails the same way.
 */
export class PgnParseError extends RuntimeError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'PgnParseError';
  }
}

/**
 * The text held no game at all.
 */
export class EmptyPgnError extends PgnParseError {
  constructor() {
    super('EMPTY_PGN', 'Empty PGN');
    this.name = 'EmptyPgnError';
  }
}

/**
 * The game ended without one of the White, Black, Date or Event tags.
 */
export class MissingHeaderError extends PgnParseError {
  readonly header: RequiredHeader;

  constructor(header: RequiredHeader) {
    super('MISSING_HEADER', `PGN is missing the required ${header} header`);
    this.name = 'MissingHeaderError';
    this.header = header;
  }
}

/**
 * The text could not be tokenized.
 */
export class MalformedPgnError extends PgnParseError {
  /** Character offset into the input where scanning failed */
  readonly offset: number;

  constructor(offset: number, reason: string) {
    super('MALFORMED_PGN', `Malformed PGN at offset ${offset}: ${reason}`);
    this.name = 'MalformedPgnError';
    this.offset = offset;
  }
}

/**
 * The seen-games record could not be read at startup.
 */
export class StateLoadError extends RuntimeError {
  constructor(message: string, cause?: unknown, code = 'STATE_LOAD_FAILED') {
    super(code, message, { cause });
    this.name = 'StateLoadError';
  }
}

/**
 * The seen-games record contains a line that is not an identity hash.
 */
export class CorruptStateError extends StateLoadError {
  readonly line: number;
  readonly text: string;

  constructor(line: number, text: string, cause?: unknown) {
    super(`Bad state file: line ${line} is not an identity hash ("${text}")`, cause, 'CORRUPT_STATE');
    this.name = 'CorruptStateError';
    this.line = line;
    this.text = text;
  }
}

/**
 * An identity hash could not be appended to the seen-games record.
 * The in-memory set already contains it when this is thrown.
 */
export class StateWriteError extends RuntimeError {
  readonly hash: bigint;

  constructor(hash: bigint, cause?: unknown) {
    super(
      'STATE_WRITE_FAILED',
      `Unable to write seen game ${hash} to the state record: ${describeCause(cause)}`,
      { cause }
    );
    this.name = 'StateWriteError';
    this.hash = hash;
  }
}

/**
 * The live feed could not be fetched.
 */
export class FeedFetchError extends RuntimeError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('FEED_FETCH_FAILED', message, { cause: options?.cause });
    this.name = 'FeedFetchError';
    this.status = options?.status;
  }
}

/**
 * A notification could not be delivered.
 */
export class NotifyError extends RuntimeError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('NOTIFY_FAILED', message, { cause: options?.cause });
    this.name = 'NotifyError';
    this.status = options?.status;
  }
}

/**
 * Configuration (environment or users file) is unusable.
 */
export class ConfigError extends RuntimeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], cause?: unknown) {
    super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, {
      cause,
    });
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
