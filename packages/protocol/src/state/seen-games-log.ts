// Seen-games log helpers
// One unsigned 64-bit identity hash per line, base-10, append-only.

import type { IdentityHash } from '../types/common.js';

/**
 * Default file name of the seen-games log, relative to the working directory
 */
export const SEEN_GAMES_LOG_FILE = 'state.bin';

const MAX_IDENTITY_HASH = (1n << 64n) - 1n;
const DECIMAL_PATTERN = /^\d+$/;

/**
 * A line of the log that is not a valid identity hash
 */
export type SeenGamesLogLineError = {
  line: number;
  text: string;
  reason: string;
};

/**
 * Thrown by parseSeenGamesLog when the log holds a corrupt line.
 */
export class SeenGamesLogFormatError extends Error {
  readonly line: number;
  readonly text: string;

  constructor(error: SeenGamesLogLineError) {
    super(`Bad seen-games log at line ${error.line}: ${error.reason}`);
    this.name = 'SeenGamesLogFormatError';
    this.line = error.line;
    this.text = error.text;
  }
}

/**
 * Parse one line into an identity hash, or describe why it is not one.
 */
export function parseIdentityHash(text: string): IdentityHash | string {
  if (!DECIMAL_PATTERN.test(text)) {
    return 'expected an unsigned decimal integer';
  }

  const value = BigInt(text);
  if (value > MAX_IDENTITY_HASH) {
    return 'value does not fit in 64 bits';
  }

  return value;
}

/**
 * Whether a value is representable as an identity hash
 */
export function isIdentityHash(value: bigint): boolean {
  return value >= 0n && value <= MAX_IDENTITY_HASH;
}

/**
 * Parse the whole log.
 * Blank lines are skipped; anything else that is not a hash throws.
 */
export function parseSeenGamesLog(content: string): IdentityHash[] {
  if (!content.trim()) {
    return [];
  }

  const lines = content.split('\n');
  const hashes: IdentityHash[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    const parsed = parseIdentityHash(line);
    if (typeof parsed === 'string') {
      throw new SeenGamesLogFormatError({ line: i + 1, text: line, reason: parsed });
    }
    hashes.push(parsed);
  }

  return hashes;
}

/**
 * Render a single hash as a log line (for appending)
 */
export function stringifySeenGamesLogLine(hash: IdentityHash): string {
  if (!isIdentityHash(hash)) {
    throw new RangeError(`Not an unsigned 64-bit identity hash: ${hash}`);
  }
  return `${hash.toString(10)}\n`;
}
