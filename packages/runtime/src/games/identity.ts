// Identity hash - stable 64-bit fingerprint of a game

import { createHash, type Hash } from 'node:crypto';
import type { IdentityHash } from '@engine-watch/protocol';

export type IdentityFields = {
  /** Normalized white player name */
  white: string;
  /** Normalized black player name */
  black: string;
  date: string;
  openingSans: readonly string[];
};

function writeField(hash: Hash, field: string): void {
  const bytes = Buffer.from(field, 'utf8');
  const length = Buffer.alloc(4);
  length.writeUInt32BE(bytes.length);
  hash.update(length);
  hash.update(bytes);
}

/**
 * Hash the identity fields with SHA-256 and keep the first 8 bytes,
 * big-endian. Every field is length-prefixed, so no two field lists
 * share an encoding.
 */
export function computeIdentityHash(fields: IdentityFields): IdentityHash {
  const hash = createHash('sha256');

  writeField(hash, fields.white);
  writeField(hash, fields.black);
  writeField(hash, fields.date);

  const count = Buffer.alloc(4);
  count.writeUInt32BE(fields.openingSans.length);
  hash.update(count);
  for (const san of fields.openingSans) {
    writeField(hash, san);
  }

  return hash.digest().readBigUInt64BE(0);
}
