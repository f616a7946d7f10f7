// In-memory repository implementation for development and testing
//
// Data does not persist between restarts.

import { isIdentityHash, type IdentityHash } from '@engine-watch/protocol';
import type { SeenGameRepository } from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemorySeenGamesData {
  /** Appended hashes, in append order (duplicates kept, like the file log) */
  hashes: IdentityHash[];
  /** Whether close() has been called */
  closed: boolean;
}

/**
 * Extended repository with access to underlying data and clear function.
 */
export interface InMemorySeenGameRepository extends SeenGameRepository {
  /** Direct access to underlying data (for debugging/testing) */
  _data: InMemorySeenGamesData;
  /** Clear all data */
  clear(): void;
}

/**
 * Create an in-memory seen-games repository.
 *
 * @param initial - Hashes the record starts with, as if loaded from storage
 */
export function createInMemorySeenGameRepository(
  initial: IdentityHash[] = []
): InMemorySeenGameRepository {
  const data: InMemorySeenGamesData = {
    hashes: [...initial],
    closed: false,
  };

  return {
    _data: data,

    async loadAll(): Promise<IdentityHash[]> {
      return [...data.hashes];
    },

    async append(hash: IdentityHash): Promise<void> {
      if (data.closed) {
        throw new Error('Seen-games repository is closed');
      }
      if (!isIdentityHash(hash)) {
        throw new RangeError(`Not an unsigned 64-bit identity hash: ${hash}`);
      }
      data.hashes.push(hash);
    },

    async close(): Promise<void> {
      data.closed = true;
    },

    clear(): void {
      data.hashes.length = 0;
      data.closed = false;
    },
  };
}
