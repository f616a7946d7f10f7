import type { IdentityHash } from '@engine-watch/protocol';

/**
 * Repository interface for the seen-games record.
 *
 * The record is an append-only set of game identity hashes. A hash is
 * appended once the game it identifies has been announced, so that a
 * restarted process does not announce it again.
 *
 * Implementations own their storage handle for the life of the process:
 * it is acquired on first use and released by close().
 */
export interface SeenGameRepository {
  /**
   * Read every persisted hash, in append order.
   * Missing storage is created empty where the backend can do so: the file
   * backend creates its file, while the Postgres backend expects the
   * `seen_games` table to exist already (`npm run db:push`). Corrupt storage
   * throws SeenGamesLogFormatError; it is never silently truncated.
   */
  loadAll(): Promise<IdentityHash[]>;

  /**
   * Durably append one hash.
   * Resolves only once the hash has reached storage.
   */
  append(hash: IdentityHash): Promise<void>;

  /**
   * Release the underlying storage handle.
   */
  close(): Promise<void>;
}
