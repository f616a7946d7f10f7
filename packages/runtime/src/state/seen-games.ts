// SeenGames - the set of games already notified, kept in memory and on disk

import { SeenGamesLogFormatError, type IdentityHash } from '@engine-watch/protocol';
import type { SeenGameRepository } from '@engine-watch/repositories';
import { CorruptStateError, StateLoadError, StateWriteError, describeCause } from '../errors.js';
import type { Game } from '../games/index.js';

/**
 * In-memory membership over a durable, append-only record.
 *
 * The set is the source of truth for the running process; the repository
 * only has to survive restarts. A game is added to the set before it is
 * written, so a failed write can at worst cause one repeat notification
 * after a restart, never a missed one within this run.
 */
export class SeenGames {
  private readonly hashes: Set<IdentityHash>;

  private constructor(
    private readonly repository: SeenGameRepository,
    hashes: Iterable<IdentityHash>
  ) {
    this.hashes = new Set(hashes);
  }

  /**
   * Read every persisted hash.
   *
   * @throws CorruptStateError when the record holds a line that is not a hash
   * @throws StateLoadError when the record cannot be read at all
   */
  static async load(repository: SeenGameRepository): Promise<SeenGames> {
    let hashes: IdentityHash[];
    try {
      hashes = await repository.loadAll();
    } catch (error) {
      if (error instanceof SeenGamesLogFormatError) {
        throw new CorruptStateError(error.line, error.text, error);
      }
      throw new StateLoadError(`Unable to load seen games: ${describeCause(error)}`, error);
    }
    return new SeenGames(repository, hashes);
  }

  get size(): number {
    return this.hashes.size;
  }

  contains(game: Game): boolean {
    return this.hashes.has(game.identityHash);
  }

  /**
   * Record a game as seen.
   *
   * @throws StateWriteError when the durable append fails; the game stays
   * in the in-memory set
   */
  async add(game: Game): Promise<void> {
    const hash = game.identityHash;
    this.hashes.add(hash);
    try {
      await this.repository.append(hash);
    } catch (error) {
      throw new StateWriteError(hash, error);
    }
  }

  close(): Promise<void> {
    return this.repository.close();
  }
}
