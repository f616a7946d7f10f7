import { asc } from 'drizzle-orm';
import {
  SeenGamesLogFormatError,
  parseIdentityHash,
  stringifySeenGamesLogLine,
  type IdentityHash,
} from '@engine-watch/protocol';
import { createDatabase, type Database, type DatabaseClient, type DatabaseConfig } from '../db.js';
import { seenGames } from '../schema/index.js';
import type { SeenGameRepository } from '../../interfaces/index.js';

/**
 * Map stored rows to hashes. A bad row throws the same error as a bad line
 * in the file log, numbered from 1 in `seen_at` order.
 */
export function rowsToIdentityHashes(rows: ReadonlyArray<{ hash: string }>): IdentityHash[] {
  return rows.map((row, index) => {
    const parsed = parseIdentityHash(row.hash);
    if (typeof parsed === 'string') {
      throw new SeenGamesLogFormatError({ line: index + 1, text: row.hash, reason: parsed });
    }
    return parsed;
  });
}

/**
 * Seen-games record in the `seen_games` table.
 *
 * The table is not created here: apply the schema first with
 * `npm run db:push` (or `db:generate` then `db:migrate`).
 */
export class PgSeenGameRepository implements SeenGameRepository {
  /**
   * @param db - Drizzle instance
   * @param client - Connection owned by this repository, ended on close()
   */
  constructor(
    private db: Database,
    private client: DatabaseClient | null = null
  ) {}

  async loadAll(): Promise<IdentityHash[]> {
    const rows = await this.db
      .select({ hash: seenGames.hash })
      .from(seenGames)
      .orderBy(asc(seenGames.seenAt));

    return rowsToIdentityHashes(rows);
  }

  async append(hash: IdentityHash): Promise<void> {
    // Validates the range; the stored text is the same decimal as the file log
    const value = stringifySeenGamesLogLine(hash).trimEnd();

    await this.db.insert(seenGames).values({ hash: value }).onConflictDoNothing();
  }

  async close(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.end();
    }
  }
}

/**
 * Create a SeenGameRepository backed by Postgres.
 * The repository owns the connection and ends it on close().
 *
 * Usage:
 * ```ts
 * const repo = createPgSeenGameRepository({ connectionString: process.env.TCEC_DATABASE_URL });
 * const hashes = await repo.loadAll();
 * ```
 */
export function createPgSeenGameRepository(config: DatabaseConfig): PgSeenGameRepository {
  const { db, client } = createDatabase(config);
  return new PgSeenGameRepository(db, client);
}
