import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

/**
 * Seen games table - append-only record of announced game identities.
 *
 * Design notes:
 * - Hashes are unsigned 64-bit; Postgres bigint is signed, so the decimal
 *   rendering is stored as text
 * - The primary key makes a repeated append a no-op
 */
export const seenGames = pgTable('seen_games', {
  hash: text('hash').primaryKey(),
  seenAt: timestamp('seen_at', { withTimezone: true }).notNull().defaultNow(),
});
