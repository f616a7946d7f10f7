// Notification configuration and payload types

import type { RecipientId } from './common.js';

/**
 * Shape of the remote users file: each user lists the engines they follow.
 *
 * ```json
 * { "users": { "1061209452": ["Stockfish", "Lunar"] } }
 * ```
 */
export type UsersConfigFile = {
  users: Record<RecipientId, string[]>;
};

/**
 * Engine name (as configured) → users following it.
 * The inversion of UsersConfigFile.
 */
export type EngineRecipients = Map<string, Set<RecipientId>>;

/**
 * What gets announced when a new game leaves book.
 */
export type NotificationContent = {
  tournament: string;
  white: string;
  black: string;
  mentions: RecipientId[];
};
