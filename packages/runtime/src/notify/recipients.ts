// Recipient selection - who to mention for a game

import type { EngineRecipients, RecipientId, UsersConfigFile } from '@engine-watch/protocol';
import type { Game } from '../games/index.js';

/**
 * Invert the users file into engine name → users following it.
 * An engine listed by several users collects all of them.
 */
export function buildEngineRecipients(config: UsersConfigFile): EngineRecipients {
  const recipients: EngineRecipients = new Map();

  for (const [user, engines] of Object.entries(config.users)) {
    for (const engine of engines) {
      const users = recipients.get(engine) ?? new Set<RecipientId>();
      users.add(user);
      recipients.set(engine, users);
    }
  }

  return recipients;
}

/**
 * Value equality of two recipient maps.
 */
export function engineRecipientsEqual(a: EngineRecipients, b: EngineRecipients): boolean {
  if (a.size !== b.size) return false;

  for (const [engine, users] of a) {
    const other = b.get(engine);
    if (!other || other.size !== users.size) return false;
    for (const user of users) {
      if (!other.has(user)) return false;
    }
  }

  return true;
}

export type RecipientSelection = {
  /** Users to mention, sorted, without duplicates */
  mentions: RecipientId[];
  /** Configured engine names that matched a player, sorted */
  matchedEngines: string[];
};

export function selectRecipients(game: Game, recipients: EngineRecipients): RecipientSelection {
  const mentions = new Set<RecipientId>();
  const matchedEngines: string[] = [];

  for (const [engine, users] of recipients) {
    if (!game.hasPlayer(engine)) continue;
    matchedEngines.push(engine);
    for (const user of users) {
      mentions.add(user);
    }
  }

  return {
    mentions: [...mentions].sort(),
    matchedEngines: matchedEngines.sort(),
  };
}
