// Game - one chess game as read from the feed

import {
  BOOK_MOVE_COMMENT_PREFIX,
  type GameMove,
  type GameSummary,
  type IdentityHash,
} from '@engine-watch/protocol';
import { EngineName } from '../engines/index.js';
import { computeIdentityHash } from './identity.js';

/**
 * Build a move, classifying it as book from its comment.
 */
export function createMove(san: string, comment = ''): GameMove {
  return Object.freeze({
    san,
    comment,
    inBook: comment.startsWith(BOOK_MOVE_COMMENT_PREFIX),
  });
}

export type GameInit = {
  white: EngineName;
  black: EngineName;
  date: string;
  event: string;
  moves: readonly GameMove[];
};

/**
 * Immutable game value. Two games are the same game when their players,
 * date and opening book line agree; moves played after the book ends do
 * not change the identity.
 */
export class Game {
  readonly white: EngineName;
  readonly black: EngineName;
  readonly date: string;
  readonly event: string;
  readonly moves: readonly GameMove[];

  private hash: IdentityHash | null = null;

  constructor(init: GameInit) {
    this.white = init.white;
    this.black = init.black;
    this.date = init.date;
    this.event = init.event;
    this.moves = Object.freeze([...init.moves]);
  }

  get plyCount(): number {
    return this.moves.length;
  }

  /** True once any move has left the opening book */
  outOfBook(): boolean {
    return this.moves.some((move) => !move.inBook);
  }

  /** Leading run of book moves, ending at the first non-book move */
  opening(): readonly GameMove[] {
    const end = this.moves.findIndex((move) => !move.inBook);
    return end === -1 ? this.moves : this.moves.slice(0, end);
  }

  hasPlayer(name: string): boolean {
    return this.white.matches(name) || this.black.matches(name);
  }

  get identityHash(): IdentityHash {
    if (this.hash === null) {
      this.hash = computeIdentityHash({
        white: this.white.key,
        black: this.black.key,
        date: this.date,
        openingSans: this.opening().map((move) => move.san),
      });
    }
    return this.hash;
  }

  equals(other: Game): boolean {
    return this.identityHash === other.identityHash;
  }

  toSummary(): GameSummary {
    return {
      white: this.white.raw,
      black: this.black.raw,
      date: this.date,
      event: this.event,
      plies: this.plyCount,
      openingPlies: this.opening().length,
      outOfBook: this.outOfBook(),
      identityHash: this.identityHash.toString(),
    };
  }
}
