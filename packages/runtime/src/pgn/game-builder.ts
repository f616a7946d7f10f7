// GameBuilder - turns visitor events into a Game

import { REQUIRED_HEADERS, type GameMove, type RequiredHeader } from '@engine-watch/protocol';
import { EngineName } from '../engines/index.js';
import { MissingHeaderError } from '../errors.js';
import { Game, createMove } from '../games/index.js';
import type { PgnVisitor } from './visitor.js';

/**
 * What to do with a comment that arrives while no move is pending,
 * such as a game-level comment before the first move.
 * - drop: discard it
 * - carry: attach it to the next committed move unless a later comment replaces it
 */
export type OrphanCommentPolicy = 'drop' | 'carry';

export type GameBuilderOptions = {
  orphanComments?: OrphanCommentPolicy;
};

/**
 * Visitor that collects the mainline of one game.
 *
 * A move is held back until the next move (or the end of the game) so the
 * last comment after it can be attached; book classification happens only
 * then. Variations are always skipped. Single use.
 */
export class GameBuilder implements PgnVisitor<Game> {
  private readonly headers: Partial<Record<RequiredHeader, string>> = {};
  private readonly moves: GameMove[] = [];
  private pendingSan: string | null = null;
  private pendingComment: string | null = null;
  private readonly orphanComments: OrphanCommentPolicy;

  constructor(options: GameBuilderOptions = {}) {
    this.orphanComments = options.orphanComments ?? 'drop';
  }

  header(name: string, value: string): void {
    const header = REQUIRED_HEADERS.find((required) => required === name);
    if (header) {
      this.headers[header] = value;
    }
  }

  san(san: string): void {
    this.commitPending();
    this.pendingSan = san;
  }

  comment(text: string): void {
    if (this.pendingSan === null && this.orphanComments === 'drop') {
      return;
    }
    this.pendingComment = text;
  }

  beginVariation(): boolean {
    return true;
  }

  endVariation(): void {
    // Variations are skipped, so nothing was opened
  }

  endGame(): Game {
    this.commitPending();

    return new Game({
      white: new EngineName(this.requireHeader('White')),
      black: new EngineName(this.requireHeader('Black')),
      date: this.requireHeader('Date'),
      event: this.requireHeader('Event'),
      moves: this.moves,
    });
  }

  private commitPending(): void {
    if (this.pendingSan === null) {
      return;
    }
    this.moves.push(createMove(this.pendingSan, this.pendingComment ?? ''));
    this.pendingSan = null;
    this.pendingComment = null;
  }

  private requireHeader(header: RequiredHeader): string {
    const value = this.headers[header];
    if (value === undefined) {
      throw new MissingHeaderError(header);
    }
    return value;
  }
}
