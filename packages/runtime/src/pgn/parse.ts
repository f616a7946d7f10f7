// PGN entry points

import type { Game } from '../games/index.js';
import { EmptyPgnError, PgnParseError } from '../errors.js';
import { GameBuilder, type GameBuilderOptions } from './game-builder.js';
import { readGame } from './visitor.js';

export type ParsePgnOptions = GameBuilderOptions;

export type ParsePgnResult =
  | { ok: true; game: Game }
  | { ok: false; error: PgnParseError };

/**
 * Parse the first game of a PGN text.
 *
 * @throws EmptyPgnError when the text holds no game
 * @throws MissingHeaderError when White, Black, Date or Event is absent
 * @throws MalformedPgnError when the text cannot be tokenized
 */
export function parsePgn(text: string, options: ParsePgnOptions = {}): Game {
  const game = readGame(text, new GameBuilder(options));
  if (game === null) {
    throw new EmptyPgnError();
  }
  return game;
}

/**
 * parsePgn with parse failures returned instead of thrown.
 * Anything that is not a PgnParseError still propagates.
 */
export function tryParsePgn(text: string, options: ParsePgnOptions = {}): ParsePgnResult {
  try {
    return { ok: true, game: parsePgn(text, options) };
  } catch (error) {
    if (error instanceof PgnParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
