// PGN visitor - drives a visitor over the tokens of one game

import { MalformedPgnError } from '../errors.js';
import { PgnTokenizer } from './tokenizer.js';

/**
 * Receives the events of one game in text order.
 */
export interface PgnVisitor<T> {
  header(name: string, value: string): void;
  san(san: string): void;
  comment(text: string): void;
  nag?(nag: string): void;
  /** Return true to skip the whole variation, nested ones included */
  beginVariation(): boolean;
  endVariation(): void;
  endGame(): T;
}

/**
 * Read the first game in `text`.
 *
 * Returns null when the text holds no game. The game ends at its result
 * token, at a tag that follows movetext, or at end of input; anything after
 * that is ignored.
 */
export function readGame<T>(text: string, visitor: PgnVisitor<T>): T | null {
  const tokenizer = new PgnTokenizer(text);
  let started = false;
  let inMovetext = false;
  let depth = 0;
  let skipping = 0;

  for (let token = tokenizer.next(); token; token = tokenizer.next()) {
    started = true;

    if (skipping > 0) {
      if (token.kind === 'beginVariation') {
        skipping++;
      } else if (token.kind === 'endVariation') {
        skipping--;
        if (skipping === 0) {
          depth--;
        }
      } else if (token.kind === 'result' || token.kind === 'tag') {
        throw new MalformedPgnError(token.offset, 'unterminated variation');
      }
      continue;
    }

    switch (token.kind) {
      case 'tag':
        if (inMovetext) {
          if (depth > 0) {
            throw new MalformedPgnError(token.offset, 'unterminated variation');
          }
          return visitor.endGame();
        }
        visitor.header(token.name, token.value);
        break;
      case 'moveNumber':
        inMovetext = true;
        break;
      case 'san':
        inMovetext = true;
        visitor.san(token.san);
        break;
      case 'nag':
        inMovetext = true;
        visitor.nag?.(token.nag);
        break;
      case 'comment':
        visitor.comment(token.text);
        break;
      case 'beginVariation':
        inMovetext = true;
        depth++;
        if (visitor.beginVariation()) {
          skipping = 1;
        }
        break;
      case 'endVariation':
        if (depth === 0) {
          throw new MalformedPgnError(token.offset, 'unbalanced ")"');
        }
        depth--;
        visitor.endVariation();
        break;
      case 'result':
        if (depth > 0) {
          throw new MalformedPgnError(token.offset, 'unterminated variation');
        }
        return visitor.endGame();
    }
  }

  if (!started) {
    return null;
  }
  if (depth > 0) {
    throw new MalformedPgnError(text.length, 'unterminated variation');
  }
  return visitor.endGame();
}
