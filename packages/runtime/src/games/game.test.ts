// Tests for the Game value and its identity hash

import { describe, it, expect } from 'vitest';
import { EngineName } from '../engines/index.js';
import { Game, createMove, type GameInit } from './game.js';
import { computeIdentityHash } from './identity.js';

const book = (san: string) => createMove(san, 'book, mb=+0');
const played = (san: string) => createMove(san, 'd=24');

function makeGame(overrides: Partial<GameInit> = {}): Game {
  return new Game({
    white: new EngineName('Lunar 2.0'),
    black: new EngineName('Torch 3'),
    date: '2026.01.01',
    event: 'Test Cup',
    moves: [book('e4'), book('c5'), played('Nf3')],
    ...overrides,
  });
}

describe('createMove', () => {
  it('marks moves whose comment starts with the book prefix', () => {
    expect(createMove('e4', 'book,')).toEqual({ san: 'e4', comment: 'book,', inBook: true });
    expect(createMove('e4', 'bookish')).toEqual({ san: 'e4', comment: 'bookish', inBook: false });
    expect(createMove('e4')).toEqual({ san: 'e4', comment: '', inBook: false });
  });
});

describe('Game', () => {
  it('stops the opening at the first non-book move', () => {
    const game = makeGame({ moves: [book('d4'), book('d5'), played('c4'), book('e6')] });
    expect(game.opening().map((move) => move.san)).toEqual(['d4', 'd5']);
  });

  it('uses every move as the opening while still in book', () => {
    const game = makeGame({ moves: [book('d4'), book('d5')] });
    expect(game.outOfBook()).toBe(false);
    expect(game.opening()).toHaveLength(2);
  });

  it('is out of book once any move is not', () => {
    expect(makeGame().outOfBook()).toBe(true);
    expect(makeGame({ moves: [] }).outOfBook()).toBe(false);
  });

  it('matches either player', () => {
    const game = makeGame();
    expect(game.hasPlayer('lunar')).toBe(true);
    expect(game.hasPlayer('Torch 4')).toBe(true);
    expect(game.hasPlayer('Nova')).toBe(false);
  });

  it('does not share its move list with the caller', () => {
    const moves = [book('e4')];
    const game = makeGame({ moves });
    moves.push(played('e5'));
    expect(game.plyCount).toBe(1);
    expect(Object.isFrozen(game.moves)).toBe(true);
  });

  it('summarizes itself for logging', () => {
    const game = makeGame();
    expect(game.toSummary()).toEqual({
      white: 'Lunar 2.0',
      black: 'Torch 3',
      date: '2026.01.01',
      event: 'Test Cup',
      plies: 3,
      openingPlies: 2,
      outOfBook: true,
      identityHash: game.identityHash.toString(),
    });
  });

  describe('identityHash', () => {
    it('is an unsigned 64-bit integer', () => {
      const hash = makeGame().identityHash;
      expect(hash >= 0n).toBe(true);
      expect(hash < 2n ** 64n).toBe(true);
    });

    it('ignores moves played after the book', () => {
      const early = makeGame();
      const later = makeGame({ moves: [book('e4'), book('c5'), played('Nf3'), played('d6')] });
      expect(later.identityHash).toBe(early.identityHash);
      expect(later.equals(early)).toBe(true);
    });

    it('ignores book moves after the first non-book move', () => {
      const a = makeGame({ moves: [book('e4'), played('c5'), book('Nf3')] });
      const b = makeGame({ moves: [book('e4'), played('e5'), book('Nc3')] });
      expect(a.identityHash).toBe(b.identityHash);
    });

    it('ignores event and engine versions', () => {
      const other = makeGame({
        white: new EngineName('Lunar 2.1'),
        black: new EngineName('Torch'),
        event: 'Another Cup',
      });
      expect(other.identityHash).toBe(makeGame().identityHash);
    });

    it('changes with the opening', () => {
      const other = makeGame({ moves: [book('e4'), book('e5'), played('Nf3')] });
      expect(other.identityHash).not.toBe(makeGame().identityHash);
    });

    it('changes with a longer opening', () => {
      const other = makeGame({ moves: [book('e4'), book('c5'), book('Nf3')] });
      expect(other.identityHash).not.toBe(makeGame().identityHash);
    });

    it('changes with the date', () => {
      expect(makeGame({ date: '2026.01.02' }).identityHash).not.toBe(makeGame().identityHash);
    });

    it('changes when colors are swapped', () => {
      const swapped = makeGame({ white: new EngineName('Torch 3'), black: new EngineName('Lunar 2.0') });
      expect(swapped.identityHash).not.toBe(makeGame().identityHash);
    });

    it('changes when only black changes', () => {
      const other = makeGame({ black: new EngineName('Nova') });
      expect(other.identityHash).not.toBe(makeGame().identityHash);
    });

    it('changes when only white changes', () => {
      const other = makeGame({ white: new EngineName('Nova') });
      expect(other.identityHash).not.toBe(makeGame().identityHash);
    });
  });
});

describe('computeIdentityHash', () => {
  it('keeps field boundaries apart', () => {
    const a = computeIdentityHash({ white: 'ab', black: 'c', date: 'd', openingSans: [] });
    const b = computeIdentityHash({ white: 'a', black: 'bc', date: 'd', openingSans: [] });
    expect(a).not.toBe(b);
  });

  it('keeps move boundaries apart', () => {
    const a = computeIdentityHash({ white: 'w', black: 'b', date: 'd', openingSans: ['e4e5'] });
    const b = computeIdentityHash({ white: 'w', black: 'b', date: 'd', openingSans: ['e4', 'e5'] });
    expect(a).not.toBe(b);
  });
});
