import { describe, it, expect } from 'vitest';
import { SeenGamesLogFormatError } from '@engine-watch/protocol';
import { rowsToIdentityHashes } from './seen-game-repository.js';

describe('rowsToIdentityHashes', () => {
  it('maps stored decimals to hashes in row order', () => {
    const hashes = rowsToIdentityHashes([{ hash: '7' }, { hash: '18446744073709551615' }]);

    expect(hashes).toEqual([7n, 18446744073709551615n]);
  });

  it('throws the log format error for a bad row', () => {
    let failure: unknown;
    try {
      rowsToIdentityHashes([{ hash: '1' }, { hash: 'abc' }]);
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(SeenGamesLogFormatError);
    expect(failure).toMatchObject({ line: 2, text: 'abc' });
  });

  it('rejects a row that does not fit in 64 bits', () => {
    expect(() => rowsToIdentityHashes([{ hash: '18446744073709551616' }])).toThrow(
      'Bad seen-games log at line 1: value does not fit in 64 bits'
    );
  });
});
