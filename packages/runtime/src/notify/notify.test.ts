// Tests for recipient selection and message formatting

import { describe, it, expect } from 'vitest';
import type { EngineRecipients } from '@engine-watch/protocol';
import { EngineName } from '../engines/index.js';
import { Game } from '../games/index.js';
import { formatNotification } from './message.js';
import { buildEngineRecipients, engineRecipientsEqual, selectRecipients } from './recipients.js';

function makeGame(white: string, black: string): Game {
  return new Game({
    white: new EngineName(white),
    black: new EngineName(black),
    date: '2026.01.01',
    event: 'Test Cup',
    moves: [],
  });
}

describe('buildEngineRecipients', () => {
  it('inverts users to engines', () => {
    const recipients = buildEngineRecipients({
      users: { '100': ['Lunar', 'Torch'], '200': ['Lunar'] },
    });

    expect([...recipients.keys()]).toEqual(['Lunar', 'Torch']);
    expect(recipients.get('Lunar')).toEqual(new Set(['100', '200']));
    expect(recipients.get('Torch')).toEqual(new Set(['100']));
  });

  it('returns an empty map for no users', () => {
    expect(buildEngineRecipients({ users: {} }).size).toBe(0);
  });
});

describe('engineRecipientsEqual', () => {
  const base = (): EngineRecipients => new Map([['Lunar', new Set(['100', '200'])]]);

  it('compares by value', () => {
    expect(engineRecipientsEqual(base(), new Map([['Lunar', new Set(['200', '100'])]]))).toBe(true);
  });

  it('notices a changed user list', () => {
    expect(engineRecipientsEqual(base(), new Map([['Lunar', new Set(['100', '300'])]]))).toBe(false);
    expect(engineRecipientsEqual(base(), new Map([['Lunar', new Set(['100'])]]))).toBe(false);
  });

  it('notices a changed engine list', () => {
    const more = base().set('Torch', new Set(['100']));
    expect(engineRecipientsEqual(base(), more)).toBe(false);
    expect(engineRecipientsEqual(base(), new Map([['Nova', new Set(['100', '200'])]]))).toBe(false);
  });
});

describe('selectRecipients', () => {
  const recipients = buildEngineRecipients({
    users: { '300': ['Torch'], '100': ['Lunar 1.0'], '200': ['lunar', 'Torch'] },
  });

  it('unions the users of every matching engine', () => {
    expect(selectRecipients(makeGame('Lunar 2.0', 'Torch 3'), recipients)).toEqual({
      mentions: ['100', '200', '300'],
      matchedEngines: ['Lunar 1.0', 'Torch', 'lunar'],
    });
  });

  it('matches one side only', () => {
    expect(selectRecipients(makeGame('Nova', 'Torch 3'), recipients)).toEqual({
      mentions: ['200', '300'],
      matchedEngines: ['Torch'],
    });
  });

  it('returns nothing when no engine plays', () => {
    expect(selectRecipients(makeGame('Nova', 'Quasar'), recipients)).toEqual({
      mentions: [],
      matchedEngines: [],
    });
  });
});

describe('formatNotification', () => {
  const content = { tournament: 'Test Cup', white: 'Lunar 2.0', black: 'Torch 3' };

  it('renders the headline without mentions', () => {
    expect(formatNotification({ ...content, mentions: [] }, 'https://example.test/')).toBe(
      '[`Test Cup`](https://example.test/) `Lunar 2.0` vs. `Torch 3`'
    );
  });

  it('appends mentions', () => {
    expect(formatNotification({ ...content, mentions: ['100', '200'] }, 'https://example.test/')).toBe(
      '[`Test Cup`](https://example.test/) `Lunar 2.0` vs. `Torch 3`   cc. <@!100> <@!200>'
    );
  });
});
