// Tests for the HTTP users config source

import { describe, it, expect, vi } from 'vitest';
import { ConfigError, createCapturingLogger } from '@engine-watch/runtime';
import type { FetchFn } from './http.js';
import { createHttpUsersConfigSource } from './users-config-source.js';

const CONFIG_URL = 'https://example.test/users.json';

function serving(...bodies: string[]) {
  const fetchFn = vi.fn<FetchFn>(async () => new Response(bodies[0], { status: 200 }));
  for (const body of bodies) {
    fetchFn.mockImplementationOnce(async () => new Response(body, { status: 200 }));
  }
  return fetchFn;
}

describe('createHttpUsersConfigSource', () => {
  it('inverts the users file', async () => {
    const fetchFn = serving('{"users": {"100": ["Lunar", "Torch"], "200": ["Lunar"]}}');
    const source = createHttpUsersConfigSource({ url: CONFIG_URL, fetch: fetchFn });

    const recipients = await source.load();

    expect(recipients).toEqual(
      new Map([
        ['Lunar', new Set(['100', '200'])],
        ['Torch', new Set(['100'])],
      ])
    );
    expect(fetchFn).toHaveBeenCalledWith(CONFIG_URL, { redirect: 'manual' });
  });

  it('logs warnings once per distinct file', async () => {
    const logger = createCapturingLogger();
    const source = createHttpUsersConfigSource({
      url: CONFIG_URL,
      fetch: serving('{"users": {"100": []}, "extra": 1}'),
      logger,
    });

    await source.load();
    await source.load();

    expect(logger.entries.map((entry) => entry.message)).toEqual([
      'config.extra: Unknown field "extra" is ignored',
      'config.users.100: User "100" follows no engines',
    ]);
  });

  it('rejects an invalid file', async () => {
    const source = createHttpUsersConfigSource({ url: CONFIG_URL, fetch: serving('{"users": {"100": "Lunar"}}') });

    const failure = await source.load().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ConfigError);
    expect(failure).toMatchObject({ issues: ['config.users.100: Engine list must be an array'] });
  });

  it('rejects text that is not JSON5', async () => {
    const source = createHttpUsersConfigSource({ url: CONFIG_URL, fetch: serving('users:') });
    await expect(source.load()).rejects.toThrow('Users config is not valid JSON5');
  });

  it('rejects a non-200 response', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('moved', { status: 301 }));
    const source = createHttpUsersConfigSource({ url: CONFIG_URL, fetch: fetchFn });

    await expect(source.load()).rejects.toThrow('Users config request failed (301)');
  });
});
