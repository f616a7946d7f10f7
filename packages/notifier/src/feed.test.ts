// Tests for the HTTP feed source

import { describe, it, expect, vi } from 'vitest';
import { FeedFetchError } from '@engine-watch/runtime';
import { createHttpFeedSource } from './feed.js';
import type { FetchFn } from './http.js';

const FEED_URL = 'https://example.test/live.pgn';

describe('createHttpFeedSource', () => {
  it('returns the feed text', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('[Event "Test Cup"]', { status: 200 }));

    const text = await createHttpFeedSource({ url: FEED_URL, fetch: fetchFn }).fetchPgn();

    expect(text).toBe('[Event "Test Cup"]');
    expect(fetchFn).toHaveBeenCalledWith(FEED_URL, expect.objectContaining({ redirect: 'manual' }));
  });

  it('treats a redirect as a failure', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response(null, { status: 302 }));

    const failure = await createHttpFeedSource({ url: FEED_URL, fetch: fetchFn })
      .fetchPgn()
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(FeedFetchError);
    expect(failure).toMatchObject({ status: 302, message: 'Feed request failed (302)' });
  });

  it('wraps network errors', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => {
      throw new Error('socket hang up');
    });

    await expect(createHttpFeedSource({ url: FEED_URL, fetch: fetchFn }).fetchPgn()).rejects.toThrow(
      'Feed request failed: socket hang up'
    );
  });
});
