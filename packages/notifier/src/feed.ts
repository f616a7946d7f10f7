// Live PGN feed over HTTP

import { FeedFetchError, describeCause, type FeedSource } from '@engine-watch/runtime';
import type { FetchFn } from './http.js';

export type HttpFeedSourceOptions = {
  url: string;
  fetch?: FetchFn;
};

/**
 * Fetch the feed without following redirects; anything but a 200 is a failure.
 */
export function createHttpFeedSource(options: HttpFeedSourceOptions): FeedSource {
  const fetchFn = options.fetch ?? fetch;

  return {
    async fetchPgn(): Promise<string> {
      let res: Response;
      try {
        res = await fetchFn(options.url, {
          redirect: 'manual',
          headers: { Accept: 'application/x-chess-pgn, text/plain' },
        });
      } catch (error) {
        throw new FeedFetchError(`Feed request failed: ${describeCause(error)}`, { cause: error });
      }

      if (res.status !== 200) {
        throw new FeedFetchError(`Feed request failed (${res.status})`, { status: res.status });
      }

      return res.text();
    },
  };
}
