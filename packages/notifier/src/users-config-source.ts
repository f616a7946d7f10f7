// Users config over HTTP - who follows which engines

import { parseUsersConfig, type EngineRecipients } from '@engine-watch/protocol';
import {
  ConfigError,
  buildEngineRecipients,
  consoleLogger,
  describeCause,
  type Logger,
  type RecipientsSource,
} from '@engine-watch/runtime';
import type { FetchFn } from './http.js';

export type HttpUsersConfigSourceOptions = {
  url: string;
  fetch?: FetchFn;
  /**
   * Receives validation warnings (default: console)
   */
  logger?: Logger;
};

/**
 * Load the users file from a URL and invert it into engine → users.
 *
 * Redirects are not followed. Warnings are logged once per distinct file
 * content, not on every reload.
 */
export function createHttpUsersConfigSource(options: HttpUsersConfigSourceOptions): RecipientsSource {
  const fetchFn = options.fetch ?? fetch;
  const logger = options.logger ?? consoleLogger;
  let lastText: string | null = null;

  return {
    async load(): Promise<EngineRecipients> {
      let res: Response;
      try {
        res = await fetchFn(options.url, { redirect: 'manual' });
      } catch (error) {
        throw new ConfigError('Users config request failed', [describeCause(error)], error);
      }

      if (res.status !== 200) {
        throw new ConfigError(`Users config request failed (${res.status})`);
      }

      const text = await res.text();
      const { config, result } = parseUsersConfig(text);

      if (text !== lastText) {
        for (const warning of result.warnings) {
          logger.warn(`${warning.path}: ${warning.message}`, { code: warning.code });
        }
      }

      if (!config) {
        throw new ConfigError(
          'Invalid users config',
          result.errors.map((error) => `${error.path}: ${error.message}`)
        );
      }

      lastText = text;
      return buildEngineRecipients(config);
    },
  };
}
