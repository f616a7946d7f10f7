// Environment configuration for the notifier process

import { z } from 'zod';
import { SEEN_GAMES_LOG_FILE } from '@engine-watch/protocol';
import { ConfigError } from '@engine-watch/runtime';

export const DEFAULT_FEED_URL = 'https://tcec-chess.com/live.pgn';
export const DEFAULT_SITE_URL = 'https://tcec-chess.com/';
export const DEFAULT_POLL_INTERVAL_MS = 30_000;

const EnvSchema = z
  .object({
    TCEC_CONFIG_URL: z.string().url(),
    TCEC_NOTIFY_WEBHOOK: z.string().url(),
    TCEC_LOG_WEBHOOK: z.string().url().optional(),
    TCEC_FEED_URL: z.string().url().default(DEFAULT_FEED_URL),
    TCEC_SITE_URL: z.string().url().default(DEFAULT_SITE_URL),
    TCEC_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
    TCEC_STATE_FILE: z.string().default(SEEN_GAMES_LOG_FILE),
    TCEC_DATABASE_URL: z.string().optional(),
  })
  .transform((env) => ({
    configUrl: env.TCEC_CONFIG_URL,
    notifyWebhook: env.TCEC_NOTIFY_WEBHOOK,
    logWebhook: env.TCEC_LOG_WEBHOOK,
    feedUrl: env.TCEC_FEED_URL,
    siteUrl: env.TCEC_SITE_URL,
    pollIntervalMs: env.TCEC_POLL_INTERVAL_MS,
    stateFile: env.TCEC_STATE_FILE,
    databaseUrl: env.TCEC_DATABASE_URL,
  }));

export type NotifierConfig = z.output<typeof EnvSchema>;

/**
 * Read the notifier configuration from the environment.
 * Variables set to the empty string count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(
      'Invalid environment',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}
