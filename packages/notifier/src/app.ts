// Notifier wiring - builds the collaborators from config and starts polling
//
// Storage backend:
// - File (default): one decimal hash per line in TCEC_STATE_FILE
// - Postgres: set TCEC_DATABASE_URL

import {
  createFileSeenGameRepository,
  postgres,
  type SeenGameRepository,
} from '@engine-watch/repositories';
import {
  SeenGames,
  consoleLogger,
  createLoopState,
  createPoller,
  type Logger,
  type LoopState,
  type Poller,
} from '@engine-watch/runtime';
import type { NotifierConfig } from './config.js';
import { createDiscordNotifier } from './discord.js';
import { createHttpFeedSource } from './feed.js';
import type { FetchFn } from './http.js';
import { createHttpUsersConfigSource } from './users-config-source.js';
import { createWebhookLogger, withoutWebhook, type FlushableLogger } from './webhook-logger.js';

/**
 * Overrides for the process-wide collaborators
 */
export type NotifierDeps = {
  fetch?: FetchFn;
  logger?: Logger;
  repository?: SeenGameRepository;
};

export type NotifierHandle = {
  poller: Poller;
  state: LoopState;
  seenGames: SeenGames;
  /** Stop polling and release the seen-games record */
  stop(): Promise<void>;
};

/**
 * The process logger: console, mirrored to the log webhook when one is set.
 */
export function createNotifierLogger(
  config: NotifierConfig,
  base: Logger = consoleLogger,
  fetchFn?: FetchFn
): FlushableLogger {
  if (!config.logWebhook) {
    return withoutWebhook(base);
  }
  return createWebhookLogger(base, { webhookUrl: config.logWebhook, fetch: fetchFn });
}

export function createSeenGameRepository(config: NotifierConfig): SeenGameRepository {
  if (config.databaseUrl) {
    return postgres.createPgSeenGameRepository({ connectionString: config.databaseUrl });
  }
  return createFileSeenGameRepository({ filePath: config.stateFile });
}

/**
 * Load the users config and the seen-games record, then start polling.
 *
 * Either load failing is fatal: the error propagates and nothing is left
 * running.
 */
export async function startNotifier(
  config: NotifierConfig,
  deps: NotifierDeps = {}
): Promise<NotifierHandle> {
  const logger = deps.logger ?? consoleLogger;

  const recipientsSource = createHttpUsersConfigSource({
    url: config.configUrl,
    fetch: deps.fetch,
    logger,
  });
  const recipients = await recipientsSource.load();
  logger.info(`Loaded users config`, { engines: recipients.size });

  const repository = deps.repository ?? createSeenGameRepository(config);
  let seenGames: SeenGames;
  try {
    seenGames = await SeenGames.load(repository);
  } catch (error) {
    await repository.close();
    throw error;
  }
  logger.info(`Loaded ${seenGames.size} seen games`);

  const state = createLoopState(recipients);
  const poller = createPoller(
    {
      feed: createHttpFeedSource({ url: config.feedUrl, fetch: deps.fetch }),
      recipientsSource,
      notifier: createDiscordNotifier({
        webhookUrl: config.notifyWebhook,
        siteUrl: config.siteUrl,
        fetch: deps.fetch,
      }),
      seenGames,
      logger,
    },
    state,
    { intervalMs: config.pollIntervalMs }
  );

  poller.start();
  logger.info(`Polling ${config.feedUrl} every ${config.pollIntervalMs}ms`);

  return {
    poller,
    state,
    seenGames,
    async stop() {
      await poller.stop();
      await seenGames.close();
    },
  };
}
