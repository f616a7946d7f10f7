// @engine-watch/notifier
// The polling process and its HTTP collaborators

export {
  loadConfig,
  DEFAULT_FEED_URL,
  DEFAULT_SITE_URL,
  DEFAULT_POLL_INTERVAL_MS,
  type NotifierConfig,
} from './config.js';
export { createHttpFeedSource, type HttpFeedSourceOptions } from './feed.js';
export {
  createHttpUsersConfigSource,
  type HttpUsersConfigSourceOptions,
} from './users-config-source.js';
export {
  postDiscordMessage,
  createDiscordNotifier,
  DISCORD_USERNAME,
  type DiscordWebhookMessage,
  type DiscordNotifierOptions,
  type PostDiscordMessageOptions,
} from './discord.js';
export {
  createWebhookLogger,
  withoutWebhook,
  formatLogMessage,
  type FlushableLogger,
  type WebhookLoggerOptions,
} from './webhook-logger.js';
export {
  startNotifier,
  createNotifierLogger,
  createSeenGameRepository,
  type NotifierDeps,
  type NotifierHandle,
} from './app.js';
export type { FetchFn } from './http.js';
