// Logger that mirrors entries to a Discord webhook

import {
  describeCause,
  isLevelEnabled,
  type Logger,
  type LogLevel,
} from '@engine-watch/runtime';
import { postDiscordMessage } from './discord.js';
import type { FetchFn } from './http.js';

export type WebhookLoggerOptions = {
  webhookUrl: string;
  /**
   * Least severe level that is mirrored (default: info)
   */
  minLevel?: LogLevel;
  fetch?: FetchFn;
  username?: string;
};

/**
 * A logger whose webhook deliveries can be awaited before exit
 */
export type FlushableLogger = Logger & {
  flush(): Promise<void>;
};

function stringifyData(data: Record<string, unknown>): string {
  return JSON.stringify(data, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

export function formatLogMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  const line = `**${level.toUpperCase()}** ${message}`;
  return data ? `${line}\n\`${stringifyData(data)}\`` : line;
}

/**
 * Log through `base`, and mirror entries at or above `minLevel` to a webhook.
 *
 * Deliveries run in the background. A failed delivery is reported to
 * `base.error` only, so it is never mirrored or thrown.
 */
export function createWebhookLogger(base: Logger, options: WebhookLoggerOptions): FlushableLogger {
  const minLevel = options.minLevel ?? 'info';
  const pending = new Set<Promise<void>>();

  const mirror = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    const delivery: Promise<void> = postDiscordMessage(
      options.webhookUrl,
      formatLogMessage(level, message, data),
      { fetch: options.fetch, username: options.username, allowedMentions: [] }
    )
      .catch((error: unknown) => {
        base.error(`Unable to mirror log entry to webhook: ${describeCause(error)}`);
      })
      .finally(() => {
        pending.delete(delivery);
      });
    pending.add(delivery);
  };

  const log =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      base[level](message, data);
      if (isLevelEnabled(level, minLevel)) {
        mirror(level, message, data);
      }
    };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),

    async flush(): Promise<void> {
      await Promise.all([...pending]);
    },
  };
}

/**
 * Wrap a logger with a no-op flush
 */
export function withoutWebhook(base: Logger): FlushableLogger {
  return {
    debug: (message, data) => base.debug(message, data),
    info: (message, data) => base.info(message, data),
    warn: (message, data) => base.warn(message, data),
    error: (message, data) => base.error(message, data),
    flush: async () => {},
  };
}
