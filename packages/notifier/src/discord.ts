// Discord webhook delivery

import type { NotificationContent } from '@engine-watch/protocol';
import {
  NotifyError,
  describeCause,
  formatNotification,
  type GameNotifier,
} from '@engine-watch/runtime';
import type { FetchFn } from './http.js';

export const DISCORD_USERNAME = 'engine-watch';

type MentionKind = 'users' | 'roles' | 'everyone';

/**
 * Body of a webhook execution request
 */
export type DiscordWebhookMessage = {
  username: string;
  allowed_mentions: { parse: MentionKind[] };
  content: string;
};

export type PostDiscordMessageOptions = {
  fetch?: FetchFn;
  username?: string;
  /** Mention kinds Discord may resolve (default: users) */
  allowedMentions?: MentionKind[];
};

/**
 * Execute a webhook with a plain text message.
 *
 * @throws NotifyError when the request fails or is answered with a non-2xx status
 */
export async function postDiscordMessage(
  webhookUrl: string,
  content: string,
  options: PostDiscordMessageOptions = {}
): Promise<void> {
  const fetchFn = options.fetch ?? fetch;
  const message: DiscordWebhookMessage = {
    username: options.username ?? DISCORD_USERNAME,
    allowed_mentions: { parse: options.allowedMentions ?? ['users'] },
    content,
  };

  let res: Response;
  try {
    res = await fetchFn(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(message),
    });
  } catch (error) {
    // The webhook URL carries its token, so it stays out of the message
    throw new NotifyError(`Webhook request failed: ${describeCause(error)}`, { cause: error });
  }

  if (!res.ok) {
    throw new NotifyError(`Webhook request failed (${res.status})`, { status: res.status });
  }
}

export type DiscordNotifierOptions = {
  webhookUrl: string;
  /** Link target of the tournament name */
  siteUrl: string;
  fetch?: FetchFn;
  username?: string;
};

export function createDiscordNotifier(options: DiscordNotifierOptions): GameNotifier {
  return {
    notify(content: NotificationContent): Promise<void> {
      return postDiscordMessage(options.webhookUrl, formatNotification(content, options.siteUrl), {
        fetch: options.fetch,
        username: options.username,
      });
    },
  };
}
