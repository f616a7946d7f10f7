// Notification text

import type { NotificationContent, RecipientId } from '@engine-watch/protocol';

const MENTION_SEPARATOR = '   cc. ';

export function formatMention(id: RecipientId): string {
  return `<@!${id}>`;
}

/**
 * Render a notification as Discord markdown, e.g.
 * [`Test Cup`](https://example.test/) `Lunar 2.0` vs. `Torch 3`   cc. <@!1> <@!2>
 */
export function formatNotification(content: NotificationContent, siteUrl: string): string {
  const headline = `[\`${content.tournament}\`](${siteUrl}) \`${content.white}\` vs. \`${content.black}\``;
  if (content.mentions.length === 0) {
    return headline;
  }
  return headline + MENTION_SEPARATOR + content.mentions.map(formatMention).join(' ');
}
