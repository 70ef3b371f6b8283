import { WebhookClient } from 'discord.js';
import type { EmbedBuilder, WebhookMessageCreateOptions } from 'discord.js';
import { NotificationError, errorMessage } from './errors.js';
import type { CanonicalItem, Notifier } from './types.js';

export const NEW_ITEM_COLOR = 0x00ff00;

export const WEBHOOK_PLACEHOLDERS = [
  'YOUR_DISCORD_WEBHOOK_URL_HERE',
  'https://discord.com/api/webhooks/YOUR_WEBHOOK_ID/YOUR_WEBHOOK_TOKEN',
] as const;

const EMBED_TITLE_LIMIT = 256;

export interface WebhookSender {
  send(options: WebhookMessageCreateOptions): Promise<unknown>;
  destroy(): void;
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  username: string;
  avatarUrl?: string;
  format: (item: CanonicalItem) => EmbedBuilder;
  createClient?: (url: string) => WebhookSender;
}

export function isWebhookConfigured(url: string): boolean {
  const trimmed = url.trim();
  return trimmed !== '' && !WEBHOOK_PLACEHOLDERS.some((placeholder) => placeholder === trimmed);
}

export function truncateTitle(title: string): string {
  return title.length > EMBED_TITLE_LIMIT ? `${title.slice(0, EMBED_TITLE_LIMIT - 1)}…` : title;
}

/**
 * Posts one embed per new item to a Discord webhook.
 *
 * notify() never rejects: a lost notification is logged and dropped, never
 * retried, so a retry can't double-post.
 */
export class DiscordNotifier implements Notifier {
  readonly enabled: boolean;
  private client: WebhookSender | null = null;

  constructor(private readonly options: DiscordNotifierOptions) {
    this.enabled = isWebhookConfigured(options.webhookUrl);
    if (!this.enabled) {
      console.warn('Discord webhook URL not configured. Notifications are disabled.');
    }
  }

  async notify(item: CanonicalItem): Promise<void> {
    if (!this.enabled) return;

    try {
      const client = this.getClient();
      await client.send({
        username: this.options.username,
        avatarURL: this.options.avatarUrl,
        embeds: [this.options.format(item)],
      });
    } catch (err) {
      const error = new NotificationError(`Discord delivery for item ${item.id} failed: ${errorMessage(err)}`, {
        cause: err,
      });
      console.error(`Discord error: ${error.message}`);
    }
  }

  close(): void {
    this.client?.destroy();
    this.client = null;
  }

  private getClient(): WebhookSender {
    if (!this.client) {
      const create = this.options.createClient ?? ((url: string) => new WebhookClient({ url }));
      this.client = create(this.options.webhookUrl);
    }
    return this.client;
  }
}
