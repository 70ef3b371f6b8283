import { EmbedBuilder } from 'discord.js';
import { NEW_ITEM_COLOR, emptyItem, truncateTitle, type CanonicalItem } from '@dropwatch/shared';

export interface ImageEmbedOptions {
  sourceLabel: string;
  footerText: string;
  iconUrl?: string;
  now?: Date;
}

export function toImageItem(id: number, url: string): CanonicalItem {
  return { ...emptyItem(String(id), url), imageUrl: url };
}

export function buildImageEmbed(item: CanonicalItem, options: ImageEmbedOptions): EmbedBuilder {
  const { sourceLabel, footerText, iconUrl, now = new Date() } = options;

  return new EmbedBuilder()
    .setTitle(truncateTitle(`Image Loaded via ${sourceLabel} [${item.id}]`))
    .setURL(item.url)
    .setColor(NEW_ITEM_COLOR)
    .setAuthor({ name: 'New image', iconURL: iconUrl })
    .setImage(item.imageUrl || item.url)
    .setFooter({ text: footerText, iconURL: iconUrl })
    .setTimestamp(now);
}
