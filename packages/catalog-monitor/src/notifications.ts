import { EmbedBuilder } from 'discord.js';
import { NEW_ITEM_COLOR, truncateTitle, type CanonicalItem, type Variant } from '@dropwatch/shared';

export interface ProductEmbedOptions {
  sourceLabel: string;
  sizeUnit: string;
  footerText: string;
  iconUrl?: string;
  now?: Date;
}

/**
 * Splits entries into `columns` consecutive groups, as even as possible with
 * the larger groups first: 7 entries become 3, 2 and 2.
 */
export function splitIntoColumns<T>(entries: readonly T[], columns = 3): T[][] {
  const groups: T[][] = [];
  let offset = 0;

  for (let index = 0; index < columns; index++) {
    const size = Math.ceil((entries.length - offset) / (columns - index));
    groups.push(entries.slice(offset, offset + size));
    offset += size;
  }

  return groups;
}

export function formatVariantLink(variant: Variant, fallbackUrl: string, unit: string): string {
  const label = unit ? `${variant.label} ${unit}` : variant.label;
  return `[${label}](${variant.link || fallbackUrl})`;
}

export function buildProductEmbed(item: CanonicalItem, options: ProductEmbedOptions): EmbedBuilder {
  const { sourceLabel, sizeUnit, footerText, iconUrl, now = new Date() } = options;

  const embed = new EmbedBuilder()
    .setTitle(truncateTitle(item.title || `Product ${item.id}`))
    .setURL(item.url)
    .setColor(NEW_ITEM_COLOR)
    .setAuthor({ name: 'New product' });

  if (item.price) {
    embed.addFields({ name: 'Price', value: `$${item.price}`, inline: true });
  }
  embed.addFields(
    { name: 'Website', value: sourceLabel, inline: true },
    { name: 'ID', value: item.id, inline: true },
  );

  for (const column of splitIntoColumns(item.variants)) {
    if (column.length === 0) continue;
    embed.addFields({
      name: 'Sizes',
      value: column.map((variant) => formatVariantLink(variant, item.url, sizeUnit)).join('\n'),
      inline: true,
    });
  }

  if (item.imageUrl) {
    embed.setThumbnail(item.imageUrl);
  }

  return embed.setFooter({ text: footerText, iconURL: iconUrl }).setTimestamp(now);
}
