import type { CanonicalItem, Variant } from '@dropwatch/shared';
import type { RawProduct } from './feed.js';

const UNSAFE_KEY_CHARS = /[.$]/g;

/** Variant labels are stored as JSON keys; dots and dollar signs are not allowed in them. */
export function toSafeKey(label: string): string {
  return label.replace(UNSAFE_KEY_CHARS, '_');
}

export function buildCartLink(storeUrl: string, variantId: string): string {
  return `${storeUrl}/cart/${variantId}:1`;
}

export function normalizeProduct(raw: RawProduct, { storeUrl }: { storeUrl: string }): CanonicalItem {
  const rawVariants = raw.variants ?? [];

  const variants: Variant[] = [];
  for (const variant of rawVariants) {
    const label = variant.title ?? '';
    const variantId = variant.id ?? '';
    if (!label || !variantId) continue;

    variants.push({
      label,
      key: toSafeKey(label),
      link: buildCartLink(storeUrl, variantId),
    });
  }

  // No variants means no price; the embed then leaves the Price field out rather than showing $0.00.
  const firstPrice = rawVariants[0]?.price;

  return {
    id: raw.id,
    url: `${storeUrl}/products/${raw.handle ?? ''}`,
    title: raw.title ?? '',
    price: firstPrice === null || firstPrice === undefined ? '' : String(firstPrice),
    imageUrl: raw.images?.[0]?.src ?? '',
    variants,
  };
}
