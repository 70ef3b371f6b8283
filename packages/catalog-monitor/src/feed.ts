import { z } from 'zod';
import { TransientFetchError } from '@dropwatch/shared';

const sourceIdSchema = z.union([z.string(), z.number()]).transform(String);

const rawVariantSchema = z.object({
  id: sourceIdSchema.nullish(),
  title: z.string().nullish(),
  price: z.union([z.string(), z.number()]).nullish(),
});

const rawImageSchema = z.object({
  src: z.string().nullish(),
});

export const rawProductSchema = z.object({
  id: sourceIdSchema,
  handle: z.string().nullish(),
  title: z.string().nullish(),
  images: z.array(rawImageSchema).nullish(),
  variants: z.array(rawVariantSchema).nullish(),
});

export type RawProduct = z.infer<typeof rawProductSchema>;

const productFeedSchema = z.object({
  products: z.array(z.unknown()).nullish(),
});

export interface ParsedFeed {
  products: RawProduct[];
  /** Records dropped because they did not look like a product */
  skipped: number;
}

/**
 * Reads the `products` list of a products.json body. A body without the list
 * is an empty feed; records that don't fit the product shape are skipped.
 */
export function parseProductFeed(body: unknown): ParsedFeed {
  const feed = productFeedSchema.safeParse(body);
  if (!feed.success) {
    throw new TransientFetchError(`Unexpected feed body: ${feed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const products: RawProduct[] = [];
  let skipped = 0;
  for (const record of feed.data.products ?? []) {
    const product = rawProductSchema.safeParse(record);
    if (product.success) {
      products.push(product.data);
    } else {
      skipped += 1;
    }
  }

  return { products, skipped };
}
