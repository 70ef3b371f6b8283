import { describe, it, expect } from 'vitest';
import { TransientFetchError } from '@dropwatch/shared';
import { parseProductFeed } from '../feed.js';

describe('parseProductFeed', () => {
  it('reads the products list', () => {
    const { products, skipped } = parseProductFeed({
      products: [
        { id: 1, handle: 'a', title: 'A' },
        { id: '2', handle: 'b', title: 'B' },
      ],
    });

    expect(products.map((p) => p.id)).toEqual(['1', '2']);
    expect(skipped).toBe(0);
  });

  it('treats a body without products as an empty feed', () => {
    expect(parseProductFeed({})).toEqual({ products: [], skipped: 0 });
    expect(parseProductFeed({ products: [] })).toEqual({ products: [], skipped: 0 });
  });

  it('skips records that are not products', () => {
    const { products, skipped } = parseProductFeed({
      products: [{ id: 1 }, { handle: 'no-id' }, 'junk', { id: 3, variants: 'none' }],
    });

    expect(products.map((p) => p.id)).toEqual(['1']);
    expect(skipped).toBe(3);
  });

  it('rejects a body that is not a feed object', () => {
    expect(() => parseProductFeed([1, 2, 3])).toThrow(TransientFetchError);
    expect(() => parseProductFeed({ products: 'soon' })).toThrow(TransientFetchError);
  });
});
