import { describe, it, expect } from 'vitest';
import { normalizeProduct, toSafeKey } from '../normalize.js';
import { rawProductSchema } from '../feed.js';

const storeUrl = 'https://shop.example.com';

describe('toSafeKey', () => {
  it('replaces dots and dollar signs', () => {
    expect(toSafeKey('10.5')).toBe('10_5');
    expect(toSafeKey('$1.5.0')).toBe('_1_5_0');
    expect(toSafeKey('XL')).toBe('XL');
  });
});

describe('normalizeProduct', () => {
  it('fills empty defaults for a record without images or variants', () => {
    const raw = rawProductSchema.parse({ id: 7001 });

    expect(normalizeProduct(raw, { storeUrl })).toEqual({
      id: '7001',
      url: 'https://shop.example.com/products/',
      title: '',
      price: '',
      imageUrl: '',
      variants: [],
    });
  });

  it('maps a full product record', () => {
    const raw = rawProductSchema.parse({
      id: 8123456789,
      handle: 'runner-og-white',
      title: 'Runner OG White',
      images: [{ src: 'https://cdn.example.com/runner-og-1.jpg' }, { src: 'https://cdn.example.com/runner-og-2.jpg' }],
      variants: [
        { id: 4001, title: '10', price: '120.00' },
        { id: 4002, title: '10.5', price: '120.00' },
      ],
    });

    expect(normalizeProduct(raw, { storeUrl })).toEqual({
      id: '8123456789',
      url: 'https://shop.example.com/products/runner-og-white',
      title: 'Runner OG White',
      price: '120.00',
      imageUrl: 'https://cdn.example.com/runner-og-1.jpg',
      variants: [
        { label: '10', key: '10', link: 'https://shop.example.com/cart/4001:1' },
        { label: '10.5', key: '10_5', link: 'https://shop.example.com/cart/4002:1' },
      ],
    });
  });

  it('skips variants missing a label or an id', () => {
    const raw = rawProductSchema.parse({
      id: 1,
      variants: [
        { id: 4001, title: '' },
        { title: '9' },
        { id: null, title: '9.5' },
        { id: '4004', title: '11' },
      ],
    });

    expect(normalizeProduct(raw, { storeUrl }).variants).toEqual([
      { label: '11', key: '11', link: 'https://shop.example.com/cart/4004:1' },
    ]);
  });

  it('takes the price of the first variant even when it has no size', () => {
    const raw = rawProductSchema.parse({ id: 1, variants: [{ price: 89.5 }, { id: 2, title: '8', price: '99.00' }] });

    expect(normalizeProduct(raw, { storeUrl }).price).toBe('89.5');
  });
});
