import { pgTable, text, jsonb, bigserial, timestamp, uniqueIndex } from 'drizzle-orm/pg-core';
import type { Variant } from '../types.js';

export const seenItems = pgTable('seen_items', {
  id: bigserial('id', { mode: 'number' }).primaryKey(),
  namespace: text('namespace').notNull(),
  itemId: text('item_id').notNull(),
  url: text('url').notNull(),
  title: text('title').default('').notNull(),
  price: text('price').default('').notNull(),
  imageUrl: text('image_url').default('').notNull(),
  variants: jsonb('variants').$type<Variant[]>().default([]).notNull(),
  firstSeenAt: timestamp('first_seen_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  uniqueIndex('ux_seen_items_namespace_item').on(table.namespace, table.itemId),
]);

export type SeenItemRow = typeof seenItems.$inferSelect;
