import { and, eq } from 'drizzle-orm';
import type { Db } from './db/index.js';
import { seenItems } from './db/schema.js';
import { StoreError, errorMessage } from './errors.js';
import type { CanonicalItem, IdentityStore, InsertResult } from './types.js';

export type StoreDb = Pick<Db, 'select' | 'insert'>;

/**
 * Identity store backed by the seen_items table, scoped to one namespace.
 *
 * Inserts are a single INSERT ... ON CONFLICT DO NOTHING, so when two pollers
 * race on the same id exactly one of them sees `inserted`.
 */
export class DrizzleIdentityStore implements IdentityStore {
  constructor(
    private readonly db: StoreDb,
    private readonly namespace: string,
  ) {}

  async exists(id: string): Promise<boolean> {
    try {
      const rows = await this.db
        .select({ id: seenItems.id })
        .from(seenItems)
        .where(and(eq(seenItems.namespace, this.namespace), eq(seenItems.itemId, id)))
        .limit(1);
      return rows.length > 0;
    } catch (err) {
      throw new StoreError(`Lookup of ${this.namespace}/${id} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async insert(item: CanonicalItem): Promise<InsertResult> {
    try {
      const inserted = await this.db
        .insert(seenItems)
        .values({
          namespace: this.namespace,
          itemId: item.id,
          url: item.url,
          title: item.title,
          price: item.price,
          imageUrl: item.imageUrl,
          variants: item.variants,
        })
        .onConflictDoNothing()
        .returning({ id: seenItems.id });

      return inserted.length > 0 ? { status: 'inserted' } : { status: 'already_exists' };
    } catch (err) {
      return {
        status: 'error',
        error: new StoreError(`Insert of ${this.namespace}/${item.id} failed: ${errorMessage(err)}`, { cause: err }),
      };
    }
  }
}
