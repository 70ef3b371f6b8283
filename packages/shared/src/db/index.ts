import postgres from 'postgres';
import { sql } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/postgres-js';
import { FatalStartupError, errorMessage } from '../errors.js';
import * as schema from './schema.js';

export function createDatabase(connectionString: string) {
  // One logical worker, one connection.
  const client = postgres(connectionString, { max: 1, onnotice: () => undefined });
  const db = drizzle(client, { schema });

  return {
    db,
    close: () => client.end({ timeout: 5 }),
  };
}

export type Db = ReturnType<typeof createDatabase>['db'];

/**
 * Creates the seen_items table and its unique index if they are missing.
 *
 * Failing to create the table means the store is unusable and is fatal.
 * Failing to (re)declare the index is only logged.
 */
export async function ensureSchema(db: Pick<Db, 'execute'>): Promise<void> {
  try {
    await db.execute(sql`
      CREATE TABLE IF NOT EXISTS seen_items (
        id bigserial PRIMARY KEY,
        namespace text NOT NULL,
        item_id text NOT NULL,
        url text NOT NULL,
        title text NOT NULL DEFAULT '',
        price text NOT NULL DEFAULT '',
        image_url text NOT NULL DEFAULT '',
        variants jsonb NOT NULL DEFAULT '[]'::jsonb,
        first_seen_at timestamptz NOT NULL DEFAULT now()
      )
    `);
  } catch (err) {
    throw new FatalStartupError(`Could not prepare seen_items table: ${errorMessage(err)}`, { cause: err });
  }

  try {
    await db.execute(sql`
      CREATE UNIQUE INDEX IF NOT EXISTS ux_seen_items_namespace_item
      ON seen_items (namespace, item_id)
    `);
  } catch (err) {
    console.warn(`Could not declare unique index on seen_items: ${errorMessage(err)}`);
  }
}

export { seenItems } from './schema.js';
export type { SeenItemRow } from './schema.js';
