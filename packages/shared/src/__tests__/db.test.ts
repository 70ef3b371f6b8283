import { describe, it, expect, vi } from 'vitest';
import { ensureSchema, type Db } from '../db/index.js';
import { FatalStartupError } from '../errors.js';

function createDbDouble(execute: () => Promise<unknown>) {
  return { execute: vi.fn(execute) } as unknown as Pick<Db, 'execute'>;
}

describe('ensureSchema', () => {
  it('creates the table and then the unique index', async () => {
    const db = createDbDouble(async () => []);

    await ensureSchema(db);

    expect(db.execute).toHaveBeenCalledTimes(2);
  });

  it('fails startup when the table cannot be created', async () => {
    const db = createDbDouble(async () => {
      throw new Error('ECONNREFUSED');
    });

    const result = ensureSchema(db);

    await expect(result).rejects.toBeInstanceOf(FatalStartupError);
    await expect(result).rejects.toThrow('Could not prepare seen_items table: ECONNREFUSED');
  });

  it('only warns when the unique index cannot be declared', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    let calls = 0;
    const db = createDbDouble(async () => {
      calls += 1;
      if (calls === 2) throw new Error('permission denied');
      return [];
    });

    try {
      await expect(ensureSchema(db)).resolves.toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Could not declare unique index on seen_items: permission denied');
    } finally {
      warnSpy.mockRestore();
    }
  });
});
