import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Pool } from 'pg';
import { createPool } from '../pool.js';
import { runMigrations } from '../migrate.js';
import { DuplicateKeyError, PgAccountStore } from '../accountStore.js';

const databaseUrl = process.env.DATABASE_URL;
const describeDb = databaseUrl ? describe : describe.skip;

describeDb('PgAccountStore (PostgreSQL)', () => {
  let pool: Pool;
  let store: PgAccountStore;
  const suffix = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
  const username = `vitest-${suffix}`;
  const email = `vitest-${suffix}@example.com`;

  beforeAll(async () => {
    pool = createPool({ connectionString: databaseUrl ?? '', max: 1, connectionTimeoutMillis: 2000 });
    await runMigrations(pool);
    store = new PgAccountStore(pool);
  });

  afterAll(async () => {
    await pool.query('DELETE FROM accounts WHERE username LIKE $1', [`vitest-${suffix}%`]);
    await pool.end();
  });

  it('should insert, read back and update an account', async () => {
    const id = await store.insert({ username, email, passwordHash: 'hash-1', role: 'user' });

    expect(await store.findByUsername(username)).toEqual({
      id,
      username,
      email,
      passwordHash: 'hash-1',
      role: 'user',
    });

    const updated = await store.update(id, { role: 'admin' });
    expect(updated).toMatchObject({ id, role: 'admin', passwordHash: 'hash-1' });
  });

  it('should enforce unique usernames and emails', async () => {
    await expect(
      store.insert({ username, email: `other-${email}`, passwordHash: 'h', role: 'user' })
    ).rejects.toMatchObject({ field: 'username' });
    await expect(
      store.insert({ username: `${username}-2`, email, passwordHash: 'h', role: 'user' })
    ).rejects.toThrow(DuplicateKeyError);
  });

  it('should never reuse a deleted id', async () => {
    const first = await store.insert({
      username: `${username}-del`,
      email: `del-${email}`,
      passwordHash: 'h',
      role: 'user',
    });
    expect(await store.delete(first)).toBe(true);
    expect(await store.delete(first)).toBe(false);

    const second = await store.insert({
      username: `${username}-del`,
      email: `del-${email}`,
      passwordHash: 'h',
      role: 'user',
    });
    expect(second).toBeGreaterThan(first);
  });
});
