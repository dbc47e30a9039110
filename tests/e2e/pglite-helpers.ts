import { PGlite } from '@electric-sql/pglite';

import { createPostgresExecutor, type PostgresClientLike } from '../../src/core/execution/executors/postgres-executor.js';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';

const createPgliteClient = (db: PGlite): PostgresClientLike => ({
  async query(sql, params) {
    const { rows } = await db.query<Record<string, unknown>>(sql, params);
    return { rows };
  },
  async exec(sql) {
    const results = await db.exec(sql);
    return results.map(({ rows }) => ({ rows }));
  }
});

export const createPgliteExecutor = (db: PGlite): DbExecutor =>
  createPostgresExecutor(createPgliteClient(db));

export interface PgliteTestSetup {
  db: PGlite;
  executor: DbExecutor;
}

export const createPgliteServer = async (): Promise<PgliteTestSetup> => {
  const db = new PGlite();
  await db.waitReady;
  return { db, executor: createPgliteExecutor(db) };
};

export const stopPgliteServer = async (setup: PgliteTestSetup): Promise<void> => {
  await setup.db.close();
};

export const runSql = async (
  db: PGlite,
  sql: string,
  params: unknown[] = []
): Promise<void> => {
  await db.query(sql, params);
};

export const queryAll = async <T extends Record<string, unknown>>(
  db: PGlite,
  sql: string,
  params: unknown[] = []
): Promise<T[]> => {
  const result = await db.query<T>(sql, params);
  return result.rows;
};
