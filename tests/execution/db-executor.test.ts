// tests/execution/db-executor.test.ts
import { describe, it, expect } from 'vitest';
import {
  rowsToQueryResult,
  createExecutorFromQueryRunner,
  supportsTransactions,
} from '../../src/core/execution/db-executor.js';
import { createPostgresExecutor, type PostgresClientLike } from '../../src/core/execution/executors/postgres-executor.js';

describe('rowsToQueryResult', () => {
  it('produces an empty result for statements without rows', () => {
    expect(rowsToQueryResult([])).toEqual({ columns: [], values: [] });
  });

  it('uses keys of the first row as columns', () => {
    const res = rowsToQueryResult([
      { table_name: 'users', column_count: 3 },
      { table_name: 'posts', column_count: 5 },
    ]);

    expect(res.columns).toEqual(['table_name', 'column_count']);
    expect(res.values).toEqual([
      ['users', 3],
      ['posts', 5],
    ]);
  });
});

describe('createExecutorFromQueryRunner', () => {
  it('passes DDL through unchanged', async () => {
    const calls: { sql: string; params?: unknown[] }[] = [];

    const executor = createExecutorFromQueryRunner({
      async query(sql, params) {
        calls.push({ sql, params });
        return [];
      },
    });

    const [result] = await executor.executeSql('ALTER TABLE "users" DROP COLUMN "email";');

    expect(calls).toEqual([{ sql: 'ALTER TABLE "users" DROP COLUMN "email";', params: undefined }]);
    expect(result).toEqual({ columns: [], values: [] });
    expect(supportsTransactions(executor)).toBe(false);
  });

  it('rewires transaction methods when present', async () => {
    const events: string[] = [];

    const executor = createExecutorFromQueryRunner({
      async query() {
        return [];
      },
      async beginTransaction() {
        events.push('begin');
      },
      async commitTransaction() {
        events.push('commit');
      },
      async rollbackTransaction() {
        events.push('rollback');
      },
    });

    expect(supportsTransactions(executor)).toBe(true);
    await executor.beginTransaction?.();
    await executor.commitTransaction?.();
    await executor.rollbackTransaction?.();

    expect(events).toEqual(['begin', 'commit', 'rollback']);
  });
});

describe('createPostgresExecutor', () => {
  it('sends statements and transaction control to the same client', async () => {
    const executed: string[] = [];
    const client: PostgresClientLike = {
      async query(sql) {
        executed.push(sql);
        return { rows: sql.startsWith('SELECT') ? [{ ok: 1 }] : [] };
      },
    };

    const executor = createPostgresExecutor(client);
    await executor.beginTransaction?.();
    await executor.executeSql('CREATE TABLE "t" (\n  "id" INTEGER\n);');
    const [selected] = await executor.executeSql('SELECT 1 AS ok');
    await executor.commitTransaction?.();

    expect(executed).toEqual(['BEGIN', 'CREATE TABLE "t" (\n  "id" INTEGER\n);', 'SELECT 1 AS ok', 'COMMIT']);
    expect(selected).toEqual({ columns: ['ok'], values: [[1]] });
  });

  it('sends parameterless scripts through exec, one result per statement', async () => {
    const queried: string[] = [];
    const scripts: string[] = [];
    const client: PostgresClientLike = {
      async query(sql) {
        queried.push(sql);
        return { rows: [{ n: 1 }] };
      },
      async exec(sql) {
        scripts.push(sql);
        return [{ rows: [] }, { rows: [{ total: 2 }] }];
      },
    };

    const executor = createPostgresExecutor(client);
    const results = await executor.executeSql('CREATE TABLE "t" ("id" INTEGER); SELECT 2 AS total;');
    const [withParams] = await executor.executeSql('SELECT $1::int AS n', [1]);

    expect(scripts).toEqual(['CREATE TABLE "t" ("id" INTEGER); SELECT 2 AS total;']);
    expect(results).toEqual([
      { columns: [], values: [] },
      { columns: ['total'], values: [[2]] },
    ]);
    expect(queried).toEqual(['SELECT $1::int AS n']);
    expect(withParams).toEqual({ columns: ['n'], values: [[1]] });
  });
});
