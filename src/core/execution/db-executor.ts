// src/core/execution/db-executor.ts

/** Column names plus row values, the shape every executor returns. */
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

export interface DbExecutor {
  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;

  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

/**
 * Convert an array of row objects into a QueryResult.
 * Columns are taken from the first row.
 */
export function rowsToQueryResult(
  rows: ReadonlyArray<Record<string, unknown>>
): QueryResult {
  const [first] = rows;
  if (first === undefined) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(first);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

/** Minimal contract a SQL client needs to run DDL. */
export interface SimpleQueryRunner {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  beginTransaction?(): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  return {
    async executeSql(sql, params) {
      const rows = await runner.query(sql, params);
      return [rowsToQueryResult(rows)];
    },
    beginTransaction: runner.beginTransaction?.bind(runner),
    commitTransaction: runner.commitTransaction?.bind(runner),
    rollbackTransaction: runner.rollbackTransaction?.bind(runner),
  };
}

/** True when the executor can open, commit and roll back a transaction. */
export const supportsTransactions = (
  executor: DbExecutor
): executor is Required<DbExecutor> =>
  executor.beginTransaction !== undefined &&
  executor.commitTransaction !== undefined &&
  executor.rollbackTransaction !== undefined;
