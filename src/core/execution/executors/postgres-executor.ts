import {
  type DbExecutor,
  createExecutorFromQueryRunner,
  rowsToQueryResult
} from '../db-executor.js';

export interface PostgresQueryResult {
  rows: Array<Record<string, unknown>>;
}

/** Anything with a pg-style `query` method: a pg Client or Pool, or PGlite. */
export interface PostgresClientLike {
  query(text: string, params?: unknown[]): Promise<PostgresQueryResult>;
  /**
   * Runs a parameterless script through the simple-query protocol, one result
   * per statement. Generated DDL such as a function body with several
   * statements goes through here when the client has it.
   */
  exec?(text: string): Promise<PostgresQueryResult[]>;
}

export function createPostgresExecutor(
  client: PostgresClientLike
): DbExecutor {
  const executor = createExecutorFromQueryRunner({
    async query(sql, params) {
      const { rows } = await client.query(sql, params);
      return rows;
    },
    async beginTransaction() {
      await client.query('BEGIN');
    },
    async commitTransaction() {
      await client.query('COMMIT');
    },
    async rollbackTransaction() {
      await client.query('ROLLBACK');
    },
  });

  return {
    ...executor,
    async executeSql(sql, params) {
      if (params?.length || !client.exec) {
        return executor.executeSql(sql, params);
      }
      const results = await client.exec(sql);
      return results.map(({ rows }) => rowsToQueryResult(rows));
    },
  };
}
