import type { DbExecutor } from './db-executor.js';

/**
 * Represents a single SQL statement log entry
 */
export interface QueryLogEntry {
  /** The SQL that was executed */
  sql: string;
  /** Parameters used in the statement */
  params?: unknown[];
}

/**
 * Function type for query logging callbacks
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Wraps an executor so every statement is handed to `logger` before it runs.
 * Returns the executor unchanged when no logger is given.
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger?: QueryLogger
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  return {
    async executeSql(sql, params) {
      logger({ sql, params });
      return executor.executeSql(sql, params);
    },
    beginTransaction: executor.beginTransaction?.bind(executor),
    commitTransaction: executor.commitTransaction?.bind(executor),
    rollbackTransaction: executor.rollbackTransaction?.bind(executor),
  };
};
