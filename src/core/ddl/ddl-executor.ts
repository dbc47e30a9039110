import { supportsTransactions, type DbExecutor } from '../execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogger } from '../execution/query-logger.js';
import { isCommentOnly } from './sql-writing.js';

export interface ExecuteDdlOptions {
  /** Receives every statement before it runs. */
  logger?: QueryLogger;
  /**
   * Wraps the batch in a transaction when the executor supports one.
   * A failing statement rolls the batch back and the error is rethrown.
   */
  transactional?: boolean;
}

/**
 * Runs generated DDL in order. Blank and comment-only statements are skipped.
 * @returns the statements that were sent to the database
 */
export const executeDdlStatements = async (
  executor: DbExecutor,
  statements: readonly string[],
  options: ExecuteDdlOptions = {}
): Promise<string[]> => {
  const runnable = statements.filter(stmt => stmt.trim() && !isCommentOnly(stmt));
  const target = createQueryLoggingExecutor(executor, options.logger);

  if (!options.transactional || !supportsTransactions(target)) {
    for (const stmt of runnable) {
      await target.executeSql(stmt);
    }
    return runnable;
  }

  await target.beginTransaction();
  try {
    for (const stmt of runnable) {
      await target.executeSql(stmt);
    }
    await target.commitTransaction();
  } catch (error) {
    await target.rollbackTransaction();
    throw error;
  }
  return runnable;
};
