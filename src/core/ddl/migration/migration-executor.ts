import type { DbExecutor } from '../../execution/db-executor.js';
import { executeDdlStatements, type ExecuteDdlOptions } from '../ddl-executor.js';
import type { Migration } from './migration-types.js';

export type MigrationDirection = 'up' | 'down';

export interface ExecuteMigrationOptions extends ExecuteDdlOptions {
  /** Defaults to 'up'. */
  direction?: MigrationDirection;
  /** Also runs steps that can lose data or reject existing rows. */
  allowDestructive?: boolean;
}

/**
 * Runs one direction of a migration. Steps that are unsafe in that direction
 * are skipped unless `allowDestructive` is set.
 * @returns the statements that were sent to the database
 */
export const executeMigration = async (
  executor: DbExecutor,
  migration: Migration,
  options: ExecuteMigrationOptions = {}
): Promise<string[]> => {
  const direction = options.direction ?? 'up';
  const steps = direction === 'up' ? migration.steps : [...migration.steps].reverse();
  const statements = steps
    .filter(step => options.allowDestructive || (direction === 'up' ? step.safe : step.downSafe))
    .flatMap(step => step[direction]);
  return executeDdlStatements(executor, statements, options);
};
