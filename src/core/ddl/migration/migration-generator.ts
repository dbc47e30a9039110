import type { SchemaDiff } from '../compare/schema-diff.js';
import { createSchemaDialect } from '../dialects/index.js';
import type { DialectName } from '../schema-dialect.js';
import type { Migration, MigrationContext, MigrationOptions, StepGroups } from './migration-types.js';
import { migrateFunctions, migrateProcedures, migrateSequences, migrateTriggers, migrateTypes, migrateViews } from './object-migration.js';
import { migrateTables } from './table-migration.js';

/**
 * Turns a schema diff into ordered up and down scripts for one dialect.
 *
 * Dependents are dropped before what they depend on (triggers, views, routines,
 * tables, sequences, types) and created after it, in the reverse order. The
 * down script undoes the steps last to first.
 *
 * Pass the snapshots the diff was computed from as `desired` and `current`:
 * created tables, changed columns and replaced routines need their full
 * definitions. Anything that cannot be expressed is reported in `warnings`.
 */
export const generateMigration = (diff: SchemaDiff, dialect: DialectName, options: MigrationOptions = {}): Migration => {
  const context: MigrationContext = {
    dialectName: dialect,
    dialect: createSchemaDialect(dialect),
    ifExists: options.ifExists ?? true,
    cascade: options.cascade ?? false,
    includeComments: options.includeComments ?? false,
    desired: options.desired,
    current: options.current,
    warnings: []
  };

  const types = migrateTypes(context, diff.types);
  const sequences = migrateSequences(context, diff.sequences);
  const tables = migrateTables(context, diff.tables);
  const functions = migrateFunctions(context, diff.functions);
  const procedures = migrateProcedures(context, diff.procedures);
  const views = migrateViews(context, diff.views);
  const triggers = migrateTriggers(context, diff.triggers);

  const creationOrder: StepGroups[] = [types, sequences, tables, functions, procedures, views, triggers];
  const steps = [
    ...[...creationOrder].reverse().flatMap(group => group.drops),
    ...creationOrder.flatMap(group => group.changes)
  ];

  return {
    steps,
    up: steps.flatMap(step => step.up),
    down: [...steps].reverse().flatMap(step => step.down),
    warnings: context.warnings
  };
};

/** Joins statements into one script, separated by blank lines. */
export const renderMigrationScript = (statements: readonly string[]): string => statements.join('\n\n');
