/**
 * Dialect-aware DDL synthesis and schema comparison.
 */
export * from './core/ddl/schema-dialect.js';
export * from './core/ddl/capabilities.js';
export * from './core/ddl/identifier-quoter.js';
export * from './core/ddl/sql-writing.js';
export * from './core/ddl/ddl-result.js';
export * from './core/ddl/ddl-errors.js';

export * from './core/ddl/policy/policy-spec.js';
export * from './core/ddl/policy/policy-validator.js';
export * from './core/ddl/policy/policy-manager.js';

export * from './core/ddl/trigger/trigger-spec.js';
export * from './core/ddl/trigger/trigger-validator.js';
export * from './core/ddl/trigger/trigger-synthesizers.js';
export * from './core/ddl/trigger/trigger-manager.js';

export * from './core/ddl/function/function-spec.js';
export * from './core/ddl/function/function-validator.js';
export * from './core/ddl/function/function-synthesizers.js';
export * from './core/ddl/function/function-manager.js';

export * from './core/ddl/table/table-design.js';
export * from './core/ddl/table/table-validator.js';
export * from './core/ddl/table/schema-generator.js';
export * from './core/ddl/table/alter-generator.js';
export * from './core/ddl/dialects/index.js';

export * from './core/ddl/compare/schema-types.js';
export * from './core/ddl/compare/schema-diff.js';
export * from './core/ddl/compare/schema-comparator.js';

export * from './core/execution/db-executor.js';
export * from './core/execution/query-logger.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/ddl/ddl-executor.js';

export type {
  Migration,
  MigrationOptions,
  MigrationStep,
  MigrationStepKind
} from './core/ddl/migration/migration-types.js';
export { generateMigration, renderMigrationScript } from './core/ddl/migration/migration-generator.js';
export * from './core/ddl/migration/migration-executor.js';
