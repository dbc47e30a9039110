import type { DialectName, SchemaDialect } from '../schema-dialect.js';
import { MSSqlSchemaDialect } from './mssql-schema-dialect.js';
import { MySqlSchemaDialect } from './mysql-schema-dialect.js';
import { PostgresSchemaDialect } from './postgres-schema-dialect.js';
import { SQLiteSchemaDialect } from './sqlite-schema-dialect.js';

/** Re-exports for schema dialects. */
export { BaseSchemaDialect } from './base-schema-dialect.js';
export { PostgresSchemaDialect } from './postgres-schema-dialect.js';
export { MySqlSchemaDialect } from './mysql-schema-dialect.js';
export { SQLiteSchemaDialect } from './sqlite-schema-dialect.js';
export { MSSqlSchemaDialect } from './mssql-schema-dialect.js';

const factories: Record<DialectName, () => SchemaDialect> = {
  postgres: () => new PostgresSchemaDialect(),
  mysql: () => new MySqlSchemaDialect(),
  sqlite: () => new SQLiteSchemaDialect(),
  mssql: () => new MSSqlSchemaDialect()
};

/** Creates the table DDL strategy for a dialect. */
export const createSchemaDialect = (dialect: DialectName): SchemaDialect => factories[dialect]();
