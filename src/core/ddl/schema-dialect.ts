import type { ConstraintInfo, PrimaryKeyInfo } from './compare/schema-types.js';
import type { ColumnDesign, ForeignKeyDesign, IndexDesign, TableDesign } from './table/table-design.js';
import type { Quoter } from './sql-writing.js';

export const SUPPORTED_DIALECTS = {
  /** PostgreSQL */
  POSTGRES: 'postgres',
  /** MySQL / MariaDB */
  MYSQL: 'mysql',
  /** SQLite */
  SQLITE: 'sqlite',
  /** Microsoft SQL Server */
  MSSQL: 'mssql'
} as const;

/** The name of a database dialect. */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];

const DIALECT_NAMES: ReadonlySet<string> = new Set(Object.values(SUPPORTED_DIALECTS));

export const isDialectName = (value: string): value is DialectName => DIALECT_NAMES.has(value);

/** Field-level changes between two versions of the same column. */
export interface ColumnChange {
  typeChanged: boolean;
  nullableChanged: boolean;
  defaultChanged: boolean;
  uniqueChanged: boolean;
}

/** Interface for schema dialect implementations that handle table DDL. */
export interface SchemaDialect extends Quoter {
  /** The name of the dialect. */
  readonly name: DialectName;

  /** Formats a possibly schema-qualified table name. */
  formatTableName(table: { name: string; schema?: string }): string;

  /** Renders the full type of a column, including length and scale. */
  renderColumnType(column: ColumnDesign): string;
  /** Renders the auto-increment clause, if any. */
  renderAutoIncrement(column: ColumnDesign, inlinePrimaryKey: boolean): string | undefined;
  /** Renders the generated column clause. */
  renderGenerated(column: ColumnDesign): string;
  /** Renders a whole computed column, for dialects whose computed columns carry no type. */
  renderComputedColumn?(column: ColumnDesign): string;
  /** Renders an inline column comment clause. */
  renderColumnComment?(comment: string): string;
  /** Renders comment statements that follow CREATE TABLE. */
  renderCommentStatements?(table: TableDesign): string[];
  /** Name of the constraint or index backing a column-level UNIQUE flag. */
  uniqueConstraintName(table: TableDesign, column: string): string;
  /** Renders the column-level UNIQUE clause, named after `uniqueConstraintName` where the dialect can name it. */
  renderUniqueClause(table: TableDesign, column: string): string;
  /** Renders a FOREIGN KEY table constraint. */
  renderForeignKey(fk: ForeignKeyDesign): string;
  /** Renders a CREATE INDEX statement. */
  renderIndex(table: TableDesign, index: IndexDesign): string;
  /** Renders the trailing table options. */
  renderTableOptions(table: TableDesign): string | undefined;

  /** Generates SQL to rename a table. */
  renameTableSql(from: { name: string; schema?: string }, to: string): string[];
  /** Generates SQL to add a column. */
  addColumnSql(table: TableDesign, columnSql: string): string[];
  /** Generates SQL to drop a column. */
  dropColumnSql(table: TableDesign, column: string): string[];
  /** Generates SQL to alter a column present in both versions of a table. */
  alterColumnSql(table: TableDesign, before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[];
  /** Generates SQL to add a foreign key. */
  addForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[];
  /** Generates SQL to drop a foreign key. */
  dropForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[];
  /** Generates SQL to add a primary key to an existing table. */
  addPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[];
  /** Generates SQL to drop the primary key of a table. */
  dropPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[];
  /** Generates SQL to add a UNIQUE, CHECK or EXCLUDE constraint. */
  addConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[];
  /** Generates SQL to drop a UNIQUE, CHECK or EXCLUDE constraint. */
  dropConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[];
  /** Generates SQL to drop an index. */
  dropIndexSql(table: TableDesign, index: string): string[];
  /** Generates SQL to drop a table. `cascade` is honored where the dialect has it. */
  dropTableSql(table: { name: string; schema?: string }, ifExists: boolean, cascade?: boolean): string[];
}
