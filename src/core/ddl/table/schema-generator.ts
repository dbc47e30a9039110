import { err, mapResult, ok, type Result } from '../ddl-result.js';
import type { TableError } from '../ddl-errors.js';
import { createSchemaDialect } from '../dialects/index.js';
import type { DialectName, SchemaDialect } from '../schema-dialect.js';
import { renderColumnList } from '../sql-writing.js';
import { hasCompositePrimaryKey, primaryKeyColumns, type ColumnDesign, type TableDesign } from './table-design.js';
import { validateTableDesign } from './table-validator.js';

/** Result of generating schema SQL. */
export interface SchemaGenerateResult {
  tableSql: string;
  indexSql: string[];
  commentSql: string[];
}

/** Options for rendering column definitions. */
export interface RenderColumnOptions {
  /** Emit PRIMARY KEY on the column itself. */
  inlinePrimaryKey: boolean;
  /** Table whose named UNIQUE clause the column gets; without it the flag is left out. */
  uniqueIn?: TableDesign;
}

/**
 * Renders a column definition:
 * name, type, generated clause, NOT NULL, PRIMARY KEY, auto-increment, UNIQUE, DEFAULT.
 */
export const renderColumnDefinition = (
  column: ColumnDesign,
  dialect: SchemaDialect,
  options: RenderColumnOptions
): string => {
  if (column.generatedExpression !== undefined && dialect.renderComputedColumn) {
    return dialect.renderComputedColumn(column);
  }

  const parts: string[] = [dialect.quoteIdentifier(column.name), dialect.renderColumnType(column)];
  if (column.generatedExpression !== undefined) parts.push(dialect.renderGenerated(column));
  if (!column.nullable) parts.push('NOT NULL');
  if (options.inlinePrimaryKey) parts.push('PRIMARY KEY');

  const autoInc = dialect.renderAutoIncrement(column, options.inlinePrimaryKey);
  if (autoInc) parts.push(autoInc);

  if (options.uniqueIn && column.isUnique && !options.inlinePrimaryKey) {
    parts.push(dialect.renderUniqueClause(options.uniqueIn, column.name));
  }
  if (column.defaultValue !== undefined) parts.push(`DEFAULT ${column.defaultValue}`);
  if (column.comment !== undefined && dialect.renderColumnComment) parts.push(dialect.renderColumnComment(column.comment));
  return parts.join(' ');
};

/** Renders a column the way it appears inside CREATE TABLE for this design. */
export const renderTableColumn = (table: TableDesign, column: ColumnDesign, dialect: SchemaDialect): string =>
  renderColumnDefinition(column, dialect, {
    inlinePrimaryKey: column.isPrimaryKey && !hasCompositePrimaryKey(table),
    uniqueIn: table
  });

/**
 * Generates the CREATE TABLE statement, its indexes and comments.
 * The design is validated first.
 */
export const generateCreateTableSql = (table: TableDesign): Result<SchemaGenerateResult, TableError> => {
  const validation = validateTableDesign(table);
  if (!validation.ok) return err(validation.error);

  const dialect = createSchemaDialect(table.dialect);
  const lines = table.columns.map(column => `  ${renderTableColumn(table, column, dialect)}`);

  if (hasCompositePrimaryKey(table)) {
    lines.push(`  PRIMARY KEY (${renderColumnList(dialect, primaryKeyColumns(table))})`);
  }

  for (const fk of table.foreignKeys) {
    lines.push(`  ${dialect.renderForeignKey(fk)}`);
  }

  const options = dialect.renderTableOptions(table);
  const tableName = dialect.formatTableName({ name: table.tableName, schema: table.schema });
  const tableSql = `CREATE TABLE ${tableName} (\n${lines.join(',\n')}\n)${options ? ` ${options}` : ''};`;

  return ok({
    tableSql,
    indexSql: table.indexes.filter(index => !index.isPrimary).map(index => dialect.renderIndex(table, index)),
    commentSql: dialect.renderCommentStatements?.(table) ?? []
  });
};

/** The full creation script, statements separated by blank lines. */
export const generateCreateTable = (table: TableDesign): Result<string, TableError> =>
  mapResult(generateCreateTableSql(table), ({ tableSql, indexSql, commentSql }) =>
    [tableSql, ...indexSql, ...commentSql].join('\n\n')
  );

export interface DropTableOptions {
  schema?: string;
  ifExists?: boolean;
}

export const generateDropTable = (dialect: DialectName, tableName: string, options: DropTableOptions = {}): string[] =>
  createSchemaDialect(dialect).dropTableSql({ name: tableName, schema: options.schema }, options.ifExists ?? true);
