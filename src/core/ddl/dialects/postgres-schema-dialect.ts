import { BaseSchemaDialect, tableRef } from './base-schema-dialect.js';
import type { ColumnChange, DialectName } from '../schema-dialect.js';
import { formatStringLiteral } from '../sql-writing.js';
import type { ColumnDesign, TableDesign } from '../table/table-design.js';

const SERIAL_TYPES: Record<string, string> = {
  SMALLINT: 'SMALLSERIAL',
  INT2: 'SMALLSERIAL',
  INT: 'SERIAL',
  INTEGER: 'SERIAL',
  INT4: 'SERIAL',
  BIGINT: 'BIGSERIAL',
  INT8: 'BIGSERIAL'
};

/** PostgreSQL schema dialect implementation. */
export class PostgresSchemaDialect extends BaseSchemaDialect {
  readonly name: DialectName = 'postgres';

  /** Auto-increment integers become the matching SERIAL type. */
  renderColumnType(column: ColumnDesign): string {
    if (column.isAutoIncrement) {
      const serial = SERIAL_TYPES[column.dataType.toUpperCase()];
      if (serial) return serial;
    }
    return super.renderColumnType(column);
  }

  renderCommentStatements(table: TableDesign): string[] {
    const tableName = this.formatTableName(tableRef(table));
    const statements: string[] = [];
    if (table.comment !== undefined) {
      statements.push(`COMMENT ON TABLE ${tableName} IS ${formatStringLiteral(table.comment)};`);
    }
    for (const column of table.columns) {
      if (column.comment === undefined) continue;
      statements.push(`COMMENT ON COLUMN ${tableName}.${this.quoteIdentifier(column.name)} IS ${formatStringLiteral(column.comment)};`);
    }
    return statements;
  }

  alterColumnSql(table: TableDesign, before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[] {
    const prefix = `ALTER TABLE ${this.formatTableName(tableRef(table))} ALTER COLUMN ${this.quoteIdentifier(after.name)}`;
    const statements: string[] = [];
    if (change.typeChanged) {
      statements.push(`${prefix} TYPE ${this.renderColumnType({ ...after, isAutoIncrement: false })};`);
    }
    if (change.nullableChanged) {
      statements.push(`${prefix} ${after.nullable ? 'DROP' : 'SET'} NOT NULL;`);
    }
    if (change.defaultChanged) {
      statements.push(after.defaultValue !== undefined ? `${prefix} SET DEFAULT ${after.defaultValue};` : `${prefix} DROP DEFAULT;`);
    }
    if (change.uniqueChanged) {
      statements.push(after.isUnique ? this.addUniqueConstraintSql(table, after.name) : this.dropUniqueConstraintSql(table, before.name));
    }
    return statements;
  }

  dropTableSql(table: { name: string; schema?: string }, ifExists: boolean, cascade = false): string[] {
    return [`DROP TABLE ${ifExists ? 'IF EXISTS ' : ''}${this.formatTableName(table)}${cascade ? ' CASCADE' : ''};`];
  }

  /** `<table>_pkey`, as PostgreSQL names an unnamed key. */
  protected defaultPrimaryKeyName(table: TableDesign): string {
    return `${table.tableName}_pkey`;
  }
}
