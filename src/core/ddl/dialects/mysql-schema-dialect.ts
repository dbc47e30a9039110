import { BaseSchemaDialect, tableRef } from './base-schema-dialect.js';
import type { ConstraintInfo, PrimaryKeyInfo } from '../compare/schema-types.js';
import type { ColumnChange, DialectName } from '../schema-dialect.js';
import type { ColumnDesign, ForeignKeyDesign, MySqlTableOptions, TableDesign } from '../table/table-design.js';
import { renderColumnDefinition } from '../table/schema-generator.js';
import { formatStringLiteral } from '../sql-writing.js';

/** MySQL schema dialect implementation. */
export class MySqlSchemaDialect extends BaseSchemaDialect {
  readonly name: DialectName = 'mysql';

  /** A column-level UNIQUE creates an index named after the column. */
  uniqueConstraintName(_table: TableDesign, column: string): string {
    return column;
  }

  renderUniqueClause(_table: TableDesign, _column: string): string {
    return 'UNIQUE';
  }

  renderColumnComment(comment: string): string {
    return `COMMENT ${formatStringLiteral(comment)}`;
  }

  renderTableOptions(table: TableDesign): string | undefined {
    const options: MySqlTableOptions = table.options.mysql ?? {};
    const parts: string[] = [];
    if (options.engine) parts.push(`ENGINE=${options.engine}`);
    if (options.charset) parts.push(`DEFAULT CHARSET=${options.charset}`);
    if (options.collation) parts.push(`COLLATE=${options.collation}`);
    if (options.autoIncrementStart !== undefined) parts.push(`AUTO_INCREMENT=${options.autoIncrementStart}`);
    if (options.rowFormat) parts.push(`ROW_FORMAT=${options.rowFormat}`);
    if (table.comment !== undefined) parts.push(`COMMENT=${formatStringLiteral(table.comment)}`);
    return parts.length ? parts.join(' ') : undefined;
  }

  /** MODIFY COLUMN restates the whole column; key and uniqueness are managed separately. */
  alterColumnSql(table: TableDesign, before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[] {
    const tableName = this.formatTableName(tableRef(table));
    const statements: string[] = [];
    if (change.typeChanged || change.nullableChanged || change.defaultChanged) {
      const rendered = renderColumnDefinition(after, this, { inlinePrimaryKey: false });
      statements.push(`ALTER TABLE ${tableName} MODIFY COLUMN ${rendered};`);
    }
    if (change.uniqueChanged) {
      const indexName = this.quoteIdentifier(this.uniqueConstraintName(table, after.isUnique ? after.name : before.name));
      statements.push(
        after.isUnique
          ? `CREATE UNIQUE INDEX ${indexName} ON ${tableName} (${this.quoteIdentifier(after.name)});`
          : `DROP INDEX ${indexName} ON ${tableName};`
      );
    }
    return statements;
  }

  dropForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[] {
    if (!fk.name) return super.dropForeignKeySql(table, fk);
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP FOREIGN KEY ${this.quoteIdentifier(fk.name)};`];
  }

  /** The key is always named PRIMARY, so it is dropped without a name. */
  dropPrimaryKeySql(table: TableDesign, _key: PrimaryKeyInfo): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP PRIMARY KEY;`];
  }

  dropConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[] {
    if (constraint.constraintType === 'UNIQUE') return this.dropIndexSql(table, constraint.name);
    if (constraint.constraintType === 'CHECK') {
      return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP CHECK ${this.quoteIdentifier(constraint.name)};`];
    }
    return super.dropConstraintSql(table, constraint);
  }

  dropIndexSql(table: TableDesign, index: string): string[] {
    return [`DROP INDEX ${this.quoteIdentifier(index)} ON ${this.formatTableName(tableRef(table))};`];
  }
}
