import { BaseSchemaDialect, tableRef } from './base-schema-dialect.js';
import type { ColumnChange, DialectName } from '../schema-dialect.js';
import { escapeSqlString, qualifyName, sqlComment } from '../sql-writing.js';
import type { ColumnDesign, TableDesign } from '../table/table-design.js';

/** Microsoft SQL Server schema dialect implementation. */
export class MSSqlSchemaDialect extends BaseSchemaDialect {
  readonly name: DialectName = 'mssql';

  /** Computed columns carry no type: `[col] AS (expr) [PERSISTED]`. */
  renderComputedColumn(column: ColumnDesign): string {
    const persisted = column.generatedStored ? ' PERSISTED' : '';
    return `${this.quoteIdentifier(column.name)} AS (${column.generatedExpression ?? ''})${persisted}`;
  }

  renameTableSql(from: { name: string; schema?: string }, to: string): string[] {
    return [`EXEC sp_rename '${escapeSqlString(qualifyName(from.name, from.schema))}', '${escapeSqlString(to)}';`];
  }

  addColumnSql(table: TableDesign, columnSql: string): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} ADD ${columnSql};`];
  }

  /** Defaults are named constraints here; dropping one needs that name. */
  alterColumnSql(table: TableDesign, before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[] {
    const tableName = this.formatTableName(tableRef(table));
    const column = this.quoteIdentifier(after.name);
    const statements: string[] = [];
    if (change.typeChanged || change.nullableChanged) {
      statements.push(`ALTER TABLE ${tableName} ALTER COLUMN ${column} ${this.renderColumnType(after)} ${after.nullable ? 'NULL' : 'NOT NULL'};`);
    }
    if (change.defaultChanged) {
      statements.push(
        after.defaultValue !== undefined
          ? `ALTER TABLE ${tableName} ADD DEFAULT ${after.defaultValue} FOR ${column};`
          : sqlComment(`SQL Server drops defaults by constraint name; drop the default constraint of ${column} on ${tableName} manually`)
      );
    }
    if (change.uniqueChanged) {
      statements.push(after.isUnique ? this.addUniqueConstraintSql(table, after.name) : this.dropUniqueConstraintSql(table, before.name));
    }
    return statements;
  }

  dropIndexSql(table: TableDesign, index: string): string[] {
    return [`DROP INDEX ${this.quoteIdentifier(index)} ON ${this.formatTableName(tableRef(table))};`];
  }
}
