import { BaseSchemaDialect, tableRef } from './base-schema-dialect.js';
import type { ConstraintInfo, PrimaryKeyInfo } from '../compare/schema-types.js';
import type { ColumnChange, DialectName } from '../schema-dialect.js';
import { renderColumnList, sqlComment } from '../sql-writing.js';
import type { ColumnDesign, ForeignKeyDesign, TableDesign } from '../table/table-design.js';

/**
 * SQLite schema dialect implementation.
 * SQLite cannot alter column properties or constraints in place; those changes
 * come back as SQL comments so the rest of a batch still runs.
 */
export class SQLiteSchemaDialect extends BaseSchemaDialect {
  readonly name: DialectName = 'sqlite';

  renderTableOptions(table: TableDesign): string | undefined {
    const options = table.options.sqlite;
    if (!options) return undefined;
    const parts: string[] = [];
    if (options.withoutRowid) parts.push('WITHOUT ROWID');
    if (options.strict) parts.push('STRICT');
    return parts.length ? parts.join(', ') : undefined;
  }

  alterColumnSql(table: TableDesign, _before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[] {
    const properties: string[] = [];
    if (change.typeChanged) properties.push('type');
    if (change.nullableChanged) properties.push('nullability');
    if (change.defaultChanged) properties.push('default');
    if (change.uniqueChanged) properties.push('uniqueness');
    if (!properties.length) return [];
    return [this.recreateNotice(table, `alter the ${properties.join('/')} of column ${this.quoteIdentifier(after.name)} on`)];
  }

  addForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[] {
    return [this.recreateNotice(table, `add foreign key (${renderColumnList(this, fk.columns)}) to existing table`)];
  }

  dropForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[] {
    return [this.recreateNotice(table, `drop foreign key (${renderColumnList(this, fk.columns)}) from existing table`)];
  }

  addPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[] {
    return [this.recreateNotice(table, `add primary key (${renderColumnList(this, key.columns)}) to existing table`)];
  }

  dropPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[] {
    return [this.recreateNotice(table, `drop primary key (${renderColumnList(this, key.columns)}) from existing table`)];
  }

  addConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[] {
    return [this.recreateNotice(table, `add constraint ${this.quoteIdentifier(constraint.name)} to existing table`)];
  }

  dropConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[] {
    return [this.recreateNotice(table, `drop constraint ${this.quoteIdentifier(constraint.name)} from existing table`)];
  }

  private recreateNotice(table: TableDesign, action: string): string {
    return sqlComment(`SQLite cannot ${action} ${this.formatTableName(tableRef(table))}; recreate the table to apply it`);
  }
}
