import { getCapabilities } from '../capabilities.js';
import type { ConstraintInfo, PrimaryKeyInfo } from '../compare/schema-types.js';
import { delimitIdentifier } from '../identifier-quoter.js';
import type { ColumnChange, DialectName, SchemaDialect } from '../schema-dialect.js';
import { renderColumnList, sqlComment } from '../sql-writing.js';
import type { ColumnDesign, ForeignKeyDesign, IndexDesign, TableDesign } from '../table/table-design.js';

type TableLike = { name: string; schema?: string };

export const tableRef = (table: TableDesign): TableLike => ({ name: table.tableName, schema: table.schema });

/**
 * Common behavior for schema dialects (DDL).
 * Concrete dialects only override the small surface area instead of reimplementing everything.
 * Identifiers are always delimited so names keep their exact case.
 */
export abstract class BaseSchemaDialect implements SchemaDialect {
  abstract readonly name: DialectName;

  abstract alterColumnSql(table: TableDesign, before: ColumnDesign, after: ColumnDesign, change: ColumnChange): string[];

  quoteIdentifier(id: string): string {
    return delimitIdentifier(this.name, id);
  }

  formatTableName(table: TableLike): string {
    if (table.schema) {
      return `${this.quoteIdentifier(table.schema)}.${this.quoteIdentifier(table.name)}`;
    }
    return this.quoteIdentifier(table.name);
  }

  renderColumnType(column: ColumnDesign): string {
    if (column.length === undefined) return column.dataType;
    const args = column.scale !== undefined ? `${column.length}, ${column.scale}` : `${column.length}`;
    return `${column.dataType}(${args})`;
  }

  renderAutoIncrement(column: ColumnDesign, inlinePrimaryKey: boolean): string | undefined {
    if (!column.isAutoIncrement) return undefined;
    const support = getCapabilities(this.name).autoIncrement;
    switch (support.style) {
      case 'type-name':
        return undefined;
      case 'generated':
        return 'GENERATED BY DEFAULT AS IDENTITY';
      case 'suffix':
        return inlinePrimaryKey || !support.primaryKeyOnly ? support.keyword : undefined;
    }
  }

  renderGenerated(column: ColumnDesign): string {
    const storage = column.generatedStored ? 'STORED' : 'VIRTUAL';
    return `GENERATED ALWAYS AS (${column.generatedExpression ?? ''}) ${storage}`;
  }

  uniqueConstraintName(table: TableDesign, column: string): string {
    return `${table.tableName}_${column}_unique`;
  }

  /** Names the constraint, so ALTER can find it again. */
  renderUniqueClause(table: TableDesign, column: string): string {
    return `CONSTRAINT ${this.quoteIdentifier(this.uniqueConstraintName(table, column))} UNIQUE`;
  }

  renderForeignKey(fk: ForeignKeyDesign): string {
    const parts: string[] = [];
    if (fk.name) parts.push('CONSTRAINT', this.quoteIdentifier(fk.name));
    parts.push(
      `FOREIGN KEY (${renderColumnList(this, fk.columns)})`,
      'REFERENCES',
      this.formatTableName({ name: fk.referencedTable, schema: fk.referencedSchema }),
      `(${renderColumnList(this, fk.referencedColumns)})`
    );
    if (fk.onUpdate !== 'NO ACTION') parts.push('ON UPDATE', fk.onUpdate);
    if (fk.onDelete !== 'NO ACTION') parts.push('ON DELETE', fk.onDelete);
    return parts.join(' ');
  }

  renderIndex(table: TableDesign, index: IndexDesign): string {
    const unique = index.isUnique ? 'UNIQUE ' : '';
    const cols = renderColumnList(this, index.columns);
    return `CREATE ${unique}INDEX ${this.quoteIdentifier(index.name)} ON ${this.formatTableName(tableRef(table))} (${cols});`;
  }

  renderTableOptions(_table: TableDesign): string | undefined {
    return undefined;
  }

  renameTableSql(from: TableLike, to: string): string[] {
    return [`ALTER TABLE ${this.formatTableName(from)} RENAME TO ${this.quoteIdentifier(to)};`];
  }

  addColumnSql(table: TableDesign, columnSql: string): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} ADD COLUMN ${columnSql};`];
  }

  dropColumnSql(table: TableDesign, column: string): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP COLUMN ${this.quoteIdentifier(column)};`];
  }

  addForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} ADD ${this.renderForeignKey(fk)};`];
  }

  dropForeignKeySql(table: TableDesign, fk: ForeignKeyDesign): string[] {
    if (!fk.name) {
      return [
        sqlComment(
          `Unnamed foreign key (${renderColumnList(this, fk.columns)}) on ${this.formatTableName(tableRef(table))} must be dropped by its generated name`
        )
      ];
    }
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP CONSTRAINT ${this.quoteIdentifier(fk.name)};`];
  }

  addPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[] {
    const name = key.name ? `CONSTRAINT ${this.quoteIdentifier(key.name)} ` : '';
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} ADD ${name}PRIMARY KEY (${renderColumnList(this, key.columns)});`];
  }

  dropPrimaryKeySql(table: TableDesign, key: PrimaryKeyInfo): string[] {
    const name = key.name ?? this.defaultPrimaryKeyName(table);
    if (name === undefined) {
      return [
        sqlComment(
          `Unnamed primary key (${renderColumnList(this, key.columns)}) on ${this.formatTableName(tableRef(table))} must be dropped by its generated name`
        )
      ];
    }
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP CONSTRAINT ${this.quoteIdentifier(name)};`];
  }

  addConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[] {
    const body = this.renderConstraintBody(constraint);
    if (body === undefined) {
      return [
        sqlComment(
          `${constraint.constraintType} constraint ${this.quoteIdentifier(constraint.name)} on ${this.formatTableName(tableRef(table))} has no definition to apply`
        )
      ];
    }
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} ADD CONSTRAINT ${this.quoteIdentifier(constraint.name)} ${body};`];
  }

  dropConstraintSql(table: TableDesign, constraint: ConstraintInfo): string[] {
    return [`ALTER TABLE ${this.formatTableName(tableRef(table))} DROP CONSTRAINT ${this.quoteIdentifier(constraint.name)};`];
  }

  dropIndexSql(table: TableDesign, index: string): string[] {
    return [`DROP INDEX IF EXISTS ${this.formatTableName({ name: index, schema: table.schema })};`];
  }

  dropTableSql(table: TableLike, ifExists: boolean, _cascade = false): string[] {
    return [`DROP TABLE ${ifExists ? 'IF EXISTS ' : ''}${this.formatTableName(table)};`];
  }

  /** The name the database gives an unnamed primary key, when it is predictable. */
  protected defaultPrimaryKeyName(_table: TableDesign): string | undefined {
    return undefined;
  }

  /** CHECK takes the bare condition and EXCLUDE everything after the keyword. */
  protected renderConstraintBody(constraint: ConstraintInfo): string | undefined {
    switch (constraint.constraintType) {
      case 'UNIQUE':
        return `UNIQUE (${renderColumnList(this, constraint.columns)})`;
      case 'CHECK':
        return constraint.definition !== undefined ? `CHECK (${constraint.definition})` : undefined;
      case 'EXCLUDE':
        return constraint.definition !== undefined ? `EXCLUDE ${constraint.definition}` : undefined;
      case 'PRIMARY KEY':
      case 'FOREIGN KEY':
        return undefined;
    }
  }

  protected addUniqueConstraintSql(table: TableDesign, column: string): string {
    return `ALTER TABLE ${this.formatTableName(tableRef(table))} ADD CONSTRAINT ${this.quoteIdentifier(this.uniqueConstraintName(table, column))} UNIQUE (${this.quoteIdentifier(column)});`;
  }

  protected dropUniqueConstraintSql(table: TableDesign, column: string): string {
    return `ALTER TABLE ${this.formatTableName(tableRef(table))} DROP CONSTRAINT ${this.quoteIdentifier(this.uniqueConstraintName(table, column))};`;
  }
}
