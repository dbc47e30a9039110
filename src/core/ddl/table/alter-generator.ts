import { createSchemaDialect } from '../dialects/index.js';
import type { ColumnChange } from '../schema-dialect.js';
import { renderColumnDefinition } from './schema-generator.js';
import { primaryKeyColumns, type ColumnDesign, type ForeignKeyDesign, type IndexDesign, type TableDesign } from './table-design.js';

const sameList = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((value, i) => value === b[i]);

export const diffColumnDesign = (before: ColumnDesign, after: ColumnDesign): ColumnChange => ({
  typeChanged:
    before.dataType.toUpperCase() !== after.dataType.toUpperCase() ||
    before.length !== after.length ||
    before.scale !== after.scale,
  nullableChanged: before.nullable !== after.nullable,
  defaultChanged: before.defaultValue !== after.defaultValue,
  uniqueChanged: before.isUnique !== after.isUnique
});

const hasChange = (change: ColumnChange): boolean =>
  change.typeChanged || change.nullableChanged || change.defaultChanged || change.uniqueChanged;

/** Unnamed keys are identified by their shape. */
const foreignKeyId = (fk: ForeignKeyDesign): string =>
  fk.name ?? `(${fk.columns.join(',')})->${fk.referencedSchema ?? ''}.${fk.referencedTable}(${fk.referencedColumns.join(',')})`;

const sameForeignKey = (a: ForeignKeyDesign, b: ForeignKeyDesign): boolean =>
  sameList(a.columns, b.columns) &&
  a.referencedTable === b.referencedTable &&
  a.referencedSchema === b.referencedSchema &&
  sameList(a.referencedColumns, b.referencedColumns) &&
  a.onUpdate === b.onUpdate &&
  a.onDelete === b.onDelete;

const sameIndex = (a: IndexDesign, b: IndexDesign): boolean =>
  a.isUnique === b.isUnique && sameList(a.columns, b.columns);

/**
 * Splits two keyed collections into what must be dropped and what must be
 * created. An entry whose definition changed under the same key is both.
 */
const partition = <T>(
  before: readonly T[],
  after: readonly T[],
  key: (item: T) => string,
  same: (a: T, b: T) => boolean
): { dropped: T[]; created: T[] } => {
  const beforeByKey = new Map(before.map(item => [key(item), item] as const));
  const afterByKey = new Map(after.map(item => [key(item), item] as const));
  const dropped = before.filter(item => {
    const next = afterByKey.get(key(item));
    return !next || !same(item, next);
  });
  const created = after.filter(item => {
    const previous = beforeByKey.get(key(item));
    return !previous || !same(previous, item);
  });
  return { dropped, created };
};

/**
 * Generates the ALTER statements turning `original` into `modified`, using the
 * dialect of `modified`. Order: rename, dropped columns, added columns,
 * altered columns, foreign keys, indexes. Identical designs produce nothing.
 */
export const generateAlterTable = (original: TableDesign, modified: TableDesign): string[] => {
  const dialect = createSchemaDialect(modified.dialect);
  const statements: string[] = [];

  if (original.tableName !== modified.tableName) {
    statements.push(...dialect.renameTableSql({ name: original.tableName, schema: original.schema }, modified.tableName));
  }

  const originalColumns = new Map(original.columns.map(column => [column.name, column] as const));
  const modifiedColumns = new Map(modified.columns.map(column => [column.name, column] as const));

  for (const column of original.columns) {
    if (!modifiedColumns.has(column.name)) statements.push(...dialect.dropColumnSql(modified, column.name));
  }

  const canInlineKey = primaryKeyColumns(original).length === 0 && primaryKeyColumns(modified).length === 1;
  for (const column of modified.columns) {
    if (originalColumns.has(column.name)) continue;
    const definition = renderColumnDefinition(column, dialect, {
      inlinePrimaryKey: canInlineKey && column.isPrimaryKey,
      uniqueIn: modified
    });
    statements.push(...dialect.addColumnSql(modified, definition));
  }

  for (const column of modified.columns) {
    const before = originalColumns.get(column.name);
    if (!before) continue;
    const change = diffColumnDesign(before, column);
    if (hasChange(change)) statements.push(...dialect.alterColumnSql(modified, before, column, change));
  }

  const fks = partition(original.foreignKeys, modified.foreignKeys, foreignKeyId, sameForeignKey);
  for (const fk of fks.dropped) statements.push(...dialect.dropForeignKeySql(modified, fk));
  for (const fk of fks.created) statements.push(...dialect.addForeignKeySql(modified, fk));

  const indexes = partition(
    original.indexes.filter(index => !index.isPrimary),
    modified.indexes.filter(index => !index.isPrimary),
    index => index.name,
    sameIndex
  );
  for (const index of indexes.dropped) statements.push(...dialect.dropIndexSql(modified, index.name));
  for (const index of indexes.created) statements.push(dialect.renderIndex(modified, index));

  return statements;
};
