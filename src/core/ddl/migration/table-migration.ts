import { describeTableError } from '../ddl-errors.js';
import { isColumnDiffSafe, qualifiedName, type ColumnDiff, type EntityDiff, type TableDiff } from '../compare/schema-diff.js';
import type { ColumnInfo, ConstraintInfo, ForeignKeyInfo, IndexInfo, PrimaryKeyInfo, TableDetails, TableInfo } from '../compare/schema-types.js';
import type { DialectName } from '../schema-dialect.js';
import { diffColumnDesign } from '../table/alter-generator.js';
import { generateCreateTableSql, renderColumnDefinition } from '../table/schema-generator.js';
import {
  col,
  defineTableDesign,
  index,
  type ColumnDesign,
  type ForeignKeyDesign,
  type IndexDesign,
  type TableDesign
} from '../table/table-design.js';
import { createStep, findTableDetails, type MigrationContext, type MigrationStep, type StepGroups } from './migration-types.js';

/** Introspected lengths live in `maxLength` for strings and `precision`/`scale` for numbers. */
export const columnDesignFromInfo = (column: ColumnInfo, isPrimaryKey = column.isPrimaryKey): ColumnDesign =>
  col.custom(column.name, column.dataType, {
    length: column.maxLength ?? column.precision,
    scale: column.maxLength === undefined ? column.scale : undefined,
    nullable: column.nullable && !isPrimaryKey,
    isPrimaryKey,
    isAutoIncrement: column.isAutoIncrement,
    isUnique: column.isUnique,
    // The sequence default of an auto-increment column comes back with the column type.
    defaultValue: column.isAutoIncrement ? undefined : column.defaultValue,
    comment: column.comment
  });

const foreignKeyDesignFromInfo = (fk: ForeignKeyInfo): ForeignKeyDesign => ({
  name: fk.name,
  columns: fk.columns,
  referencedTable: fk.referencedTable,
  referencedSchema: fk.referencedSchema,
  referencedColumns: fk.referencedColumns,
  onUpdate: fk.onUpdate,
  onDelete: fk.onDelete
});

const indexDesignFromInfo = (info: IndexInfo): IndexDesign => index(info.name, info.columns, info.isUnique);

/** Rebuilds a table design from introspected details so it can be created again. */
export const tableDesignFromDetails = (details: TableDetails, dialect: DialectName): TableDesign => {
  const keyColumns = details.primaryKey?.columns ?? details.columns.filter(column => column.isPrimaryKey).map(column => column.name);
  const columns = [...details.columns]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map(column => ({
      ...columnDesignFromInfo(column, keyColumns.includes(column.name)),
      isPartOfCompositePk: keyColumns.length > 1 && keyColumns.includes(column.name)
    }));
  return defineTableDesign(details.info.name, dialect, columns, {
    schema: details.info.schema,
    indexes: details.indexes.filter(info => !info.isPrimary).map(indexDesignFromInfo),
    foreignKeys: details.foreignKeys.map(foreignKeyDesignFromInfo),
    comment: details.info.comment
  });
};

/** Only the name and schema of this design are read by the dialect's ALTER methods. */
const tableShell = (context: MigrationContext, name: string, schema?: string): TableDesign =>
  defineTableDesign(name, context.dialectName, [], { schema });

const createTableStatements = (context: MigrationContext, details: TableDetails): string[] | undefined => {
  const generated = generateCreateTableSql(tableDesignFromDetails(details, context.dialectName));
  if (!generated.ok) {
    context.warnings.push(`Table ${qualifiedName(details.info)}: ${describeTableError(generated.error)}`);
    return undefined;
  }
  const { tableSql, indexSql, commentSql } = generated.value;
  return [tableSql, ...indexSql, ...commentSql];
};

const dropTableStatements = (context: MigrationContext, table: TableInfo): string[] =>
  context.dialect.dropTableSql({ name: table.name, schema: table.schema }, context.ifExists, context.cascade);

const createdTableStep = (context: MigrationContext, table: TableInfo): MigrationStep | undefined => {
  const details = findTableDetails(context.desired, table.name);
  if (!details) {
    context.warnings.push(`Table ${qualifiedName(table)} has no details in the desired snapshot and cannot be created`);
    return undefined;
  }
  const up = createTableStatements(context, details);
  if (!up) return undefined;
  return createStep(context, {
    kind: 'createTable',
    target: qualifiedName(table),
    description: `Create table ${qualifiedName(table)}`,
    up,
    down: dropTableStatements(context, table),
    safe: true,
    downSafe: false
  });
};

const droppedTableStep = (context: MigrationContext, table: TableInfo): MigrationStep => {
  const details = findTableDetails(context.current, table.name);
  const down = details ? createTableStatements(context, details) : undefined;
  if (!details) {
    context.warnings.push(`Table ${qualifiedName(table)} has no details in the current snapshot; the down script cannot recreate it`);
  }
  return createStep(context, {
    kind: 'dropTable',
    target: qualifiedName(table),
    description: `Drop table ${qualifiedName(table)}`,
    up: dropTableStatements(context, table),
    down: down ?? [],
    safe: false,
    downSafe: true
  });
};

/** Collects the steps of one modified table, in the order they must run. */
class TableStepCollector {
  private readonly drops: MigrationStep[] = [];
  private readonly adds: MigrationStep[] = [];
  private readonly alters: MigrationStep[] = [];
  readonly table: TableDesign;
  private readonly target: string;

  constructor(private readonly context: MigrationContext, readonly diff: TableDiff) {
    this.table = tableShell(context, diff.tableName, diff.schema);
    this.target = qualifiedName({ name: diff.tableName, schema: diff.schema });
  }

  drop(kind: MigrationStep['kind'], what: string, up: string[], down: string[]): void {
    this.drops.push(
      createStep(this.context, { kind, target: this.target, description: `Drop ${what} on ${this.target}`, up, down, safe: false, downSafe: true })
    );
  }

  add(kind: MigrationStep['kind'], what: string, up: string[], down: string[]): void {
    this.adds.push(
      createStep(this.context, { kind, target: this.target, description: `Add ${what} to ${this.target}`, up, down, safe: true, downSafe: false })
    );
  }

  alter(step: Omit<MigrationStep, 'kind' | 'target'>): void {
    this.alters.push(createStep(this.context, { ...step, kind: 'alterColumn', target: this.target }));
  }

  /** Drops, then additions of columns, then column changes, then the remaining additions. */
  steps(): MigrationStep[] {
    const addedColumns = this.adds.filter(step => step.kind === 'addColumn');
    const otherAdds = this.adds.filter(step => step.kind !== 'addColumn');
    const dropOrder: MigrationStep['kind'][] = ['dropForeignKey', 'dropConstraint', 'dropIndex', 'dropPrimaryKey', 'dropColumn'];
    const addOrder: MigrationStep['kind'][] = ['addPrimaryKey', 'addIndex', 'addConstraint', 'addForeignKey'];
    const byKind = (steps: MigrationStep[], order: MigrationStep['kind'][]) =>
      order.flatMap(kind => steps.filter(step => step.kind === kind));
    return [...byKind(this.drops, dropOrder), ...addedColumns, ...this.alters, ...byKind(otherAdds, addOrder)];
  }
}

const isTableConstraint = (constraint: ConstraintInfo): boolean =>
  constraint.constraintType !== 'PRIMARY KEY' && constraint.constraintType !== 'FOREIGN KEY';

const columnsOf = (names: readonly string[]): string => names.join(', ');

const collectColumns = (collector: TableStepCollector, context: MigrationContext): void => {
  const { dialect } = context;
  const { table, diff } = collector;
  const render = (column: ColumnInfo) =>
    dialect.addColumnSql(table, renderColumnDefinition(columnDesignFromInfo(column, false), dialect, { inlinePrimaryKey: false, uniqueIn: table }));

  for (const column of diff.removedColumns) {
    collector.drop('dropColumn', `column ${column.name}`, dialect.dropColumnSql(table, column.name), render(column));
  }
  for (const column of diff.addedColumns) {
    collector.add('addColumn', `column ${column.name}`, render(column), dialect.dropColumnSql(table, column.name));
  }
  for (const columnDiff of diff.modifiedColumns) {
    collectColumnChange(collector, context, columnDiff);
  }
};

const collectColumnChange = (collector: TableStepCollector, context: MigrationContext, columnDiff: ColumnDiff): void => {
  const { table, diff } = collector;
  const desired = findTableDetails(context.desired, diff.tableName)?.columns.find(column => column.name === columnDiff.columnName);
  const current = findTableDetails(context.current, diff.tableName)?.columns.find(column => column.name === columnDiff.columnName);
  const where = `${qualifiedName({ name: diff.tableName, schema: diff.schema })}.${columnDiff.columnName}`;
  if (!desired || !current) {
    context.warnings.push(`Column ${where} changed but the snapshots lack its definition; the change is not migrated`);
    return;
  }

  const before = columnDesignFromInfo(current, false);
  const after = columnDesignFromInfo(desired, false);
  // Uniqueness travels with the index and constraint changes of the table.
  const change = { ...diffColumnDesign(before, after), uniqueChanged: false };
  if (columnDiff.ordinalChange) {
    context.warnings.push(`Column ${where} moved from position ${columnDiff.ordinalChange.current} to ${columnDiff.ordinalChange.desired}; column order is not migrated`);
  }
  if (!change.typeChanged && !change.nullableChanged && !change.defaultChanged) return;

  collector.alter({
    description: `Alter column ${columnDiff.columnName} on ${qualifiedName({ name: diff.tableName, schema: diff.schema })}`,
    up: context.dialect.alterColumnSql(table, before, after, change),
    down: context.dialect.alterColumnSql(table, after, before, change),
    safe: isColumnDiffSafe(columnDiff),
    downSafe: !(after.nullable && !before.nullable)
  });
};

const collectIndexes = (collector: TableStepCollector, context: MigrationContext): void => {
  const { dialect } = context;
  const { table, diff } = collector;
  const create = (info: IndexInfo) => [dialect.renderIndex(table, indexDesignFromInfo(info))];
  const drop = (info: IndexInfo) => dialect.dropIndexSql(table, info.name);

  const dropped = [...diff.removedIndexes, ...diff.modifiedIndexes.map(entry => entry.current)];
  const created = [...diff.addedIndexes, ...diff.modifiedIndexes.map(entry => entry.desired)];
  for (const info of dropped.filter(info => !info.isPrimary)) {
    collector.drop('dropIndex', `index ${info.name}`, drop(info), create(info));
  }
  for (const info of created.filter(info => !info.isPrimary)) {
    collector.add('addIndex', `index ${info.name}`, create(info), drop(info));
  }
};

const collectForeignKeys = (collector: TableStepCollector, context: MigrationContext): void => {
  const { dialect } = context;
  const { table, diff } = collector;
  const add = (fk: ForeignKeyInfo) => dialect.addForeignKeySql(table, foreignKeyDesignFromInfo(fk));
  const drop = (fk: ForeignKeyInfo) => dialect.dropForeignKeySql(table, foreignKeyDesignFromInfo(fk));

  const dropped = [...diff.removedForeignKeys];
  const created = [...diff.addedForeignKeys];
  for (const fkDiff of diff.modifiedForeignKeys) {
    const desired = findTableDetails(context.desired, diff.tableName)?.foreignKeys.find(fk => fk.name === fkDiff.name);
    const current = findTableDetails(context.current, diff.tableName)?.foreignKeys.find(fk => fk.name === fkDiff.name);
    if (!desired || !current) {
      context.warnings.push(`Foreign key ${fkDiff.name} on ${diff.tableName} changed but the snapshots lack its definition; the change is not migrated`);
      continue;
    }
    dropped.push(current);
    created.push(desired);
  }
  for (const fk of dropped) {
    collector.drop('dropForeignKey', `foreign key ${fk.name} (${columnsOf(fk.columns)})`, drop(fk), add(fk));
  }
  for (const fk of created) {
    collector.add('addForeignKey', `foreign key ${fk.name} (${columnsOf(fk.columns)})`, add(fk), drop(fk));
  }
};

const collectConstraints = (collector: TableStepCollector, context: MigrationContext): void => {
  const { dialect } = context;
  const { table, diff } = collector;
  const dropped = [...diff.removedConstraints, ...diff.modifiedConstraints.map(entry => entry.current)].filter(isTableConstraint);
  const created = [...diff.addedConstraints, ...diff.modifiedConstraints.map(entry => entry.desired)].filter(isTableConstraint);
  for (const constraint of dropped) {
    collector.drop(
      'dropConstraint',
      `${constraint.constraintType} constraint ${constraint.name}`,
      dialect.dropConstraintSql(table, constraint),
      dialect.addConstraintSql(table, constraint)
    );
  }
  for (const constraint of created) {
    collector.add(
      'addConstraint',
      `${constraint.constraintType} constraint ${constraint.name}`,
      dialect.addConstraintSql(table, constraint),
      dialect.dropConstraintSql(table, constraint)
    );
  }
};

const collectPrimaryKey = (collector: TableStepCollector, context: MigrationContext): void => {
  const { dialect } = context;
  const { table, diff } = collector;
  const change = diff.primaryKeyChange;
  if (!change) return;
  const what = (key: PrimaryKeyInfo) => `primary key (${columnsOf(key.columns)})`;
  const dropped = change.kind === 'removed' ? change.primaryKey : change.kind === 'modified' ? change.current : undefined;
  const added = change.kind === 'added' ? change.primaryKey : change.kind === 'modified' ? change.desired : undefined;
  if (dropped) {
    collector.drop('dropPrimaryKey', what(dropped), dialect.dropPrimaryKeySql(table, dropped), dialect.addPrimaryKeySql(table, dropped));
  }
  if (added) {
    collector.add('addPrimaryKey', what(added), dialect.addPrimaryKeySql(table, added), dialect.dropPrimaryKeySql(table, added));
  }
};

const modifiedTableSteps = (context: MigrationContext, diff: TableDiff): MigrationStep[] => {
  const collector = new TableStepCollector(context, diff);
  collectColumns(collector, context);
  collectIndexes(collector, context);
  collectForeignKeys(collector, context);
  collectConstraints(collector, context);
  collectPrimaryKey(collector, context);
  return collector.steps();
};

/** Steps for created, changed and dropped tables. */
export const migrateTables = (context: MigrationContext, tables: EntityDiff<TableInfo, TableDiff>): StepGroups => {
  const created = tables.added.map(table => createdTableStep(context, table))
    .filter((step): step is MigrationStep => step !== undefined);
  return {
    drops: tables.removed.map(table => droppedTableStep(context, table)),
    changes: [...created, ...tables.modified.flatMap(diff => modifiedTableSteps(context, diff))]
  };
};
