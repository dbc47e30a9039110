import type {
  ColumnInfo,
  ConstraintInfo,
  ForeignKeyInfo,
  FunctionInfo,
  IndexInfo,
  PrimaryKeyInfo,
  ProcedureInfo,
  SequenceInfo,
  TableInfo,
  TriggerInfo,
  TypeInfo,
  ViewInfo
} from './schema-types.js';
import type { ReferentialAction } from '../table/table-design.js';

/** A value that differs between the current database and the desired state. */
export interface ValueChange<T> {
  current: T;
  desired: T;
}

export interface ColumnDiff {
  columnName: string;
  typeChange?: ValueChange<string>;
  nullableChange?: ValueChange<boolean>;
  defaultChange?: ValueChange<string | undefined>;
  maxLengthChange?: ValueChange<number | undefined>;
  precisionChange?: ValueChange<number | undefined>;
  scaleChange?: ValueChange<number | undefined>;
  commentChange?: ValueChange<string | undefined>;
  ordinalChange?: ValueChange<number>;
}

/** An index or constraint whose definition changed as a whole. */
export interface EntityChange<T> {
  name: string;
  current: T;
  desired: T;
}

export interface ForeignKeyDiff {
  name: string;
  onUpdateChange?: ValueChange<ReferentialAction>;
  onDeleteChange?: ValueChange<ReferentialAction>;
  referencedTableChange?: ValueChange<string>;
  columnsChange?: ValueChange<string[]>;
  referencedColumnsChange?: ValueChange<string[]>;
}

export type PrimaryKeyChange =
  | { kind: 'added'; primaryKey: PrimaryKeyInfo }
  | { kind: 'removed'; primaryKey: PrimaryKeyInfo }
  | { kind: 'modified'; current: PrimaryKeyInfo; desired: PrimaryKeyInfo };

export interface TableDiff {
  tableName: string;
  schema?: string;
  addedColumns: ColumnInfo[];
  removedColumns: ColumnInfo[];
  modifiedColumns: ColumnDiff[];
  addedIndexes: IndexInfo[];
  removedIndexes: IndexInfo[];
  modifiedIndexes: EntityChange<IndexInfo>[];
  addedForeignKeys: ForeignKeyInfo[];
  removedForeignKeys: ForeignKeyInfo[];
  modifiedForeignKeys: ForeignKeyDiff[];
  addedConstraints: ConstraintInfo[];
  removedConstraints: ConstraintInfo[];
  modifiedConstraints: EntityChange<ConstraintInfo>[];
  primaryKeyChange?: PrimaryKeyChange;
}

export interface ViewDiff {
  name: string;
  schema?: string;
  definitionChange?: ValueChange<string | undefined>;
  materializedChange?: ValueChange<boolean>;
}

export interface FunctionDiff {
  name: string;
  schema?: string;
  returnTypeChange?: ValueChange<string>;
  languageChange?: ValueChange<string>;
  definitionChange?: ValueChange<string | undefined>;
}

export interface ProcedureDiff {
  name: string;
  schema?: string;
  languageChange?: ValueChange<string>;
  definitionChange?: ValueChange<string | undefined>;
}

export interface TriggerDiff {
  name: string;
  tableName: string;
  schema?: string;
  definitionChange?: ValueChange<string | undefined>;
  enabledChange?: ValueChange<boolean>;
}

export interface SequenceDiff {
  name: string;
  schema?: string;
  startValueChange?: ValueChange<number>;
  incrementChange?: ValueChange<number>;
  minValueChange?: ValueChange<number | undefined>;
  maxValueChange?: ValueChange<number | undefined>;
}

export interface TypeDiff {
  name: string;
  schema?: string;
  valuesChange?: ValueChange<string[] | undefined>;
  definitionChange?: ValueChange<string | undefined>;
}

/** Added, removed and modified entries of one entity kind. */
export interface EntityDiff<TInfo, TDiff> {
  added: TInfo[];
  removed: TInfo[];
  modified: TDiff[];
}

/** Differences between the desired schema and the current one. */
export interface SchemaDiff {
  tables: EntityDiff<TableInfo, TableDiff>;
  views: EntityDiff<ViewInfo, ViewDiff>;
  functions: EntityDiff<FunctionInfo, FunctionDiff>;
  procedures: EntityDiff<ProcedureInfo, ProcedureDiff>;
  triggers: EntityDiff<TriggerInfo, TriggerDiff>;
  sequences: EntityDiff<SequenceInfo, SequenceDiff>;
  types: EntityDiff<TypeInfo, TypeDiff>;
}

export type SchemaEntityKind = keyof SchemaDiff;

export const SCHEMA_ENTITY_KINDS: readonly SchemaEntityKind[] = [
  'tables',
  'views',
  'functions',
  'procedures',
  'triggers',
  'sequences',
  'types'
];

export const emptyEntityDiff = <TInfo, TDiff>(): EntityDiff<TInfo, TDiff> => ({ added: [], removed: [], modified: [] });

export const createSchemaDiff = (): SchemaDiff => ({
  tables: emptyEntityDiff(),
  views: emptyEntityDiff(),
  functions: emptyEntityDiff(),
  procedures: emptyEntityDiff(),
  triggers: emptyEntityDiff(),
  sequences: emptyEntityDiff(),
  types: emptyEntityDiff()
});

export const createTableDiff = (tableName: string, schema?: string): TableDiff => ({
  tableName,
  schema,
  addedColumns: [],
  removedColumns: [],
  modifiedColumns: [],
  addedIndexes: [],
  removedIndexes: [],
  modifiedIndexes: [],
  addedForeignKeys: [],
  removedForeignKeys: [],
  modifiedForeignKeys: [],
  addedConstraints: [],
  removedConstraints: [],
  modifiedConstraints: []
});

const entityChangeCount = (diff: EntityDiff<unknown, unknown>): number =>
  diff.added.length + diff.removed.length + diff.modified.length;

export const countSchemaChanges = (diff: SchemaDiff): number =>
  SCHEMA_ENTITY_KINDS.reduce((total, kind) => total + entityChangeCount(diff[kind]), 0);

export const isSchemaDiffEmpty = (diff: SchemaDiff): boolean => countSchemaChanges(diff) === 0;

export const isTableDiffEmpty = (diff: TableDiff): boolean =>
  !diff.addedColumns.length &&
  !diff.removedColumns.length &&
  !diff.modifiedColumns.length &&
  !diff.addedIndexes.length &&
  !diff.removedIndexes.length &&
  !diff.modifiedIndexes.length &&
  !diff.addedForeignKeys.length &&
  !diff.removedForeignKeys.length &&
  !diff.modifiedForeignKeys.length &&
  !diff.addedConstraints.length &&
  !diff.removedConstraints.length &&
  !diff.modifiedConstraints.length &&
  diff.primaryKeyChange === undefined;

export const isColumnDiffEmpty = (diff: ColumnDiff): boolean =>
  diff.typeChange === undefined &&
  diff.nullableChange === undefined &&
  diff.defaultChange === undefined &&
  diff.maxLengthChange === undefined &&
  diff.precisionChange === undefined &&
  diff.scaleChange === undefined &&
  diff.commentChange === undefined &&
  diff.ordinalChange === undefined;

/** Making a nullable column NOT NULL can fail on existing rows. */
export const isColumnDiffSafe = (diff: ColumnDiff): boolean =>
  !(diff.nullableChange && diff.nullableChange.current && !diff.nullableChange.desired);

/** Only adding a primary key keeps every existing reference valid. */
export const isPrimaryKeyChangeSafe = (change: PrimaryKeyChange): boolean => change.kind === 'added';

/** True when applying the diff cannot lose data or reject existing rows. */
export const isTableDiffSafe = (diff: TableDiff): boolean =>
  !diff.removedColumns.length &&
  diff.modifiedColumns.every(isColumnDiffSafe) &&
  !diff.removedIndexes.length &&
  !diff.removedForeignKeys.length &&
  !diff.removedConstraints.length &&
  (diff.primaryKeyChange === undefined || isPrimaryKeyChangeSafe(diff.primaryKeyChange));

export const hasBreakingChanges = (diff: SchemaDiff): boolean =>
  SCHEMA_ENTITY_KINDS.some(kind => diff[kind].removed.length > 0) ||
  !diff.tables.modified.every(isTableDiffSafe);

export const qualifiedName = (entity: { name: string; schema?: string }): string =>
  entity.schema ? `${entity.schema}.${entity.name}` : entity.name;

const mergeInto = <TInfo, TDiff>(target: EntityDiff<TInfo, TDiff>, source: EntityDiff<TInfo, TDiff>): void => {
  target.added.push(...source.added);
  target.removed.push(...source.removed);
  target.modified.push(...source.modified);
};

/** Concatenates partial diffs, kind by kind, in the given order. */
export const mergeDiffs = (diffs: readonly SchemaDiff[]): SchemaDiff => {
  const merged = createSchemaDiff();
  for (const diff of diffs) {
    mergeInto(merged.tables, diff.tables);
    mergeInto(merged.views, diff.views);
    mergeInto(merged.functions, diff.functions);
    mergeInto(merged.procedures, diff.procedures);
    mergeInto(merged.triggers, diff.triggers);
    mergeInto(merged.sequences, diff.sequences);
    mergeInto(merged.types, diff.types);
  }
  return merged;
};
