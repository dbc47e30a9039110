import {
  createSchemaDiff,
  createTableDiff,
  isColumnDiffEmpty,
  isTableDiffEmpty,
  mergeDiffs,
  type ColumnDiff,
  type EntityChange,
  type EntityDiff,
  type ForeignKeyDiff,
  type FunctionDiff,
  type PrimaryKeyChange,
  type ProcedureDiff,
  type SchemaDiff,
  type SequenceDiff,
  type TableDiff,
  type TriggerDiff,
  type TypeDiff,
  type ValueChange,
  type ViewDiff
} from './schema-diff.js';
import type {
  ColumnInfo,
  ConstraintInfo,
  ForeignKeyInfo,
  FunctionInfo,
  IndexInfo,
  PrimaryKeyInfo,
  ProcedureInfo,
  SchemaSnapshot,
  SequenceInfo,
  TableDetails,
  TableInfo,
  TriggerInfo,
  TypeInfo,
  ViewInfo
} from './schema-types.js';

/** Options for schema comparison. */
export interface CompareConfig {
  compareComments: boolean;
  compareIndexes: boolean;
  compareForeignKeys: boolean;
  compareConstraints: boolean;
  compareTriggers: boolean;
  /** When false, a column that moved is reported with an ordinal change. */
  ignoreColumnOrder: boolean;
  /** Applies to every name lookup, and to type and language comparison. */
  caseSensitive: boolean;
}

export const DEFAULT_COMPARE_CONFIG: Readonly<CompareConfig> = Object.freeze({
  compareComments: true,
  compareIndexes: true,
  compareForeignKeys: true,
  compareConstraints: true,
  compareTriggers: true,
  ignoreColumnOrder: false,
  caseSensitive: true
});

const sameList = <T>(a: readonly T[] | undefined, b: readonly T[] | undefined): boolean => {
  if (a === undefined || b === undefined) return a === b;
  return a.length === b.length && a.every((value, i) => value === b[i]);
};

const change = <T>(current: T, desired: T, equal: (a: T, b: T) => boolean = Object.is): ValueChange<T> | undefined =>
  equal(current, desired) ? undefined : { current, desired };

/** True when any key outside `ignored` holds a change. */
const hasAnyChange = (diff: object, ignored: readonly string[]): boolean =>
  Object.entries(diff).some(([key, value]) => !ignored.includes(key) && value !== undefined);

/**
 * Compares a desired schema (source, usually newer) against the current one
 * (target, the baseline). Entries only in the desired schema are added, only in
 * the current one removed, and in both diffed field by field.
 */
export class SchemaComparator {
  readonly config: Readonly<CompareConfig>;

  constructor(config: Partial<CompareConfig> = {}) {
    this.config = Object.freeze({ ...DEFAULT_COMPARE_CONFIG, ...config });
  }

  compareTables(
    desired: readonly TableInfo[],
    current: readonly TableInfo[],
    desiredDetails: ReadonlyMap<string, TableDetails>,
    currentDetails: ReadonlyMap<string, TableDetails>
  ): SchemaDiff {
    const desiredByName = this.normalizeKeys(desiredDetails);
    const currentByName = this.normalizeKeys(currentDetails);
    const diff = createSchemaDiff();
    diff.tables = this.compareNamed(desired, current, table => table.name, (want, have) => {
      const wantDetails = desiredByName.get(this.normalize(want.name));
      const haveDetails = currentByName.get(this.normalize(have.name));
      if (!wantDetails || !haveDetails) return undefined;
      return this.compareTableDetails(wantDetails, haveDetails);
    });
    return diff;
  }

  /** Undefined when both tables are structurally identical. */
  compareTableDetails(desired: TableDetails, current: TableDetails): TableDiff | undefined {
    const diff = createTableDiff(desired.info.name, desired.info.schema);

    const columns = this.compareNamed(desired.columns, current.columns, col => col.name, (a, b) => this.compareColumn(a, b));
    diff.addedColumns = columns.added;
    diff.removedColumns = columns.removed;
    diff.modifiedColumns = columns.modified;

    if (this.config.compareIndexes) {
      const indexes = this.compareNamed(desired.indexes, current.indexes, idx => idx.name, (a, b) =>
        this.indexesEqual(a, b) ? undefined : entityChange(a.name, b, a)
      );
      diff.addedIndexes = indexes.added;
      diff.removedIndexes = indexes.removed;
      diff.modifiedIndexes = indexes.modified;
    }

    if (this.config.compareForeignKeys) {
      const fks = this.compareNamed(desired.foreignKeys, current.foreignKeys, fk => fk.name, (a, b) => this.compareForeignKey(a, b));
      diff.addedForeignKeys = fks.added;
      diff.removedForeignKeys = fks.removed;
      diff.modifiedForeignKeys = fks.modified;
    }

    if (this.config.compareConstraints) {
      const constraints = this.compareNamed(desired.constraints, current.constraints, c => c.name, (a, b) =>
        constraintsEqual(a, b) ? undefined : entityChange(a.name, b, a)
      );
      diff.addedConstraints = constraints.added;
      diff.removedConstraints = constraints.removed;
      diff.modifiedConstraints = constraints.modified;
    }

    diff.primaryKeyChange = comparePrimaryKeys(desired.primaryKey, current.primaryKey);
    return isTableDiffEmpty(diff) ? undefined : diff;
  }

  compareViews(desired: readonly ViewInfo[], current: readonly ViewInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    diff.views = this.compareNamed(desired, current, view => view.name, (want, have): ViewDiff | undefined => {
      const viewDiff: ViewDiff = {
        name: want.name,
        schema: want.schema,
        definitionChange: change(have.definition, want.definition),
        materializedChange: change(have.isMaterialized, want.isMaterialized)
      };
      return hasAnyChange(viewDiff, ['name', 'schema']) ? viewDiff : undefined;
    });
    return diff;
  }

  compareFunctions(desired: readonly FunctionInfo[], current: readonly FunctionInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    diff.functions = this.compareNamed(desired, current, fn => fn.name, (want, have): FunctionDiff | undefined => {
      const fnDiff: FunctionDiff = {
        name: want.name,
        schema: want.schema,
        returnTypeChange: change(have.returnType, want.returnType, this.namesEqual),
        languageChange: change(have.language, want.language, this.namesEqual),
        definitionChange: change(have.definition, want.definition)
      };
      return hasAnyChange(fnDiff, ['name', 'schema']) ? fnDiff : undefined;
    });
    return diff;
  }

  compareProcedures(desired: readonly ProcedureInfo[], current: readonly ProcedureInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    diff.procedures = this.compareNamed(desired, current, proc => proc.name, (want, have): ProcedureDiff | undefined => {
      const procDiff: ProcedureDiff = {
        name: want.name,
        schema: want.schema,
        languageChange: change(have.language, want.language, this.namesEqual),
        definitionChange: change(have.definition, want.definition)
      };
      return hasAnyChange(procDiff, ['name', 'schema']) ? procDiff : undefined;
    });
    return diff;
  }

  /** Triggers are identified by table and name, since names are only unique per table on some dialects. */
  compareTriggers(desired: readonly TriggerInfo[], current: readonly TriggerInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    if (!this.config.compareTriggers) return diff;
    diff.triggers = this.compareNamed(desired, current, trg => `${trg.tableName}.${trg.name}`, (want, have): TriggerDiff | undefined => {
      const trgDiff: TriggerDiff = {
        name: want.name,
        tableName: want.tableName,
        schema: want.schema,
        definitionChange: change(have.definition, want.definition),
        enabledChange: change(have.enabled, want.enabled)
      };
      return hasAnyChange(trgDiff, ['name', 'tableName', 'schema']) ? trgDiff : undefined;
    });
    return diff;
  }

  compareSequences(desired: readonly SequenceInfo[], current: readonly SequenceInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    diff.sequences = this.compareNamed(desired, current, seq => seq.name, (want, have): SequenceDiff | undefined => {
      const seqDiff: SequenceDiff = {
        name: want.name,
        schema: want.schema,
        startValueChange: change(have.startValue, want.startValue),
        incrementChange: change(have.incrementBy, want.incrementBy),
        minValueChange: change(have.minValue, want.minValue),
        maxValueChange: change(have.maxValue, want.maxValue)
      };
      return hasAnyChange(seqDiff, ['name', 'schema']) ? seqDiff : undefined;
    });
    return diff;
  }

  compareTypes(desired: readonly TypeInfo[], current: readonly TypeInfo[]): SchemaDiff {
    const diff = createSchemaDiff();
    diff.types = this.compareNamed(desired, current, type => type.name, (want, have): TypeDiff | undefined => {
      const typeDiff: TypeDiff = {
        name: want.name,
        schema: want.schema,
        valuesChange: change(have.values, want.values, sameList),
        definitionChange: change(have.definition, want.definition)
      };
      return hasAnyChange(typeDiff, ['name', 'schema']) ? typeDiff : undefined;
    });
    return diff;
  }

  /** Runs every comparison and merges the results. */
  compareSchemas(desired: SchemaSnapshot, current: SchemaSnapshot): SchemaDiff {
    return this.mergeDiffs([
      this.compareTables(desired.tables, current.tables, desired.tableDetails, current.tableDetails),
      this.compareViews(desired.views, current.views),
      this.compareFunctions(desired.functions, current.functions),
      this.compareProcedures(desired.procedures, current.procedures),
      this.compareTriggers(desired.triggers, current.triggers),
      this.compareSequences(desired.sequences, current.sequences),
      this.compareTypes(desired.types, current.types)
    ]);
  }

  mergeDiffs(diffs: readonly SchemaDiff[]): SchemaDiff {
    return mergeDiffs(diffs);
  }

  private compareColumn(desired: ColumnInfo, current: ColumnInfo): ColumnDiff | undefined {
    const diff: ColumnDiff = {
      columnName: desired.name,
      typeChange: change(current.dataType, desired.dataType, this.namesEqual),
      nullableChange: change(current.nullable, desired.nullable),
      defaultChange: change(current.defaultValue, desired.defaultValue),
      maxLengthChange: change(current.maxLength, desired.maxLength),
      precisionChange: change(current.precision, desired.precision),
      scaleChange: change(current.scale, desired.scale),
      commentChange: this.config.compareComments ? change(current.comment, desired.comment) : undefined,
      ordinalChange: this.config.ignoreColumnOrder ? undefined : change(current.ordinal, desired.ordinal)
    };
    return isColumnDiffEmpty(diff) ? undefined : diff;
  }

  private compareForeignKey(desired: ForeignKeyInfo, current: ForeignKeyInfo): ForeignKeyDiff | undefined {
    const diff: ForeignKeyDiff = {
      name: desired.name,
      onUpdateChange: change(current.onUpdate, desired.onUpdate),
      onDeleteChange: change(current.onDelete, desired.onDelete),
      referencedTableChange: change(current.referencedTable, desired.referencedTable, this.namesEqual),
      columnsChange: change(current.columns, desired.columns, sameList),
      referencedColumnsChange: change(current.referencedColumns, desired.referencedColumns, sameList)
    };
    return hasAnyChange(diff, ['name']) ? diff : undefined;
  }

  private indexesEqual(a: IndexInfo, b: IndexInfo): boolean {
    return (
      sameList(a.columns, b.columns) &&
      a.isUnique === b.isUnique &&
      a.isPrimary === b.isPrimary &&
      this.namesEqual(a.indexType, b.indexType)
    );
  }

  /**
   * Matches two collections by normalized name. `diffEntry` returns undefined
   * for entries that are the same on both sides.
   */
  private compareNamed<T, D>(
    desired: readonly T[],
    current: readonly T[],
    nameOf: (item: T) => string,
    diffEntry: (desired: T, current: T) => D | undefined
  ): EntityDiff<T, D> {
    const currentByName = new Map(current.map(item => [this.normalize(nameOf(item)), item] as const));
    const desiredNames = new Set(desired.map(item => this.normalize(nameOf(item))));
    const result: EntityDiff<T, D> = { added: [], removed: [], modified: [] };

    for (const item of desired) {
      const match = currentByName.get(this.normalize(nameOf(item)));
      if (match === undefined) {
        result.added.push(item);
        continue;
      }
      const entryDiff = diffEntry(item, match);
      if (entryDiff !== undefined) result.modified.push(entryDiff);
    }

    for (const item of current) {
      if (!desiredNames.has(this.normalize(nameOf(item)))) result.removed.push(item);
    }
    return result;
  }

  private normalizeKeys(details: ReadonlyMap<string, TableDetails>): Map<string, TableDetails> {
    return new Map([...details].map(([name, detail]) => [this.normalize(name), detail] as const));
  }

  private normalize(name: string): string {
    return this.config.caseSensitive ? name : name.toLowerCase();
  }

  private readonly namesEqual = (a: string, b: string): boolean => this.normalize(a) === this.normalize(b);
}

const entityChange = <T>(name: string, current: T, desired: T): EntityChange<T> => ({ name, current, desired });

const constraintsEqual = (a: ConstraintInfo, b: ConstraintInfo): boolean =>
  a.constraintType === b.constraintType && sameList(a.columns, b.columns) && a.definition === b.definition;

const comparePrimaryKeys = (
  desired: PrimaryKeyInfo | undefined,
  current: PrimaryKeyInfo | undefined
): PrimaryKeyChange | undefined => {
  if (desired && !current) return { kind: 'added', primaryKey: desired };
  if (!desired && current) return { kind: 'removed', primaryKey: current };
  if (desired && current && !sameList(desired.columns, current.columns)) {
    return { kind: 'modified', current, desired };
  }
  return undefined;
};
