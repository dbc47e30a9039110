import type { DialectName } from '../schema-dialect.js';

export type ReferentialAction =
  | 'NO ACTION'
  | 'RESTRICT'
  | 'CASCADE'
  | 'SET NULL'
  | 'SET DEFAULT';

export interface ColumnDesign {
  readonly name: string;
  readonly dataType: string;
  readonly length?: number;
  readonly scale?: number;
  readonly nullable: boolean;
  readonly isPrimaryKey: boolean;
  /** Informational; a key is composite whenever several columns are primary keys. */
  readonly isPartOfCompositePk: boolean;
  readonly isAutoIncrement: boolean;
  readonly isUnique: boolean;
  /** SQL expression, rendered verbatim. */
  readonly defaultValue?: string;
  readonly generatedExpression?: string;
  readonly generatedStored: boolean;
  readonly comment?: string;
  /** Zero based position in the table. */
  readonly ordinal: number;
}

export interface ForeignKeyDesign {
  readonly name?: string;
  readonly columns: readonly string[];
  readonly referencedTable: string;
  readonly referencedSchema?: string;
  readonly referencedColumns: readonly string[];
  readonly onUpdate: ReferentialAction;
  readonly onDelete: ReferentialAction;
}

export interface IndexDesign {
  readonly name: string;
  readonly columns: readonly string[];
  readonly isUnique: boolean;
  /** Backs the primary key; never emitted as CREATE INDEX. */
  readonly isPrimary: boolean;
}

export interface MySqlTableOptions {
  engine?: string;
  charset?: string;
  collation?: string;
  autoIncrementStart?: number;
  rowFormat?: string;
}

export interface SqliteTableOptions {
  withoutRowid?: boolean;
  strict?: boolean;
}

export interface TableOptions {
  mysql?: MySqlTableOptions;
  sqlite?: SqliteTableOptions;
}

export interface TableDesign {
  readonly tableName: string;
  readonly schema?: string;
  readonly dialect: DialectName;
  readonly columns: readonly ColumnDesign[];
  readonly indexes: readonly IndexDesign[];
  readonly foreignKeys: readonly ForeignKeyDesign[];
  readonly options: TableOptions;
  readonly comment?: string;
}

type ColumnModifier = (def: ColumnDesign) => ColumnDesign;

const baseColumn = (name: string, dataType: string, extra: Partial<ColumnDesign> = {}): ColumnDesign => ({
  name,
  dataType,
  nullable: true,
  isPrimaryKey: false,
  isPartOfCompositePk: false,
  isAutoIncrement: false,
  isUnique: false,
  generatedStored: false,
  ordinal: 0,
  ...extra
});

/**
 * Factory for column designs with common data types, plus modifiers that
 * return an updated copy.
 */
export const col = {
  integer: (name: string): ColumnDesign => baseColumn(name, 'INTEGER'),

  bigint: (name: string): ColumnDesign => baseColumn(name, 'BIGINT'),

  text: (name: string): ColumnDesign => baseColumn(name, 'TEXT'),

  varchar: (name: string, length: number): ColumnDesign => baseColumn(name, 'VARCHAR', { length }),

  decimal: (name: string, precision: number, scale = 0): ColumnDesign =>
    baseColumn(name, 'DECIMAL', { length: precision, scale }),

  boolean: (name: string): ColumnDesign => baseColumn(name, 'BOOLEAN'),

  timestamp: (name: string): ColumnDesign => baseColumn(name, 'TIMESTAMP'),

  /** Any dialect-specific type name. */
  custom: (name: string, dataType: string, extra: Partial<ColumnDesign> = {}): ColumnDesign =>
    baseColumn(name, dataType, extra),

  /** Primary keys are always NOT NULL. */
  primaryKey: (def: ColumnDesign): ColumnDesign => ({ ...def, isPrimaryKey: true, nullable: false }),

  notNull: (def: ColumnDesign): ColumnDesign => ({ ...def, nullable: false }),

  unique: (def: ColumnDesign): ColumnDesign => ({ ...def, isUnique: true }),

  autoIncrement: (def: ColumnDesign): ColumnDesign => ({ ...def, isAutoIncrement: true }),

  default: (def: ColumnDesign, expression: string): ColumnDesign => ({ ...def, defaultValue: expression }),

  withLength: (def: ColumnDesign, length: number, scale?: number): ColumnDesign => ({ ...def, length, scale }),

  generated: (def: ColumnDesign, expression: string, stored = true): ColumnDesign =>
    ({ ...def, generatedExpression: expression, generatedStored: stored }),

  comment: (def: ColumnDesign, comment: string): ColumnDesign => ({ ...def, comment }),

  /** Applies modifiers left to right. */
  with: (def: ColumnDesign, ...modifiers: ColumnModifier[]): ColumnDesign =>
    modifiers.reduce((acc, modifier) => modifier(acc), def)
};

export const foreignKey = (
  columns: readonly string[],
  referencedTable: string,
  referencedColumns: readonly string[],
  extra: Partial<Omit<ForeignKeyDesign, 'columns' | 'referencedTable' | 'referencedColumns'>> = {}
): ForeignKeyDesign => ({
  columns,
  referencedTable,
  referencedColumns,
  onUpdate: 'NO ACTION',
  onDelete: 'NO ACTION',
  ...extra
});

export const index = (name: string, columns: readonly string[], isUnique = false): IndexDesign => ({
  name,
  columns,
  isUnique,
  isPrimary: false
});

export interface TableDesignInit {
  schema?: string;
  indexes?: readonly IndexDesign[];
  foreignKeys?: readonly ForeignKeyDesign[];
  options?: TableOptions;
  comment?: string;
}

/** Assembles a table design, numbering columns in declaration order. */
export const defineTableDesign = (
  tableName: string,
  dialect: DialectName,
  columns: readonly ColumnDesign[],
  init: TableDesignInit = {}
): TableDesign => ({
  tableName,
  schema: init.schema,
  dialect,
  columns: columns.map((column, ordinal) => ({ ...column, ordinal })),
  indexes: init.indexes ?? [],
  foreignKeys: init.foreignKeys ?? [],
  options: init.options ?? {},
  comment: init.comment
});

/** Primary key column names in declaration order. */
export const primaryKeyColumns = (table: TableDesign): string[] =>
  table.columns.filter(column => column.isPrimaryKey).map(column => column.name);

/** True when the key spans several columns and must be a table constraint. */
export const hasCompositePrimaryKey = (table: TableDesign): boolean =>
  primaryKeyColumns(table).length > 1;
