import type { ReferentialAction } from '../table/table-design.js';

/** Shapes produced by catalog introspection and consumed by the comparator. */

export interface TableInfo {
  schema?: string;
  name: string;
  /** e.g. 'BASE TABLE', 'VIEW'. */
  tableType?: string;
  comment?: string;
}

export interface ColumnInfo {
  name: string;
  ordinal: number;
  dataType: string;
  nullable: boolean;
  defaultValue?: string;
  maxLength?: number;
  precision?: number;
  scale?: number;
  isPrimaryKey: boolean;
  isAutoIncrement: boolean;
  isUnique: boolean;
  comment?: string;
}

export interface IndexInfo {
  name: string;
  columns: string[];
  isUnique: boolean;
  isPrimary: boolean;
  /** Access method, e.g. 'btree'. */
  indexType: string;
  comment?: string;
}

export interface ForeignKeyInfo {
  name: string;
  columns: string[];
  referencedTable: string;
  referencedSchema?: string;
  referencedColumns: string[];
  onUpdate: ReferentialAction;
  onDelete: ReferentialAction;
}

export interface PrimaryKeyInfo {
  name?: string;
  columns: string[];
}

export type ConstraintType = 'PRIMARY KEY' | 'FOREIGN KEY' | 'UNIQUE' | 'CHECK' | 'EXCLUDE';

export interface ConstraintInfo {
  name: string;
  constraintType: ConstraintType;
  columns: string[];
  definition?: string;
}

export interface TriggerInfo {
  schema?: string;
  name: string;
  tableName: string;
  timing: string;
  events: string[];
  /** 'ROW' or 'STATEMENT'. */
  forEach: string;
  definition?: string;
  enabled: boolean;
}

export interface TableDetails {
  info: TableInfo;
  columns: ColumnInfo[];
  primaryKey?: PrimaryKeyInfo;
  foreignKeys: ForeignKeyInfo[];
  indexes: IndexInfo[];
  constraints: ConstraintInfo[];
  triggers: TriggerInfo[];
}

export interface ViewInfo {
  schema?: string;
  name: string;
  isMaterialized: boolean;
  definition?: string;
  comment?: string;
}

export interface FunctionInfo {
  schema?: string;
  name: string;
  language: string;
  returnType: string;
  parameters: string[];
  definition?: string;
}

export interface ProcedureInfo {
  schema?: string;
  name: string;
  language: string;
  parameters: string[];
  definition?: string;
}

export interface SequenceInfo {
  schema?: string;
  name: string;
  dataType: string;
  startValue: number;
  minValue?: number;
  maxValue?: number;
  incrementBy: number;
}

export type TypeKind = 'enum' | 'composite' | 'domain' | 'range' | 'base';

export interface TypeInfo {
  schema?: string;
  name: string;
  typeKind: TypeKind;
  /** Labels of an enum type. */
  values?: string[];
  definition?: string;
}

/** Everything the comparator reads from one database. */
export interface SchemaSnapshot {
  tables: TableInfo[];
  /** Keyed by table name. */
  tableDetails: ReadonlyMap<string, TableDetails>;
  views: ViewInfo[];
  functions: FunctionInfo[];
  procedures: ProcedureInfo[];
  triggers: TriggerInfo[];
  sequences: SequenceInfo[];
  types: TypeInfo[];
}
