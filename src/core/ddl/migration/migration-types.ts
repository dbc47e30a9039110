import type { SchemaSnapshot, TableDetails } from '../compare/schema-types.js';
import type { DialectName, SchemaDialect } from '../schema-dialect.js';
import { isCommentOnly, sqlComment } from '../sql-writing.js';

export type MigrationStepKind =
  | 'createType'
  | 'alterType'
  | 'dropType'
  | 'createSequence'
  | 'alterSequence'
  | 'dropSequence'
  | 'createTable'
  | 'dropTable'
  | 'addColumn'
  | 'alterColumn'
  | 'dropColumn'
  | 'addIndex'
  | 'dropIndex'
  | 'addForeignKey'
  | 'dropForeignKey'
  | 'addConstraint'
  | 'dropConstraint'
  | 'addPrimaryKey'
  | 'dropPrimaryKey'
  | 'createView'
  | 'alterView'
  | 'dropView'
  | 'createFunction'
  | 'alterFunction'
  | 'dropFunction'
  | 'createProcedure'
  | 'alterProcedure'
  | 'dropProcedure'
  | 'createTrigger'
  | 'alterTrigger'
  | 'dropTrigger';

/** One reversible change: `up` applies it and `down` undoes it. */
export interface MigrationStep {
  kind: MigrationStepKind;
  /** Qualified name of the changed object. */
  target: string;
  description: string;
  up: string[];
  down: string[];
  /** False when `up` can lose data or reject existing rows. */
  safe: boolean;
  /** The same, for `down`. */
  downSafe: boolean;
}

export interface Migration {
  steps: MigrationStep[];
  /** Every `up` statement in step order. */
  up: string[];
  /** Every `down` statement, steps in reverse order. */
  down: string[];
  /** Changes that could not be expressed, or only partly. */
  warnings: string[];
}

export interface MigrationOptions {
  /** Adds IF EXISTS to drops. Defaults to true. */
  ifExists?: boolean;
  /** Adds CASCADE to drops where the dialect has it. Defaults to false. */
  cascade?: boolean;
  /** Starts each step's statements with a `--` line naming the step. Defaults to false. */
  includeComments?: boolean;
  /** Snapshot the diff was computed from; supplies full definitions of created or changed objects. */
  desired?: SchemaSnapshot;
  /** Snapshot of the database the migration runs against; supplies definitions for `down`. */
  current?: SchemaSnapshot;
}

/** State shared by the step builders of one migration. */
export interface MigrationContext {
  readonly dialectName: DialectName;
  readonly dialect: SchemaDialect;
  readonly ifExists: boolean;
  readonly cascade: boolean;
  readonly includeComments: boolean;
  readonly desired?: SchemaSnapshot;
  readonly current?: SchemaSnapshot;
  readonly warnings: string[];
}

/** Steps that remove objects run before the steps that create or change them. */
export interface StepGroups {
  drops: MigrationStep[];
  changes: MigrationStep[];
}

export const emptyStepGroups = (): StepGroups => ({ drops: [], changes: [] });

/** Ends a statement with a semicolon unless it has one or is only a comment. */
export const terminate = (sql: string): string =>
  isCommentOnly(sql) || sql.trimEnd().endsWith(';') ? sql : `${sql.trimEnd()};`;

export const createStep = (
  context: MigrationContext,
  init: Omit<MigrationStep, 'up' | 'down'> & { up: readonly string[]; down: readonly string[] }
): MigrationStep => {
  const up = init.up.map(terminate);
  const down = init.down.map(terminate);
  if (!context.includeComments) return { ...init, up, down };
  return {
    ...init,
    up: [sqlComment(init.description), ...up],
    down: [sqlComment(`Revert: ${init.description}`), ...down]
  };
};

const findIgnoringCase = <T>(entries: Iterable<[string, T]>, name: string): T | undefined => {
  const lowered = name.toLowerCase();
  for (const [key, value] of entries) {
    if (key.toLowerCase() === lowered) return value;
  }
  return undefined;
};

/** Table details by exact name, then ignoring case. */
export const findTableDetails = (snapshot: SchemaSnapshot | undefined, name: string): TableDetails | undefined => {
  if (!snapshot) return undefined;
  return snapshot.tableDetails.get(name) ?? findIgnoringCase(snapshot.tableDetails.entries(), name);
};

/** An object of a snapshot list by schema and name, ignoring case. */
export const findByName = <T extends { name: string; schema?: string }>(
  entries: readonly T[] | undefined,
  target: { name: string; schema?: string }
): T | undefined =>
  entries?.find(
    entry => entry.name.toLowerCase() === target.name.toLowerCase() && (entry.schema ?? '') === (target.schema ?? '')
  ) ?? entries?.find(entry => entry.name.toLowerCase() === target.name.toLowerCase());
