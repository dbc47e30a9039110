import { describeTriggerError } from '../ddl-errors.js';
import {
  qualifiedName,
  type EntityDiff,
  type FunctionDiff,
  type ProcedureDiff,
  type SequenceDiff,
  type TriggerDiff,
  type TypeDiff,
  type ViewDiff
} from '../compare/schema-diff.js';
import type { FunctionInfo, ProcedureInfo, SequenceInfo, TriggerInfo, TypeInfo, ViewInfo } from '../compare/schema-types.js';
import { createQuoter, quoteQualifiedName } from '../identifier-quoter.js';
import { formatStringLiteral, qualifyName } from '../sql-writing.js';
import { TriggerManager } from '../trigger/trigger-manager.js';
import { createStep, findByName, type MigrationContext, type MigrationStep, type StepGroups } from './migration-types.js';

type Named = { name: string; schema?: string };

const objectName = (context: MigrationContext, entity: Named): string =>
  context.dialect.formatTableName({ name: entity.name, schema: entity.schema });

const ifExists = (context: MigrationContext): string => (context.ifExists ? 'IF EXISTS ' : '');

const cascade = (context: MigrationContext): string =>
  context.cascade && context.dialectName === 'postgres' ? ' CASCADE' : '';

const isStatement = (definition: string): boolean => /^\s*create\b/i.test(definition);

const isDefined = <T>(value: T | undefined): value is T => value !== undefined;

// Views

const createViewSql = (context: MigrationContext, view: ViewInfo, replace = false): string[] | undefined => {
  if (view.definition === undefined) {
    context.warnings.push(`View ${qualifiedName(view)} has no definition and cannot be created`);
    return undefined;
  }
  if (isStatement(view.definition)) return [view.definition];
  const materialized = view.isMaterialized && context.dialectName === 'postgres';
  if (view.isMaterialized && !materialized) {
    context.warnings.push(`View ${qualifiedName(view)} is materialized; ${context.dialectName} creates it as a plain view`);
  }
  const verb = !replace ? 'CREATE' : context.dialectName === 'mssql' ? 'CREATE OR ALTER' : 'CREATE OR REPLACE';
  return [`${verb} ${materialized ? 'MATERIALIZED ' : ''}VIEW ${objectName(context, view)} AS ${view.definition}`];
};

const dropViewSql = (context: MigrationContext, view: ViewInfo): string[] => {
  const materialized = view.isMaterialized && context.dialectName === 'postgres' ? 'MATERIALIZED ' : '';
  return [`DROP ${materialized}VIEW ${ifExists(context)}${objectName(context, view)}${cascade(context)}`];
};

const modifiedViewStep = (context: MigrationContext, diff: ViewDiff): MigrationStep | undefined => {
  const desiredInfo = findByName(context.desired?.views, diff);
  const currentInfo = findByName(context.current?.views, diff);
  const desired: ViewInfo = {
    name: diff.name,
    schema: diff.schema,
    isMaterialized: diff.materializedChange?.desired ?? desiredInfo?.isMaterialized ?? false,
    definition: diff.definitionChange ? diff.definitionChange.desired : desiredInfo?.definition
  };
  const current: ViewInfo = {
    name: diff.name,
    schema: diff.schema,
    isMaterialized: diff.materializedChange?.current ?? currentInfo?.isMaterialized ?? desired.isMaterialized,
    definition: diff.definitionChange ? diff.definitionChange.current : currentInfo?.definition
  };

  // Materialized views and SQLite views have no CREATE OR REPLACE.
  const replaceable =
    context.dialectName !== 'sqlite' && !desired.isMaterialized && !current.isMaterialized && !diff.materializedChange;
  const create = (view: ViewInfo) => createViewSql(context, view, replaceable);
  const upCreate = create(desired);
  const downCreate = create(current);
  if (!upCreate || !downCreate) return undefined;

  return createStep(context, {
    kind: 'alterView',
    target: qualifiedName(diff),
    description: `Replace view ${qualifiedName(diff)}`,
    up: replaceable ? upCreate : [...dropViewSql(context, current), ...upCreate],
    down: replaceable ? downCreate : [...dropViewSql(context, desired), ...downCreate],
    safe: true,
    downSafe: true
  });
};

export const migrateViews = (context: MigrationContext, views: EntityDiff<ViewInfo, ViewDiff>): StepGroups => ({
  drops: views.removed.map(view =>
    createStep(context, {
      kind: 'dropView',
      target: qualifiedName(view),
      description: `Drop view ${qualifiedName(view)}`,
      up: dropViewSql(context, view),
      down: createViewSql(context, view) ?? [],
      safe: true,
      downSafe: true
    })
  ),
  changes: [
    ...views.added.map(view => {
      const up = createViewSql(context, view);
      if (!up) return undefined;
      return createStep(context, {
        kind: 'createView',
        target: qualifiedName(view),
        description: `Create view ${qualifiedName(view)}`,
        up,
        down: dropViewSql(context, view),
        safe: true,
        downSafe: true
      });
    }),
    ...views.modified.map(diff => modifiedViewStep(context, diff))
  ].filter(isDefined)
});

// Functions and procedures

type RoutineKind = 'function' | 'procedure';

interface RoutineInfo extends Named {
  language: string;
  parameters: string[];
  returnType?: string;
  definition?: string;
}

const ROUTINE_STEP_KINDS = {
  function: { create: 'createFunction', alter: 'alterFunction', drop: 'dropFunction' },
  procedure: { create: 'createProcedure', alter: 'alterProcedure', drop: 'dropProcedure' }
} as const;

const routineLabel = (kind: RoutineKind): string => (kind === 'function' ? 'Function' : 'Procedure');

/** Picks a dollar-quote tag that does not occur in the body. */
const dollarQuote = (body: string): string => {
  const tag = body.includes('$$') ? '$body$' : '$$';
  return `${tag}${body}${tag}`;
};

const createRoutineSql = (
  context: MigrationContext,
  kind: RoutineKind,
  routine: RoutineInfo,
  replace = false
): string[] | undefined => {
  const label = `${routineLabel(kind)} ${qualifiedName(routine)}`;
  if (routine.definition === undefined) {
    context.warnings.push(`${label} has no definition and cannot be created`);
    return undefined;
  }
  if (isStatement(routine.definition)) return [routine.definition];

  const keyword = kind.toUpperCase();
  const signature = `${objectName(context, routine)}(${routine.parameters.join(', ')})`;
  const returns = kind === 'function' && routine.returnType !== undefined ? ` RETURNS ${routine.returnType}` : '';
  switch (context.dialectName) {
    case 'postgres':
      return [
        `CREATE ${replace ? 'OR REPLACE ' : ''}${keyword} ${signature}${returns} LANGUAGE ${routine.language} AS ${dollarQuote(routine.definition)}`
      ];
    case 'mysql':
      return [`CREATE ${keyword} ${signature}${returns}\n${routine.definition}`];
    case 'mssql':
      return [`CREATE ${replace ? 'OR ALTER ' : ''}${keyword} ${signature}${returns}\nAS\n${routine.definition}`];
    case 'sqlite':
      context.warnings.push(`${label} cannot be created: SQLite has no stored routines`);
      return undefined;
  }
};

const dropRoutineSql = (context: MigrationContext, kind: RoutineKind, routine: RoutineInfo): string[] => {
  const keyword = kind.toUpperCase();
  // PostgreSQL routines are overloadable, so the drop names the signature.
  const signature =
    context.dialectName === 'postgres' ? `(${routine.parameters.join(', ')})` : '';
  return [`DROP ${keyword} ${ifExists(context)}${objectName(context, routine)}${signature}${cascade(context)}`];
};

const modifiedRoutineStep = (
  context: MigrationContext,
  kind: RoutineKind,
  diff: FunctionDiff | ProcedureDiff,
  desired: RoutineInfo | undefined,
  current: RoutineInfo | undefined
): MigrationStep | undefined => {
  const label = `${routineLabel(kind)} ${qualifiedName(diff)}`;
  if (!desired || !current) {
    context.warnings.push(`${label} changed but the snapshots lack its definition; the change is not migrated`);
    return undefined;
  }
  const returnTypeChanged = 'returnTypeChange' in diff && diff.returnTypeChange !== undefined;
  const verbatim = [desired.definition, current.definition].some(definition => definition !== undefined && isStatement(definition));
  const replaceable =
    !verbatim && ((context.dialectName === 'postgres' && !returnTypeChanged) || context.dialectName === 'mssql');

  const upCreate = createRoutineSql(context, kind, desired, replaceable);
  const downCreate = createRoutineSql(context, kind, current, replaceable);
  if (!upCreate || !downCreate) return undefined;
  return createStep(context, {
    kind: ROUTINE_STEP_KINDS[kind].alter,
    target: qualifiedName(diff),
    description: `Replace ${kind} ${qualifiedName(diff)}`,
    up: replaceable ? upCreate : [...dropRoutineSql(context, kind, current), ...upCreate],
    down: replaceable ? downCreate : [...dropRoutineSql(context, kind, desired), ...downCreate],
    safe: true,
    downSafe: true
  });
};

const migrateRoutines = (
  context: MigrationContext,
  kind: RoutineKind,
  diff: { added: RoutineInfo[]; removed: RoutineInfo[]; modified: (FunctionDiff | ProcedureDiff)[] },
  lookup: (snapshot: 'desired' | 'current', target: Named) => RoutineInfo | undefined
): StepGroups => {
  const kinds = ROUTINE_STEP_KINDS[kind];
  return {
    drops: diff.removed.map(routine =>
      createStep(context, {
        kind: kinds.drop,
        target: qualifiedName(routine),
        description: `Drop ${kind} ${qualifiedName(routine)}`,
        up: dropRoutineSql(context, kind, routine),
        down: createRoutineSql(context, kind, routine) ?? [],
        safe: true,
        downSafe: true
      })
    ),
    changes: [
      ...diff.added.map(routine => {
        const up = createRoutineSql(context, kind, routine);
        if (!up) return undefined;
        return createStep(context, {
          kind: kinds.create,
          target: qualifiedName(routine),
          description: `Create ${kind} ${qualifiedName(routine)}`,
          up,
          down: dropRoutineSql(context, kind, routine),
          safe: true,
          downSafe: true
        });
      }),
      ...diff.modified.map(entry =>
        modifiedRoutineStep(context, kind, entry, lookup('desired', entry), lookup('current', entry))
      )
    ].filter(isDefined)
  };
};

export const migrateFunctions = (context: MigrationContext, functions: EntityDiff<FunctionInfo, FunctionDiff>): StepGroups =>
  migrateRoutines(context, 'function', functions, (snapshot, target) => findByName(context[snapshot]?.functions, target));

export const migrateProcedures = (context: MigrationContext, procedures: EntityDiff<ProcedureInfo, ProcedureDiff>): StepGroups =>
  migrateRoutines(context, 'procedure', procedures, (snapshot, target) => findByName(context[snapshot]?.procedures, target));

// Sequences

const supportsSequences = (context: MigrationContext, sequence: Named): boolean => {
  if (context.dialectName === 'postgres' || context.dialectName === 'mssql') return true;
  context.warnings.push(`Sequence ${qualifiedName(sequence)} is not migrated: ${context.dialectName} has no sequences`);
  return false;
};

const createSequenceSql = (context: MigrationContext, sequence: SequenceInfo): string[] => {
  const parts = [
    `CREATE SEQUENCE ${objectName(context, sequence)}`,
    `AS ${sequence.dataType}`,
    `START WITH ${sequence.startValue}`,
    `INCREMENT BY ${sequence.incrementBy}`
  ];
  if (sequence.minValue !== undefined) parts.push(`MINVALUE ${sequence.minValue}`);
  if (sequence.maxValue !== undefined) parts.push(`MAXVALUE ${sequence.maxValue}`);
  return [parts.join(' ')];
};

const dropSequenceSql = (context: MigrationContext, sequence: Named): string[] => [
  `DROP SEQUENCE ${ifExists(context)}${objectName(context, sequence)}${cascade(context)}`
];

const limitClause = (keyword: 'MINVALUE' | 'MAXVALUE', value: number | undefined): string =>
  value === undefined ? `NO ${keyword}` : `${keyword} ${value}`;

const alterSequenceSql = (context: MigrationContext, diff: SequenceDiff, side: 'current' | 'desired'): string[] => {
  const clauses: string[] = [];
  if (diff.startValueChange) clauses.push(`RESTART WITH ${diff.startValueChange[side]}`);
  if (diff.incrementChange) clauses.push(`INCREMENT BY ${diff.incrementChange[side]}`);
  if (diff.minValueChange) clauses.push(limitClause('MINVALUE', diff.minValueChange[side]));
  if (diff.maxValueChange) clauses.push(limitClause('MAXVALUE', diff.maxValueChange[side]));
  return clauses.length ? [`ALTER SEQUENCE ${objectName(context, diff)} ${clauses.join(' ')}`] : [];
};

export const migrateSequences = (context: MigrationContext, sequences: EntityDiff<SequenceInfo, SequenceDiff>): StepGroups => ({
  drops: sequences.removed
    .filter(sequence => supportsSequences(context, sequence))
    .map(sequence =>
      createStep(context, {
        kind: 'dropSequence',
        target: qualifiedName(sequence),
        description: `Drop sequence ${qualifiedName(sequence)}`,
        up: dropSequenceSql(context, sequence),
        down: createSequenceSql(context, sequence),
        safe: false,
        downSafe: true
      })
    ),
  changes: [
    ...sequences.added
      .filter(sequence => supportsSequences(context, sequence))
      .map(sequence =>
        createStep(context, {
          kind: 'createSequence',
          target: qualifiedName(sequence),
          description: `Create sequence ${qualifiedName(sequence)}`,
          up: createSequenceSql(context, sequence),
          down: dropSequenceSql(context, sequence),
          safe: true,
          downSafe: false
        })
      ),
    ...sequences.modified
      .filter(diff => supportsSequences(context, diff))
      .map(diff =>
        createStep(context, {
          kind: 'alterSequence',
          target: qualifiedName(diff),
          description: `Alter sequence ${qualifiedName(diff)}`,
          up: alterSequenceSql(context, diff, 'desired'),
          down: alterSequenceSql(context, diff, 'current'),
          safe: diff.startValueChange === undefined,
          downSafe: diff.startValueChange === undefined
        })
      )
  ]
});

// Types

const supportsTypes = (context: MigrationContext, type: Named): boolean => {
  if (context.dialectName === 'postgres') return true;
  context.warnings.push(`Type ${qualifiedName(type)} is not migrated: ${context.dialectName} has no user-defined types`);
  return false;
};

const createTypeSql = (context: MigrationContext, type: TypeInfo): string[] | undefined => {
  const name = objectName(context, type);
  if (type.typeKind === 'enum') {
    return [`CREATE TYPE ${name} AS ENUM (${(type.values ?? []).map(value => formatStringLiteral(value)).join(', ')})`];
  }
  if (type.typeKind === 'base' || type.definition === undefined) {
    context.warnings.push(`Type ${qualifiedName(type)} (${type.typeKind}) cannot be created from its catalog entry`);
    return undefined;
  }
  switch (type.typeKind) {
    case 'domain':
      return [`CREATE DOMAIN ${name} AS ${type.definition}`];
    case 'composite':
      return [`CREATE TYPE ${name} AS (${type.definition})`];
    case 'range':
      return [`CREATE TYPE ${name} AS RANGE (${type.definition})`];
  }
};

const dropTypeSql = (context: MigrationContext, type: TypeInfo): string[] => [
  `DROP ${type.typeKind === 'domain' ? 'DOMAIN' : 'TYPE'} ${ifExists(context)}${objectName(context, type)}${cascade(context)}`
];

/** New labels are inserted next to a neighbour so the desired order holds. */
const addEnumValuesSql = (context: MigrationContext, diff: TypeDiff, current: readonly string[], desired: readonly string[]): string[] => {
  const name = objectName(context, diff);
  const anchor = desired.find(value => current.includes(value));
  return desired.flatMap((value, i) => {
    if (current.includes(value)) return [];
    const position =
      i > 0 ? ` AFTER ${formatStringLiteral(desired[i - 1])}` : anchor !== undefined ? ` BEFORE ${formatStringLiteral(anchor)}` : '';
    return [`ALTER TYPE ${name} ADD VALUE ${formatStringLiteral(value)}${position}`];
  });
};

const modifiedTypeStep = (context: MigrationContext, diff: TypeDiff): MigrationStep | undefined => {
  const label = `Type ${qualifiedName(diff)}`;
  if (diff.definitionChange) {
    const desired = findByName(context.desired?.types, diff);
    const current = findByName(context.current?.types, diff);
    if (!desired || !current) {
      context.warnings.push(`${label} changed but the snapshots lack its definition; the change is not migrated`);
      return undefined;
    }
    const upCreate = createTypeSql(context, desired);
    const downCreate = createTypeSql(context, current);
    if (!upCreate || !downCreate) return undefined;
    return createStep(context, {
      kind: 'alterType',
      target: qualifiedName(diff),
      description: `Recreate type ${qualifiedName(diff)}`,
      up: [...dropTypeSql(context, current), ...upCreate],
      down: [...dropTypeSql(context, desired), ...downCreate],
      safe: false,
      downSafe: false
    });
  }

  const current = diff.valuesChange?.current ?? [];
  const desired = diff.valuesChange?.desired ?? [];
  if (current.some(value => !desired.includes(value))) {
    context.warnings.push(`${label} drops enum values; PostgreSQL cannot remove them in place`);
  }
  const up = addEnumValuesSql(context, diff, current, desired);
  if (!up.length) return undefined;
  context.warnings.push(`${label} gains enum values; the down script cannot remove them`);
  return createStep(context, {
    kind: 'alterType',
    target: qualifiedName(diff),
    description: `Add values to type ${qualifiedName(diff)}`,
    up,
    down: [],
    safe: true,
    downSafe: true
  });
};

export const migrateTypes = (context: MigrationContext, types: EntityDiff<TypeInfo, TypeDiff>): StepGroups => ({
  drops: types.removed
    .filter(type => supportsTypes(context, type))
    .map(type =>
      createStep(context, {
        kind: 'dropType',
        target: qualifiedName(type),
        description: `Drop type ${qualifiedName(type)}`,
        up: dropTypeSql(context, type),
        down: createTypeSql(context, type) ?? [],
        safe: false,
        downSafe: true
      })
    ),
  changes: [
    ...types.added
      .filter(type => supportsTypes(context, type))
      .map(type => {
        const up = createTypeSql(context, type);
        if (!up) return undefined;
        return createStep(context, {
          kind: 'createType',
          target: qualifiedName(type),
          description: `Create type ${qualifiedName(type)}`,
          up,
          down: dropTypeSql(context, type),
          safe: true,
          downSafe: false
        });
      }),
    ...types.modified.filter(diff => supportsTypes(context, diff)).map(diff => modifiedTypeStep(context, diff))
  ].filter(isDefined)
});

// Triggers

/** Trigger names are quoted only where needed, the way the trigger builders quote them. */
const createTriggerSql = (context: MigrationContext, trigger: TriggerInfo): string[] | undefined => {
  if (trigger.definition === undefined) {
    context.warnings.push(`Trigger ${qualifiedName(trigger)} has no definition and cannot be created`);
    return undefined;
  }
  const statements: string[] = [];
  if (isStatement(trigger.definition)) {
    statements.push(trigger.definition);
  } else {
    const dialect = context.dialectName;
    const table = quoteQualifiedName(dialect, qualifyName(trigger.tableName, trigger.schema));
    if (dialect === 'mssql') {
      const name = quoteQualifiedName(dialect, qualifyName(trigger.name, trigger.schema));
      statements.push(`CREATE TRIGGER ${name} ON ${table} ${trigger.timing} ${trigger.events.join(', ')} AS ${trigger.definition}`);
    } else {
      const name = createQuoter(dialect).quoteIdentifier(trigger.name);
      statements.push(
        `CREATE TRIGGER ${name} ${trigger.timing} ${trigger.events.join(' OR ')} ON ${table} FOR EACH ${trigger.forEach} ${trigger.definition}`
      );
    }
  }
  if (!trigger.enabled) {
    const disable = new TriggerManager(context.dialectName).buildDisableTrigger(triggerTarget(trigger));
    if (disable !== undefined) statements.push(disable);
  }
  return statements;
};

const triggerTarget = (trigger: { name: string; tableName: string; schema?: string }) => ({
  name: trigger.name,
  table: trigger.tableName,
  schema: trigger.schema
});

const dropTriggerSql = (context: MigrationContext, trigger: { name: string; tableName: string; schema?: string }): string[] => {
  const built = new TriggerManager(context.dialectName).buildDropTrigger(triggerTarget(trigger), context.ifExists);
  if (!built.ok) {
    context.warnings.push(`Trigger ${qualifiedName(trigger)} cannot be dropped: ${describeTriggerError(built.error)}`);
    return [];
  }
  return [built.value];
};

const modifiedTriggerStep = (context: MigrationContext, diff: TriggerDiff): MigrationStep | undefined => {
  const label = `Trigger ${qualifiedName(diff)}`;
  if (diff.definitionChange) {
    const desired = findByName(context.desired?.triggers, diff);
    const current = findByName(context.current?.triggers, diff);
    if (!desired || !current) {
      context.warnings.push(`${label} changed but the snapshots lack its definition; the change is not migrated`);
      return undefined;
    }
    const upCreate = createTriggerSql(context, desired);
    const downCreate = createTriggerSql(context, current);
    if (!upCreate || !downCreate) return undefined;
    return createStep(context, {
      kind: 'alterTrigger',
      target: qualifiedName(diff),
      description: `Recreate trigger ${qualifiedName(diff)}`,
      up: [...dropTriggerSql(context, current), ...upCreate],
      down: [...dropTriggerSql(context, desired), ...downCreate],
      safe: true,
      downSafe: true
    });
  }

  if (!diff.enabledChange) return undefined;
  const manager = new TriggerManager(context.dialectName);
  const toggle = (enabled: boolean) =>
    enabled ? manager.buildEnableTrigger(triggerTarget(diff)) : manager.buildDisableTrigger(triggerTarget(diff));
  const up = toggle(diff.enabledChange.desired);
  const down = toggle(diff.enabledChange.current);
  if (up === undefined || down === undefined) {
    context.warnings.push(`${label} cannot be enabled or disabled on ${context.dialectName}`);
    return undefined;
  }
  return createStep(context, {
    kind: 'alterTrigger',
    target: qualifiedName(diff),
    description: `${diff.enabledChange.desired ? 'Enable' : 'Disable'} trigger ${qualifiedName(diff)}`,
    up: [up],
    down: [down],
    safe: true,
    downSafe: true
  });
};

export const migrateTriggers = (context: MigrationContext, triggers: EntityDiff<TriggerInfo, TriggerDiff>): StepGroups => ({
  drops: triggers.removed.map(trigger =>
    createStep(context, {
      kind: 'dropTrigger',
      target: qualifiedName(trigger),
      description: `Drop trigger ${qualifiedName(trigger)}`,
      up: dropTriggerSql(context, trigger),
      down: createTriggerSql(context, trigger) ?? [],
      safe: true,
      downSafe: true
    })
  ),
  changes: [
    ...triggers.added.map(trigger => {
      const up = createTriggerSql(context, trigger);
      if (!up) return undefined;
      return createStep(context, {
        kind: 'createTrigger',
        target: qualifiedName(trigger),
        description: `Create trigger ${qualifiedName(trigger)}`,
        up,
        down: dropTriggerSql(context, trigger),
        safe: true,
        downSafe: true
      });
    }),
    ...triggers.modified.map(diff => modifiedTriggerStep(context, diff))
  ].filter(isDefined)
});
