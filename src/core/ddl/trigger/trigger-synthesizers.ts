import type { DialectName } from '../schema-dialect.js';
import { createQuoter, quoteQualifiedName } from '../identifier-quoter.js';
import { escapeSqlString, formatStringLiteral, qualifyName, renderColumnList, type Quoter } from '../sql-writing.js';
import type { TriggerDefinition, TriggerEvent } from './trigger-spec.js';

/** Identifies an existing trigger. */
export interface TriggerTarget {
  name: string;
  table: string;
  schema?: string;
}

/** Per-dialect trigger DDL. Optional members are absent where the dialect has no such statement. */
export interface TriggerRenderer {
  /** Renders the CREATE TRIGGER statement of an already validated spec. */
  create(spec: TriggerDefinition): string;
  drop(target: TriggerTarget, ifExists: boolean): string;
  toggle?(target: TriggerTarget, enabled: boolean): string;
  comment?(target: TriggerTarget, comment: string | undefined): string;
}

const uniqueEvents = (spec: TriggerDefinition): TriggerEvent[] => [...new Set(spec.events)];

const renderEvent = (event: TriggerEvent, spec: TriggerDefinition, quoter: Quoter): string =>
  event === 'UPDATE' && spec.updateColumns.length
    ? `UPDATE OF ${renderColumnList(quoter, spec.updateColumns)}`
    : event;

const tableName = (dialect: DialectName, target: { table: string; schema?: string }): string =>
  quoteQualifiedName(dialect, qualifyName(target.table, target.schema));

const ifExistsClause = (ifExists: boolean): string => (ifExists ? 'IF EXISTS ' : '');

const pgQuoter = createQuoter('postgres');

const postgresTriggers: TriggerRenderer = {
  create(spec) {
    const events = uniqueEvents(spec).map(event => renderEvent(event, spec, pgQuoter)).join(' OR ');
    const lines = [
      `CREATE TRIGGER ${pgQuoter.quoteIdentifier(spec.name)}`,
      `    ${spec.timing} ${events}`,
      `    ON ${tableName('postgres', spec)}`,
      `    FOR EACH ${spec.level}`
    ];
    if (spec.whenCondition !== undefined) lines.push(`    WHEN (${spec.whenCondition})`);
    lines.push(`    EXECUTE FUNCTION ${quoteQualifiedName('postgres', spec.functionName ?? '')}()`);
    return lines.join('\n');
  },
  drop(target, ifExists) {
    return `DROP TRIGGER ${ifExistsClause(ifExists)}${pgQuoter.quoteIdentifier(target.name)} ON ${tableName('postgres', target)}`;
  },
  toggle(target, enabled) {
    const action = enabled ? 'ENABLE' : 'DISABLE';
    return `ALTER TABLE ${tableName('postgres', target)} ${action} TRIGGER ${pgQuoter.quoteIdentifier(target.name)}`;
  },
  comment(target, comment) {
    return `COMMENT ON TRIGGER ${pgQuoter.quoteIdentifier(target.name)} ON ${tableName('postgres', target)} IS ${formatStringLiteral(comment)}`;
  }
};

const mysqlQuoter = createQuoter('mysql');

// MySQL fires a trigger for exactly one event.
const mysqlTriggers: TriggerRenderer = {
  create(spec) {
    return [
      `CREATE TRIGGER ${mysqlQuoter.quoteIdentifier(spec.name)}`,
      `${spec.timing} ${uniqueEvents(spec)[0]} ON ${tableName('mysql', spec)}`,
      'FOR EACH ROW',
      'BEGIN',
      spec.body ?? '',
      'END'
    ].join('\n');
  },
  drop(target, ifExists) {
    return `DROP TRIGGER ${ifExistsClause(ifExists)}${quoteQualifiedName('mysql', qualifyName(target.name, target.schema))}`;
  }
};

const sqliteQuoter = createQuoter('sqlite');

const sqliteTriggers: TriggerRenderer = {
  create(spec) {
    const lines = [
      `CREATE TRIGGER ${sqliteQuoter.quoteIdentifier(spec.name)}`,
      `    ${spec.timing} ${renderEvent(uniqueEvents(spec)[0], spec, sqliteQuoter)}`,
      `    ON ${tableName('sqlite', spec)}`,
      '    FOR EACH ROW'
    ];
    if (spec.whenCondition !== undefined) lines.push(`    WHEN ${spec.whenCondition}`);
    lines.push('BEGIN', spec.body ?? '', 'END');
    return lines.join('\n');
  },
  drop(target, ifExists) {
    return `DROP TRIGGER ${ifExistsClause(ifExists)}${sqliteQuoter.quoteIdentifier(target.name)}`;
  }
};

// SQL Server triggers fire once per statement; BEFORE is rejected during validation.
const mssqlTriggers: TriggerRenderer = {
  create(spec) {
    const timing = spec.timing === 'INSTEAD OF' ? 'INSTEAD OF' : 'AFTER';
    return [
      `CREATE TRIGGER ${quoteQualifiedName('mssql', qualifyName(spec.name, spec.schema))}`,
      `    ON ${tableName('mssql', spec)}`,
      `    ${timing} ${uniqueEvents(spec).join(', ')}`,
      'AS',
      'BEGIN',
      spec.body ?? '',
      'END'
    ].join('\n');
  },
  drop(target, ifExists) {
    const qualified = qualifyName(target.name, target.schema);
    const drop = `DROP TRIGGER ${quoteQualifiedName('mssql', qualified)}`;
    return ifExists ? `IF OBJECT_ID('${escapeSqlString(qualified)}', 'TR') IS NOT NULL ${drop}` : drop;
  },
  toggle(target, enabled) {
    const action = enabled ? 'ENABLE' : 'DISABLE';
    return `${action} TRIGGER ${quoteQualifiedName('mssql', qualifyName(target.name, target.schema))} ON ${tableName('mssql', target)}`;
  }
};

export const TRIGGER_RENDERERS: Readonly<Record<DialectName, TriggerRenderer>> = Object.freeze({
  postgres: postgresTriggers,
  mysql: mysqlTriggers,
  sqlite: sqliteTriggers,
  mssql: mssqlTriggers
});
