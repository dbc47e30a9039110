import type { DialectName } from '../schema-dialect.js';
import { createQuoter, quoteQualifiedName } from '../identifier-quoter.js';
import { escapeSqlString, formatStringLiteral, qualifyName } from '../sql-writing.js';
import type { FunctionDefinition, FunctionParameter } from './function-spec.js';

/** Per-dialect function DDL. Optional members are absent where the dialect has no such statement. */
export interface FunctionRenderer {
  /** Keyword that creates or replaces in one statement, when the dialect has one. */
  readonly replaceKeyword?: string;
  /** Renders the statement for an already validated spec, starting with `createKeyword`. */
  create(spec: FunctionDefinition, createKeyword: string): string;
  drop(spec: FunctionDefinition, options: { ifExists: boolean; cascade: boolean }): string;
  comment?(spec: FunctionDefinition, comment: string | undefined): string;
  alterOwner?(spec: FunctionDefinition, owner: string): string;
}

const functionName = (dialect: DialectName, spec: FunctionDefinition): string =>
  quoteQualifiedName(dialect, qualifyName(spec.name, spec.schema));

const pgQuoter = createQuoter('postgres');

const renderPgParameter = (param: FunctionParameter): string => {
  const mode = param.mode === 'IN' ? '' : `${param.mode} `;
  const defaultValue = param.defaultValue !== undefined ? ` DEFAULT ${param.defaultValue}` : '';
  return `${mode}${pgQuoter.quoteIdentifier(param.name)} ${param.dataType}${defaultValue}`;
};

/** Input argument types, which identify a PostgreSQL function among its overloads. */
const pgSignature = (spec: FunctionDefinition): string => {
  const args = spec.parameters
    .filter(param => param.mode !== 'OUT')
    .map(param => (param.mode === 'IN' ? param.dataType : `${param.mode} ${param.dataType}`));
  return `${functionName('postgres', spec)}(${args.join(', ')})`;
};

const pgReturns = (spec: FunctionDefinition): string => {
  if (spec.tableColumns?.length) {
    const columns = spec.tableColumns.map(col => `${pgQuoter.quoteIdentifier(col.name)} ${col.dataType}`);
    return `TABLE (${columns.join(', ')})`;
  }
  return spec.isSetReturning ? `SETOF ${spec.returnType}` : spec.returnType;
};

const dollarQuote = (body: string): string => {
  const tag = body.includes('$$') ? '$func$' : '$$';
  return `${tag}\n${body.trim()}\n${tag}`;
};

const postgresFunctions: FunctionRenderer = {
  replaceKeyword: 'CREATE OR REPLACE',
  create(spec, createKeyword) {
    const lines = [
      `${createKeyword} FUNCTION ${functionName('postgres', spec)}(${spec.parameters.map(renderPgParameter).join(', ')})`,
      `RETURNS ${pgReturns(spec)}`,
      `LANGUAGE ${pgQuoter.quoteIdentifier(spec.language)}`
    ];
    if (spec.volatility !== 'VOLATILE') lines.push(spec.volatility);
    if (spec.nullBehavior !== 'CALLED ON NULL INPUT') lines.push(spec.nullBehavior);
    if (spec.security === 'DEFINER') lines.push('SECURITY DEFINER');
    if (spec.parallelSafe) lines.push('PARALLEL SAFE');
    if (spec.cost !== undefined) lines.push(`COST ${spec.cost}`);
    if (spec.rows !== undefined && spec.isSetReturning) lines.push(`ROWS ${spec.rows}`);
    lines.push(`AS ${dollarQuote(spec.body ?? '')}`);
    return lines.join('\n');
  },
  drop(spec, { ifExists, cascade }) {
    return `DROP FUNCTION ${ifExists ? 'IF EXISTS ' : ''}${pgSignature(spec)}${cascade ? ' CASCADE' : ''}`;
  },
  comment(spec, comment) {
    return `COMMENT ON FUNCTION ${pgSignature(spec)} IS ${formatStringLiteral(comment)}`;
  },
  alterOwner(spec, owner) {
    return `ALTER FUNCTION ${pgSignature(spec)} OWNER TO ${pgQuoter.quoteIdentifier(owner)}`;
  }
};

const mysqlQuoter = createQuoter('mysql');

// MySQL defaults are NOT DETERMINISTIC and SQL SECURITY DEFINER.
const mysqlFunctions: FunctionRenderer = {
  create(spec, createKeyword) {
    const params = spec.parameters.map(param => `${mysqlQuoter.quoteIdentifier(param.name)} ${param.dataType}`);
    const lines = [
      `${createKeyword} FUNCTION ${functionName('mysql', spec)}(${params.join(', ')})`,
      `RETURNS ${spec.returnType}`
    ];
    if (spec.volatility === 'IMMUTABLE') lines.push('DETERMINISTIC');
    if (spec.security === 'INVOKER') lines.push('SQL SECURITY INVOKER');
    lines.push('BEGIN', (spec.body ?? '').trim(), 'END');
    return lines.join('\n');
  },
  drop(spec, { ifExists }) {
    return `DROP FUNCTION ${ifExists ? 'IF EXISTS ' : ''}${functionName('mysql', spec)}`;
  }
};

const mssqlQuoter = createQuoter('mssql');

const mssqlParameterName = (name: string): string =>
  name.startsWith('@') ? name : `@${name}`;

const renderMssqlParameter = (param: FunctionParameter): string => {
  const defaultValue = param.defaultValue !== undefined ? ` = ${param.defaultValue}` : '';
  return `${mssqlParameterName(param.name)} ${param.dataType}${defaultValue}`;
};

/** Set-returning functions become multi-statement table-valued functions filling `@result`. */
const mssqlFunctions: FunctionRenderer = {
  replaceKeyword: 'CREATE OR ALTER',
  create(spec, createKeyword) {
    const lines = [
      `${createKeyword} FUNCTION ${functionName('mssql', spec)}(${spec.parameters.map(renderMssqlParameter).join(', ')})`
    ];
    if (spec.isSetReturning || spec.tableColumns?.length) {
      const columns = spec.tableColumns?.length
        ? spec.tableColumns.map(col => `${mssqlQuoter.quoteIdentifier(col.name)} ${col.dataType}`)
        : [`value ${spec.returnType}`];
      lines.push(`RETURNS @result TABLE (${columns.join(', ')})`);
    } else {
      lines.push(`RETURNS ${spec.returnType}`);
    }
    if (spec.security === 'DEFINER') lines.push('WITH EXECUTE AS OWNER');
    lines.push('AS', 'BEGIN', (spec.body ?? '').trim());
    if (spec.isSetReturning || spec.tableColumns?.length) lines.push('RETURN');
    lines.push('END');
    return lines.join('\n');
  },
  drop(spec, { ifExists }) {
    const qualified = qualifyName(spec.name, spec.schema);
    const drop = `DROP FUNCTION ${functionName('mssql', spec)}`;
    if (!ifExists) return drop;
    const type = spec.isSetReturning || spec.tableColumns?.length ? 'TF' : 'FN';
    return `IF OBJECT_ID('${escapeSqlString(qualified)}', '${type}') IS NOT NULL ${drop}`;
  }
};

export const FUNCTION_RENDERERS: Readonly<Record<DialectName, FunctionRenderer | undefined>> = Object.freeze({
  postgres: postgresFunctions,
  mysql: mysqlFunctions,
  sqlite: undefined,
  mssql: mssqlFunctions
});
