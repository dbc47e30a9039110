export type ParameterMode = 'IN' | 'OUT' | 'INOUT' | 'VARIADIC';

export type FunctionVolatility = 'IMMUTABLE' | 'STABLE' | 'VOLATILE';

export type NullBehavior = 'CALLED ON NULL INPUT' | 'RETURNS NULL ON NULL INPUT' | 'STRICT';

export type SecurityMode = 'INVOKER' | 'DEFINER';

/** Well-known PostgreSQL procedural languages; any other language name is accepted as-is. */
export type FunctionLanguage = 'sql' | 'plpgsql' | 'plpython3u' | 'plv8' | (string & {});

export interface FunctionParameter {
  readonly name: string;
  readonly dataType: string;
  readonly mode: ParameterMode;
  readonly defaultValue?: string;
}

export interface TableColumn {
  readonly name: string;
  readonly dataType: string;
}

export const isOutputParameter = (param: FunctionParameter): boolean =>
  param.mode === 'OUT' || param.mode === 'INOUT';

export const parameter = (name: string, dataType: string, mode: ParameterMode = 'IN', defaultValue?: string): FunctionParameter => ({
  name,
  dataType,
  mode,
  defaultValue
});

/** Plain shape of a user-defined function. */
export interface FunctionDefinition {
  readonly name: string;
  readonly schema?: string;
  readonly returnType: string;
  readonly parameters: readonly FunctionParameter[];
  readonly body?: string;
  readonly language: FunctionLanguage;
  readonly volatility: FunctionVolatility;
  readonly nullBehavior: NullBehavior;
  readonly security: SecurityMode;
  readonly parallelSafe: boolean;
  readonly cost?: number;
  readonly rows?: number;
  readonly isSetReturning: boolean;
  /** Columns of a `RETURNS TABLE (...)` function. */
  readonly tableColumns?: readonly TableColumn[];
  readonly comment?: string;
}

/**
 * Immutable description of a `CREATE FUNCTION` statement.
 * Defaults: LANGUAGE sql, VOLATILE, CALLED ON NULL INPUT, SECURITY INVOKER.
 */
export class FunctionSpec implements FunctionDefinition {
  readonly name: string;
  readonly schema?: string;
  readonly returnType: string;
  readonly parameters: readonly FunctionParameter[];
  readonly body?: string;
  readonly language: FunctionLanguage;
  readonly volatility: FunctionVolatility;
  readonly nullBehavior: NullBehavior;
  readonly security: SecurityMode;
  readonly parallelSafe: boolean;
  readonly cost?: number;
  readonly rows?: number;
  readonly isSetReturning: boolean;
  readonly tableColumns?: readonly TableColumn[];
  readonly comment?: string;

  private constructor(def: FunctionDefinition) {
    this.name = def.name;
    this.schema = def.schema;
    this.returnType = def.returnType;
    this.parameters = Object.freeze([...def.parameters]);
    this.body = def.body;
    this.language = def.language;
    this.volatility = def.volatility;
    this.nullBehavior = def.nullBehavior;
    this.security = def.security;
    this.parallelSafe = def.parallelSafe;
    this.cost = def.cost;
    this.rows = def.rows;
    this.isSetReturning = def.isSetReturning;
    this.tableColumns = def.tableColumns ? Object.freeze([...def.tableColumns]) : undefined;
    this.comment = def.comment;
    Object.freeze(this);
  }

  static create(name: string, returnType: string): FunctionSpec {
    return new FunctionSpec({
      name,
      returnType,
      parameters: [],
      language: 'sql',
      volatility: 'VOLATILE',
      nullBehavior: 'CALLED ON NULL INPUT',
      security: 'INVOKER',
      parallelSafe: false,
      isSetReturning: false
    });
  }

  static from(def: FunctionDefinition): FunctionSpec {
    return new FunctionSpec(def);
  }

  withSchema(schema: string): FunctionSpec {
    return this.with({ schema });
  }

  withParameter(name: string, dataType: string, mode: ParameterMode = 'IN', defaultValue?: string): FunctionSpec {
    return this.with({ parameters: [...this.parameters, parameter(name, dataType, mode, defaultValue)] });
  }

  withParameters(parameters: readonly FunctionParameter[]): FunctionSpec {
    return this.with({ parameters });
  }

  withBody(body: string): FunctionSpec {
    return this.with({ body });
  }

  withLanguage(language: FunctionLanguage): FunctionSpec {
    return this.with({ language });
  }

  withVolatility(volatility: FunctionVolatility): FunctionSpec {
    return this.with({ volatility });
  }

  withNullBehavior(nullBehavior: NullBehavior): FunctionSpec {
    return this.with({ nullBehavior });
  }

  withSecurity(security: SecurityMode): FunctionSpec {
    return this.with({ security });
  }

  withParallelSafe(parallelSafe = true): FunctionSpec {
    return this.with({ parallelSafe });
  }

  withCost(cost: number): FunctionSpec {
    return this.with({ cost });
  }

  withRows(rows: number): FunctionSpec {
    return this.with({ rows });
  }

  /** `RETURNS SETOF <returnType>`. */
  returnsSet(): FunctionSpec {
    return this.with({ isSetReturning: true });
  }

  /** `RETURNS TABLE (...)`; implies a set-returning function. */
  returnsTable(columns: readonly TableColumn[]): FunctionSpec {
    return this.with({ tableColumns: columns, isSetReturning: true });
  }

  withComment(comment: string): FunctionSpec {
    return this.with({ comment });
  }

  toDefinition(): FunctionDefinition {
    return {
      name: this.name,
      schema: this.schema,
      returnType: this.returnType,
      parameters: this.parameters,
      body: this.body,
      language: this.language,
      volatility: this.volatility,
      nullBehavior: this.nullBehavior,
      security: this.security,
      parallelSafe: this.parallelSafe,
      cost: this.cost,
      rows: this.rows,
      isSetReturning: this.isSetReturning,
      tableColumns: this.tableColumns,
      comment: this.comment
    };
  }

  private with(patch: Partial<FunctionDefinition>): FunctionSpec {
    return new FunctionSpec({ ...this.toDefinition(), ...patch });
  }
}
