export type PolicyCommand = 'ALL' | 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE';

export type PolicyType = 'PERMISSIVE' | 'RESTRICTIVE';

/** Plain shape of a row-level security policy. */
export interface PolicyDefinition {
  readonly name: string;
  readonly table: string;
  readonly schema?: string;
  readonly command: PolicyCommand;
  readonly policyType: PolicyType;
  /** Empty means PUBLIC. */
  readonly roles: readonly string[];
  readonly usingExpr?: string;
  readonly checkExpr?: string;
}

/**
 * Immutable description of a `CREATE POLICY` statement.
 * Every `with*` call returns a new spec.
 */
export class PolicySpec implements PolicyDefinition {
  readonly name: string;
  readonly table: string;
  readonly schema?: string;
  readonly command: PolicyCommand;
  readonly policyType: PolicyType;
  readonly roles: readonly string[];
  readonly usingExpr?: string;
  readonly checkExpr?: string;

  private constructor(def: PolicyDefinition) {
    this.name = def.name;
    this.table = def.table;
    this.schema = def.schema;
    this.command = def.command;
    this.policyType = def.policyType;
    this.roles = Object.freeze([...def.roles]);
    this.usingExpr = def.usingExpr;
    this.checkExpr = def.checkExpr;
    Object.freeze(this);
  }

  static create(name: string, table: string): PolicySpec {
    return new PolicySpec({ name, table, command: 'ALL', policyType: 'PERMISSIVE', roles: [] });
  }

  static from(def: PolicyDefinition): PolicySpec {
    return new PolicySpec(def);
  }

  withSchema(schema: string): PolicySpec {
    return this.with({ schema });
  }

  withCommand(command: PolicyCommand): PolicySpec {
    return this.with({ command });
  }

  withType(policyType: PolicyType): PolicySpec {
    return this.with({ policyType });
  }

  restrictive(): PolicySpec {
    return this.withType('RESTRICTIVE');
  }

  withRole(role: string): PolicySpec {
    return this.with({ roles: [...this.roles, role] });
  }

  withRoles(roles: readonly string[]): PolicySpec {
    return this.with({ roles });
  }

  withUsing(expr: string): PolicySpec {
    return this.with({ usingExpr: expr });
  }

  withCheck(expr: string): PolicySpec {
    return this.with({ checkExpr: expr });
  }

  toDefinition(): PolicyDefinition {
    return {
      name: this.name,
      table: this.table,
      schema: this.schema,
      command: this.command,
      policyType: this.policyType,
      roles: this.roles,
      usingExpr: this.usingExpr,
      checkExpr: this.checkExpr
    };
  }

  private with(patch: Partial<PolicyDefinition>): PolicySpec {
    return new PolicySpec({ ...this.toDefinition(), ...patch });
  }
}
