import { err, ok, type Result } from '../ddl-result.js';
import type { PolicyError } from '../ddl-errors.js';
import { quoteIdentifier, quoteQualifiedName } from '../identifier-quoter.js';
import { getCapabilities } from '../capabilities.js';
import type { DialectName } from '../schema-dialect.js';
import { qualifyName } from '../sql-writing.js';
import type { PolicyDefinition } from './policy-spec.js';
import { validatePolicy } from './policy-validator.js';

const ROLE_KEYWORDS = new Set(['PUBLIC', 'CURRENT_USER', 'CURRENT_ROLE', 'SESSION_USER']);

export interface DropPolicyOptions {
  schema?: string;
  ifExists?: boolean;
}

/** Builds row-level security DDL. Every builder validates its input first. */
export class PolicyManager {
  constructor(readonly dialect: DialectName = 'postgres') {}

  validate(spec: PolicyDefinition): Result<void, PolicyError> {
    return validatePolicy(spec, this.dialect);
  }

  buildCreatePolicy(spec: PolicyDefinition): Result<string, PolicyError> {
    const validation = this.validate(spec);
    if (!validation.ok) return validation;

    let sql = `CREATE POLICY ${this.quote(spec.name)} ON ${this.table(spec.table, spec.schema)}`;
    if (spec.policyType === 'RESTRICTIVE') sql += ' AS RESTRICTIVE';
    if (spec.command !== 'ALL') sql += ` FOR ${spec.command}`;
    sql += ` TO ${this.renderRoles(spec.roles)}`;
    if (spec.usingExpr !== undefined) sql += ` USING (${spec.usingExpr})`;
    if (spec.checkExpr !== undefined) sql += ` WITH CHECK (${spec.checkExpr})`;
    return ok(sql);
  }

  buildDropPolicy(name: string, table: string, options: DropPolicyOptions = {}): Result<string, PolicyError> {
    return this.withTarget(name, table, () => {
      const ifExists = options.ifExists ? 'IF EXISTS ' : '';
      return `DROP POLICY ${ifExists}${this.quote(name)} ON ${this.table(table, options.schema)}`;
    });
  }

  buildRenamePolicy(oldName: string, newName: string, table: string, schema?: string): Result<string, PolicyError> {
    if (!newName.trim()) return err({ kind: 'EmptyName' });
    return this.withTarget(oldName, table, () =>
      `ALTER POLICY ${this.quote(oldName)} ON ${this.table(table, schema)} RENAME TO ${this.quote(newName)}`
    );
  }

  buildAlterPolicyRoles(name: string, table: string, roles: readonly string[], schema?: string): Result<string, PolicyError> {
    return this.withTarget(name, table, () =>
      `ALTER POLICY ${this.quote(name)} ON ${this.table(table, schema)} TO ${this.renderRoles(roles)}`
    );
  }

  /** A missing expression resets the clause to `(true)`. */
  buildAlterPolicyUsing(name: string, table: string, expr?: string, schema?: string): Result<string, PolicyError> {
    return this.withTarget(name, table, () =>
      `ALTER POLICY ${this.quote(name)} ON ${this.table(table, schema)} USING (${expr ?? 'true'})`
    );
  }

  buildAlterPolicyCheck(name: string, table: string, expr?: string, schema?: string): Result<string, PolicyError> {
    return this.withTarget(name, table, () =>
      `ALTER POLICY ${this.quote(name)} ON ${this.table(table, schema)} WITH CHECK (${expr ?? 'true'})`
    );
  }

  buildEnableRls(table: string, schema?: string): Result<string, PolicyError> {
    return this.alterTableRls(table, schema, 'ENABLE ROW LEVEL SECURITY');
  }

  buildDisableRls(table: string, schema?: string): Result<string, PolicyError> {
    return this.alterTableRls(table, schema, 'DISABLE ROW LEVEL SECURITY');
  }

  /** Applies policies to the table owner as well. */
  buildForceRls(table: string, schema?: string): Result<string, PolicyError> {
    return this.alterTableRls(table, schema, 'FORCE ROW LEVEL SECURITY');
  }

  buildNoForceRls(table: string, schema?: string): Result<string, PolicyError> {
    return this.alterTableRls(table, schema, 'NO FORCE ROW LEVEL SECURITY');
  }

  private alterTableRls(table: string, schema: string | undefined, action: string): Result<string, PolicyError> {
    if (!table.trim()) return err({ kind: 'EmptyTable' });
    const support = this.checkSupport();
    if (!support.ok) return support;
    return ok(`ALTER TABLE ${this.table(table, schema)} ${action}`);
  }

  private withTarget(name: string, table: string, render: () => string): Result<string, PolicyError> {
    if (!name.trim()) return err({ kind: 'EmptyName' });
    if (!table.trim()) return err({ kind: 'EmptyTable' });
    const support = this.checkSupport();
    if (!support.ok) return support;
    return ok(render());
  }

  private checkSupport(): Result<void, PolicyError> {
    if (getCapabilities(this.dialect).supportsRowLevelSecurity) return ok(undefined);
    return err({ kind: 'NotSupported', reason: `row-level security policies are not available on ${this.dialect}` });
  }

  private renderRoles(roles: readonly string[]): string {
    if (!roles.length) return 'PUBLIC';
    return roles
      .map(role => (ROLE_KEYWORDS.has(role.toUpperCase()) ? role.toUpperCase() : this.quote(role)))
      .join(', ');
  }

  private quote(name: string): string {
    return quoteIdentifier(this.dialect, name);
  }

  private table(table: string, schema?: string): string {
    return quoteQualifiedName(this.dialect, qualifyName(table, schema));
  }
}
