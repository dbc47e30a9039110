import { getCapabilities } from '../capabilities.js';
import { err, ok, type Result } from '../ddl-result.js';
import type { PolicyError } from '../ddl-errors.js';
import type { DialectName } from '../schema-dialect.js';
import type { PolicyDefinition } from './policy-spec.js';

const isBlank = (value: string): boolean => value.trim().length === 0;

const checkCommandExpressions = (spec: PolicyDefinition): PolicyError | undefined => {
  const hasUsing = spec.usingExpr !== undefined;
  const hasCheck = spec.checkExpr !== undefined;
  switch (spec.command) {
    case 'INSERT':
      if (!hasCheck) return { kind: 'InsertRequiresCheck' };
      if (hasUsing) return { kind: 'NotSupported', reason: 'INSERT policies only accept a WITH CHECK expression' };
      return undefined;
    case 'SELECT':
    case 'DELETE':
      if (!hasUsing) return { kind: 'NoExpression' };
      if (hasCheck) return { kind: 'SelectDeleteNoCheck' };
      return undefined;
    case 'UPDATE':
    case 'ALL':
      return hasUsing || hasCheck ? undefined : { kind: 'NoExpression' };
  }
};

/**
 * Checks a policy in a fixed order: name, table, the command's expression
 * requirements, blank expressions, then dialect support.
 */
export const validatePolicy = (spec: PolicyDefinition, dialect: DialectName): Result<void, PolicyError> => {
  if (isBlank(spec.name)) return err({ kind: 'EmptyName' });
  if (isBlank(spec.table)) return err({ kind: 'EmptyTable' });

  const commandError = checkCommandExpressions(spec);
  if (commandError) return err(commandError);

  if (spec.usingExpr !== undefined && isBlank(spec.usingExpr)) return err({ kind: 'EmptyExpression' });
  if (spec.checkExpr !== undefined && isBlank(spec.checkExpr)) return err({ kind: 'EmptyExpression' });

  if (!getCapabilities(dialect).supportsRowLevelSecurity) {
    return err({ kind: 'NotSupported', reason: `row-level security policies are not available on ${dialect}` });
  }
  return ok(undefined);
};
