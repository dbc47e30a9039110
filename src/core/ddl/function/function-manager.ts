import { err, ok, type Result } from '../ddl-result.js';
import type { FunctionError } from '../ddl-errors.js';
import type { DialectName } from '../schema-dialect.js';
import type { FunctionDefinition } from './function-spec.js';
import { FUNCTION_RENDERERS, type FunctionRenderer } from './function-synthesizers.js';
import { validateFunction } from './function-validator.js';

export interface DropFunctionOptions {
  ifExists?: boolean;
  /** PostgreSQL only. */
  cascade?: boolean;
}

/** Builds user-defined function DDL for one dialect. */
export class FunctionManager {
  private readonly renderer?: FunctionRenderer;

  constructor(readonly dialect: DialectName) {
    this.renderer = FUNCTION_RENDERERS[dialect];
  }

  validate(spec: FunctionDefinition): Result<void, FunctionError> {
    return validateFunction(spec, this.dialect);
  }

  buildCreateFunction(spec: FunctionDefinition): Result<string, FunctionError> {
    return this.render(spec, () => 'CREATE');
  }

  /** `CREATE OR REPLACE` on PostgreSQL, `CREATE OR ALTER` on SQL Server. */
  buildCreateOrReplaceFunction(spec: FunctionDefinition): Result<string, FunctionError> {
    return this.render(spec, renderer => renderer.replaceKeyword);
  }

  /** CREATE FUNCTION followed by its comment, where the dialect stores comments. */
  buildCreateStatements(spec: FunctionDefinition): Result<string[], FunctionError> {
    const created = this.buildCreateFunction(spec);
    if (!created.ok) return created;
    const statements = [created.value];
    if (spec.comment !== undefined && this.renderer?.comment) {
      statements.push(this.renderer.comment(spec, spec.comment));
    }
    return ok(statements);
  }

  buildDropFunction(spec: FunctionDefinition, options: DropFunctionOptions = {}): Result<string, FunctionError> {
    if (!spec.name.trim()) return err({ kind: 'EmptyName' });
    if (!this.renderer) return err({ kind: 'FunctionsNotSupported' });
    return ok(this.renderer.drop(spec, { ifExists: options.ifExists ?? false, cascade: options.cascade ?? false }));
  }

  /** Passing no comment removes it. Undefined when the dialect has no function comments. */
  buildCommentOnFunction(spec: FunctionDefinition, comment?: string): string | undefined {
    return this.renderer?.comment?.(spec, comment);
  }

  buildAlterOwner(spec: FunctionDefinition, owner: string): string | undefined {
    return this.renderer?.alterOwner?.(spec, owner);
  }

  private render(
    spec: FunctionDefinition,
    keyword: (renderer: FunctionRenderer) => string | undefined
  ): Result<string, FunctionError> {
    const validation = this.validate(spec);
    if (!validation.ok) return validation;
    if (!this.renderer) return err({ kind: 'FunctionsNotSupported' });
    const createKeyword = keyword(this.renderer);
    if (createKeyword === undefined) return err({ kind: 'OrReplaceNotSupported' });
    return ok(this.renderer.create(spec, createKeyword));
  }
}
