import { err, ok, type Result } from '../ddl-result.js';
import type { TriggerError } from '../ddl-errors.js';
import type { DialectName } from '../schema-dialect.js';
import type { TriggerDefinition } from './trigger-spec.js';
import { TRIGGER_RENDERERS, type TriggerRenderer, type TriggerTarget } from './trigger-synthesizers.js';
import { validateTrigger } from './trigger-validator.js';

/** Builds trigger DDL for one dialect. */
export class TriggerManager {
  private readonly renderer: TriggerRenderer;

  constructor(readonly dialect: DialectName) {
    this.renderer = TRIGGER_RENDERERS[dialect];
  }

  validate(spec: TriggerDefinition): Result<void, TriggerError> {
    return validateTrigger(spec, this.dialect);
  }

  buildCreateTrigger(spec: TriggerDefinition): Result<string, TriggerError> {
    const validation = this.validate(spec);
    if (!validation.ok) return validation;
    return ok(this.renderer.create(spec));
  }

  /** CREATE TRIGGER followed by its comment, where the dialect stores comments. */
  buildCreateStatements(spec: TriggerDefinition): Result<string[], TriggerError> {
    const created = this.buildCreateTrigger(spec);
    if (!created.ok) return created;
    const statements = [created.value];
    if (spec.comment !== undefined && this.renderer.comment) {
      statements.push(this.renderer.comment(spec, spec.comment));
    }
    return ok(statements);
  }

  buildDropTrigger(target: TriggerTarget, ifExists = false): Result<string, TriggerError> {
    const checked = checkTarget(target);
    if (!checked.ok) return checked;
    return ok(this.renderer.drop(target, ifExists));
  }

  /** Undefined when the dialect cannot toggle triggers. */
  buildEnableTrigger(target: TriggerTarget): string | undefined {
    return this.renderer.toggle?.(target, true);
  }

  buildDisableTrigger(target: TriggerTarget): string | undefined {
    return this.renderer.toggle?.(target, false);
  }

  /** Passing no comment removes it. Undefined when the dialect has no trigger comments. */
  buildCommentOnTrigger(target: TriggerTarget, comment?: string): string | undefined {
    return this.renderer.comment?.(target, comment);
  }
}

const checkTarget = (target: TriggerTarget): Result<void, TriggerError> => {
  if (!target.name.trim()) return err({ kind: 'EmptyName' });
  if (!target.table.trim()) return err({ kind: 'EmptyTable' });
  return ok(undefined);
};
