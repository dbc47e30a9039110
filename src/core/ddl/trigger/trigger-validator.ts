import { getCapabilities } from '../capabilities.js';
import { err, ok, type Result } from '../ddl-result.js';
import type { TriggerError } from '../ddl-errors.js';
import type { DialectName } from '../schema-dialect.js';
import type { TriggerDefinition } from './trigger-spec.js';

const isMissing = (value: string | undefined): boolean => value === undefined || value.trim().length === 0;

/**
 * Checks a trigger against the dialect in a fixed order. The first failing
 * check is reported.
 */
export const validateTrigger = (spec: TriggerDefinition, dialect: DialectName): Result<void, TriggerError> => {
  const caps = getCapabilities(dialect);

  if (isMissing(spec.name)) return err({ kind: 'EmptyName' });
  if (isMissing(spec.table)) return err({ kind: 'EmptyTable' });
  if (!spec.events.length) return err({ kind: 'NoEvents' });
  if (spec.timing === 'BEFORE' && !caps.supportsBeforeTrigger) return err({ kind: 'BeforeNotSupported' });
  if (spec.timing === 'INSTEAD OF' && !caps.supportsInsteadOfTrigger) return err({ kind: 'InsteadOfNotSupported' });
  if (spec.events.includes('TRUNCATE') && !caps.supportsTruncateTrigger) return err({ kind: 'TruncateNotSupported' });
  if (spec.level === 'STATEMENT' && !caps.supportsStatementLevel) return err({ kind: 'StatementLevelNotSupported' });
  if (spec.whenCondition !== undefined && !caps.supportsWhenCondition) return err({ kind: 'WhenConditionNotSupported' });
  if (spec.updateColumns.length && !caps.supportsUpdateColumns) return err({ kind: 'UpdateColumnsNotSupported' });

  if (caps.requiresFunctionForTrigger) {
    if (isMissing(spec.functionName)) return err({ kind: 'MissingFunction' });
  } else if (isMissing(spec.body)) {
    return err({ kind: 'MissingBody' });
  }

  if (new Set(spec.events).size > 1 && !caps.supportsMultipleTriggerEvents) {
    return err({ kind: 'MultipleEventsNotSupported' });
  }
  return ok(undefined);
};
