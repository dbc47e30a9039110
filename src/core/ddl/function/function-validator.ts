import { getCapabilities } from '../capabilities.js';
import { err, ok, type Result } from '../ddl-result.js';
import type { FunctionError } from '../ddl-errors.js';
import type { DialectName } from '../schema-dialect.js';
import { isOutputParameter, type FunctionDefinition } from './function-spec.js';

const isBlank = (value: string | undefined): boolean => value === undefined || value.trim().length === 0;

/** SQL Server parameters are `@` variables; the name is written unquoted. */
const MSSQL_PARAMETER_NAME = /^@?[A-Za-z_][A-Za-z0-9_]*$/;

const checkParameterList = (spec: FunctionDefinition, dialect: DialectName): FunctionError | undefined => {
  const seen = new Set<string>();
  for (const param of spec.parameters) {
    const key = param.name.trim().toLowerCase();
    if (seen.has(key)) return { kind: 'InvalidParameter', reason: `duplicate parameter name "${param.name}"` };
    seen.add(key);
  }

  const variadicAt = spec.parameters.findIndex(param => param.mode === 'VARIADIC');
  if (variadicAt === -1) return undefined;
  if (!getCapabilities(dialect).supportsVariadicParameters) {
    return { kind: 'InvalidParameter', reason: `VARIADIC parameters are not available on ${dialect}` };
  }
  const inputAfter = spec.parameters.slice(variadicAt + 1).some(param => param.mode !== 'OUT');
  if (inputAfter) {
    return { kind: 'InvalidParameter', reason: `VARIADIC parameter "${spec.parameters[variadicAt].name}" must be the last input` };
  }
  return undefined;
};

/**
 * Checks a function in a fixed order: name, return type, body, dialect
 * support, then each parameter in declaration order.
 */
export const validateFunction = (spec: FunctionDefinition, dialect: DialectName): Result<void, FunctionError> => {
  const caps = getCapabilities(dialect);
  const hasTableColumns = (spec.tableColumns?.length ?? 0) > 0;

  if (isBlank(spec.name)) return err({ kind: 'EmptyName' });
  if (isBlank(spec.returnType) && !hasTableColumns) return err({ kind: 'EmptyReturnType' });
  if (isBlank(spec.body)) return err({ kind: 'EmptyBody' });
  if (!caps.supportsFunctions) return err({ kind: 'FunctionsNotSupported' });

  for (const [position, param] of spec.parameters.entries()) {
    if (isBlank(param.name)) return err({ kind: 'EmptyParameterName', position });
    if (isBlank(param.dataType)) return err({ kind: 'EmptyParameterType', parameter: param.name });
    if (dialect === 'mssql' && !MSSQL_PARAMETER_NAME.test(param.name)) {
      return err({ kind: 'InvalidParameter', reason: `parameter name "${param.name}" is not a valid variable name` });
    }
    if (isOutputParameter(param) && !caps.supportsOutParameters) {
      return err({ kind: 'OutParametersNotSupported', parameter: param.name });
    }
  }

  const parameterError = checkParameterList(spec, dialect);
  if (parameterError) return err(parameterError);

  if (hasTableColumns && !caps.supportsReturnsTable) return err({ kind: 'ReturnsTableNotSupported' });
  return ok(undefined);
};
