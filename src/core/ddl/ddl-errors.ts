export type PolicyError =
  | { kind: 'EmptyName' }
  | { kind: 'EmptyTable' }
  | { kind: 'NoExpression' }
  | { kind: 'EmptyExpression' }
  | { kind: 'InsertRequiresCheck' }
  | { kind: 'SelectDeleteNoCheck' }
  | { kind: 'NotSupported'; reason: string };

export type TriggerError =
  | { kind: 'EmptyName' }
  | { kind: 'EmptyTable' }
  | { kind: 'NoEvents' }
  | { kind: 'BeforeNotSupported' }
  | { kind: 'InsteadOfNotSupported' }
  | { kind: 'TruncateNotSupported' }
  | { kind: 'StatementLevelNotSupported' }
  | { kind: 'WhenConditionNotSupported' }
  | { kind: 'UpdateColumnsNotSupported' }
  | { kind: 'MissingFunction' }
  | { kind: 'MissingBody' }
  | { kind: 'MultipleEventsNotSupported' };

export type FunctionError =
  | { kind: 'EmptyName' }
  | { kind: 'EmptyReturnType' }
  | { kind: 'EmptyBody' }
  | { kind: 'FunctionsNotSupported' }
  | { kind: 'EmptyParameterName'; position: number }
  | { kind: 'EmptyParameterType'; parameter: string }
  | { kind: 'OutParametersNotSupported'; parameter: string }
  | { kind: 'InvalidParameter'; reason: string }
  | { kind: 'ReturnsTableNotSupported' }
  | { kind: 'OrReplaceNotSupported' };

export type TableError =
  | { kind: 'EmptyTableName' }
  | { kind: 'NoColumns' }
  | { kind: 'EmptyColumnName'; position: number }
  | { kind: 'EmptyColumnType'; column: string }
  | { kind: 'DuplicateColumn'; column: string }
  | { kind: 'UnknownIndexColumn'; index: string; column: string }
  | { kind: 'UnknownForeignKeyColumn'; foreignKey: string; column: string }
  | { kind: 'VirtualGeneratedNotSupported'; column: string };

export const describePolicyError = (error: PolicyError): string => {
  switch (error.kind) {
    case 'EmptyName':
      return 'Policy name cannot be empty';
    case 'EmptyTable':
      return 'Table name cannot be empty';
    case 'NoExpression':
      return 'Policy must have at least a USING or WITH CHECK expression';
    case 'EmptyExpression':
      return 'Policy expression cannot be empty';
    case 'InsertRequiresCheck':
      return 'INSERT policies require a WITH CHECK expression';
    case 'SelectDeleteNoCheck':
      return 'SELECT and DELETE policies cannot have a WITH CHECK expression';
    case 'NotSupported':
      return `Operation not supported: ${error.reason}`;
  }
};

export const describeTriggerError = (error: TriggerError): string => {
  switch (error.kind) {
    case 'EmptyName':
      return 'Trigger name cannot be empty';
    case 'EmptyTable':
      return 'Table name cannot be empty';
    case 'NoEvents':
      return 'At least one trigger event is required';
    case 'BeforeNotSupported':
      return 'BEFORE triggers are not supported by this dialect';
    case 'InsteadOfNotSupported':
      return 'INSTEAD OF triggers are not supported by this dialect';
    case 'TruncateNotSupported':
      return 'TRUNCATE triggers are not supported by this dialect';
    case 'StatementLevelNotSupported':
      return 'Statement-level triggers are not supported by this dialect';
    case 'WhenConditionNotSupported':
      return 'WHEN conditions are not supported by this dialect';
    case 'UpdateColumnsNotSupported':
      return 'UPDATE OF columns is not supported by this dialect';
    case 'MissingFunction':
      return 'A trigger function name is required for this dialect';
    case 'MissingBody':
      return 'A trigger body is required for this dialect';
    case 'MultipleEventsNotSupported':
      return 'This dialect allows a single event per trigger';
  }
};

export const describeFunctionError = (error: FunctionError): string => {
  switch (error.kind) {
    case 'EmptyName':
      return 'Function name cannot be empty';
    case 'EmptyReturnType':
      return 'Return type cannot be empty';
    case 'EmptyBody':
      return 'Function body cannot be empty';
    case 'FunctionsNotSupported':
      return 'User-defined functions are not supported by this dialect';
    case 'EmptyParameterName':
      return `Parameter ${error.position + 1} has an empty name`;
    case 'EmptyParameterType':
      return `Parameter "${error.parameter}" has an empty type`;
    case 'OutParametersNotSupported':
      return `OUT/INOUT parameter "${error.parameter}" is not supported by this dialect`;
    case 'InvalidParameter':
      return `Invalid parameter: ${error.reason}`;
    case 'ReturnsTableNotSupported':
      return 'RETURNS TABLE is not supported by this dialect';
    case 'OrReplaceNotSupported':
      return 'CREATE OR REPLACE FUNCTION is not supported by this dialect';
  }
};

export const describeTableError = (error: TableError): string => {
  switch (error.kind) {
    case 'EmptyTableName':
      return 'Table name is required';
    case 'NoColumns':
      return 'Table must have at least one column';
    case 'EmptyColumnName':
      return `Column ${error.position + 1} has no name`;
    case 'EmptyColumnType':
      return `Column "${error.column}" has no data type`;
    case 'DuplicateColumn':
      return `Duplicate column name "${error.column}"`;
    case 'UnknownIndexColumn':
      return `Index "${error.index}" references unknown column "${error.column}"`;
    case 'UnknownForeignKeyColumn':
      return `Foreign key "${error.foreignKey}" references unknown column "${error.column}"`;
    case 'VirtualGeneratedNotSupported':
      return `Column "${error.column}" must be a STORED generated column on this dialect`;
  }
};
