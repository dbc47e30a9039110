import type { DialectName } from './schema-dialect.js';

/**
 * How a dialect expresses auto-increment columns.
 * - `suffix`: a keyword after the column definition (AUTO_INCREMENT, IDENTITY(1,1)).
 * - `type-name`: the column type carries it (SERIAL); nothing is appended.
 * - `generated`: `GENERATED BY DEFAULT AS IDENTITY`.
 */
export type AutoIncrementStyle = 'suffix' | 'type-name' | 'generated';

export interface AutoIncrementSupport {
  style: AutoIncrementStyle;
  keyword: string;
  /** The keyword is only valid right after an inline PRIMARY KEY. */
  primaryKeyOnly: boolean;
}

/** Opening delimiter of a quoted identifier. */
export type IdentifierQuoteChar = '"' | '`' | '[';

/** Static description of what a dialect supports. */
export interface DialectCapabilities {
  readonly supportsBeforeTrigger: boolean;
  readonly supportsInsteadOfTrigger: boolean;
  readonly requiresFunctionForTrigger: boolean;
  readonly supportsStatementLevel: boolean;
  readonly supportsWhenCondition: boolean;
  readonly supportsUpdateColumns: boolean;
  readonly supportsTruncateTrigger: boolean;
  readonly supportsMultipleTriggerEvents: boolean;
  readonly supportsFunctions: boolean;
  readonly supportsReturnsTable: boolean;
  readonly supportsOutParameters: boolean;
  readonly supportsVariadicParameters: boolean;
  readonly supportsVolatility: boolean;
  readonly supportsSecurityMode: boolean;
  readonly supportsParallel: boolean;
  readonly supportsRowLevelSecurity: boolean;
  readonly supportsVirtualGenerated: boolean;
  readonly identifierQuote: IdentifierQuoteChar;
  readonly autoIncrement: Readonly<AutoIncrementSupport>;
}

const deepFreeze = (caps: DialectCapabilities): DialectCapabilities => {
  Object.freeze(caps.autoIncrement);
  return Object.freeze(caps);
};

const CAPABILITY_MATRIX: Readonly<Record<DialectName, DialectCapabilities>> = Object.freeze({
  postgres: deepFreeze({
    supportsBeforeTrigger: true,
    supportsInsteadOfTrigger: true,
    requiresFunctionForTrigger: true,
    supportsStatementLevel: true,
    supportsWhenCondition: true,
    supportsUpdateColumns: true,
    supportsTruncateTrigger: true,
    supportsMultipleTriggerEvents: true,
    supportsFunctions: true,
    supportsReturnsTable: true,
    supportsOutParameters: true,
    supportsVariadicParameters: true,
    supportsVolatility: true,
    supportsSecurityMode: true,
    supportsParallel: true,
    supportsRowLevelSecurity: true,
    supportsVirtualGenerated: false,
    identifierQuote: '"',
    autoIncrement: { style: 'type-name', keyword: 'SERIAL', primaryKeyOnly: false }
  }),
  mysql: deepFreeze({
    supportsBeforeTrigger: true,
    supportsInsteadOfTrigger: false,
    requiresFunctionForTrigger: false,
    supportsStatementLevel: false,
    supportsWhenCondition: false,
    supportsUpdateColumns: false,
    supportsTruncateTrigger: false,
    supportsMultipleTriggerEvents: false,
    supportsFunctions: true,
    supportsReturnsTable: false,
    supportsOutParameters: false,
    supportsVariadicParameters: false,
    supportsVolatility: false,
    supportsSecurityMode: true,
    supportsParallel: false,
    supportsRowLevelSecurity: false,
    supportsVirtualGenerated: true,
    identifierQuote: '`',
    autoIncrement: { style: 'suffix', keyword: 'AUTO_INCREMENT', primaryKeyOnly: false }
  }),
  sqlite: deepFreeze({
    supportsBeforeTrigger: true,
    supportsInsteadOfTrigger: true,
    requiresFunctionForTrigger: false,
    supportsStatementLevel: false,
    supportsWhenCondition: true,
    supportsUpdateColumns: true,
    supportsTruncateTrigger: false,
    supportsMultipleTriggerEvents: false,
    supportsFunctions: false,
    supportsReturnsTable: false,
    supportsOutParameters: false,
    supportsVariadicParameters: false,
    supportsVolatility: false,
    supportsSecurityMode: false,
    supportsParallel: false,
    supportsRowLevelSecurity: false,
    supportsVirtualGenerated: true,
    identifierQuote: '"',
    autoIncrement: { style: 'suffix', keyword: 'AUTOINCREMENT', primaryKeyOnly: true }
  }),
  mssql: deepFreeze({
    supportsBeforeTrigger: false,
    supportsInsteadOfTrigger: true,
    requiresFunctionForTrigger: false,
    supportsStatementLevel: false,
    supportsWhenCondition: false,
    supportsUpdateColumns: false,
    supportsTruncateTrigger: false,
    supportsMultipleTriggerEvents: true,
    supportsFunctions: true,
    supportsReturnsTable: true,
    supportsOutParameters: false,
    supportsVariadicParameters: false,
    supportsVolatility: false,
    supportsSecurityMode: true,
    supportsParallel: false,
    supportsRowLevelSecurity: false,
    supportsVirtualGenerated: true,
    identifierQuote: '[',
    autoIncrement: { style: 'suffix', keyword: 'IDENTITY(1,1)', primaryKeyOnly: false }
  })
});

/** Looks up the capabilities of a dialect. */
export const getCapabilities = (dialect: DialectName): DialectCapabilities => CAPABILITY_MATRIX[dialect];
