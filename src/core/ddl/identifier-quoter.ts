import reservedKeywords from './reserved-keywords.json' with { type: 'json' };
import { getCapabilities, type IdentifierQuoteChar } from './capabilities.js';
import type { DialectName } from './schema-dialect.js';
import { quoteQualified, type Quoter } from './sql-writing.js';

const RESERVED_KEYWORDS: ReadonlySet<string> = new Set(reservedKeywords);

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const CLOSING_QUOTE: Record<IdentifierQuoteChar, string> = {
  '"': '"',
  '`': '`',
  '[': ']'
};

export const isReservedKeyword = (name: string): boolean => RESERVED_KEYWORDS.has(name.toUpperCase());

/** True when a single identifier segment cannot be written bare. */
export const needsQuoting = (name: string): boolean =>
  !PLAIN_IDENTIFIER.test(name) || isReservedKeyword(name);

/** Wraps a single segment in the dialect's delimiters, doubling the closing delimiter inside it. */
export const delimitIdentifier = (dialect: DialectName, name: string): string => {
  const open = getCapabilities(dialect).identifierQuote;
  const close = CLOSING_QUOTE[open];
  return `${open}${name.split(close).join(close + close)}${close}`;
};

/** Quotes a single segment only when it needs quoting. */
export const quoteIdentifier = (dialect: DialectName, name: string): string =>
  needsQuoting(name) ? delimitIdentifier(dialect, name) : name;

/** Quotes `schema.table` style names segment by segment. */
export const quoteQualifiedName = (dialect: DialectName, name: string): string =>
  quoteQualified(createQuoter(dialect), name);

/**
 * Strips one level of delimiters from a single quoted segment and un-doubles the escapes.
 * Bare segments are returned untouched.
 */
export const unquoteIdentifier = (dialect: DialectName, quoted: string): string => {
  const open = getCapabilities(dialect).identifierQuote;
  const close = CLOSING_QUOTE[open];
  if (quoted.length < 2 || !quoted.startsWith(open) || !quoted.endsWith(close)) {
    return quoted;
  }
  return quoted.slice(1, -1).split(close + close).join(close);
};

/** Quoter that only delimits identifiers when required. */
export const createQuoter = (dialect: DialectName): Quoter => ({
  quoteIdentifier: (id: string) => quoteIdentifier(dialect, id)
});

/** Quoter that always delimits, preserving case exactly. */
export const createDelimitingQuoter = (dialect: DialectName): Quoter => ({
  quoteIdentifier: (id: string) => delimitIdentifier(dialect, id)
});
