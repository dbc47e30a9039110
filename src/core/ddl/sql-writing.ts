/**
 * Minimal surface for anything that can quote identifiers.
 * Implemented by schema dialects and by the conditional quoters.
 */
export interface Quoter {
  quoteIdentifier(id: string): string;
}

/**
 * Escape a value to be safe inside a single-quoted SQL literal.
 * Purely mechanical; no dialect knowledge.
 */
export const escapeSqlString = (value: string): string =>
  value.replace(/'/g, "''");

/** Renders a string literal, or NULL when the value is absent. */
export const formatStringLiteral = (value: string | undefined): string =>
  value === undefined ? 'NULL' : `'${escapeSqlString(value)}'`;

/**
 * Quotes a possibly qualified identifier like "schema.table" or "db.schema.table"
 * using a Quoter that knows how to quote a single segment.
 */
export const quoteQualified = (quoter: Quoter, identifier: string): string => {
  const parts = identifier.split('.');
  return parts.map(part => quoter.quoteIdentifier(part)).join('.');
};

/** Prefixes a name with its schema, when there is one. */
export const qualifyName = (name: string, schema?: string): string =>
  schema ? `${schema}.${name}` : name;

/** Renders a comma separated list of quoted column names. */
export const renderColumnList = (quoter: Quoter, columns: readonly string[]): string =>
  columns.map(col => quoter.quoteIdentifier(col)).join(', ');

/**
 * Renders a single-line `--` comment.
 * Line breaks in the text become spaces, so the whole text stays inside the comment.
 */
export const sqlComment = (text: string): string => `-- ${text.replace(/[\r\n]+/g, ' ')}`;

/** True for statements made only of `--` comment lines. */
export const isCommentOnly = (sql: string): boolean => {
  const lines = sql.split(/\r\n|\r|\n/).map(line => line.trim()).filter(Boolean);
  return lines.length > 0 && lines.every(line => line.startsWith('--'));
};
