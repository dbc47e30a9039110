import { getCapabilities } from '../capabilities.js';
import { err, ok, type Result } from '../ddl-result.js';
import type { TableError } from '../ddl-errors.js';
import type { TableDesign } from './table-design.js';

/**
 * Checks a table design before any DDL is rendered. Column names are
 * compared case-insensitively.
 */
export const validateTableDesign = (table: TableDesign): Result<void, TableError> => {
  if (!table.tableName.trim()) return err({ kind: 'EmptyTableName' });
  if (!table.columns.length) return err({ kind: 'NoColumns' });

  const known = new Set<string>();
  for (const [position, column] of table.columns.entries()) {
    if (!column.name.trim()) return err({ kind: 'EmptyColumnName', position });
    if (!column.dataType.trim()) return err({ kind: 'EmptyColumnType', column: column.name });
    const key = column.name.toLowerCase();
    if (known.has(key)) return err({ kind: 'DuplicateColumn', column: column.name });
    known.add(key);
  }

  for (const index of table.indexes) {
    const missing = index.columns.find(name => !known.has(name.toLowerCase()));
    if (missing !== undefined) return err({ kind: 'UnknownIndexColumn', index: index.name, column: missing });
  }

  for (const fk of table.foreignKeys) {
    const missing = fk.columns.find(name => !known.has(name.toLowerCase()));
    if (missing !== undefined) {
      return err({ kind: 'UnknownForeignKeyColumn', foreignKey: fk.name ?? fk.columns.join(', '), column: missing });
    }
  }

  if (!getCapabilities(table.dialect).supportsVirtualGenerated) {
    const virtual = table.columns.find(column => column.generatedExpression !== undefined && !column.generatedStored);
    if (virtual) return err({ kind: 'VirtualGeneratedNotSupported', column: virtual.name });
  }
  return ok(undefined);
};
