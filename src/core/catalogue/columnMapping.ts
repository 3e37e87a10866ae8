import { SchemaMismatchError } from '../../utils/errors.js';
import type { SqlValue } from '../../persistence/drivers/SqlDriver.js';
import { findColumn } from './snapshot.js';

export const MASTER_TABLE = 'master_table';
export const PRIMARY_KEY_FIELD = 'id';

export interface BookColumn {
  field: string;
  required: boolean;
}

/** Canonical record fields and whether the master table must carry them. */
export const BOOK_COLUMNS: readonly BookColumn[] = [
  { field: PRIMARY_KEY_FIELD, required: true },
  { field: 'Title', required: true },
  { field: 'Author', required: false },
  { field: 'Publisher', required: false },
  { field: 'Description', required: false },
  { field: 'Subject', required: false },
  { field: 'SubjectSpecific', required: false },
  { field: 'Location', required: false },
  { field: 'ReadingStatus', required: false },
];

export interface SchemaReport {
  primaryKey: string;
  /** Optional canonical fields the table has no column for. */
  missingOptional: string[];
}

/** Check an introspected column list against BOOK_COLUMNS. */
export function validateSchema(columns: readonly string[]): SchemaReport {
  if (columns.length === 0) {
    throw new SchemaMismatchError(`Table ${MASTER_TABLE} has no columns or does not exist`, [
      ...BOOK_COLUMNS.map((column) => column.field),
    ]);
  }

  const missing = BOOK_COLUMNS.filter((column) => !findColumn(columns, column.field));
  const missingRequired = missing.filter((column) => column.required).map((column) => column.field);
  if (missingRequired.length > 0) {
    throw new SchemaMismatchError(
      `Table ${MASTER_TABLE} is missing required column(s): ${missingRequired.join(', ')}`,
      missingRequired
    );
  }

  return {
    primaryKey: findColumn(columns, PRIMARY_KEY_FIELD) ?? PRIMARY_KEY_FIELD,
    missingOptional: missing.map((column) => column.field),
  };
}

export interface ColumnMapping {
  values: Record<string, SqlValue>;
  dropped: string[];
}

/**
 * Map record fields onto the table's actual column names, matching
 * case-insensitively. Fields with no column are returned in `dropped`. The
 * primary-key column is never taken from the record.
 */
export function mapRecordToColumns(
  record: Record<string, unknown>,
  columns: readonly string[],
  primaryKey: string
): ColumnMapping {
  const values: Record<string, SqlValue> = {};
  const dropped: string[] = [];

  for (const [field, value] of Object.entries(record)) {
    const column = findColumn(columns, field);
    if (!column) {
      dropped.push(field);
      continue;
    }
    if (column === primaryKey) continue;
    values[column] = toSqlValue(value);
  }

  return { values, dropped };
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value.join('; ');
  }
  return JSON.stringify(value);
}
