import type { DatabaseType } from '../../config/index.js';

export type SqlValue = string | number | bigint | null;
export type SqlRow = Record<string, unknown>;

/**
 * Statements use `?` placeholders for every backend; drivers translate them
 * where their client expects another style.
 */
export interface SqlExecutor {
  query(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;
  /** Resolves to the number of affected rows. */
  execute(sql: string, params?: SqlValue[]): Promise<number>;
}

export interface SqlDriver extends SqlExecutor {
  readonly type: DatabaseType;
  quoteIdentifier(name: string): string;
  /** Column names of a table in declaration order; [] when the table does not exist. */
  listColumns(table: string): Promise<string[]>;
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function quoteWith(name: string, quote: '"' | '`'): string {
  return `${quote}${name.split(quote).join(quote + quote)}${quote}`;
}
