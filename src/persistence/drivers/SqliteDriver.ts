import type Database from 'better-sqlite3';
import type { SqlDriver, SqlExecutor, SqlRow, SqlValue } from './SqlDriver.js';
import { quoteWith } from './SqlDriver.js';

export class SqliteDriver implements SqlDriver {
  readonly type = 'sqlite' as const;

  constructor(private readonly db: Database.Database) {}

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    return this.db.prepare(sql).all(...params) as SqlRow[];
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    return this.db.prepare(sql).run(...params).changes;
  }

  quoteIdentifier(name: string): string {
    return quoteWith(name, '"');
  }

  async listColumns(table: string): Promise<string[]> {
    const info = this.db.prepare(`PRAGMA table_info(${this.quoteIdentifier(table)})`).all() as Array<{
      name: string;
    }>;
    return info.map((column) => column.name);
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');
    try {
      const result = await work(this);
      this.db.exec('COMMIT');
      return result;
    } catch (error) {
      this.db.exec('ROLLBACK');
      throw error;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
