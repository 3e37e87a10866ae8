import type pg from 'pg';
import type { SqlDriver, SqlExecutor, SqlRow, SqlValue } from './SqlDriver.js';
import { quoteWith } from './SqlDriver.js';

/** `?` → `$1, $2, …` */
export function toPositionalParams(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

function clientExecutor(client: pg.PoolClient): SqlExecutor {
  return {
    async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
      const result = await client.query<SqlRow>(toPositionalParams(sql), params);
      return result.rows;
    },
    async execute(sql: string, params: SqlValue[] = []): Promise<number> {
      const result = await client.query(toPositionalParams(sql), params);
      return result.rowCount ?? 0;
    },
  };
}

export class PostgresDriver implements SqlDriver {
  readonly type = 'postgresql' as const;

  constructor(private readonly pool: pg.Pool) {}

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    const result = await this.pool.query<SqlRow>(toPositionalParams(sql), params);
    return result.rows;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const result = await this.pool.query(toPositionalParams(sql), params);
    return result.rowCount ?? 0;
  }

  quoteIdentifier(name: string): string {
    return quoteWith(name, '"');
  }

  async listColumns(table: string): Promise<string[]> {
    const rows = await this.query(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = ?
       ORDER BY ordinal_position`,
      [table]
    );
    return rows.map((row) => String(row.column_name));
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(clientExecutor(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
