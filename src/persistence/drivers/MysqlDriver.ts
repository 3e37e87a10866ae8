import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import type { SqlDriver, SqlExecutor, SqlRow, SqlValue } from './SqlDriver.js';
import { quoteWith } from './SqlDriver.js';

function connectionExecutor(connection: PoolConnection): SqlExecutor {
  return {
    async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
      const [rows] = await connection.query<RowDataPacket[]>(sql, params);
      return rows;
    },
    async execute(sql: string, params: SqlValue[] = []): Promise<number> {
      const [result] = await connection.query<ResultSetHeader>(sql, params);
      return result.affectedRows;
    },
  };
}

export class MysqlDriver implements SqlDriver {
  readonly type = 'mysql' as const;

  constructor(private readonly pool: Pool) {}

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    const [rows] = await this.pool.query<RowDataPacket[]>(sql, params);
    return rows;
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const [result] = await this.pool.query<ResultSetHeader>(sql, params);
    return result.affectedRows;
  }

  quoteIdentifier(name: string): string {
    return quoteWith(name, '`');
  }

  async listColumns(table: string): Promise<string[]> {
    const rows = await this.query(
      `SELECT COLUMN_NAME AS column_name FROM information_schema.COLUMNS
       WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ?
       ORDER BY ORDINAL_POSITION`,
      [table]
    );
    return rows.map((row) => String(row.column_name));
  }

  async transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const connection = await this.pool.getConnection();
    try {
      await connection.beginTransaction();
      const result = await work(connectionExecutor(connection));
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
