import Database from 'better-sqlite3';
import pg from 'pg';
import mysql from 'mysql2/promise';
import type { Config, DatabaseType } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import type { SqlDriver } from './drivers/SqlDriver.js';
import { SqliteDriver } from './drivers/SqliteDriver.js';
import { PostgresDriver } from './drivers/PostgresDriver.js';
import { MysqlDriver } from './drivers/MysqlDriver.js';

const logger = createLogger({ component: 'database' });

const DEFAULT_PORTS: Record<Exclude<DatabaseType, 'sqlite'>, number> = {
  mysql: 3306,
  postgresql: 5432,
};

type DatabaseSettings = Pick<
  Config,
  'dbType' | 'dbHost' | 'dbPort' | 'dbUser' | 'dbPassword' | 'dbName' | 'dbPath'
>;

/** Connection string for the configured backend; for SQLite, the database file path. */
export function buildConnectionString(settings: DatabaseSettings): string {
  switch (settings.dbType) {
    case 'mysql':
    case 'postgresql': {
      const port = settings.dbPort ?? DEFAULT_PORTS[settings.dbType];
      const user = encodeURIComponent(settings.dbUser);
      const password = encodeURIComponent(settings.dbPassword);
      const database = encodeURIComponent(settings.dbName);
      return `${settings.dbType}://${user}:${password}@${settings.dbHost}:${port}/${database}`;
    }
    case 'sqlite':
      return settings.dbPath ?? `${settings.dbName}.db`;
  }
}

/** Connection target for log lines; never includes the password. */
export function describeConnection(settings: DatabaseSettings): string {
  if (settings.dbType === 'sqlite') {
    return `sqlite://${buildConnectionString(settings)}`;
  }
  const port = settings.dbPort ?? DEFAULT_PORTS[settings.dbType];
  return `${settings.dbType}://${settings.dbUser}@${settings.dbHost}:${port}/${settings.dbName}`;
}

export function createSqlDriver(settings: DatabaseSettings): SqlDriver {
  const connectionString = buildConnectionString(settings);
  logger.info({ target: describeConnection(settings) }, 'Opening database connection');

  switch (settings.dbType) {
    case 'sqlite': {
      const db = new Database(connectionString);
      db.pragma('journal_mode = WAL');
      return new SqliteDriver(db);
    }
    case 'postgresql': {
      const pool = new pg.Pool({ connectionString, connectionTimeoutMillis: 5000 });
      pool.on('error', (error) => {
        logger.error({ error }, 'Unexpected database pool error');
      });
      return new PostgresDriver(pool);
    }
    case 'mysql':
      return new MysqlDriver(mysql.createPool({ uri: connectionString, connectTimeout: 5000 }));
  }
}
