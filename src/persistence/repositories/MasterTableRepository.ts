import type { CataloguePort, InsertOutcome, RepairOutcome } from '../../ports/CataloguePort.js';
import type { SqlDriver, SqlValue } from '../drivers/SqlDriver.js';
import type { CatalogueSnapshot } from '../../core/catalogue/snapshot.js';
import {
  createSnapshot,
  distinctValues,
  emptySnapshot,
  findColumn,
  nextPrimaryKey,
} from '../../core/catalogue/snapshot.js';
import {
  MASTER_TABLE,
  mapRecordToColumns,
  validateSchema,
  type SchemaReport,
} from '../../core/catalogue/columnMapping.js';
import { createLogger } from '../../utils/logger.js';
import { PersistenceError, SchemaMismatchError } from '../../utils/errors.js';

const STATUS_FIELD = 'ReadingStatus';
const TRAILING_CARRIAGE_RETURNS = /\r+$/;

interface TableSchema {
  columns: string[];
  report: SchemaReport;
}

export class MasterTableRepository implements CataloguePort {
  private readonly logger = createLogger({ repository: 'MasterTableRepository' });
  private snapshot: CatalogueSnapshot = emptySnapshot();
  private schema: TableSchema | null = null;

  /**
   * @param target - connection description used in error logs
   */
  constructor(
    private readonly driver: SqlDriver,
    private readonly target: string = driver.type
  ) {}

  /**
   * Introspect and validate the schema, then load the snapshot. A required
   * column missing from a reachable table throws SchemaMismatchError; an
   * unreachable store only defers introspection to the first insert.
   */
  async initialize(): Promise<CatalogueSnapshot> {
    try {
      await this.ensureSchema();
    } catch (error) {
      if (error instanceof SchemaMismatchError) {
        throw error;
      }
      this.logger.warn({ error, target: this.target }, 'Schema introspection failed; retrying on first insert');
    }
    return this.load();
  }

  get current(): CatalogueSnapshot {
    return this.snapshot;
  }

  async load(): Promise<CatalogueSnapshot> {
    try {
      this.snapshot = await this.readTable();
    } catch (error) {
      this.logger.error({ error, target: this.target }, 'Failed to load master table; using empty catalogue');
      this.snapshot = emptySnapshot();
    }
    return this.snapshot;
  }

  distinctValues(column: string): string[] {
    return distinctValues(this.snapshot, column);
  }

  async insert(record: Record<string, unknown>): Promise<InsertOutcome> {
    const logger = this.logger.child({ method: 'insert' });
    try {
      const { columns, report } = await this.ensureSchema();
      const id = nextPrimaryKey(this.snapshot, report.primaryKey);
      const { values, dropped } = mapRecordToColumns(record, columns, report.primaryKey);
      if (dropped.length > 0) {
        logger.warn({ dropped }, 'Record fields with no matching column were dropped');
      }

      const row: Record<string, SqlValue> = { [report.primaryKey]: id, ...values };
      const names = Object.keys(row);
      const sql = `INSERT INTO ${this.driver.quoteIdentifier(MASTER_TABLE)} (${names
        .map((name) => this.driver.quoteIdentifier(name))
        .join(', ')}) VALUES (${names.map(() => '?').join(', ')})`;
      await this.driver.execute(
        sql,
        names.map((name) => row[name] ?? null)
      );

      await this.refreshAfterWrite(row);
      logger.info({ id, title: record.Title ?? 'Unknown' }, 'Added book to master table');
      return { status: 'inserted', id, row };
    } catch (error) {
      logger.error({ error, target: this.target }, 'Failed to add book to master table');
      return { status: 'failed', error: toPersistenceError('Failed to add book to database', error) };
    }
  }

  async repairStatusColumn(): Promise<RepairOutcome> {
    const logger = this.logger.child({ method: 'repairStatusColumn' });
    try {
      const { columns, report } = await this.ensureSchema();
      const statusColumn = findColumn(columns, STATUS_FIELD);
      if (!statusColumn) {
        throw new SchemaMismatchError(`Table ${MASTER_TABLE} has no ${STATUS_FIELD} column`, [STATUS_FIELD]);
      }

      const table = this.driver.quoteIdentifier(MASTER_TABLE);
      const pk = this.driver.quoteIdentifier(report.primaryKey);
      const status = this.driver.quoteIdentifier(statusColumn);
      const rows = await this.driver.query(`SELECT ${pk} AS pk, ${status} AS status FROM ${table}`);

      const updates: Array<{ pk: SqlValue; status: string }> = [];
      for (const row of rows) {
        if (typeof row.status !== 'string' || !TRAILING_CARRIAGE_RETURNS.test(row.status)) continue;
        if (row.pk === null || row.pk === undefined) {
          logger.warn({ status: row.status }, 'Skipping row without a primary key');
          continue;
        }
        const key = typeof row.pk === 'number' || typeof row.pk === 'bigint' ? row.pk : String(row.pk);
        updates.push({ pk: key, status: row.status.replace(TRAILING_CARRIAGE_RETURNS, '') });
      }

      if (updates.length === 0) {
        logger.info('No ReadingStatus values end in a carriage return');
        return { status: 'repaired', cleaned: 0 };
      }

      logger.info({ count: updates.length }, 'Cleaning ReadingStatus values');
      await this.driver.transaction(async (tx) => {
        for (const update of updates) {
          await tx.execute(`UPDATE ${table} SET ${status} = ? WHERE ${pk} = ?`, [update.status, update.pk]);
        }
      });

      await this.refreshAfterWrite();
      return { status: 'repaired', cleaned: updates.length };
    } catch (error) {
      logger.error({ error, target: this.target }, 'Failed to repair ReadingStatus column');
      return { status: 'failed', error: toPersistenceError('Failed to clean ReadingStatus column', error) };
    }
  }

  private async readTable(): Promise<CatalogueSnapshot> {
    const rows = await this.driver.query(`SELECT * FROM ${this.driver.quoteIdentifier(MASTER_TABLE)}`);
    const snapshot = createSnapshot(rows, this.schema?.columns);
    this.logger.info({ rows: snapshot.rows.length, columns: snapshot.columns.length }, 'Loaded master table');
    return snapshot;
  }

  /**
   * Reload after a committed write. The write already happened, so a failed
   * reload keeps the previous snapshot plus the written row; falling back to
   * an empty snapshot would restart key assignment at 1.
   */
  private async refreshAfterWrite(written?: Record<string, SqlValue>): Promise<void> {
    try {
      this.snapshot = await this.readTable();
    } catch (error) {
      this.logger.warn({ error, target: this.target }, 'Reload after write failed; patching snapshot in memory');
      const rows = written ? [...this.snapshot.rows, written] : [...this.snapshot.rows];
      const columns = this.schema?.columns ?? [...this.snapshot.columns];
      this.snapshot = createSnapshot(rows, columns);
    }
  }

  private async ensureSchema(): Promise<TableSchema> {
    if (this.schema) {
      return this.schema;
    }
    const columns = await this.driver.listColumns(MASTER_TABLE);
    const report = validateSchema(columns);
    if (report.missingOptional.length > 0) {
      this.logger.warn({ missing: report.missingOptional }, 'Master table lacks optional book columns');
    }
    this.schema = { columns, report };
    return this.schema;
  }
}

function toPersistenceError(message: string, error: unknown): PersistenceError {
  if (error instanceof PersistenceError) {
    return error;
  }
  const detail = error instanceof Error ? `: ${error.message}` : '';
  return new PersistenceError(`${message}${detail}`, { cause: error });
}
