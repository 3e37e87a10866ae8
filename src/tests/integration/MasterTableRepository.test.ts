import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteDriver } from '../../persistence/drivers/SqliteDriver.js';
import { MasterTableRepository } from '../../persistence/repositories/MasterTableRepository.js';
import type { SqlRow, SqlValue } from '../../persistence/drivers/SqlDriver.js';
import { SchemaMismatchError } from '../../utils/errors.js';

/** Fails the next full-table read once, after `failNextTableRead` is set. */
class FlakySqliteDriver extends SqliteDriver {
  failNextTableRead = false;

  override async query(sql: string, params?: SqlValue[]): Promise<SqlRow[]> {
    if (this.failNextTableRead && sql.startsWith('SELECT *')) {
      this.failNextTableRead = false;
      throw new Error('connection lost');
    }
    return super.query(sql, params);
  }
}

const CREATE_MASTER_TABLE = `
  CREATE TABLE master_table (
    id INTEGER PRIMARY KEY,
    Title TEXT,
    Author TEXT,
    Publisher TEXT,
    Description TEXT,
    Subject TEXT,
    SubjectSpecific TEXT,
    Location TEXT,
    ReadingStatus TEXT
  )
`;

describe('MasterTableRepository', () => {
  let db: Database.Database;
  let repository: MasterTableRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    repository = new MasterTableRepository(new SqliteDriver(db));
  });

  afterEach(() => {
    db.close();
  });

  function seed(rows: Array<[number, string, string | null, string | null]>): void {
    db.exec(CREATE_MASTER_TABLE);
    const insert = db.prepare('INSERT INTO master_table (id, Title, Subject, ReadingStatus) VALUES (?, ?, ?, ?)');
    for (const row of rows) {
      insert.run(...row);
    }
  }

  function statuses(): Array<{ id: number; ReadingStatus: string | null }> {
    return db.prepare('SELECT id, ReadingStatus FROM master_table ORDER BY id').all() as Array<{
      id: number;
      ReadingStatus: string | null;
    }>;
  }

  describe('initialize', () => {
    it('loads the whole table into a snapshot', async () => {
      seed([
        [1, 'Dune', 'Fiction', 'Complete'],
        [2, 'SPQR', 'History', 'Not Started'],
      ]);

      const snapshot = await repository.initialize();

      expect(snapshot.rows).toHaveLength(2);
      expect(snapshot.columns).toContain('SubjectSpecific');
      expect(repository.distinctValues('subject')).toEqual(['Fiction', 'History']);
    });

    it('fails fast when the table lacks a required column', async () => {
      db.exec('CREATE TABLE master_table (id INTEGER PRIMARY KEY, Author TEXT)');

      const failure = repository.initialize();

      await expect(failure).rejects.toBeInstanceOf(SchemaMismatchError);
      await expect(failure).rejects.toThrow('Table master_table is missing required column(s): Title');
    });

    it('fails fast when the table does not exist', async () => {
      await expect(repository.initialize()).rejects.toThrow('Table master_table has no columns or does not exist');
    });
  });

  describe('load', () => {
    it('yields an empty snapshot when the table cannot be read', async () => {
      const snapshot = await repository.load();

      expect(snapshot.rows).toEqual([]);
      expect(snapshot.columns).toEqual([]);
      expect(repository.distinctValues('Subject')).toEqual([]);
    });
  });

  describe('insert', () => {
    it('uses id 1 for an empty table', async () => {
      seed([]);
      await repository.initialize();

      const outcome = await repository.insert({ Title: 'Dune', ReadingStatus: 'Complete' });

      expect(outcome).toEqual({ status: 'inserted', id: 1, row: { id: 1, Title: 'Dune', ReadingStatus: 'Complete' } });
    });

    it('assigns max id + 1 even with gaps', async () => {
      seed([
        [1, 'Dune', null, null],
        [2, 'SPQR', null, null],
        [5, 'Emma', null, null],
      ]);
      await repository.initialize();

      const outcome = await repository.insert({ Title: 'Middlemarch' });

      expect(outcome.status === 'inserted' && outcome.id).toBe(6);
    });

    it('persists the record and refreshes the snapshot', async () => {
      seed([[1, 'SPQR', 'History', 'Complete']]);
      await repository.initialize();

      await repository.insert({
        Title: 'Dune',
        Author: 'Frank Herbert',
        Publisher: null,
        Description: 'A desert planet epic.',
        Subject: 'Fiction',
        SubjectSpecific: 'Science Fiction',
        Location: 'Home Office',
        ReadingStatus: 'Partially Complete',
      });

      expect(db.prepare('SELECT * FROM master_table WHERE id = 2').get()).toEqual({
        id: 2,
        Title: 'Dune',
        Author: 'Frank Herbert',
        Publisher: null,
        Description: 'A desert planet epic.',
        Subject: 'Fiction',
        SubjectSpecific: 'Science Fiction',
        Location: 'Home Office',
        ReadingStatus: 'Partially Complete',
      });
      expect(repository.current.rows).toHaveLength(2);
      expect(repository.distinctValues('Subject')).toEqual(['History', 'Fiction']);
    });

    it('drops fields the table has no column for and ignores a record id', async () => {
      seed([[3, 'SPQR', null, null]]);
      await repository.initialize();

      const outcome = await repository.insert({ id: 99, Title: 'Dune', Edition: 'First', title_page: ['a', 'b'] });

      expect(outcome).toEqual({ status: 'inserted', id: 4, row: { id: 4, Title: 'Dune' } });
    });

    it('matches record fields to columns case-insensitively', async () => {
      db.exec('CREATE TABLE master_table (ID INTEGER PRIMARY KEY, title TEXT, readingstatus TEXT)');
      await repository.initialize();

      const outcome = await repository.insert({ Title: 'Dune', ReadingStatus: 'Not Started' });

      expect(outcome).toEqual({
        status: 'inserted',
        id: 1,
        row: { ID: 1, title: 'Dune', readingstatus: 'Not Started' },
      });
    });

    it('keeps assigning keys from the written row when the reload fails', async () => {
      const driver = new FlakySqliteDriver(db);
      repository = new MasterTableRepository(driver);
      seed([
        [1, 'Dune', null, null],
        [2, 'SPQR', null, null],
      ]);
      await repository.initialize();

      driver.failNextTableRead = true;
      const first = await repository.insert({ Title: 'Emma' });

      expect(first).toEqual({ status: 'inserted', id: 3, row: { id: 3, Title: 'Emma' } });
      expect(repository.current.rows).toHaveLength(3);

      const second = await repository.insert({ Title: 'Middlemarch' });

      expect(second.status === 'inserted' && second.id).toBe(4);
      expect(db.prepare('SELECT id FROM master_table ORDER BY id').all()).toEqual([
        { id: 1 },
        { id: 2 },
        { id: 3 },
        { id: 4 },
      ]);
    });

    it('keeps the previous snapshot when the reload after a repair fails', async () => {
      const driver = new FlakySqliteDriver(db);
      repository = new MasterTableRepository(driver);
      seed([[7, 'Dune', null, 'Complete\r']]);
      await repository.initialize();

      driver.failNextTableRead = true;
      expect(await repository.repairStatusColumn()).toEqual({ status: 'repaired', cleaned: 1 });

      const outcome = await repository.insert({ Title: 'Emma' });
      expect(outcome.status === 'inserted' && outcome.id).toBe(8);
    });

    it('reports a failed insert without throwing', async () => {
      seed([]);
      await repository.initialize();
      db.exec('DROP TABLE master_table');

      const outcome = await repository.insert({ Title: 'Dune' });

      expect(outcome.status).toBe('failed');
      expect(outcome.status === 'failed' && outcome.error.message).toMatch(/^Failed to add book to database: /);
    });
  });

  describe('repairStatusColumn', () => {
    it('strips trailing carriage returns and is idempotent', async () => {
      seed([
        [1, 'Dune', null, 'Complete\r'],
        [2, 'SPQR', null, 'Not Started\r\r'],
        [3, 'Emma', null, 'Partially Complete'],
        [4, 'Middlemarch', null, null],
      ]);
      await repository.initialize();

      expect(await repository.repairStatusColumn()).toEqual({ status: 'repaired', cleaned: 2 });
      expect(statuses()).toEqual([
        { id: 1, ReadingStatus: 'Complete' },
        { id: 2, ReadingStatus: 'Not Started' },
        { id: 3, ReadingStatus: 'Partially Complete' },
        { id: 4, ReadingStatus: null },
      ]);

      expect(await repository.repairStatusColumn()).toEqual({ status: 'repaired', cleaned: 0 });
      expect(repository.distinctValues('ReadingStatus')).toEqual(['Complete', 'Not Started', 'Partially Complete']);
    });

    it('fails when there is no ReadingStatus column', async () => {
      db.exec('CREATE TABLE master_table (id INTEGER PRIMARY KEY, Title TEXT)');
      await repository.initialize();

      const outcome = await repository.repairStatusColumn();

      expect(outcome.status === 'failed' && outcome.error.message).toBe(
        'Failed to clean ReadingStatus column: Table master_table has no ReadingStatus column'
      );
    });
  });
});
