import type { PersistenceError } from '../utils/errors.js';
import type { CatalogueSnapshot } from '../core/catalogue/snapshot.js';
import type { SqlValue } from '../persistence/drivers/SqlDriver.js';

export type InsertOutcome =
  | { status: 'inserted'; id: number; row: Record<string, SqlValue> }
  | { status: 'failed'; error: PersistenceError };

export type RepairOutcome =
  | { status: 'repaired'; cleaned: number }
  | { status: 'failed'; error: PersistenceError };

export interface CataloguePort {
  load(): Promise<CatalogueSnapshot>;
  distinctValues(column: string): string[];
  insert(record: Record<string, unknown>): Promise<InsertOutcome>;
  repairStatusColumn(): Promise<RepairOutcome>;
}
