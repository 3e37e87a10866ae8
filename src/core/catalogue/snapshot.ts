export type CatalogueRow = Record<string, unknown>;

/** Point-in-time copy of the whole master table. */
export interface CatalogueSnapshot {
  readonly columns: readonly string[];
  readonly rows: readonly CatalogueRow[];
  readonly loadedAt: Date;
}

export function emptySnapshot(): CatalogueSnapshot {
  return { columns: [], rows: [], loadedAt: new Date() };
}

export function createSnapshot(rows: CatalogueRow[], columns?: string[]): CatalogueSnapshot {
  const first = rows[0];
  return {
    columns: columns ?? (first ? Object.keys(first) : []),
    rows,
    loadedAt: new Date(),
  };
}

export function findColumn(columns: readonly string[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return columns.find((column) => column.toLowerCase() === wanted);
}

/**
 * Unique non-null, non-blank values of a column in first-seen order.
 * The column name is matched case-insensitively; an unknown column yields [].
 */
export function distinctValues(snapshot: CatalogueSnapshot, column: string): string[] {
  const actual = findColumn(snapshot.columns, column);
  if (!actual) {
    return [];
  }

  const seen = new Set<string>();
  for (const row of snapshot.rows) {
    const value = row[actual];
    if (value === null || value === undefined) continue;
    const text = String(value);
    if (text.trim() === '') continue;
    seen.add(text);
  }
  return [...seen];
}

export function toNumericId(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * `max(existing ids) + 1`, or 1 for an empty snapshot. Rows without any usable
 * id fall back to `rowCount + 1`. Nothing guards against a second writer
 * computing the same key.
 */
export function nextPrimaryKey(snapshot: CatalogueSnapshot, primaryKey: string): number {
  if (snapshot.rows.length === 0) {
    return 1;
  }

  const actual = findColumn(snapshot.columns, primaryKey);
  const ids = actual
    ? snapshot.rows
        .map((row) => toNumericId(row[actual]))
        .filter((id): id is number => id !== undefined)
    : [];

  if (ids.length === 0) {
    return snapshot.rows.length + 1;
  }
  return ids.reduce((max, id) => (id > max ? id : max), ids[0] ?? 0) + 1;
}
