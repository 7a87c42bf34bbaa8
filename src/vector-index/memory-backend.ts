import { RetrievalError, StorageError } from '../errors.js';
import { matchesFilter } from './filter.js';
import { computeDistance } from './metrics.js';
import type { DistanceMetric, MetadataFilter, VectorBackend, VectorMatch, VectorRow } from './types.js';

function cloneRow(row: VectorRow): VectorRow {
  return {
    id: row.id,
    vector: [...row.vector],
    text: row.text,
    metadata: { ...row.metadata },
  };
}

/**
 * In-Memory Vector Backend - exact search over rows held in process.
 *
 * Rows keep their first insertion position when replaced, so ties in
 * distance are ordered by first insertion. Nothing is persisted.
 */
export class InMemoryVectorBackend implements VectorBackend {
  readonly metric: DistanceMetric;
  private collections: Map<string, Map<string, VectorRow>> = new Map();
  private dimensions: Map<string, number> = new Map();

  constructor(metric: DistanceMetric = 'cosine') {
    this.metric = metric;
  }

  async upsert(collection: string, rows: VectorRow[]): Promise<void> {
    if (rows.length === 0) return;

    // Validate the whole call before touching the collection
    const expected = this.dimensions.get(collection) ?? rows[0].vector.length;
    for (const row of rows) {
      if (row.vector.length !== expected) {
        throw new StorageError(
          `Vector for '${row.id}' has ${row.vector.length} dimensions, collection '${collection}' uses ${expected}`
        );
      }
    }

    let table = this.collections.get(collection);
    if (!table) {
      table = new Map();
      this.collections.set(collection, table);
      this.dimensions.set(collection, expected);
    }

    for (const row of rows) {
      table.set(row.id, cloneRow(row));
    }
  }

  async query(
    collection: string,
    vector: number[],
    topK: number,
    filter?: MetadataFilter
  ): Promise<VectorMatch[]> {
    const table = this.collections.get(collection);
    if (!table) {
      return [];
    }

    const expected = this.dimensions.get(collection);
    if (expected !== undefined && vector.length !== expected) {
      throw new RetrievalError(
        `Query vector has ${vector.length} dimensions, collection '${collection}' uses ${expected}`
      );
    }

    const results: VectorMatch[] = [];
    for (const row of table.values()) {
      if (!matchesFilter(row.metadata, filter)) {
        continue;
      }
      results.push({ ...cloneRow(row), distance: computeDistance(this.metric, vector, row.vector) });
    }

    // Array.prototype.sort is stable, so equal distances keep insertion order
    results.sort((a, b) => a.distance - b.distance);
    return results.slice(0, topK);
  }

  async get(collection: string, ids: string[]): Promise<VectorRow[]> {
    const table = this.collections.get(collection);
    if (!table) {
      return [];
    }

    const rows: VectorRow[] = [];
    for (const id of ids) {
      const row = table.get(id);
      if (row) {
        rows.push(cloneRow(row));
      }
    }
    return rows;
  }

  async delete(collection: string, ids: string[]): Promise<number> {
    const table = this.collections.get(collection);
    if (!table) {
      return 0;
    }

    let removed = 0;
    for (const id of new Set(ids)) {
      if (table.delete(id)) {
        removed++;
      }
    }
    return removed;
  }

  async deleteWhere(collection: string, filter: MetadataFilter): Promise<number> {
    const table = this.collections.get(collection);
    if (!table) {
      return 0;
    }

    const ids = Array.from(table.values())
      .filter((row) => matchesFilter(row.metadata, filter))
      .map((row) => row.id);
    return this.delete(collection, ids);
  }

  async count(collection: string): Promise<number> {
    return this.collections.get(collection)?.size ?? 0;
  }

  async close(): Promise<void> {
    this.collections.clear();
    this.dimensions.clear();
  }
}
