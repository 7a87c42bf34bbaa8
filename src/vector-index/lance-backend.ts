/**
 * LanceDB Vector Backend
 * Persistent vector storage with one LanceDB table per collection.
 */

import { connect, type Connection, type Table } from '@lancedb/lancedb';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { MetadataSchema } from '../documents/document.js';
import type { Metadata } from '../documents/types.js';
import { LINEAGE_KEYS } from '../documents/types.js';
import { ConfigurationError, RetrievalError, StorageError, getErrorMessage } from '../errors.js';
import { matchesFilter } from './filter.js';
import { computeDistance } from './metrics.js';
import type { DistanceMetric, MetadataFilter, VectorBackend, VectorMatch, VectorRow } from './types.js';

/**
 * Column layout. Metadata is kept as a JSON string because tables have a
 * fixed schema and metadata maps are open; the parent document id is
 * duplicated into its own column so filters on it can be pushed down.
 */
type LanceRow = {
  id: string;
  text: string;
  vector: number[];
  parent_document_id: string;
  metadata: string;
};

const PARENT_COLUMN = LINEAGE_KEYS.parentDocumentId;

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function toNumberArray(value: unknown): number[] {
  if (!isIterable(value)) {
    return [];
  }
  return Array.from(value, (item) => Number(item));
}

function parseMetadata(raw: unknown): Metadata {
  if (typeof raw !== 'string') {
    return {};
  }
  const parsed = MetadataSchema.safeParse(JSON.parse(raw));
  return parsed.success ? parsed.data : {};
}

const RowShape = z.object({
  id: z.string(),
  text: z.string(),
});

/**
 * Convert a row returned by LanceDB (Arrow-backed) into a VectorRow.
 */
function fromLanceRow(row: Record<string, unknown>): VectorRow {
  const { id, text } = RowShape.parse({ id: row.id, text: row.text });
  return {
    id,
    text,
    vector: toNumberArray(row.vector),
    metadata: parseMetadata(row.metadata),
  };
}

function toLanceRow(row: VectorRow): LanceRow {
  const parent = row.metadata[PARENT_COLUMN];
  return {
    id: row.id,
    text: row.text,
    vector: row.vector,
    parent_document_id: typeof parent === 'string' ? parent : '',
    metadata: JSON.stringify(row.metadata),
  };
}

/**
 * SQL predicate for the part of a filter that maps onto the parent id
 * column, or null when nothing can be pushed down. The complete filter is
 * still evaluated on every candidate.
 */
export function buildPushdown(filter: MetadataFilter | undefined): string | null {
  const condition = filter?.[PARENT_COLUMN];
  if (typeof condition === 'string') {
    return `${PARENT_COLUMN} = ${quote(condition)}`;
  }
  if (condition && typeof condition === 'object' && !Array.isArray(condition)) {
    if (typeof condition.$eq === 'string') {
      return `${PARENT_COLUMN} = ${quote(condition.$eq)}`;
    }
    const values = condition.$in;
    if (Array.isArray(values) && values.length > 0 && values.every((v) => typeof v === 'string')) {
      return `${PARENT_COLUMN} IN (${values.map((v) => quote(String(v))).join(', ')})`;
    }
  }
  return null;
}

/**
 * LanceDB backend. Unfiltered queries use the table's vector search;
 * filtered queries narrow candidates with a pushed-down predicate and rank
 * the rows that satisfy the full filter exactly, so filtering always
 * happens before ranking.
 */
export class LanceVectorBackend implements VectorBackend {
  readonly metric: DistanceMetric;
  private dbPath: string;
  private connection: Connection | null = null;
  private tables: Map<string, Table> = new Map();

  constructor(dbPath: string, metric: DistanceMetric = 'cosine') {
    this.dbPath = dbPath;
    this.metric = metric;
  }

  /**
   * Initialize the LanceDB connection.
   */
  async init(): Promise<void> {
    try {
      await mkdir(dirname(this.dbPath), { recursive: true });
      this.connection = await connect(this.dbPath);
    } catch (error) {
      throw new ConfigurationError(`Failed to open LanceDB at ${this.dbPath}`, error);
    }
    console.log(`[LanceBackend] Connected to ${this.dbPath} (metric: ${this.metric})`);
  }

  private requireConnection(): Connection {
    if (!this.connection) {
      throw new StorageError('LanceVectorBackend not initialized. Call init() first.');
    }
    return this.connection;
  }

  private async openTable(collection: string): Promise<Table | null> {
    const cached = this.tables.get(collection);
    if (cached) {
      return cached;
    }

    const connection = this.requireConnection();
    const tableNames = await connection.tableNames();
    if (!tableNames.includes(collection)) {
      return null;
    }

    const table = await connection.openTable(collection);
    this.tables.set(collection, table);
    return table;
  }

  async upsert(collection: string, rows: VectorRow[]): Promise<void> {
    if (rows.length === 0) return;

    const data = rows.map(toLanceRow);
    try {
      const table = await this.openTable(collection);
      if (!table) {
        // Table will be created with the first batch of data
        const created = await this.requireConnection().createTable(collection, data);
        this.tables.set(collection, created);
        return;
      }

      await table.mergeInsert('id').whenMatchedUpdateAll().whenNotMatchedInsertAll().execute(data);
    } catch (error) {
      throw new StorageError(`Failed to upsert ${rows.length} rows into '${collection}': ${getErrorMessage(error)}`, error);
    }
  }

  async query(
    collection: string,
    vector: number[],
    topK: number,
    filter?: MetadataFilter
  ): Promise<VectorMatch[]> {
    try {
      const table = await this.openTable(collection);
      if (!table) {
        return [];
      }

      if (!filter || Object.keys(filter).length === 0) {
        const rows: Record<string, unknown>[] = await table
          .vectorSearch(vector)
          .distanceType(this.metric)
          .limit(topK)
          .toArray();

        return rows.map((row) => ({
          ...fromLanceRow(row),
          distance: typeof row._distance === 'number' ? row._distance : Number(row._distance),
        }));
      }

      const candidates = await this.scan(table, filter);
      const matches: VectorMatch[] = [];
      for (const row of candidates) {
        if (row.vector.length !== vector.length) {
          throw new RetrievalError(
            `Query vector has ${vector.length} dimensions, collection '${collection}' uses ${row.vector.length}`
          );
        }
        matches.push({ ...row, distance: computeDistance(this.metric, vector, row.vector) });
      }

      matches.sort((a, b) => a.distance - b.distance);
      return matches.slice(0, topK);
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      throw new RetrievalError(`Vector search on '${collection}' failed: ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Rows satisfying a filter. Plain queries return only a default page of
   * rows, so the scan is sized to every candidate the pushdown admits.
   */
  private async scan(table: Table, filter: MetadataFilter): Promise<VectorRow[]> {
    const pushdown = buildPushdown(filter);
    const candidates = await table.countRows(pushdown ?? undefined);
    if (candidates === 0) {
      return [];
    }

    let query = table.query().limit(candidates);
    if (pushdown) {
      query = query.where(pushdown);
    }

    const rows: Record<string, unknown>[] = await query.toArray();
    return rows.map(fromLanceRow).filter((row) => matchesFilter(row.metadata, filter));
  }

  async get(collection: string, ids: string[]): Promise<VectorRow[]> {
    if (ids.length === 0) return [];

    try {
      const table = await this.openTable(collection);
      if (!table) {
        return [];
      }
      const unique = Array.from(new Set(ids));
      const rows: Record<string, unknown>[] = await table
        .query()
        .where(`id IN (${unique.map(quote).join(', ')})`)
        .limit(unique.length)
        .toArray();
      return rows.map(fromLanceRow);
    } catch (error) {
      throw new RetrievalError(`Failed to read rows from '${collection}': ${getErrorMessage(error)}`, error);
    }
  }

  async delete(collection: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;

    try {
      const table = await this.openTable(collection);
      if (!table) {
        return 0;
      }

      const predicate = `id IN (${Array.from(new Set(ids), quote).join(', ')})`;
      const matching = await table.countRows(predicate);
      if (matching > 0) {
        await table.delete(predicate);
      }
      return matching;
    } catch (error) {
      throw new StorageError(`Failed to delete rows from '${collection}': ${getErrorMessage(error)}`, error);
    }
  }

  async deleteWhere(collection: string, filter: MetadataFilter): Promise<number> {
    let ids: string[];
    try {
      const table = await this.openTable(collection);
      if (!table) {
        return 0;
      }
      ids = (await this.scan(table, filter)).map((row) => row.id);
    } catch (error) {
      throw new RetrievalError(`Failed to select rows in '${collection}': ${getErrorMessage(error)}`, error);
    }
    return this.delete(collection, ids);
  }

  async count(collection: string): Promise<number> {
    try {
      const table = await this.openTable(collection);
      return table ? await table.countRows() : 0;
    } catch (error) {
      throw new RetrievalError(`Failed to count rows in '${collection}': ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Close the database connection.
   */
  async close(): Promise<void> {
    for (const table of this.tables.values()) {
      table.close();
    }
    this.tables.clear();
    this.connection?.close();
    this.connection = null;
  }
}

/**
 * Create and initialize a LanceDB backend.
 */
export async function createLanceBackend(
  dbPath: string,
  metric: DistanceMetric = 'cosine'
): Promise<LanceVectorBackend> {
  const backend = new LanceVectorBackend(dbPath, metric);
  await backend.init();
  return backend;
}
