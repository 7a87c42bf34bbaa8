/**
 * Vector Index Manager
 * Embeds, validates and upserts records into one collection of a vector
 * backend, and answers filtered similarity searches against it.
 */

import { MetadataSchema } from '../documents/document.js';
import type { EmbeddingRecord, Metadata } from '../documents/types.js';
import {
  ConfigurationError,
  OperationTimeoutError,
  RetrievalError,
  StorageError,
  getErrorMessage,
} from '../errors.js';
import { withTimeout } from '../utils/timeout.js';
import { assertValidFilter } from './filter.js';
import type {
  DistanceMetric,
  EmbeddingProvider,
  FailedRecord,
  MetadataFilter,
  SearchHit,
  SkippedRecord,
  UpsertReport,
  VectorBackend,
  VectorMatch,
  VectorRow,
} from './types.js';

const COLLECTION_NAME = /^[A-Za-z0-9_-]+$/;

export interface VectorIndexOptions {
  /** Collection (table) name, letters, digits, '_' and '-' */
  collection?: string;
  /** Records embedded and committed per backend call */
  batchSize?: number;
  /** Bound on each embedding and backend call; 0 disables */
  timeoutMs?: number;
}

export interface UpsertOptions {
  /** Checked between batches; committed batches stay committed */
  signal?: AbortSignal;
}

export const DEFAULT_VECTOR_INDEX_OPTIONS: Required<VectorIndexOptions> = {
  collection: 'documents',
  batchSize: 64,
  timeoutMs: 30000,
};

interface PendingRecord {
  index: number;
  id: string;
  text: string;
  vector?: number[];
  metadata: Metadata;
}

type EmbedOutcome = { vector: number[] } | { error: string };

function isFiniteVector(vector: number[]): boolean {
  return vector.length > 0 && vector.every((value) => Number.isFinite(value));
}

export class VectorIndexManager {
  private backend: VectorBackend;
  private embeddings: EmbeddingProvider;
  private collection: string;
  private batchSize: number;
  private timeoutMs: number;
  private dimensions: number | null;

  constructor(backend: VectorBackend, embeddings: EmbeddingProvider, options: VectorIndexOptions = {}) {
    const resolved = { ...DEFAULT_VECTOR_INDEX_OPTIONS, ...options };

    if (!COLLECTION_NAME.test(resolved.collection)) {
      throw new ConfigurationError(`Invalid collection name '${resolved.collection}'`);
    }
    if (!Number.isInteger(resolved.batchSize) || resolved.batchSize <= 0) {
      throw new ConfigurationError(`batchSize must be a positive integer, got ${resolved.batchSize}`);
    }
    if (!Number.isFinite(resolved.timeoutMs) || resolved.timeoutMs < 0) {
      throw new ConfigurationError(`timeoutMs must be a non-negative number, got ${resolved.timeoutMs}`);
    }

    this.backend = backend;
    this.embeddings = embeddings;
    this.collection = resolved.collection;
    this.batchSize = resolved.batchSize;
    this.timeoutMs = resolved.timeoutMs;

    const providerDimensions = embeddings.getDimensions();
    this.dimensions = providerDimensions > 0 ? providerDimensions : null;
  }

  get collectionName(): string {
    return this.collection;
  }

  get metric(): DistanceMetric {
    return this.backend.metric;
  }

  /**
   * Insert or replace records by id. Invalid records are skipped, records
   * whose vector cannot be produced fail individually, and a backend
   * failure or timeout aborts the remaining batches with a StorageError.
   */
  async upsert(records: EmbeddingRecord[], options: UpsertOptions = {}): Promise<UpsertReport> {
    const skipped: SkippedRecord[] = [];
    const failed: FailedRecord[] = [];
    const pending = new Map<string, PendingRecord>();

    records.forEach((record, index) => {
      const reason = this.validateRecord(record);
      if (reason) {
        skipped.push({ index, id: record.id || undefined, reason });
        return;
      }

      const metadata = MetadataSchema.safeParse(record.metadata ?? {});
      if (!metadata.success) {
        skipped.push({ index, id: record.id, reason: 'metadata values must be strings, finite numbers or booleans' });
        return;
      }

      const previous = pending.get(record.id);
      if (previous) {
        skipped.push({ index: previous.index, id: previous.id, reason: 'superseded by a later record with the same id' });
        pending.delete(record.id);
      }
      pending.set(record.id, {
        index,
        id: record.id,
        text: record.text,
        vector: record.vector,
        metadata: metadata.data,
      });
    });

    for (const entry of skipped) {
      console.warn(`[VectorIndex] Skipped record ${entry.id ?? `#${entry.index}`}: ${entry.reason}`);
    }

    const queue = Array.from(pending.values());
    let upserted = 0;

    for (let start = 0; start < queue.length; start += this.batchSize) {
      options.signal?.throwIfAborted();

      const batch = queue.slice(start, start + this.batchSize);
      const rows = await this.resolveVectors(batch, failed);
      if (rows.length === 0) continue;

      try {
        await withTimeout(this.backend.upsert(this.collection, rows), this.timeoutMs, `Upsert into '${this.collection}'`);
      } catch (error) {
        console.error(
          `[VectorIndex] Backend upsert failed after ${upserted} committed records: ${getErrorMessage(error)}`
        );
        throw new StorageError(
          `Upsert into '${this.collection}' failed after ${upserted} records were committed: ${getErrorMessage(error)}`,
          error
        );
      }
      upserted += rows.length;
    }

    for (const entry of failed) {
      console.error(`[VectorIndex] Failed record ${entry.id}: ${entry.error}`);
    }
    console.log(
      `[VectorIndex] Upserted ${upserted} records into '${this.collection}' (${skipped.length} skipped, ${failed.length} failed)`
    );

    return { upserted, skipped, failed };
  }

  private validateRecord(record: EmbeddingRecord): string | null {
    if (typeof record.id !== 'string' || record.id.length === 0) {
      return 'missing id';
    }
    if (typeof record.text !== 'string' || record.text.length === 0) {
      return 'missing text';
    }
    if (record.vector !== undefined && !Array.isArray(record.vector)) {
      return 'vector must be an array of numbers';
    }
    return null;
  }

  /**
   * Produce a backend row for every record of the batch that ends up with a
   * usable vector; the rest are appended to `failed`.
   */
  private async resolveVectors(batch: PendingRecord[], failed: FailedRecord[]): Promise<VectorRow[]> {
    const missing = batch.filter((record) => record.vector === undefined);
    const embedded = await this.embedTexts(missing.map((record) => record.text));
    const outcomes = new Map<string, EmbedOutcome>();
    missing.forEach((record, i) => outcomes.set(record.id, embedded[i]));

    const rows: VectorRow[] = [];
    for (const record of batch) {
      const outcome: EmbedOutcome = record.vector
        ? { vector: record.vector }
        : (outcomes.get(record.id) ?? { error: 'no embedding produced' });
      if ('error' in outcome) {
        failed.push({ index: record.index, id: record.id, error: outcome.error });
        continue;
      }

      const vector = outcome.vector;
      if (!isFiniteVector(vector)) {
        failed.push({ index: record.index, id: record.id, error: 'vector must be a non-empty array of finite numbers' });
        continue;
      }
      if (this.dimensions === null) {
        this.dimensions = vector.length;
      }
      if (vector.length !== this.dimensions) {
        failed.push({
          index: record.index,
          id: record.id,
          error: `vector has ${vector.length} dimensions, expected ${this.dimensions}`,
        });
        continue;
      }

      rows.push({ id: record.id, vector: [...vector], text: record.text, metadata: record.metadata });
    }
    return rows;
  }

  /**
   * Embed texts in one batch call when the provider offers it, falling back
   * to one call per text so a single bad input only fails itself.
   */
  private async embedTexts(texts: string[]): Promise<EmbedOutcome[]> {
    if (texts.length === 0) return [];

    if (this.embeddings.embedBatch) {
      try {
        const vectors = await withTimeout(this.embeddings.embedBatch(texts), this.timeoutMs, 'Batch embedding');
        if (vectors.length === texts.length) {
          return vectors.map((vector) => ({ vector }));
        }
        console.warn(
          `[VectorIndex] Batch embedding returned ${vectors.length} vectors for ${texts.length} texts, embedding individually`
        );
      } catch (error) {
        console.warn(`[VectorIndex] Batch embedding failed (${getErrorMessage(error)}), embedding individually`);
      }
    }

    const outcomes: EmbedOutcome[] = [];
    for (const text of texts) {
      try {
        outcomes.push({ vector: await withTimeout(this.embeddings.embed(text), this.timeoutMs, 'Embedding') });
      } catch (error) {
        outcomes.push({ error: getErrorMessage(error) });
      }
    }
    return outcomes;
  }

  /**
   * Nearest records to the query text, ascending by distance. The filter
   * restricts candidates before ranking.
   */
  async search(queryText: string, topK: number, filter?: MetadataFilter): Promise<SearchHit[]> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ConfigurationError(`topK must be a positive integer, got ${topK}`);
    }
    if (filter !== undefined) {
      assertValidFilter(filter);
    }

    let vector: number[];
    try {
      vector = await withTimeout(this.embeddings.embed(queryText), this.timeoutMs, 'Query embedding');
    } catch (error) {
      if (error instanceof OperationTimeoutError) throw error;
      throw new RetrievalError(`Failed to embed query: ${getErrorMessage(error)}`, error);
    }

    let matches: VectorMatch[];
    try {
      matches = await withTimeout(
        this.backend.query(this.collection, vector, topK, filter),
        this.timeoutMs,
        `Search in '${this.collection}'`
      );
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      throw new RetrievalError(`Search in '${this.collection}' failed: ${getErrorMessage(error)}`, error);
    }

    return [...matches]
      .sort((a, b) => a.distance - b.distance)
      .slice(0, topK)
      .map((match) => ({
        id: match.id,
        distance: match.distance,
        metadata: match.metadata,
        text: match.text,
      }));
  }

  async get(ids: string[]): Promise<VectorRow[]> {
    try {
      return await withTimeout(this.backend.get(this.collection, ids), this.timeoutMs, `Read from '${this.collection}'`);
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      throw new RetrievalError(`Read from '${this.collection}' failed: ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Remove records by id. Returns the number removed. Failures, timeouts
   * included, surface as StorageError.
   */
  async delete(ids: string[]): Promise<number> {
    try {
      return await withTimeout(
        this.backend.delete(this.collection, ids),
        this.timeoutMs,
        `Delete from '${this.collection}'`
      );
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Delete from '${this.collection}' failed: ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Remove every record whose metadata satisfies the filter.
   */
  async deleteWhere(filter: MetadataFilter): Promise<number> {
    assertValidFilter(filter);
    try {
      const removed = await withTimeout(
        this.backend.deleteWhere(this.collection, filter),
        this.timeoutMs,
        `Delete from '${this.collection}'`
      );
      if (removed > 0) {
        console.log(`[VectorIndex] Removed ${removed} records from '${this.collection}'`);
      }
      return removed;
    } catch (error) {
      if (error instanceof StorageError) throw error;
      throw new StorageError(`Delete from '${this.collection}' failed: ${getErrorMessage(error)}`, error);
    }
  }

  async count(): Promise<number> {
    try {
      return await withTimeout(this.backend.count(this.collection), this.timeoutMs, `Count of '${this.collection}'`);
    } catch (error) {
      if (error instanceof RetrievalError) throw error;
      throw new RetrievalError(`Count of '${this.collection}' failed: ${getErrorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    await this.backend.close();
  }
}
