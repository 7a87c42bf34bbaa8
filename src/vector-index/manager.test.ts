import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { EmbeddingRecord } from '../documents/types.js';
import { ConfigurationError, OperationTimeoutError, RetrievalError, StorageError } from '../errors.js';
import { FakeEmbeddingProvider } from '../tests/fake-embedding-provider.js';
import { VectorIndexManager } from './manager.js';
import { InMemoryVectorBackend } from './memory-backend.js';

function record(id: string, text: string, metadata: EmbeddingRecord['metadata'] = {}): EmbeddingRecord {
  return { id, text, metadata };
}

describe('VectorIndexManager', () => {
  let backend: InMemoryVectorBackend;
  let provider: FakeEmbeddingProvider;
  let manager: VectorIndexManager;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    backend = new InMemoryVectorBackend('cosine');
    provider = new FakeEmbeddingProvider({ dimensions: 4 });
    manager = new VectorIndexManager(backend, provider);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('upsert', () => {
    it('replaces a record re-upserted under the same id', async () => {
      await manager.upsert([{ id: 'd1#0', text: 'old', vector: [1, 0, 0, 0], metadata: {} }]);
      await manager.upsert([{ id: 'd1#0', text: 'new', vector: [0, 1, 0, 0], metadata: {} }]);

      expect(await manager.count()).toBe(1);
      expect(await manager.get(['d1#0'])).toEqual([
        { id: 'd1#0', text: 'new', vector: [0, 1, 0, 0], metadata: {} },
      ]);
    });

    it('embeds missing vectors in one batch call', async () => {
      const report = await manager.upsert([record('a', 'one'), record('b', 'two'), record('c', 'three')]);

      expect(report).toEqual({ upserted: 3, skipped: [], failed: [] });
      expect(provider.batchCalls).toEqual([['one', 'two', 'three']]);
      expect(provider.embedCalls).toEqual([]);
    });

    it('keeps supplied vectors and only embeds the rest', async () => {
      await manager.upsert([
        { id: 'a', text: 'one', vector: [1, 1, 1, 1], metadata: {} },
        record('b', 'two'),
      ]);

      expect(provider.batchCalls).toEqual([['two']]);
      expect((await manager.get(['a']))[0].vector).toEqual([1, 1, 1, 1]);
    });

    it('skips and reports records missing an id or text or with invalid metadata', async () => {
      const report = await manager.upsert([
        record('', 'x'),
        record('a', ''),
        record('b', 'ok', { score: Number.NaN }),
      ]);

      expect(report).toEqual({
        upserted: 0,
        failed: [],
        skipped: [
          { index: 0, id: undefined, reason: 'missing id' },
          { index: 1, id: 'a', reason: 'missing text' },
          { index: 2, id: 'b', reason: 'metadata values must be strings, finite numbers or booleans' },
        ],
      });
      expect(provider.batchCalls).toEqual([]);
      expect(await manager.count()).toBe(0);
    });

    it('keeps the last of several records with the same id', async () => {
      const report = await manager.upsert([record('a', 'first'), record('a', 'second')]);

      expect(report.upserted).toBe(1);
      expect(report.skipped).toEqual([
        { index: 0, id: 'a', reason: 'superseded by a later record with the same id' },
      ]);
      expect((await manager.get(['a']))[0].text).toBe('second');
    });

    it('falls back to single embeddings so one bad record fails alone', async () => {
      provider = new FakeEmbeddingProvider({ dimensions: 4, failOn: ['bad'] });
      manager = new VectorIndexManager(backend, provider);

      const report = await manager.upsert([record('r1', 'good one'), record('r2', 'bad'), record('r3', 'good two')]);

      expect(provider.embedCalls).toEqual(['good one', 'bad', 'good two']);
      expect(report.upserted).toBe(2);
      expect(report.failed).toEqual([{ index: 1, id: 'r2', error: "cannot embed 'bad'" }]);
      expect(await manager.count()).toBe(2);
    });

    it('embeds one record at a time when the provider has no batch call', async () => {
      provider = new FakeEmbeddingProvider({ dimensions: 4, withoutBatch: true });
      manager = new VectorIndexManager(backend, provider);

      await manager.upsert([record('a', 'one'), record('b', 'two')]);
      expect(provider.embedCalls).toEqual(['one', 'two']);
    });

    it('fails records whose vector has the wrong shape', async () => {
      const report = await manager.upsert([
        { id: 'short', text: 'x', vector: [1, 0], metadata: {} },
        { id: 'nan', text: 'y', vector: [Number.NaN, 0, 0, 0], metadata: {} },
        { id: 'fine', text: 'z', vector: [0, 0, 1, 0], metadata: {} },
      ]);

      expect(report.upserted).toBe(1);
      expect(report.failed).toEqual([
        { index: 0, id: 'short', error: 'vector has 2 dimensions, expected 4' },
        { index: 1, id: 'nan', error: 'vector must be a non-empty array of finite numbers' },
      ]);
    });

    it('commits batch by batch and stops between batches when aborted', async () => {
      manager = new VectorIndexManager(backend, provider, { batchSize: 2 });
      const controller = new AbortController();
      const upsert = backend.upsert.bind(backend);
      vi.spyOn(backend, 'upsert').mockImplementation(async (collection, rows) => {
        await upsert(collection, rows);
        controller.abort();
      });

      const records = ['a', 'b', 'c', 'd', 'e'].map((id) => record(id, `text ${id}`));
      await expect(manager.upsert(records, { signal: controller.signal })).rejects.toMatchObject({
        name: 'AbortError',
      });
      expect(await manager.count()).toBe(2);
    });

    it('aborts the remaining batches with a StorageError when the backend fails', async () => {
      manager = new VectorIndexManager(backend, provider, { batchSize: 1 });
      const upsert = backend.upsert.bind(backend);
      let calls = 0;
      vi.spyOn(backend, 'upsert').mockImplementation(async (collection, rows) => {
        calls++;
        if (calls === 2) {
          throw new Error('disk full');
        }
        await upsert(collection, rows);
      });

      const records = ['a', 'b', 'c'].map((id) => record(id, `text ${id}`));
      await expect(manager.upsert(records)).rejects.toThrow(
        new StorageError("Upsert into 'documents' failed after 1 records were committed: disk full")
      );
      expect(calls).toBe(2);
      expect(await manager.count()).toBe(1);
    });
  });

  describe('write timeouts', () => {
    it('reports a backend upsert that times out as a StorageError', async () => {
      manager = new VectorIndexManager(backend, provider, { timeoutMs: 20 });
      vi.spyOn(backend, 'upsert').mockImplementation(() => new Promise<void>(() => {}));

      const error: unknown = await manager.upsert([record('a', 'one')]).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(StorageError);
      expect(error).toMatchObject({
        message: "Upsert into 'documents' failed after 0 records were committed: Upsert into 'documents' timed out after 20ms",
      });
      expect(error instanceof StorageError && error.cause instanceof OperationTimeoutError).toBe(true);
    });

    it('reports deletes that time out as a StorageError', async () => {
      manager = new VectorIndexManager(backend, provider, { timeoutMs: 20 });
      vi.spyOn(backend, 'delete').mockImplementation(() => new Promise<number>(() => {}));
      vi.spyOn(backend, 'deleteWhere').mockImplementation(() => new Promise<number>(() => {}));

      await expect(manager.delete(['a'])).rejects.toThrow(
        new StorageError("Delete from 'documents' failed: Delete from 'documents' timed out after 20ms")
      );
      await expect(manager.deleteWhere({ parent_document_id: 'd1' })).rejects.toBeInstanceOf(StorageError);
    });
  });

  describe('search', () => {
    it('returns only records matching the filter, at most topK, by non-decreasing distance', async () => {
      const records: EmbeddingRecord[] = [];
      for (let i = 0; i < 7; i++) {
        records.push(record(`d1#${i}`, `first document part ${'x'.repeat(i)}`, { parent_document_id: 'd1' }));
      }
      for (let i = 0; i < 3; i++) {
        records.push(record(`d2#${i}`, 'query', { parent_document_id: 'd2' }));
      }
      await manager.upsert(records);

      const hits = await manager.search('query', 5, { parent_document_id: 'd1' });

      expect(hits).toHaveLength(5);
      for (const hit of hits) {
        expect(hit.id.startsWith('d1#')).toBe(true);
        expect(hit.metadata.parent_document_id).toBe('d1');
      }
      for (let i = 1; i < hits.length; i++) {
        expect(hits[i].distance).toBeGreaterThanOrEqual(hits[i - 1].distance);
      }
    });

    it('finds a twice-upserted record by its own text exactly once', async () => {
      await manager.upsert([record('d1#0', 'alpha beta'), record('d2#0', 'zzzz')]);
      await manager.upsert([record('d1#0', 'alpha beta')]);

      const hits = await manager.search('alpha beta', 5);

      expect(hits[0].id).toBe('d1#0');
      expect(hits[0].distance).toBeCloseTo(0);
      expect(hits[0].text).toBe('alpha beta');
      expect(hits.filter((hit) => hit.id === 'd1#0')).toHaveLength(1);
    });

    it('returns fewer results when fewer records exist', async () => {
      await manager.upsert([record('a', 'one'), record('b', 'two')]);
      expect(await manager.search('one', 10)).toHaveLength(2);
    });

    it('returns an empty list for an empty collection', async () => {
      expect(await manager.search('anything', 3)).toEqual([]);
    });

    it('rejects a topK that is not a positive integer', async () => {
      await expect(manager.search('q', 0)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(manager.search('q', -1)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(manager.search('q', 1.5)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('rejects a malformed filter', async () => {
      const filter = JSON.parse('{"lang":{"$regex":"e"}}');
      await expect(manager.search('q', 3, filter)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('reports a failed query embedding as a RetrievalError', async () => {
      provider = new FakeEmbeddingProvider({ dimensions: 4, failOn: ['boom'] });
      manager = new VectorIndexManager(backend, provider);

      await expect(manager.search('boom', 3)).rejects.toThrow(
        new RetrievalError("Failed to embed query: cannot embed 'boom'")
      );
    });

    it('reports a backend failure as a RetrievalError', async () => {
      vi.spyOn(backend, 'query').mockRejectedValue(new Error('offline'));

      await expect(manager.search('q', 3)).rejects.toThrow(
        new RetrievalError("Search in 'documents' failed: offline")
      );
    });

    it('bounds the query embedding with the operation timeout', async () => {
      manager = new VectorIndexManager(
        backend,
        { embed: () => new Promise<number[]>(() => {}), getDimensions: () => 4 },
        { timeoutMs: 20 }
      );

      await expect(manager.search('q', 3)).rejects.toBeInstanceOf(OperationTimeoutError);
    });
  });

  describe('delete', () => {
    it('removes records by id and by filter', async () => {
      await manager.upsert([
        record('d1#0', 'a', { parent_document_id: 'd1' }),
        record('d1#1', 'b', { parent_document_id: 'd1' }),
        record('d2#0', 'c', { parent_document_id: 'd2' }),
      ]);

      expect(await manager.delete(['d2#0'])).toBe(1);
      expect(await manager.deleteWhere({ parent_document_id: 'd1' })).toBe(2);
      expect(await manager.count()).toBe(0);
    });
  });

  it('validates its options', () => {
    expect(() => new VectorIndexManager(backend, provider, { collection: 'my docs' })).toThrow(ConfigurationError);
    expect(() => new VectorIndexManager(backend, provider, { batchSize: 0 })).toThrow(ConfigurationError);
    expect(new VectorIndexManager(backend, provider).collectionName).toBe('documents');
  });
});
