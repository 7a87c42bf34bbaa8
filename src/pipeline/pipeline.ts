/**
 * Ingestion Pipeline
 * Archives originals, normalizes, splits and indexes documents, and answers
 * queries against the resulting index.
 */

import { EventEmitter } from 'events';
import { getMimeType } from '../document-store/content-types.js';
import type { FileSystemDocumentStore } from '../document-store/store.js';
import { createDocument, deriveDocumentId, flattenMetadata } from '../documents/document.js';
import type { Document } from '../documents/types.js';
import { LINEAGE_KEYS } from '../documents/types.js';
import { ConfigurationError, StorageError, getErrorMessage } from '../errors.js';
import type { TextNormalizer } from '../normalizer/normalizer.js';
import { toEmbeddingRecord, type DocumentSplitter } from '../splitter/splitter.js';
import { composeAsyncProcessors } from '../utils/compose.js';
import type { VectorIndexManager } from '../vector-index/manager.js';
import type {
  DocumentProcessor,
  IngestInput,
  IngestOptions,
  IngestionProgress,
  IngestionReport,
  IngestionStatus,
  QueryRequest,
  QueryResponse,
  RemoveResult,
} from './types.js';

const DEFAULT_TOP_K = 10;

export interface PipelineComponents {
  store: FileSystemDocumentStore;
  normalizer: TextNormalizer;
  splitter: DocumentSplitter;
  index: VectorIndexManager;
  documentProcessors?: DocumentProcessor[];
}

function resolveStatus(segmentCount: number, upserted: number, problems: number): IngestionStatus {
  if (segmentCount === 0) return 'empty';
  if (upserted === 0) return 'failed';
  return problems > 0 ? 'partial' : 'indexed';
}

/**
 * Ingestion Pipeline - store, normalize, process, split, index.
 *
 * Events:
 * - 'ingestion_progress' (IngestionProgress) during ingestMany
 */
export class IngestionPipeline extends EventEmitter {
  private store: FileSystemDocumentStore;
  private normalizer: TextNormalizer;
  private splitter: DocumentSplitter;
  private index: VectorIndexManager;
  private processDocument: (document: Document) => Promise<Document>;

  constructor(components: PipelineComponents) {
    super();
    this.store = components.store;
    this.normalizer = components.normalizer;
    this.splitter = components.splitter;
    this.index = components.index;
    this.processDocument = composeAsyncProcessors(components.documentProcessors ?? []);
  }

  /**
   * Ingest one document. Re-ingesting the same source replaces the previous
   * version: segments are upserted under the same ids, and old records whose
   * segment was rejected or lies beyond the new count are removed.
   */
  async ingest(input: IngestInput, options: IngestOptions = {}): Promise<IngestionReport> {
    if (!input.sourceId) {
      throw new ConfigurationError('sourceId is required');
    }

    const contentType = input.contentType ?? getMimeType(input.sourceId);
    const metadata = { ...flattenMetadata(input.metadata ?? {}), content_type: contentType };

    await this.store.put(input.sourceId, input.raw ?? input.text, metadata);

    const normalized = createDocument({
      id: input.documentId,
      content: this.normalizer.normalize(input.text),
      source: input.sourceId,
      metadata,
      tags: input.tags,
    });
    const document = await this.processDocument(normalized);
    if (document.id !== normalized.id) {
      throw new ConfigurationError(`Document processors must keep the document id (${normalized.id})`);
    }

    const segments = this.splitter.split(document);
    const records = segments.map(toEmbeddingRecord);
    const { upserted, skipped, failed } = await this.index.upsert(records, options);

    // A rejected segment must not leave the previous version's record behind
    const rejected = new Set([...skipped, ...failed].map((entry) => entry.index));
    const accepted = new Set(records.filter((_, i) => !rejected.has(i)).map((record) => record.id));
    const outdated = records.filter((record, i) => rejected.has(i) && !accepted.has(record.id)).map((record) => record.id);

    let staleRemoved = outdated.length > 0 ? await this.index.delete(outdated) : 0;
    staleRemoved += await this.index.deleteWhere({
      [LINEAGE_KEYS.parentDocumentId]: document.id,
      [LINEAGE_KEYS.sequenceNumber]: { $gte: segments.length },
    });

    const status = resolveStatus(segments.length, upserted, skipped.length + failed.length);
    console.log(
      `[Pipeline] Ingested ${input.sourceId}: ${segments.length} segments, ${upserted} upserted, ` +
        `${skipped.length} skipped, ${failed.length} failed (${status})`
    );

    return {
      documentId: document.id,
      sourceId: input.sourceId,
      segmentCount: segments.length,
      upserted,
      skipped,
      failed,
      staleRemoved,
      status,
    };
  }

  /**
   * Ingest several documents in order. A document that fails is reported as
   * failed and the run continues; storage failures and cancellation stop
   * the run.
   */
  async ingestMany(inputs: IngestInput[], options: IngestOptions = {}): Promise<IngestionReport[]> {
    const reports: IngestionReport[] = [];
    const totalDocuments = inputs.length;

    this.emitProgress({
      status: 'started',
      totalDocuments,
      processedDocuments: 0,
      timestamp: new Date().toISOString(),
    });

    try {
      for (const input of inputs) {
        options.signal?.throwIfAborted();

        this.emitProgress({
          status: 'processing',
          totalDocuments,
          processedDocuments: reports.length,
          currentDocument: input.sourceId,
          timestamp: new Date().toISOString(),
        });

        try {
          reports.push(await this.ingest(input, options));
        } catch (error) {
          if (error instanceof StorageError || options.signal?.aborted) {
            throw error;
          }
          console.error(`[Pipeline] Error ingesting ${input.sourceId}:`, error);
          reports.push({
            documentId: input.documentId ?? deriveDocumentId(input.sourceId),
            sourceId: input.sourceId,
            segmentCount: 0,
            upserted: 0,
            skipped: [],
            failed: [],
            staleRemoved: 0,
            status: 'failed',
            error: getErrorMessage(error),
          });
        }
      }
    } catch (error) {
      this.emitProgress({
        status: 'error',
        totalDocuments,
        processedDocuments: reports.length,
        error: getErrorMessage(error),
        timestamp: new Date().toISOString(),
      });
      throw error;
    }

    this.emitProgress({
      status: 'completed',
      totalDocuments,
      processedDocuments: reports.length,
      timestamp: new Date().toISOString(),
    });

    return reports;
  }

  /**
   * Remove a document: its index records first, then the stored original.
   */
  async remove(sourceId: string, documentId: string = deriveDocumentId(sourceId)): Promise<RemoveResult> {
    const removedRecords = await this.index.deleteWhere({ [LINEAGE_KEYS.parentDocumentId]: documentId });
    const storeDeleted = await this.store.delete(sourceId);

    console.log(`[Pipeline] Removed ${sourceId}: ${removedRecords} records`);
    return { documentId, removedRecords, storeDeleted };
  }

  /**
   * Search the index.
   */
  async query(request: QueryRequest): Promise<QueryResponse> {
    const startTime = Date.now();
    const results = await this.index.search(request.query, request.topK ?? DEFAULT_TOP_K, request.filter);

    return {
      results,
      queryTimeMs: Date.now() - startTime,
    };
  }

  /**
   * Emit an ingestion progress event.
   */
  private emitProgress(progress: IngestionProgress): void {
    this.emit('ingestion_progress', progress);
  }

  /**
   * Close the pipeline and release resources.
   */
  async close(): Promise<void> {
    await this.index.close();
  }
}
