/**
 * Ingestion Pipeline Types
 */

import type { Document } from '../documents/types.js';
import type { AsyncProcessor } from '../utils/compose.js';
import type { FailedRecord, MetadataFilter, SearchHit, SkippedRecord } from '../vector-index/types.js';

/**
 * A stage applied to every normalized document before it is split.
 * Stages run in order and must keep the document id.
 */
export type DocumentProcessor = AsyncProcessor<Document>;

/**
 * One acquired document, already decoded to text by the caller.
 */
export interface IngestInput {
  /** External locator (URL, filename); keys the stored original */
  sourceId: string;
  /** Decoded text to normalize, split and index */
  text: string;
  /** Original bytes or markup to archive instead of `text` */
  raw?: string | Uint8Array;
  /** MIME type hint, derived from the source id when absent */
  contentType?: string;
  metadata?: Record<string, unknown>;
  tags?: string[];
  /** Defaults to an id derived from the source id */
  documentId?: string;
}

/**
 * indexed: every segment was upserted
 * partial: some segments were skipped or failed
 * failed: nothing was indexed
 * empty: the normalized text produced no segments
 */
export type IngestionStatus = 'indexed' | 'partial' | 'failed' | 'empty';

/**
 * Per-document outcome of an ingestion.
 */
export interface IngestionReport {
  documentId: string;
  sourceId: string;
  segmentCount: number;
  upserted: number;
  skipped: SkippedRecord[];
  failed: FailedRecord[];
  /** Records of a previous version beyond the new segment count or replaced by a rejected segment */
  staleRemoved: number;
  status: IngestionStatus;
  error?: string;
}

/**
 * Emitted as 'ingestion_progress' during ingestMany.
 */
export interface IngestionProgress {
  status: 'started' | 'processing' | 'completed' | 'error';
  totalDocuments: number;
  processedDocuments: number;
  /** Source id of the document being processed */
  currentDocument?: string;
  /** Error message if status is 'error' */
  error?: string;
  timestamp: string;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export interface RemoveResult {
  documentId: string;
  /** Index records removed */
  removedRecords: number;
  /** Whether the stored original is gone */
  storeDeleted: boolean;
}

/**
 * Query request to the pipeline's index.
 */
export interface QueryRequest {
  /** Search query text */
  query: string;
  /** Maximum number of results (default 10) */
  topK?: number;
  filter?: MetadataFilter;
}

export interface QueryResponse {
  results: SearchHit[];
  /** Query execution time in ms */
  queryTimeMs: number;
}
