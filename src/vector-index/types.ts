/**
 * Vector Index Types
 * Contracts between the index manager, embedding providers and backends.
 */

import type { Metadata, MetadataValue } from '../documents/types.js';

/**
 * Dissimilarity measure of a collection. Smaller is always more similar:
 * cosine is 1 - cos, l2 is squared Euclidean distance, dot is 1 - dot.
 */
export type DistanceMetric = 'cosine' | 'l2' | 'dot';

/**
 * Embedding provider interface.
 */
export interface EmbeddingProvider {
  /** Generate embedding for a single text */
  embed(text: string): Promise<number[]>;
  /** Generate embeddings for multiple texts (batch) */
  embedBatch?(texts: string[]): Promise<number[][]>;
  /** Get the embedding dimension */
  getDimensions(): number;
}

/**
 * Row persisted by a backend.
 */
export interface VectorRow {
  id: string;
  vector: number[];
  text: string;
  metadata: Metadata;
}

/**
 * Row returned from a similarity query.
 */
export interface VectorMatch extends VectorRow {
  distance: number;
}

/**
 * Comparison operators on a single metadata key.
 */
export interface FieldOperators {
  $eq?: MetadataValue;
  $ne?: MetadataValue;
  $gt?: number | string;
  $gte?: number | string;
  $lt?: number | string;
  $lte?: number | string;
  $in?: MetadataValue[];
  $nin?: MetadataValue[];
}

export type FieldCondition = MetadataValue | FieldOperators;

/**
 * Structured metadata predicate. Keys other than $and/$or name metadata
 * fields; several keys at one level must all match.
 */
export interface MetadataFilter {
  $and?: MetadataFilter[];
  $or?: MetadataFilter[];
  [key: string]: FieldCondition | MetadataFilter[] | undefined;
}

/**
 * Persistent vector storage with filtered nearest-neighbor search.
 * Upserts are idempotent per id; results are ordered by ascending distance.
 */
export interface VectorBackend {
  readonly metric: DistanceMetric;
  upsert(collection: string, rows: VectorRow[]): Promise<void>;
  query(collection: string, vector: number[], topK: number, filter?: MetadataFilter): Promise<VectorMatch[]>;
  get(collection: string, ids: string[]): Promise<VectorRow[]>;
  /** Returns the number of rows removed */
  delete(collection: string, ids: string[]): Promise<number>;
  deleteWhere(collection: string, filter: MetadataFilter): Promise<number>;
  count(collection: string): Promise<number>;
  close(): Promise<void>;
}

/**
 * A ranked search result.
 */
export interface SearchHit {
  id: string;
  distance: number;
  metadata: Metadata;
  text: string;
}

export interface SkippedRecord {
  /** Position in the input list */
  index: number;
  id?: string;
  reason: string;
}

export interface FailedRecord {
  index: number;
  id: string;
  error: string;
}

/**
 * Outcome of an upsert call.
 */
export interface UpsertReport {
  upserted: number;
  skipped: SkippedRecord[];
  failed: FailedRecord[];
}
