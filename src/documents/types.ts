/**
 * Document Types
 * Typed entities passed between the normalizer, splitter, store and index.
 */

/**
 * Scalar values allowed in persisted metadata.
 */
export type MetadataValue = string | number | boolean;

/**
 * Flat key/value metadata map.
 */
export type Metadata = Record<string, MetadataValue>;

/**
 * A unit of ingested content.
 */
export interface Document {
  /** Stable identifier, never reassigned */
  readonly id: string;
  /** Normalized text */
  readonly content: string;
  /** External locator (URL, filename) */
  readonly source?: string;
  readonly metadata: Readonly<Metadata>;
  /** De-duplicated labels */
  readonly tags: readonly string[];
  /** ISO timestamp of the ingestion event that produced this version */
  readonly processedAt?: string;
}

/**
 * Input accepted by createDocument.
 */
export interface DocumentInit {
  id?: string;
  content: string;
  source?: string;
  metadata?: Record<string, unknown>;
  tags?: Iterable<string>;
  processedAt?: string;
}

/**
 * Lineage keys merged into every segment's metadata.
 */
export const LINEAGE_KEYS = {
  parentDocumentId: 'parent_document_id',
  sequenceNumber: 'sequence_number',
  startOffset: 'start_offset',
  endOffset: 'end_offset',
} as const;

/**
 * A contiguous sub-range of a document's content.
 * Offsets are half-open and count Unicode code points.
 */
export interface Segment {
  /** `${parentDocumentId}#${sequenceNumber}` */
  id: string;
  parentDocumentId: string;
  sequenceNumber: number;
  startOffset: number;
  endOffset: number;
  content: string;
  metadata: Metadata;
  tags: string[];
}

/**
 * The unit stored in the vector index.
 */
export interface EmbeddingRecord {
  id: string;
  text: string;
  /** Computed by the embedding provider when absent */
  vector?: number[];
  metadata: Metadata;
}
