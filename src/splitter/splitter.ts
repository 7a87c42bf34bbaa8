import { ConfigurationError, getErrorMessage } from '../errors.js';
import { LINEAGE_KEYS, type Document, type EmbeddingRecord, type Segment } from '../documents/types.js';

export interface SplitterOptions {
  /** Target segment length in code points */
  chunkSize: number;
  /** Code points shared by consecutive segments; must be below chunkSize */
  chunkOverlap: number;
}

export const DEFAULT_SPLITTER_OPTIONS: SplitterOptions = {
  chunkSize: 1000,
  chunkOverlap: 100,
};

const SEGMENT_ID_SEPARATOR = '#';

/**
 * Segment id for a parent document and sequence number.
 */
export function segmentId(parentDocumentId: string, sequenceNumber: number): string {
  return `${parentDocumentId}${SEGMENT_ID_SEPARATOR}${sequenceNumber}`;
}

/**
 * Inverse of segmentId. Returns null for ids that were not produced by it.
 */
export function parseSegmentId(id: string): { parentDocumentId: string; sequenceNumber: number } | null {
  const separator = id.lastIndexOf(SEGMENT_ID_SEPARATOR);
  if (separator <= 0) {
    return null;
  }

  const suffix = id.slice(separator + 1);
  if (!/^(0|[1-9]\d*)$/.test(suffix)) {
    return null;
  }

  return {
    parentDocumentId: id.slice(0, separator),
    sequenceNumber: Number(suffix),
  };
}

/**
 * Document Splitter - divides normalized text into fixed-size overlapping
 * segments that carry lineage back to their parent document.
 *
 * Output is deterministic: the same document and options always produce the
 * same segments with the same ids.
 */
export class DocumentSplitter {
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;

  constructor(options: Partial<SplitterOptions> = {}) {
    const opts = { ...DEFAULT_SPLITTER_OPTIONS, ...options };

    if (!Number.isInteger(opts.chunkSize) || opts.chunkSize <= 0) {
      throw new ConfigurationError(`chunkSize must be a positive integer, got ${opts.chunkSize}`);
    }
    if (!Number.isInteger(opts.chunkOverlap) || opts.chunkOverlap < 0) {
      throw new ConfigurationError(`chunkOverlap must be a non-negative integer, got ${opts.chunkOverlap}`);
    }

    this.chunkSize = opts.chunkSize;
    this.chunkOverlap = opts.chunkOverlap;

    if (this.chunkOverlap >= this.chunkSize) {
      console.warn(
        `[Splitter] chunkOverlap (${this.chunkOverlap}) >= chunkSize (${this.chunkSize}), using overlap 0`
      );
      this.chunkOverlap = 0;
    }
  }

  getOptions(): SplitterOptions {
    return { chunkSize: this.chunkSize, chunkOverlap: this.chunkOverlap };
  }

  /**
   * Split a document into ordered segments covering [0, length).
   */
  split(document: Document): Segment[] {
    // Offsets are code points so that surrogate pairs are never cut in half
    const codePoints = Array.from(document.content);
    const length = codePoints.length;

    if (length === 0) {
      return [];
    }

    if (length <= this.chunkSize) {
      return [this.createSegment(document, codePoints, 0, 0, length)];
    }

    const segments: Segment[] = [];
    let start = 0;
    let sequenceNumber = 0;

    while (start < length) {
      const end = Math.min(start + this.chunkSize, length);
      segments.push(this.createSegment(document, codePoints, sequenceNumber, start, end));

      if (end === length) {
        break;
      }

      let next = start + this.chunkSize - this.chunkOverlap;
      if (next <= start) {
        next = start + this.chunkSize; // Prevent infinite loop
      }
      start = next;
      sequenceNumber++;
    }

    return segments;
  }

  /**
   * Split several documents. A document whose split throws is logged and
   * skipped so the rest of the batch still produces segments.
   */
  splitMany(documents: readonly Document[]): Segment[] {
    const segments: Segment[] = [];

    for (const document of documents) {
      try {
        segments.push(...this.split(document));
      } catch (error) {
        console.error(`[Splitter] Failed to split document ${document.id}: ${getErrorMessage(error)}`);
      }
    }

    console.log(`[Splitter] Split ${documents.length} documents into ${segments.length} segments`);
    return segments;
  }

  private createSegment(
    document: Document,
    codePoints: string[],
    sequenceNumber: number,
    startOffset: number,
    endOffset: number
  ): Segment {
    return {
      id: segmentId(document.id, sequenceNumber),
      parentDocumentId: document.id,
      sequenceNumber,
      startOffset,
      endOffset,
      content: codePoints.slice(startOffset, endOffset).join(''),
      metadata: {
        ...document.metadata,
        [LINEAGE_KEYS.parentDocumentId]: document.id,
        [LINEAGE_KEYS.sequenceNumber]: sequenceNumber,
        [LINEAGE_KEYS.startOffset]: startOffset,
        [LINEAGE_KEYS.endOffset]: endOffset,
      },
      tags: [...document.tags],
    };
  }
}

/**
 * Convert a segment into a record for the vector index. Tags are flattened
 * into a sorted comma-joined `tags` entry.
 */
export function toEmbeddingRecord(segment: Segment): EmbeddingRecord {
  const metadata = { ...segment.metadata };
  if (segment.tags.length > 0) {
    metadata.tags = [...segment.tags].sort().join(',');
  }

  return {
    id: segment.id,
    text: segment.content,
    metadata,
  };
}
