export type { SplitterOptions } from './splitter.js';

export {
  DocumentSplitter,
  DEFAULT_SPLITTER_OPTIONS,
  segmentId,
  parseSegmentId,
  toEmbeddingRecord,
} from './splitter.js';
