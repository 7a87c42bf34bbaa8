/**
 * Pipeline Module
 * Document ingestion and querying over the store and vector index.
 */

export type {
  DocumentProcessor,
  IngestInput,
  IngestOptions,
  IngestionStatus,
  IngestionReport,
  IngestionProgress,
  RemoveResult,
  QueryRequest,
  QueryResponse,
} from './types.js';

export { IngestionPipeline, type PipelineComponents } from './pipeline.js';
