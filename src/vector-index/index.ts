/**
 * Vector Index Module
 * Embedding, persistence and filtered similarity search of records.
 */

// Types
export type {
  DistanceMetric,
  EmbeddingProvider,
  VectorRow,
  VectorMatch,
  FieldOperators,
  FieldCondition,
  MetadataFilter,
  VectorBackend,
  SearchHit,
  SkippedRecord,
  FailedRecord,
  UpsertReport,
} from './types.js';

// Manager
export {
  VectorIndexManager,
  DEFAULT_VECTOR_INDEX_OPTIONS,
  type VectorIndexOptions,
  type UpsertOptions,
} from './manager.js';

// Filters and metrics
export { assertValidFilter, matchesFilter } from './filter.js';
export { computeDistance, isDistanceMetric, DISTANCE_METRICS } from './metrics.js';

// Backends
export { InMemoryVectorBackend } from './memory-backend.js';
export { LanceVectorBackend, createLanceBackend, buildPushdown } from './lance-backend.js';

// Embedding providers
export {
  GoogleEmbeddingProvider,
  OpenAIEmbeddingProvider,
  AzureOpenAIEmbeddingProvider,
  VoyageEmbeddingProvider,
} from './embedding-providers.js';
