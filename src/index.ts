/**
 * docvec-core
 * Document normalization, splitting, archival and vector retrieval.
 */

export * from './errors.js';
export * from './documents/index.js';
export * from './normalizer/index.js';
export * from './splitter/index.js';
export * from './document-store/index.js';
export * from './vector-index/index.js';
export * from './pipeline/index.js';
export * from './config/index.js';

export {
  createPipeline,
  createEmbeddingProvider,
  createVectorBackend,
  type PipelineOverrides,
} from './factory.js';

export {
  composeProcessors,
  composeAsyncProcessors,
  type Processor,
  type AsyncProcessor,
} from './utils/compose.js';
export { withTimeout } from './utils/timeout.js';
