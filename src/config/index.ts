export type { PipelineConfig, VectorBackendType, EmbeddingProviderType } from './config.js';

export {
  PIPELINE_ENV_VARS,
  DEFAULT_PIPELINE_CONFIG,
  loadConfig,
  loadEnvironment,
  logConfig,
} from './config.js';
