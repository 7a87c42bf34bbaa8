/**
 * Pipeline Configuration
 *
 * Loads pipeline configuration from environment variables. Nothing is read
 * at import time; callers pass the environment in explicitly.
 */

import { config as loadDotenv } from 'dotenv';
import { ConfigurationError } from '../errors.js';
import { isDistanceMetric } from '../vector-index/metrics.js';
import type { DistanceMetric } from '../vector-index/types.js';

export type VectorBackendType = 'lancedb' | 'memory';

export type EmbeddingProviderType = 'openai' | 'google' | 'azure_openai' | 'voyage';

export interface PipelineConfig {
  chunkSize: number;
  chunkOverlap: number;
  normalizer: {
    stripMarkup: boolean;
    collapseWhitespace: boolean;
    collapseBlankLines: boolean;
    lowercase: boolean;
  };
  documentStore: {
    path: string;
    maxPathLength: number;
    hashSuffix: boolean;
  };
  vector: {
    backend: VectorBackendType;
    dbPath: string;
    collection: string;
    metric: DistanceMetric;
  };
  embedding: {
    provider: EmbeddingProviderType;
    /** Provider default when undefined */
    model?: string;
    batchSize: number;
  };
  operationTimeoutMs: number;
  openaiApiKey: string;
  googleApiKey: string;
  azureOpenaiApiKey: string;
  azureOpenaiEndpoint: string;
  azureOpenaiApiVersion: string;
  voyageApiKey: string;
}

/**
 * Environment variable names for pipeline configuration.
 */
export const PIPELINE_ENV_VARS = {
  CHUNK_SIZE: 'CHUNK_SIZE',
  CHUNK_OVERLAP: 'CHUNK_OVERLAP',

  /** 'true' | 'false' */
  NORMALIZE_STRIP_MARKUP: 'NORMALIZE_STRIP_MARKUP',
  NORMALIZE_COLLAPSE_WHITESPACE: 'NORMALIZE_COLLAPSE_WHITESPACE',
  NORMALIZE_COLLAPSE_BLANK_LINES: 'NORMALIZE_COLLAPSE_BLANK_LINES',
  NORMALIZE_LOWERCASE: 'NORMALIZE_LOWERCASE',

  DOCUMENT_STORE_PATH: 'DOCUMENT_STORE_PATH',
  STORAGE_KEY_MAX_PATH_LENGTH: 'STORAGE_KEY_MAX_PATH_LENGTH',
  STORAGE_KEY_HASH_SUFFIX: 'STORAGE_KEY_HASH_SUFFIX',

  /** 'lancedb' | 'memory' */
  VECTOR_BACKEND: 'VECTOR_BACKEND',
  VECTOR_DB_PATH: 'VECTOR_DB_PATH',
  VECTOR_COLLECTION: 'VECTOR_COLLECTION',
  /** 'cosine' | 'l2' | 'dot' */
  VECTOR_DISTANCE_METRIC: 'VECTOR_DISTANCE_METRIC',

  /** 'openai' | 'google' | 'azure_openai' | 'voyage' */
  EMBEDDING_PROVIDER: 'EMBEDDING_PROVIDER',
  EMBEDDING_MODEL: 'EMBEDDING_MODEL',
  EMBEDDING_BATCH_SIZE: 'EMBEDDING_BATCH_SIZE',

  /** Bound on each embedding and backend call, in ms */
  OPERATION_TIMEOUT_MS: 'OPERATION_TIMEOUT_MS',

  OPENAI_API_KEY: 'OPENAI_API_KEY',
  GOOGLE_API_KEY: 'GOOGLE_API_KEY',
  AZURE_OPENAI_API_KEY: 'AZURE_OPENAI_API_KEY',
  AZURE_OPENAI_ENDPOINT: 'AZURE_OPENAI_ENDPOINT',
  AZURE_OPENAI_API_VERSION: 'AZURE_OPENAI_API_VERSION',
  VOYAGE_API_KEY: 'VOYAGE_API_KEY',
} as const;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  chunkSize: 1000,
  chunkOverlap: 100,
  normalizer: {
    stripMarkup: true,
    collapseWhitespace: true,
    collapseBlankLines: true,
    lowercase: false,
  },
  documentStore: {
    path: './document_store',
    maxPathLength: 100,
    hashSuffix: true,
  },
  vector: {
    backend: 'lancedb',
    dbPath: './vector_index.lance',
    collection: 'documents',
    metric: 'cosine',
  },
  embedding: {
    provider: 'openai',
    batchSize: 64,
  },
  operationTimeoutMs: 30000,
  openaiApiKey: '',
  googleApiKey: '',
  azureOpenaiApiKey: '',
  azureOpenaiEndpoint: '',
  azureOpenaiApiVersion: '2024-02-15-preview',
  voyageApiKey: '',
};

function isBackendType(value: string): value is VectorBackendType {
  return value === 'lancedb' || value === 'memory';
}

function isEmbeddingProviderType(value: string): value is EmbeddingProviderType {
  return value === 'openai' || value === 'google' || value === 'azure_openai' || value === 'voyage';
}

/**
 * Parses a boolean environment variable.
 */
function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Parses an integer environment variable.
 */
function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseString(value: string | undefined, defaultValue: string): string {
  return value === undefined || value === '' ? defaultValue : value;
}

/**
 * Loads pipeline configuration from environment variables. Unknown enum
 * values fall back to their defaults; numeric ranges are checked by the
 * components that use them.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const defaults = DEFAULT_PIPELINE_CONFIG;
  const backendRaw = env[PIPELINE_ENV_VARS.VECTOR_BACKEND];
  const metricRaw = env[PIPELINE_ENV_VARS.VECTOR_DISTANCE_METRIC];
  const providerRaw = env[PIPELINE_ENV_VARS.EMBEDDING_PROVIDER];
  const model = env[PIPELINE_ENV_VARS.EMBEDDING_MODEL];

  return {
    chunkSize: parseInt(env[PIPELINE_ENV_VARS.CHUNK_SIZE], defaults.chunkSize),
    chunkOverlap: parseInt(env[PIPELINE_ENV_VARS.CHUNK_OVERLAP], defaults.chunkOverlap),
    normalizer: {
      stripMarkup: parseBoolean(env[PIPELINE_ENV_VARS.NORMALIZE_STRIP_MARKUP], defaults.normalizer.stripMarkup),
      collapseWhitespace: parseBoolean(
        env[PIPELINE_ENV_VARS.NORMALIZE_COLLAPSE_WHITESPACE],
        defaults.normalizer.collapseWhitespace
      ),
      collapseBlankLines: parseBoolean(
        env[PIPELINE_ENV_VARS.NORMALIZE_COLLAPSE_BLANK_LINES],
        defaults.normalizer.collapseBlankLines
      ),
      lowercase: parseBoolean(env[PIPELINE_ENV_VARS.NORMALIZE_LOWERCASE], defaults.normalizer.lowercase),
    },
    documentStore: {
      path: parseString(env[PIPELINE_ENV_VARS.DOCUMENT_STORE_PATH], defaults.documentStore.path),
      maxPathLength: parseInt(
        env[PIPELINE_ENV_VARS.STORAGE_KEY_MAX_PATH_LENGTH],
        defaults.documentStore.maxPathLength
      ),
      hashSuffix: parseBoolean(env[PIPELINE_ENV_VARS.STORAGE_KEY_HASH_SUFFIX], defaults.documentStore.hashSuffix),
    },
    vector: {
      backend: backendRaw && isBackendType(backendRaw) ? backendRaw : defaults.vector.backend,
      dbPath: parseString(env[PIPELINE_ENV_VARS.VECTOR_DB_PATH], defaults.vector.dbPath),
      collection: parseString(env[PIPELINE_ENV_VARS.VECTOR_COLLECTION], defaults.vector.collection),
      metric: metricRaw && isDistanceMetric(metricRaw) ? metricRaw : defaults.vector.metric,
    },
    embedding: {
      provider: providerRaw && isEmbeddingProviderType(providerRaw) ? providerRaw : defaults.embedding.provider,
      model: model ? model : undefined,
      batchSize: parseInt(env[PIPELINE_ENV_VARS.EMBEDDING_BATCH_SIZE], defaults.embedding.batchSize),
    },
    operationTimeoutMs: parseInt(env[PIPELINE_ENV_VARS.OPERATION_TIMEOUT_MS], defaults.operationTimeoutMs),
    openaiApiKey: env[PIPELINE_ENV_VARS.OPENAI_API_KEY] || '',
    googleApiKey: env[PIPELINE_ENV_VARS.GOOGLE_API_KEY] || '',
    azureOpenaiApiKey: env[PIPELINE_ENV_VARS.AZURE_OPENAI_API_KEY] || '',
    azureOpenaiEndpoint: env[PIPELINE_ENV_VARS.AZURE_OPENAI_ENDPOINT] || '',
    azureOpenaiApiVersion: parseString(
      env[PIPELINE_ENV_VARS.AZURE_OPENAI_API_VERSION],
      defaults.azureOpenaiApiVersion
    ),
    voyageApiKey: env[PIPELINE_ENV_VARS.VOYAGE_API_KEY] || '',
  };
}

/**
 * Read a .env file into a copy of the given environment. Variables already
 * set in `base` win over the file.
 */
export function loadEnvironment(
  path?: string,
  base: Record<string, string | undefined> = process.env
): Record<string, string | undefined> {
  const target: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      target[key] = value;
    }
  }

  const result = loadDotenv({ path, processEnv: target });
  if (result.error && path !== undefined) {
    throw new ConfigurationError(`Failed to load environment file ${path}`, result.error);
  }
  return target;
}

/**
 * Logs the current pipeline configuration. Secrets are not printed.
 */
export function logConfig(config: PipelineConfig): void {
  console.log('[Config] Pipeline configuration:');
  console.log(`  Chunking: size ${config.chunkSize}, overlap ${config.chunkOverlap}`);
  console.log(`  Document store: ${config.documentStore.path}`);
  console.log(
    `  Vector backend: ${config.vector.backend} (${config.vector.collection}, ${config.vector.metric})`
  );
  console.log(`  Embeddings: ${config.embedding.provider}${config.embedding.model ? `/${config.embedding.model}` : ''}`);
  console.log(`  Operation timeout: ${config.operationTimeoutMs}ms`);
}
