/**
 * Component wiring. Builds every component of the pipeline from an explicit
 * configuration value.
 */

import type { PipelineConfig } from './config/config.js';
import { createDocumentStore } from './document-store/store.js';
import { ConfigurationError } from './errors.js';
import { TextNormalizer } from './normalizer/normalizer.js';
import { IngestionPipeline } from './pipeline/pipeline.js';
import type { DocumentProcessor } from './pipeline/types.js';
import { DocumentSplitter } from './splitter/splitter.js';
import {
  AzureOpenAIEmbeddingProvider,
  GoogleEmbeddingProvider,
  OpenAIEmbeddingProvider,
  VoyageEmbeddingProvider,
} from './vector-index/embedding-providers.js';
import { createLanceBackend } from './vector-index/lance-backend.js';
import { VectorIndexManager } from './vector-index/manager.js';
import { InMemoryVectorBackend } from './vector-index/memory-backend.js';
import type { EmbeddingProvider, VectorBackend } from './vector-index/types.js';

export interface PipelineOverrides {
  embeddingProvider?: EmbeddingProvider;
  backend?: VectorBackend;
  documentProcessors?: DocumentProcessor[];
}

/**
 * Create the configured embedding provider. Throws when its credentials
 * are missing.
 */
export function createEmbeddingProvider(config: PipelineConfig): EmbeddingProvider {
  const { provider, model } = config.embedding;
  const timeoutMs = config.operationTimeoutMs;

  switch (provider) {
    case 'openai':
      if (!config.openaiApiKey) {
        throw new ConfigurationError('OPENAI_API_KEY is required for OpenAI embeddings');
      }
      return new OpenAIEmbeddingProvider(config.openaiApiKey, model, undefined, timeoutMs);

    case 'azure_openai':
      if (!config.azureOpenaiApiKey || !config.azureOpenaiEndpoint) {
        throw new ConfigurationError(
          'AZURE_OPENAI_API_KEY and AZURE_OPENAI_ENDPOINT are required for Azure OpenAI embeddings'
        );
      }
      return new AzureOpenAIEmbeddingProvider(
        config.azureOpenaiApiKey,
        config.azureOpenaiEndpoint,
        config.azureOpenaiApiVersion,
        model,
        timeoutMs
      );

    case 'google':
      if (!config.googleApiKey) {
        throw new ConfigurationError('GOOGLE_API_KEY is required for Google embeddings');
      }
      return new GoogleEmbeddingProvider(config.googleApiKey, model, timeoutMs);

    case 'voyage':
      if (!config.voyageApiKey) {
        throw new ConfigurationError('VOYAGE_API_KEY is required for Voyage embeddings');
      }
      return new VoyageEmbeddingProvider(config.voyageApiKey, model, timeoutMs);
  }
}

export async function createVectorBackend(config: PipelineConfig): Promise<VectorBackend> {
  if (config.vector.backend === 'memory') {
    return new InMemoryVectorBackend(config.vector.metric);
  }
  return createLanceBackend(config.vector.dbPath, config.vector.metric);
}

/**
 * Build and initialize a pipeline.
 */
export async function createPipeline(
  config: PipelineConfig,
  overrides: PipelineOverrides = {}
): Promise<IngestionPipeline> {
  const normalizer = new TextNormalizer(config.normalizer);
  const splitter = new DocumentSplitter({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
  const embeddingProvider = overrides.embeddingProvider ?? createEmbeddingProvider(config);

  const store = await createDocumentStore(config.documentStore.path, {
    maxPathLength: config.documentStore.maxPathLength,
    hashSuffix: config.documentStore.hashSuffix,
  });
  const backend = overrides.backend ?? (await createVectorBackend(config));
  const index = new VectorIndexManager(backend, embeddingProvider, {
    collection: config.vector.collection,
    batchSize: config.embedding.batchSize,
    timeoutMs: config.operationTimeoutMs,
  });

  console.log(
    `[Pipeline] Ready: ${config.vector.backend} backend, collection '${config.vector.collection}', ` +
      `${config.embedding.provider} embeddings`
  );

  return new IngestionPipeline({
    store,
    normalizer,
    splitter,
    index,
    documentProcessors: overrides.documentProcessors,
  });
}
