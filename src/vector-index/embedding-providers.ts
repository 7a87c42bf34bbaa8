/**
 * Embedding Providers
 * HTTP embedding service implementations for vector generation.
 */

import { z } from 'zod';
import { EmbeddingError, getErrorMessage } from '../errors.js';
import type { EmbeddingProvider } from './types.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

const EmbeddingListSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number().optional() })),
});

const GoogleEmbeddingSchema = z.object({
  embedding: z.object({ values: z.array(z.number()) }),
});

const GoogleBatchSchema = z.object({
  embeddings: z.array(z.object({ values: z.array(z.number()) })),
});

/**
 * POST a JSON body and validate the response. Network failures, non-2xx
 * statuses and unexpected payloads all surface as EmbeddingError.
 */
async function postJson<T>(
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  schema: z.ZodType<T>,
  timeoutMs: number
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new EmbeddingError(`${provider} embedding request failed: ${getErrorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new EmbeddingError(`${provider} embedding API error: ${response.status}`, { status: response.status });
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new EmbeddingError(`${provider} embedding API returned an unexpected payload`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Responses may carry an explicit index per item; honor it so vectors line
 * up with their inputs.
 */
function orderedEmbeddings(
  provider: string,
  data: Array<{ embedding: number[]; index?: number }>,
  expected: number
): number[][] {
  if (data.length !== expected) {
    throw new EmbeddingError(`${provider} returned ${data.length} embeddings for ${expected} inputs`);
  }
  if (data.every((item) => typeof item.index === 'number')) {
    return [...data].sort((a, b) => (a.index ?? 0) - (b.index ?? 0)).map((item) => item.embedding);
  }
  return data.map((item) => item.embedding);
}

/**
 * Google embedding provider using text-embedding-004 model.
 */
export class GoogleEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private model: string;
  private baseUrl = 'https://generativelanguage.googleapis.com/v1beta';
  private dimensions = 768;
  private timeoutMs: number;

  constructor(apiKey: string, model: string = 'text-embedding-004', timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.apiKey = apiKey;
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async embed(text: string): Promise<number[]> {
    const url = `${this.baseUrl}/models/${this.model}:embedContent?key=${this.apiKey}`;
    const data = await postJson(
      'Google',
      url,
      {},
      { model: `models/${this.model}`, content: { parts: [{ text }] } },
      GoogleEmbeddingSchema,
      this.timeoutMs
    );
    return data.embedding.values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const url = `${this.baseUrl}/models/${this.model}:batchEmbedContents?key=${this.apiKey}`;
    const data = await postJson(
      'Google',
      url,
      {},
      {
        requests: texts.map((text) => ({
          model: `models/${this.model}`,
          content: { parts: [{ text }] },
        })),
      },
      GoogleBatchSchema,
      this.timeoutMs
    );
    if (data.embeddings.length !== texts.length) {
      throw new EmbeddingError(`Google returned ${data.embeddings.length} embeddings for ${texts.length} inputs`);
    }
    return data.embeddings.map((item) => item.values);
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * OpenAI embedding provider.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private baseUrl: string;
  private model: string;
  private dimensions = 1536;
  private timeoutMs: number;

  constructor(
    apiKey: string,
    model: string = 'text-embedding-3-small',
    baseUrl: string = 'https://api.openai.com/v1',
    timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl;
    this.timeoutMs = timeoutMs;

    // Update dimensions based on model
    if (model === 'text-embedding-3-large') {
      this.dimensions = 3072;
    } else if (model === 'text-embedding-3-small' || model === 'text-embedding-ada-002') {
      this.dimensions = 1536;
    } else {
      this.dimensions = 0;
    }
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJson(
      'OpenAI',
      `${this.baseUrl}/embeddings`,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, input: texts },
      EmbeddingListSchema,
      this.timeoutMs
    );
    return orderedEmbeddings('OpenAI', data.data, texts.length);
  }

  /** 0 when the model's dimension is not known up front */
  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Azure OpenAI embedding provider.
 */
export class AzureOpenAIEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private endpoint: string;
  private apiVersion: string;
  private deploymentName: string;
  private dimensions = 1536;
  private timeoutMs: number;

  constructor(
    apiKey: string,
    endpoint: string,
    apiVersion: string = '2024-02-15-preview',
    deploymentName: string = 'text-embedding-ada-002',
    timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS
  ) {
    this.apiKey = apiKey;
    this.endpoint = endpoint.replace(/\/+$/, '');
    this.apiVersion = apiVersion;
    this.deploymentName = deploymentName;
    this.timeoutMs = timeoutMs;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const url = `${this.endpoint}/openai/deployments/${this.deploymentName}/embeddings?api-version=${this.apiVersion}`;
    const data = await postJson(
      'Azure OpenAI',
      url,
      { 'api-key': this.apiKey },
      { input: texts },
      EmbeddingListSchema,
      this.timeoutMs
    );
    return orderedEmbeddings('Azure OpenAI', data.data, texts.length);
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Voyage AI embedding provider.
 */
export class VoyageEmbeddingProvider implements EmbeddingProvider {
  private apiKey: string;
  private baseUrl = 'https://api.voyageai.com/v1';
  private model: string;
  private dimensions = 1024;
  private timeoutMs: number;

  constructor(apiKey: string, model: string = 'voyage-2', timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS) {
    this.apiKey = apiKey;
    this.model = model;
    this.timeoutMs = timeoutMs;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const data = await postJson(
      'Voyage',
      `${this.baseUrl}/embeddings`,
      { Authorization: `Bearer ${this.apiKey}` },
      { input: texts, model: this.model },
      EmbeddingListSchema,
      this.timeoutMs
    );
    return orderedEmbeddings('Voyage', data.data, texts.length);
  }

  getDimensions(): number {
    return this.dimensions;
  }
}
