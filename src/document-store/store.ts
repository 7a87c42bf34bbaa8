/**
 * File System Document Store
 * Persists original document content plus a JSON metadata sidecar, keyed by
 * a deterministic path derived from the document's source id.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { ConfigurationError, RetrievalError, StorageError, getErrorMessage } from '../errors.js';
import { deriveStorageKey, DEFAULT_STORAGE_KEY_OPTIONS, type StorageKeyOptions } from './storage-key.js';

export const METADATA_SUFFIX = '.meta.json';

export type StoredMetadata = Record<string, unknown>;

const StoredMetadataSchema = z.record(z.unknown());

/**
 * A document read back from the store.
 */
export interface StoredDocument<T extends string | Buffer = string> {
  content: T;
  /** null when no sidecar exists or it could not be read */
  metadata: StoredMetadata | null;
}

export interface StoragePaths {
  key: string;
  contentPath: string;
  metadataPath: string;
}

export interface ReadOptions {
  /** Text encoding, or null for the raw bytes. Defaults to utf-8 */
  encoding?: BufferEncoding | null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isNotFound(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

/**
 * Write through a temp file and rename so readers never see a partial file.
 */
async function writeFileAtomic(path: string, data: string | Uint8Array): Promise<void> {
  const tempPath = `${path}.${uuid()}.tmp`;
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export class FileSystemDocumentStore {
  private readonly basePath: string;
  private readonly keyOptions: StorageKeyOptions;

  constructor(basePath: string, keyOptions: Partial<StorageKeyOptions> = {}) {
    this.basePath = basePath;
    this.keyOptions = { ...DEFAULT_STORAGE_KEY_OPTIONS, ...keyOptions };

    if (!Number.isInteger(this.keyOptions.maxPathLength) || this.keyOptions.maxPathLength <= 0) {
      throw new ConfigurationError(
        `maxPathLength must be a positive integer, got ${this.keyOptions.maxPathLength}`
      );
    }
  }

  /**
   * Create the base directory.
   */
  async init(): Promise<void> {
    try {
      await mkdir(this.basePath, { recursive: true });
    } catch (error) {
      throw new ConfigurationError(`Failed to create document store directory ${this.basePath}`, error);
    }
    console.log(`[DocumentStore] Initialized at: ${this.basePath}`);
  }

  /**
   * Resolve where a source id is stored.
   */
  pathFor(sourceId: string): StoragePaths {
    const { key } = deriveStorageKey(sourceId, this.keyOptions);
    const contentPath = join(this.basePath, key);
    return {
      key,
      contentPath,
      metadataPath: `${contentPath}${METADATA_SUFFIX}`,
    };
  }

  /**
   * Store content and, when given, its metadata. Replaces any previous entry
   * for the same source id; a put without metadata removes a stale sidecar.
   */
  async put(sourceId: string, content: string | Uint8Array, metadata?: StoredMetadata): Promise<void> {
    const { contentPath, metadataPath } = this.pathFor(sourceId);

    try {
      await mkdir(dirname(contentPath), { recursive: true });
      await writeFileAtomic(contentPath, content);

      if (metadata !== undefined) {
        await writeFileAtomic(metadataPath, JSON.stringify(metadata, null, 2));
      } else {
        await rm(metadataPath, { force: true });
      }
    } catch (error) {
      console.error(`[DocumentStore] Failed to save '${sourceId}' to ${contentPath}:`, error);
      throw new StorageError(`Failed to write document '${sourceId}': ${getErrorMessage(error)}`, error);
    }
  }

  /**
   * Read a document back. Returns null when nothing is stored for the id.
   */
  async get(sourceId: string): Promise<StoredDocument<string> | null>;
  async get(sourceId: string, options: { encoding: null }): Promise<StoredDocument<Buffer> | null>;
  async get(sourceId: string, options: { encoding?: BufferEncoding }): Promise<StoredDocument<string> | null>;
  async get(sourceId: string, options: ReadOptions = {}): Promise<StoredDocument<string | Buffer> | null> {
    const { contentPath, metadataPath } = this.pathFor(sourceId);
    const encoding = options.encoding === undefined ? 'utf-8' : options.encoding;

    let content: string | Buffer;
    try {
      content = encoding === null ? await readFile(contentPath) : await readFile(contentPath, encoding);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      console.error(`[DocumentStore] Failed to read '${sourceId}' from ${contentPath}:`, error);
      throw new RetrievalError(`Failed to read document '${sourceId}': ${getErrorMessage(error)}`, error);
    }

    return {
      content,
      metadata: await this.readMetadata(sourceId, metadataPath),
    };
  }

  /**
   * Remove a document and its sidecar. Returns true when the entry is gone
   * afterwards (including when it never existed), false on I/O failure.
   */
  async delete(sourceId: string): Promise<boolean> {
    const { contentPath, metadataPath } = this.pathFor(sourceId);

    try {
      await rm(contentPath, { force: true });
      await rm(metadataPath, { force: true });
      return true;
    } catch (error) {
      console.error(`[DocumentStore] Failed to delete '${sourceId}':`, error);
      return false;
    }
  }

  async exists(sourceId: string): Promise<boolean> {
    try {
      await stat(this.pathFor(sourceId).contentPath);
      return true;
    } catch (error) {
      if (isNotFound(error)) {
        return false;
      }
      throw new RetrievalError(`Failed to check document '${sourceId}': ${getErrorMessage(error)}`, error);
    }
  }

  // A broken sidecar never hides the primary content
  private async readMetadata(sourceId: string, metadataPath: string): Promise<StoredMetadata | null> {
    let raw: string;
    try {
      raw = await readFile(metadataPath, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        console.warn(`[DocumentStore] Failed to read metadata for '${sourceId}':`, error);
      }
      return null;
    }

    try {
      const parsed = StoredMetadataSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`[DocumentStore] Metadata for '${sourceId}' is not an object, ignoring it`);
    } catch (error) {
      console.warn(`[DocumentStore] Corrupt metadata for '${sourceId}' at ${metadataPath}:`, error);
    }
    return null;
  }
}

/**
 * Create and initialize a store.
 */
export async function createDocumentStore(
  basePath: string,
  keyOptions: Partial<StorageKeyOptions> = {}
): Promise<FileSystemDocumentStore> {
  const store = new FileSystemDocumentStore(basePath, keyOptions);
  await store.init();
  return store;
}
