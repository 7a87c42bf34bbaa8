/**
 * Document Store Module
 * Content-addressed persistence of original documents.
 */

export type { StoredDocument, StoredMetadata, StoragePaths, ReadOptions } from './store.js';
export type { StorageKey, StorageKeyOptions } from './storage-key.js';

export { FileSystemDocumentStore, createDocumentStore, METADATA_SUFFIX } from './store.js';

export {
  deriveStorageKey,
  DEFAULT_STORAGE_KEY_OPTIONS,
  HASH_SUFFIX_LENGTH,
  LOCAL_AUTHORITY,
} from './storage-key.js';

export { CONTENT_TYPES, UNKNOWN_EXTENSION, getStorageExtension, getMimeType } from './content-types.js';
