/**
 * Content Types
 * Extension sniffing for stored documents.
 */

import { extname } from 'path';

/**
 * Known source extensions, the extension used on disk and their MIME types.
 */
export const CONTENT_TYPES: Record<string, { storageExtension: string; mimeType: string }> = {
  '.pdf': { storageExtension: '.pdf', mimeType: 'application/pdf' },
  '.html': { storageExtension: '.html', mimeType: 'text/html' },
  '.htm': { storageExtension: '.html', mimeType: 'text/html' },
  '.txt': { storageExtension: '.txt', mimeType: 'text/plain' },
  '.md': { storageExtension: '.md', mimeType: 'text/markdown' },
  '.markdown': { storageExtension: '.md', mimeType: 'text/markdown' },
  '.json': { storageExtension: '.json', mimeType: 'application/json' },
  '.csv': { storageExtension: '.csv', mimeType: 'text/csv' },
  '.xml': { storageExtension: '.xml', mimeType: 'application/xml' },
  '.docx': {
    storageExtension: '.docx',
    mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  },
};

/** Extension for content without a recognizable type */
export const UNKNOWN_EXTENSION = '.bin';

/**
 * Extension to store a document under, sniffed from its path.
 */
export function getStorageExtension(path: string): string {
  const ext = extname(path).toLowerCase();
  return CONTENT_TYPES[ext]?.storageExtension ?? UNKNOWN_EXTENSION;
}

/**
 * MIME type for a path, application/octet-stream when unknown.
 */
export function getMimeType(path: string): string {
  const ext = extname(path).toLowerCase();
  return CONTENT_TYPES[ext]?.mimeType ?? 'application/octet-stream';
}
