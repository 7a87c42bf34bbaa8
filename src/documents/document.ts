import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import type { Document, DocumentInit, Metadata, MetadataValue } from './types.js';

/**
 * Namespace for source-derived document ids. Changing it changes every id.
 */
export const DOCUMENT_ID_NAMESPACE = '6f1c2b8e-4d3a-5e9f-8a7b-2c1d0e9f8a7b';

export const MetadataValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);
export const MetadataSchema = z.record(MetadataValueSchema);

/**
 * Derive a document id. The same source always yields the same id so that
 * re-ingesting a document replaces its segments instead of duplicating them.
 */
export function deriveDocumentId(source?: string): string {
  if (source) {
    return uuidv5(source, DOCUMENT_ID_NAMESPACE);
  }
  return uuidv4();
}

/**
 * Build an immutable Document from loose input.
 */
export function createDocument(init: DocumentInit): Document {
  const tags = init.tags ? Array.from(new Set(init.tags)) : [];

  return Object.freeze({
    id: init.id ?? deriveDocumentId(init.source),
    content: init.content,
    source: init.source,
    metadata: Object.freeze(flattenMetadata(init.metadata ?? {})),
    tags: Object.freeze(tags),
    processedAt: init.processedAt ?? new Date().toISOString(),
  });
}

/**
 * Produce a new version of a document with replaced content. The id is kept.
 */
export function withContent(document: Document, content: string): Document {
  return Object.freeze({
    ...document,
    content,
    processedAt: new Date().toISOString(),
  });
}

function isScalar(value: unknown): value is MetadataValue {
  return MetadataValueSchema.safeParse(value).success;
}

/**
 * Flatten an open map to persistable scalars.
 *
 * Dates become ISO strings, sets of scalars become sorted comma-joined
 * strings (numbers in numeric order, ahead of other values), arrays of scalars keep their order, other objects are
 * JSON-serialized. null, undefined and non-finite numbers are dropped.
 */
export function flattenMetadata(input: Record<string, unknown>): Metadata {
  const flat: Metadata = {};

  for (const [key, value] of Object.entries(input)) {
    if (value === null || value === undefined) {
      continue;
    }
    if (isScalar(value)) {
      flat[key] = value;
    } else if (typeof value === 'number') {
      continue;
    } else if (value instanceof Date) {
      if (!Number.isNaN(value.getTime())) {
        flat[key] = value.toISOString();
      }
    } else if (value instanceof Set) {
      flat[key] = joinScalars(Array.from(value).sort(compareSetItems));
    } else if (Array.isArray(value)) {
      flat[key] = joinScalars(value);
    } else if (typeof value === 'object') {
      flat[key] = JSON.stringify(value);
    }
  }

  return flat;
}

function compareSetItems(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function joinScalars(values: unknown[]): string {
  return values
    .map((item) => (isScalar(item) ? String(item) : JSON.stringify(item)))
    .join(',');
}
