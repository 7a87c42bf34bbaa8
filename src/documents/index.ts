export type {
  Document,
  DocumentInit,
  Segment,
  EmbeddingRecord,
  Metadata,
  MetadataValue,
} from './types.js';

export { LINEAGE_KEYS } from './types.js';

export {
  createDocument,
  withContent,
  deriveDocumentId,
  flattenMetadata,
  MetadataSchema,
  MetadataValueSchema,
  DOCUMENT_ID_NAMESPACE,
} from './document.js';
