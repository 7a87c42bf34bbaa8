import { createHash } from 'crypto';
import { getStorageExtension } from './content-types.js';

export interface StorageKeyOptions {
  /** Maximum length of the encoded path component */
  maxPathLength: number;
  /**
   * Append a short SHA-256 of the full source id to the path component.
   * Without it, sources that differ only past the truncation point, only in
   * their query string, or in `%` vs `_` map to the same key.
   */
  hashSuffix: boolean;
}

export const DEFAULT_STORAGE_KEY_OPTIONS: StorageKeyOptions = {
  maxPathLength: 100,
  hashSuffix: true,
};

export const HASH_SUFFIX_LENGTH = 8;

/** Authority used for sources without one (plain filenames, file: URLs) */
export const LOCAL_AUTHORITY = '_local';

export interface StorageKey {
  /** Directory-safe authority hint */
  authority: string;
  /** Encoded, truncated path component without extension */
  name: string;
  /** Extension sniffed from the source path */
  extension: string;
  /** `${authority}/${name}${extension}` */
  key: string;
}

interface Locator {
  authority: string;
  path: string;
}

function parseLocator(sourceId: string): Locator {
  if (/^[a-zA-Z][a-zA-Z\d+.-]*:/.test(sourceId) && URL.canParse(sourceId)) {
    const url = new URL(sourceId);
    return { authority: url.host, path: safeDecode(url.pathname) };
  }
  // Plain filenames and other non-URL locators are all path
  return { authority: '', path: sourceId };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Percent-encode everything outside the RFC 3986 unreserved set, then turn
 * `%` into `_` so the result is a single filesystem-safe segment.
 */
function encodePathComponent(path: string): string {
  return encodeURIComponent(path)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%/g, '_');
}

function sanitizeAuthority(authority: string): string {
  if (!authority) {
    return LOCAL_AUTHORITY;
  }
  return avoidDotSegment(authority.replace(/:/g, '_').replace(/[^A-Za-z0-9._-]/g, '_'));
}

// "." and ".." would resolve outside the intended directory
function avoidDotSegment(segment: string): string {
  return /^\.+$/.test(segment) ? segment.replace(/\./g, '_') : segment;
}

/**
 * Derive the storage key for a source id. Deterministic: the same id and
 * options always yield the same key.
 */
export function deriveStorageKey(
  sourceId: string,
  options: Partial<StorageKeyOptions> = {}
): StorageKey {
  const opts = { ...DEFAULT_STORAGE_KEY_OPTIONS, ...options };
  const { authority, path } = parseLocator(sourceId);

  const trimmedPath = path.replace(/^\/+|\/+$/g, '');
  let name = avoidDotSegment(encodePathComponent(trimmedPath).slice(0, opts.maxPathLength)) || 'index';

  if (opts.hashSuffix) {
    const digest = createHash('sha256').update(sourceId).digest('hex').slice(0, HASH_SUFFIX_LENGTH);
    name = `${name}__${digest}`;
  }

  const safeAuthority = sanitizeAuthority(authority);
  const extension = getStorageExtension(trimmedPath);

  return {
    authority: safeAuthority,
    name,
    extension,
    key: `${safeAuthority}/${name}${extension}`,
  };
}
