import { createHash } from 'crypto';
import { describe, expect, it } from 'vitest';

import { getMimeType, getStorageExtension } from './content-types.js';
import { deriveStorageKey } from './storage-key.js';

const plain = { hashSuffix: false };

function digest(sourceId: string): string {
  return createHash('sha256').update(sourceId).digest('hex').slice(0, 8);
}

describe('deriveStorageKey', () => {
  it('uses the host as directory and the encoded path as name', () => {
    expect(deriveStorageKey('http://a.com/x', plain)).toEqual({
      authority: 'a.com',
      name: 'x',
      extension: '.bin',
      key: 'a.com/x.bin',
    });
  });

  it('replaces the port separator and encodes nested paths into one segment', () => {
    expect(deriveStorageKey('https://example.com:8080/docs/report.pdf', plain).key).toBe(
      'example.com_8080/docs_2Freport.pdf.pdf'
    );
  });

  it('stores plain filenames under the local authority', () => {
    expect(deriveStorageKey('notes/My File.md', plain).key).toBe('_local/notes_2FMy_20File.md.md');
  });

  it('names the root path index', () => {
    expect(deriveStorageKey('http://a.com/', plain).key).toBe('a.com/index.bin');
  });

  it('never produces a dot-only segment', () => {
    expect(deriveStorageKey('..', plain).key).toBe('_local/__.bin');
  });

  it('truncates the path component', () => {
    const key = deriveStorageKey(`http://a.com/${'a'.repeat(150)}`, plain);
    expect(key.name).toBe('a'.repeat(100));
    expect(deriveStorageKey(`http://a.com/${'a'.repeat(20)}`, { ...plain, maxPathLength: 5 }).name).toBe('aaaaa');
  });

  it('appends a digest of the full source id by default', () => {
    const sourceId = 'http://a.com/x.html';
    expect(deriveStorageKey(sourceId)).toEqual({
      authority: 'a.com',
      name: `x.html__${digest(sourceId)}`,
      extension: '.html',
      key: `a.com/x.html__${digest(sourceId)}.html`,
    });
  });

  it('keeps sources apart that only the digest distinguishes', () => {
    const pairs: Array<[string, string]> = [
      [`http://a.com/${'a'.repeat(100)}1`, `http://a.com/${'a'.repeat(100)}2`],
      ['http://a.com/x?page=1', 'http://a.com/x?page=2'],
      ['http://a.com/a%20b', 'http://a.com/a_20b'],
    ];

    for (const [first, second] of pairs) {
      expect(deriveStorageKey(first, plain).key).toBe(deriveStorageKey(second, plain).key);
      expect(deriveStorageKey(first).key).not.toBe(deriveStorageKey(second).key);
    }
  });

  it('is deterministic', () => {
    expect(deriveStorageKey('https://b.org/p/q.txt')).toEqual(deriveStorageKey('https://b.org/p/q.txt'));
  });
});

describe('content types', () => {
  it('maps known extensions case-insensitively', () => {
    expect(getStorageExtension('report.PDF')).toBe('.pdf');
    expect(getStorageExtension('page.htm')).toBe('.html');
    expect(getMimeType('notes.markdown')).toBe('text/markdown');
  });

  it('falls back for unknown extensions', () => {
    expect(getStorageExtension('archive.tar')).toBe('.bin');
    expect(getMimeType('archive.tar')).toBe('application/octet-stream');
  });
});
