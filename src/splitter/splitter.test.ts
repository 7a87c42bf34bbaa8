import { afterEach, describe, expect, it, vi } from 'vitest';

import { createDocument } from '../documents/document.js';
import { ConfigurationError } from '../errors.js';
import { DocumentSplitter, parseSegmentId, segmentId, toEmbeddingRecord } from './splitter.js';

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';

function offsets(splitter: DocumentSplitter, content: string): Array<[number, number]> {
  return splitter
    .split(createDocument({ id: 'd1', content }))
    .map((segment) => [segment.startOffset, segment.endOffset]);
}

describe('DocumentSplitter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('splits with overlap and a short trailing segment', () => {
    const splitter = new DocumentSplitter({ chunkSize: 10, chunkOverlap: 3 });
    expect(offsets(splitter, ALPHABET.slice(0, 25))).toEqual([
      [0, 10],
      [7, 17],
      [14, 24],
      [21, 25],
    ]);
  });

  it('returns one segment when the content fits exactly', () => {
    const splitter = new DocumentSplitter({ chunkSize: 10, chunkOverlap: 3 });
    const segments = splitter.split(createDocument({ id: 'd1', content: 'abcdefghij' }));

    expect(segments).toHaveLength(1);
    expect(segments[0]).toMatchObject({
      id: 'd1#0',
      sequenceNumber: 0,
      startOffset: 0,
      endOffset: 10,
      content: 'abcdefghij',
    });
  });

  it('produces disjoint segments without overlap', () => {
    const splitter = new DocumentSplitter({ chunkSize: 5, chunkOverlap: 0 });
    const segments = splitter.split(createDocument({ id: 'd1', content: ALPHABET.slice(0, 20) }));

    expect(segments.map((segment) => segment.content)).toEqual(['abcde', 'fghij', 'klmno', 'pqrst']);
  });

  it('emits a second segment for content one longer than the chunk size', () => {
    const splitter = new DocumentSplitter({ chunkSize: 10, chunkOverlap: 3 });
    expect(offsets(splitter, ALPHABET.slice(0, 11))).toEqual([
      [0, 10],
      [7, 11],
    ]);
  });

  it('covers the content without gaps and overlaps consecutive segments exactly', () => {
    const splitter = new DocumentSplitter({ chunkSize: 7, chunkOverlap: 2 });
    const ranges = offsets(splitter, ALPHABET);

    expect(ranges[0][0]).toBe(0);
    expect(ranges[ranges.length - 1][1]).toBe(26);
    for (let i = 0; i < ranges.length - 1; i++) {
      expect(ranges[i][1] - ranges[i + 1][0]).toBe(2);
    }
  });

  it('returns no segments for empty content', () => {
    expect(new DocumentSplitter().split(createDocument({ id: 'd1', content: '' }))).toEqual([]);
  });

  it('counts offsets in code points', () => {
    const splitter = new DocumentSplitter({ chunkSize: 2, chunkOverlap: 0 });
    const segments = splitter.split(createDocument({ id: 'd1', content: 'a😀b😀c' }));

    expect(segments.map((segment) => segment.content)).toEqual(['a😀', 'b😀', 'c']);
    expect(segments.map((segment) => [segment.startOffset, segment.endOffset])).toEqual([
      [0, 2],
      [2, 4],
      [4, 5],
    ]);
  });

  it('is deterministic', () => {
    const splitter = new DocumentSplitter({ chunkSize: 6, chunkOverlap: 2 });
    const document = createDocument({ id: 'd1', content: ALPHABET });
    expect(splitter.split(document)).toEqual(splitter.split(document));
  });

  it('merges lineage into segment metadata and copies tags', () => {
    const splitter = new DocumentSplitter({ chunkSize: 4, chunkOverlap: 1 });
    const document = createDocument({
      id: 'doc-7',
      content: 'abcdefg',
      metadata: { lang: 'en' },
      tags: ['news', 'tech'],
    });

    const [, second] = splitter.split(document);

    expect(second.id).toBe('doc-7#1');
    expect(second.parentDocumentId).toBe('doc-7');
    expect(second.content).toBe('defg');
    expect(second.metadata).toEqual({
      lang: 'en',
      parent_document_id: 'doc-7',
      sequence_number: 1,
      start_offset: 3,
      end_offset: 7,
    });
    expect(second.tags).toEqual(['news', 'tech']);
  });

  it('clamps an overlap that is not below the chunk size to zero', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const splitter = new DocumentSplitter({ chunkSize: 10, chunkOverlap: 10 });

    expect(splitter.getOptions()).toEqual({ chunkSize: 10, chunkOverlap: 0 });
    expect(warn).toHaveBeenCalledWith('[Splitter] chunkOverlap (10) >= chunkSize (10), using overlap 0');
    expect(offsets(splitter, ALPHABET.slice(0, 20))).toEqual([
      [0, 10],
      [10, 20],
    ]);
  });

  it('rejects invalid sizes', () => {
    expect(() => new DocumentSplitter({ chunkSize: 0 })).toThrow(ConfigurationError);
    expect(() => new DocumentSplitter({ chunkSize: 2.5 })).toThrow(ConfigurationError);
    expect(() => new DocumentSplitter({ chunkSize: 10, chunkOverlap: -1 })).toThrow(ConfigurationError);
  });

  it('splits several documents in order', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const splitter = new DocumentSplitter({ chunkSize: 3, chunkOverlap: 0 });
    const segments = splitter.splitMany([
      createDocument({ id: 'a', content: 'abcd' }),
      createDocument({ id: 'b', content: 'xy' }),
    ]);

    expect(segments.map((segment) => segment.id)).toEqual(['a#0', 'a#1', 'b#0']);
  });
});

describe('segment ids', () => {
  it('round-trips through parseSegmentId', () => {
    expect(parseSegmentId(segmentId('doc', 3))).toEqual({ parentDocumentId: 'doc', sequenceNumber: 3 });
  });

  it('splits on the last separator', () => {
    expect(parseSegmentId('a#b#12')).toEqual({ parentDocumentId: 'a#b', sequenceNumber: 12 });
  });

  it('rejects ids it did not produce', () => {
    expect(parseSegmentId('doc')).toBeNull();
    expect(parseSegmentId('#1')).toBeNull();
    expect(parseSegmentId('doc#')).toBeNull();
    expect(parseSegmentId('doc#01')).toBeNull();
  });
});

describe('toEmbeddingRecord', () => {
  it('uses the segment id and content and flattens sorted tags', () => {
    const [segment] = new DocumentSplitter({ chunkSize: 10, chunkOverlap: 0 }).split(
      createDocument({ id: 'd1', content: 'hello', tags: ['zeta', 'alpha'] })
    );

    expect(toEmbeddingRecord(segment)).toEqual({
      id: 'd1#0',
      text: 'hello',
      metadata: {
        parent_document_id: 'd1',
        sequence_number: 0,
        start_offset: 0,
        end_offset: 5,
        tags: 'alpha,zeta',
      },
    });
  });
});
