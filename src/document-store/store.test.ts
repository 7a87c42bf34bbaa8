import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ConfigurationError, RetrievalError, StorageError } from '../errors.js';
import { createTempDir, type TempDir } from '../tests/temp-dir.js';
import { FileSystemDocumentStore, createDocumentStore } from './store.js';

describe('FileSystemDocumentStore', () => {
  let temp: TempDir;
  let store: FileSystemDocumentStore;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    temp = await createTempDir();
    store = await createDocumentStore(join(temp.path, 'store'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await temp.cleanup();
  });

  it('round-trips content and metadata, and reports not-found after delete', async () => {
    await store.put('http://a.com/x', 'hello', { k: 1 });

    expect(await store.get('http://a.com/x')).toEqual({ content: 'hello', metadata: { k: 1 } });
    expect(await store.delete('http://a.com/x')).toBe(true);
    expect(await store.get('http://a.com/x')).toBeNull();
  });

  it('writes the content file and a JSON sidecar beside it', async () => {
    await store.put('http://a.com/x', 'hello', { k: 1 });
    const { contentPath, metadataPath } = store.pathFor('http://a.com/x');

    expect(metadataPath).toBe(`${contentPath}.meta.json`);
    expect(await readFile(contentPath, 'utf-8')).toBe('hello');
    expect(await readFile(metadataPath, 'utf-8')).toBe('{\n  "k": 1\n}');
    expect((await readdir(dirname(contentPath))).sort()).toEqual(
      [contentPath, metadataPath].map((path) => path.slice(dirname(contentPath).length + 1)).sort()
    );
  });

  it('returns null metadata when no sidecar was written', async () => {
    await store.put('notes/a.txt', 'plain');
    expect(await store.get('notes/a.txt')).toEqual({ content: 'plain', metadata: null });
  });

  it('replaces an entry and drops a stale sidecar on re-put without metadata', async () => {
    await store.put('notes/a.txt', 'v1', { version: 1 });
    await store.put('notes/a.txt', 'v2');

    expect(await store.get('notes/a.txt')).toEqual({ content: 'v2', metadata: null });
  });

  it('returns the raw bytes when asked for no encoding', async () => {
    const bytes = Buffer.from([0, 1, 2, 255]);
    await store.put('http://a.com/file.pdf', bytes, { content_type: 'application/pdf' });

    const stored = await store.get('http://a.com/file.pdf', { encoding: null });
    expect(stored?.content.equals(bytes)).toBe(true);
    expect(stored?.metadata).toEqual({ content_type: 'application/pdf' });
  });

  it('keeps content readable when the sidecar is corrupt', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await store.put('http://a.com/x', 'hello', { k: 1 });
    await writeFile(store.pathFor('http://a.com/x').metadataPath, '{not json');

    expect(await store.get('http://a.com/x')).toEqual({ content: 'hello', metadata: null });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('ignores a sidecar that is not an object', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await store.put('http://a.com/x', 'hello', { k: 1 });
    await writeFile(store.pathFor('http://a.com/x').metadataPath, '[1, 2]');

    expect(await store.get('http://a.com/x')).toEqual({ content: 'hello', metadata: null });
  });

  it('treats deleting a missing entry as success', async () => {
    expect(await store.delete('http://a.com/never-stored')).toBe(true);
  });

  it('reports whether an entry exists', async () => {
    expect(await store.exists('notes/a.txt')).toBe(false);
    await store.put('notes/a.txt', 'x');
    expect(await store.exists('notes/a.txt')).toBe(true);
  });

  it('surfaces read failures other than not-found as RetrievalError', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    await mkdir(store.pathFor('notes/a.txt').contentPath, { recursive: true });

    await expect(store.get('notes/a.txt')).rejects.toBeInstanceOf(RetrievalError);
  });

  it('surfaces write failures as StorageError', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = join(temp.path, 'blocker');
    await writeFile(blocker, 'not a directory');
    const blocked = new FileSystemDocumentStore(blocker);

    await expect(blocked.put('notes/a.txt', 'x')).rejects.toBeInstanceOf(StorageError);
  });

  it('rejects a non-positive path length', () => {
    expect(() => new FileSystemDocumentStore(temp.path, { maxPathLength: 0 })).toThrow(ConfigurationError);
  });
});
