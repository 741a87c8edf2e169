import { promises as fs } from 'fs';
import path from 'path';
import { UNSIGNED } from '../../src/domain/artifact';
import { ReleaseManifest } from '../../src/domain/manifest';
import { FileCacheBackend, FileReleaseSink } from '../../src/storage/file-store';
import { CacheEntry } from '../../src/storage/store';
import { makeTempDir } from '../helpers/fake-toolchain';

function entry(key: string, content: string, lastUsedAt = '2024-01-01T00:00:00.000Z'): CacheEntry {
  return {
    key,
    payload: { files: [{ name: 'app.bin', content: Buffer.from(content) }], metadata: { variant: 'play-standard' } },
    createdAt: '2024-01-01T00:00:00.000Z',
    lastUsedAt,
  };
}

function manifestFor(version: string): ReleaseManifest {
  return {
    schemaVersion: '1',
    version,
    status: 'complete',
    variants: ['play-standard'],
    entries: [{ variant: 'play-standard', filename: 'app.bin', sha256: 'ab'.repeat(32), size: 5, signature: UNSIGNED }],
    omitted: [],
  };
}

describe('FileCacheBackend', () => {
  let root: string;
  let cache: FileCacheBackend;

  beforeEach(async () => {
    root = await makeTempDir();
    cache = new FileCacheBackend(path.join(root, 'cache'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('stores files and metadata under the key', async () => {
    await cache.put(entry('abc123', 'compiled'));

    const stored = await cache.get('abc123');
    expect(stored?.payload.files.map((f) => [f.name, f.content.toString()])).toEqual([['app.bin', 'compiled']]);
    expect(stored?.payload.metadata).toEqual({ variant: 'play-standard' });
    expect(await fs.readFile(path.join(root, 'cache', 'abc123', 'files', 'app.bin'), 'utf8')).toBe('compiled');
    expect(await cache.has('abc123')).toBe(true);
  });

  it('returns null for an unknown key', async () => {
    expect(await cache.get('missing')).toBeNull();
    expect(await cache.has('missing')).toBe(false);
  });

  it('keeps the first entry written for a key', async () => {
    await cache.put(entry('abc123', 'first'));
    await cache.put(entry('abc123', 'second'));
    expect((await cache.get('abc123'))?.payload.files[0].content.toString()).toBe('first');
  });

  it('accepts concurrent writers of the same key', async () => {
    await Promise.all([cache.put(entry('abc123', 'same')), cache.put(entry('abc123', 'same'))]);
    expect((await cache.get('abc123'))?.payload.files[0].content.toString()).toBe('same');
    expect((await fs.readdir(path.join(root, 'cache'))).filter((n) => n.startsWith('.staging'))).toEqual([]);
  });

  it('rejects keys that would escape the cache directory', async () => {
    await expect(cache.get('../outside')).rejects.toThrow('Invalid cache key "../outside"');
  });

  it('evicts entries unused for longer than the retention window', async () => {
    await cache.put(entry('old', 'x', '2024-01-01T00:00:00.000Z'));
    await cache.put(entry('recent', 'y', '2024-01-09T12:00:00.000Z'));

    const evicted = await cache.evictOlderThan(24 * 60 * 60 * 1000, new Date('2024-01-10T00:00:00.000Z'));

    expect(evicted).toEqual(['old']);
    expect(await cache.has('old')).toBe(false);
    expect(await cache.has('recent')).toBe(true);
  });

  it('evicts nothing when the cache directory does not exist yet', async () => {
    expect(await cache.evictOlderThan(0)).toEqual([]);
  });
});

describe('FileReleaseSink', () => {
  let root: string;
  let sink: FileReleaseSink;
  let payloadPath: string;

  beforeEach(async () => {
    root = await makeTempDir();
    sink = new FileReleaseSink(path.join(root, 'releases'));
    payloadPath = path.join(root, 'app.bin');
    await fs.writeFile(payloadPath, 'hello');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  const bundle = (version: string) => ({
    manifest: manifestFor(version),
    payloads: [{ filename: 'app.bin', path: payloadPath }],
    checksums: `${'ab'.repeat(32)}  app.bin\n`,
  });

  it('writes the manifest, checksums and payloads into the version directory', async () => {
    expect(await sink.putRelease(bundle('1.0.0'))).toBe('created');

    const dir = path.join(root, 'releases', '1.0.0');
    expect((await fs.readdir(dir)).sort()).toEqual(['SHA256SUMS', 'app.bin', 'manifest.json']);
    expect(await sink.getManifest('1.0.0')).toEqual(manifestFor('1.0.0'));
    expect((await sink.readPayload('1.0.0', 'app.bin'))?.toString()).toBe('hello');
    expect(await sink.readChecksums('1.0.0')).toBe(`${'ab'.repeat(32)}  app.bin\n`);
  });

  it('never overwrites a published version', async () => {
    await sink.putRelease(bundle('1.0.0'));
    await fs.writeFile(payloadPath, 'changed');

    expect(await sink.putRelease(bundle('1.0.0'))).toBe('exists');
    expect((await sink.readPayload('1.0.0', 'app.bin'))?.toString()).toBe('hello');
  });

  it('lets exactly one of two racing writers create a version', async () => {
    const results = await Promise.all([sink.putRelease(bundle('1.0.0')), sink.putRelease(bundle('1.0.0'))]);
    expect(results.sort()).toEqual(['created', 'exists']);
    expect(await sink.listVersions()).toEqual(['1.0.0']);
  });

  it('reports absent releases as null', async () => {
    expect(await sink.getManifest('9.9.9')).toBeNull();
    expect(await sink.readPayload('9.9.9', 'app.bin')).toBeNull();
    expect(await sink.readChecksums('9.9.9')).toBeNull();
    expect(await sink.listVersions()).toEqual([]);
  });

  it('lists versions sorted', async () => {
    await sink.putRelease(bundle('2.0.0'));
    await sink.putRelease(bundle('1.0.0'));
    expect(await sink.listVersions()).toEqual(['1.0.0', '2.0.0']);
  });

  it('rejects version tags that would escape the output directory', async () => {
    await expect(sink.putRelease(bundle('../1.0.0'))).rejects.toThrow('Invalid version "../1.0.0"');
  });
});
