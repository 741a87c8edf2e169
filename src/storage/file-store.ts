/**
 * Filesystem storage implementation.
 *
 * Cache layout:   <cacheDir>/<key>/entry.json + <cacheDir>/<key>/files/<name>
 * Release layout: <outputDir>/<version>/manifest.json, SHA256SUMS and one file per artifact
 *
 * Both are written into a staging directory that is renamed into place, so
 * a reader sees either nothing or a complete entry. Renaming onto an
 * existing (non-empty) directory fails, which makes the rename the
 * single-writer gate for a key or version across processes.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { MANIFEST_FILENAME, CHECKSUMS_FILENAME, ReleaseManifest } from '../domain/manifest';
import { logger } from '../logger';
import { MemoryEventStore } from './memory-store';
import {
  CacheBackend,
  CacheEntry,
  CachedFile,
  ReleaseBundle,
  ReleaseSink,
  SinkWriteResult,
  Store,
} from './store';

const log = logger.child({ component: 'file-store' });

interface EntryRecord {
  key: string;
  createdAt: string;
  lastUsedAt: string;
  metadata: Record<string, string>;
  files: string[];
}

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** Rename failures that mean "someone else already put it there". */
function isAlreadyPresent(err: unknown): boolean {
  const code = errnoCode(err);
  return code === 'EEXIST' || code === 'ENOTEMPTY';
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

/** Reject path segments that would escape the storage root. */
function assertSegment(kind: string, value: string): void {
  if (!value || value === '.' || value === '..' || /[\\/]/.test(value) || value.includes('\0')) {
    throw new Error(`Invalid ${kind} "${value}"`);
  }
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.tmp.${uuid()}`;
  await fs.writeFile(tmp, content);
  await fs.rename(tmp, filePath);
}

export class FileCacheBackend implements CacheBackend {
  constructor(private readonly root: string) {}

  private entryDir(key: string): string {
    assertSegment('cache key', key);
    return path.join(this.root, key);
  }

  private async readRecord(key: string): Promise<EntryRecord | null> {
    try {
      const raw = await fs.readFile(path.join(this.entryDir(key), 'entry.json'), 'utf8');
      const record: EntryRecord = JSON.parse(raw);
      return record;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async get(key: string): Promise<CacheEntry | null> {
    const record = await this.readRecord(key);
    if (!record) return null;

    const dir = this.entryDir(key);
    const files: CachedFile[] = [];
    for (const name of record.files) {
      files.push({ name, content: await fs.readFile(path.join(dir, 'files', name)) });
    }

    record.lastUsedAt = new Date().toISOString();
    await writeFileAtomic(path.join(dir, 'entry.json'), JSON.stringify(record, null, 2));

    return {
      key,
      payload: { files, metadata: record.metadata },
      createdAt: record.createdAt,
      lastUsedAt: record.lastUsedAt,
    };
  }

  async put(entry: CacheEntry): Promise<void> {
    const target = this.entryDir(entry.key);
    if (await exists(target)) return;

    await fs.mkdir(this.root, { recursive: true });
    const staging = path.join(this.root, `.staging-${uuid()}`);
    try {
      await fs.mkdir(path.join(staging, 'files'), { recursive: true });
      for (const file of entry.payload.files) {
        assertSegment('cached file name', file.name);
        await fs.writeFile(path.join(staging, 'files', file.name), file.content);
      }
      const record: EntryRecord = {
        key: entry.key,
        createdAt: entry.createdAt,
        lastUsedAt: entry.lastUsedAt,
        metadata: entry.payload.metadata,
        files: entry.payload.files.map((f) => f.name),
      };
      await fs.writeFile(path.join(staging, 'entry.json'), JSON.stringify(record, null, 2));
      await fs.rename(staging, target);
    } catch (err) {
      await fs.rm(staging, { recursive: true, force: true });
      // Identical key means identical content; losing the race is fine.
      if (isAlreadyPresent(err)) return;
      throw err;
    }
  }

  async has(key: string): Promise<boolean> {
    return exists(path.join(this.entryDir(key), 'entry.json'));
  }

  /**
   * Retention helper for external eviction jobs: removes entries whose last
   * use is older than maxAgeMs. The pipeline itself never evicts.
   */
  async evictOlderThan(maxAgeMs: number, now: Date = new Date()): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.root);
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }

    const evicted: string[] = [];
    for (const name of names.filter((n) => !n.startsWith('.')).sort()) {
      const record = await this.readRecord(name);
      if (!record) continue;
      if (now.getTime() - new Date(record.lastUsedAt).getTime() > maxAgeMs) {
        await fs.rm(this.entryDir(name), { recursive: true, force: true });
        evicted.push(name);
      }
    }
    if (evicted.length > 0) {
      log.info('Evicted cache entries', { count: evicted.length, maxAgeMs });
    }
    return evicted;
  }
}

export class FileReleaseSink implements ReleaseSink {
  constructor(private readonly root: string) {}

  private releaseDir(version: string): string {
    assertSegment('version', version);
    return path.join(this.root, version);
  }

  async getManifest(version: string): Promise<ReleaseManifest | null> {
    try {
      const raw = await fs.readFile(path.join(this.releaseDir(version), MANIFEST_FILENAME), 'utf8');
      const manifest: ReleaseManifest = JSON.parse(raw);
      return manifest;
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async putRelease(bundle: ReleaseBundle): Promise<SinkWriteResult> {
    const target = this.releaseDir(bundle.manifest.version);
    if (await exists(target)) return 'exists';

    await fs.mkdir(this.root, { recursive: true });
    const staging = path.join(this.root, `.staging-${uuid()}`);
    try {
      await fs.mkdir(staging);
      for (const payload of bundle.payloads) {
        assertSegment('filename', payload.filename);
        await fs.copyFile(payload.path, path.join(staging, payload.filename));
      }
      await fs.writeFile(path.join(staging, CHECKSUMS_FILENAME), bundle.checksums);
      await fs.writeFile(path.join(staging, MANIFEST_FILENAME), JSON.stringify(bundle.manifest, null, 2) + '\n');
      await fs.rename(staging, target);
      return 'created';
    } catch (err) {
      await fs.rm(staging, { recursive: true, force: true });
      if (isAlreadyPresent(err)) return 'exists';
      throw err;
    }
  }

  async listVersions(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.root, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return [];
      throw err;
    }
  }

  async readPayload(version: string, filename: string): Promise<Buffer | null> {
    assertSegment('filename', filename);
    try {
      return await fs.readFile(path.join(this.releaseDir(version), filename));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }

  async readChecksums(version: string): Promise<string | null> {
    try {
      return await fs.readFile(path.join(this.releaseDir(version), CHECKSUMS_FILENAME), 'utf8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }
  }
}

/** Create a store backed by the filesystem; events stay in memory. */
export function createFileStore(options: { cacheDir: string; outputDir: string }): Store {
  return {
    cache: new FileCacheBackend(options.cacheDir),
    releases: new FileReleaseSink(options.outputDir),
    events: new MemoryEventStore(),
  };
}
