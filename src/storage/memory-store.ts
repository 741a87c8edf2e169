/**
 * In-memory storage implementation.
 *
 * Reference implementation for tests and the HTTP explorer. Every value
 * crossing the store boundary is copied, so callers can never mutate
 * stored state through a returned reference.
 */

import { promises as fs } from 'fs';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { ReleaseManifest } from '../domain/manifest';
import {
  CacheBackend,
  CacheEntry,
  CachePayload,
  EventStore,
  ListOptions,
  ReleaseBundle,
  ReleaseSink,
  SinkWriteResult,
  Store,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

/** structuredClone turns Buffers into plain Uint8Arrays, so payloads are copied by hand. */
function copyPayload(payload: CachePayload): CachePayload {
  return {
    files: payload.files.map((f) => ({ name: f.name, content: Buffer.from(f.content) })),
    metadata: { ...payload.metadata },
  };
}

function copyEntry(entry: CacheEntry): CacheEntry {
  return { ...entry, payload: copyPayload(entry.payload) };
}

export class MemoryCacheBackend implements CacheBackend {
  private data = new Map<string, CacheEntry>();

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.data.get(key);
    if (!entry) return null;
    entry.lastUsedAt = new Date().toISOString();
    return copyEntry(entry);
  }

  async put(entry: CacheEntry): Promise<void> {
    this.data.set(entry.key, copyEntry(entry));
  }

  async has(key: string): Promise<boolean> {
    return this.data.has(key);
  }

  /** Number of stored entries. */
  get size(): number {
    return this.data.size;
  }
}

interface StoredRelease {
  manifest: ReleaseManifest;
  files: Map<string, Buffer>;
  checksums: string;
}

export class MemoryReleaseSink implements ReleaseSink {
  private releases = new Map<string, StoredRelease>();

  async getManifest(version: string): Promise<ReleaseManifest | null> {
    const release = this.releases.get(version);
    return release ? deepCopy(release.manifest) : null;
  }

  async putRelease(bundle: ReleaseBundle): Promise<SinkWriteResult> {
    const version = bundle.manifest.version;
    if (this.releases.has(version)) return 'exists';

    // Read every payload before claiming the version so a failed read leaves no trace.
    const files = new Map<string, Buffer>();
    for (const payload of bundle.payloads) {
      files.set(payload.filename, await fs.readFile(payload.path));
    }
    // Re-check: another writer may have claimed the version while payloads were read.
    if (this.releases.has(version)) return 'exists';
    this.releases.set(version, {
      manifest: deepCopy(bundle.manifest),
      files,
      checksums: bundle.checksums,
    });
    return 'created';
  }

  async listVersions(): Promise<string[]> {
    return [...this.releases.keys()].sort();
  }

  async readPayload(version: string, filename: string): Promise<Buffer | null> {
    const content = this.releases.get(version)?.files.get(filename);
    return content ? Buffer.from(content) : null;
  }

  async readChecksums(version: string): Promise<string | null> {
    return this.releases.get(version)?.checksums ?? null;
  }
}

export class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]> {
    const types = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.runId === runId && (!types?.length || types.includes(e.type)),
    );
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a fully in-memory store. */
export function createMemoryStore(): Store {
  return {
    cache: new MemoryCacheBackend(),
    releases: new MemoryReleaseSink(),
    events: new MemoryEventStore(),
  };
}
