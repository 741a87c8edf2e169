/**
 * Storage layer interfaces.
 *
 * Defines the contracts for the three pieces of state the pipeline touches
 * outside a single job: the content-addressed build cache, the publication
 * sink that hosts releases, and the event log. Backends are pluggable:
 * memory for tests and the HTTP explorer, filesystem for real runs.
 */

import { PipelineEvent, PipelineEventType } from '../domain/events';
import { ReleaseManifest } from '../domain/manifest';

/** A file held by a cache entry. */
export interface CachedFile {
  name: string;
  content: Buffer;
}

/** Cached payload: the files of one build layer plus string metadata. */
export interface CachePayload {
  files: CachedFile[];
  metadata: Record<string, string>;
}

/** A reusable build artifact keyed by the content hash of its inputs. */
export interface CacheEntry {
  key: string;
  payload: CachePayload;
  createdAt: string;
  lastUsedAt: string;
}

/**
 * Cache backend. Keys are derived from content only, so a stored entry is
 * never stale; eviction is an external retention concern.
 */
export interface CacheBackend {
  /** Fetch an entry and mark it used. */
  get(key: string): Promise<CacheEntry | null>;
  put(entry: CacheEntry): Promise<void>;
  has(key: string): Promise<boolean>;
}

/** A payload handed to the sink: the published filename and the local bytes. */
export interface ReleasePayload {
  filename: string;
  path: string;
}

/** Everything that makes up one published release. */
export interface ReleaseBundle {
  manifest: ReleaseManifest;
  payloads: ReleasePayload[];
  /** Rendered SHA256SUMS file. */
  checksums: string;
}

/** Outcome of a sink write. "exists" means another writer published the version first. */
export type SinkWriteResult = 'created' | 'exists';

/**
 * Publication sink. A version is append-only: once putRelease returns
 * "created" for a version, later writes for it return "exists" and leave
 * the stored release untouched.
 */
export interface ReleaseSink {
  getManifest(version: string): Promise<ReleaseManifest | null>;
  putRelease(bundle: ReleaseBundle): Promise<SinkWriteResult>;
  listVersions(): Promise<string[]>;
  /** Published bytes of one file, or null when absent. */
  readPayload(version: string, filename: string): Promise<Buffer | null>;
  /** Stored SHA256SUMS text, or null when absent. */
  readChecksums(version: string): Promise<string | null>;
}

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for pipeline events. */
export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
}

/** Composite store interface. */
export interface Store {
  cache: CacheBackend;
  releases: ReleaseSink;
  events: EventStore;
}
