/**
 * Cache Manager.
 *
 * One content-addressed key abstraction for every cache layer (dependency
 * resolution, compiled outputs). Keys are hashes of declared
 * inputs only, never of time, so an entry can never be stale: change any
 * input and the key changes.
 *
 * Concurrent lookups of the same key collapse into a single computation
 * (single-flight). The first miss runs the producer; every other caller
 * waits for that result and reuses it.
 */

import { createHash } from 'crypto';
import { createReadStream, promises as fs } from 'fs';
import path from 'path';
import { JsonValue, stableDigest } from './stable-json';
import { CacheBackend, CacheEntry, CachePayload } from '../storage/store';
import { CacheOutcome } from '../domain/job';
import { Logger, logger as rootLogger } from '../logger';

/**
 * Cache layers sharing the key abstraction. The toolchain identity is an
 * input of every key, so a toolchain upgrade invalidates both layers.
 */
export type CacheNamespace = 'dependencies' | 'outputs';

/** Declared inputs a cache key is derived from. */
export interface CacheKeyInputs {
  namespace: CacheNamespace;
  /** Toolchain identity, including its version. */
  toolchain: string;
  /** Digest of dependency lock file contents. */
  lockDigest?: string;
  /** Digest of the source tree. */
  sourceDigest?: string;
  /** Variant flags. */
  flags?: Record<string, string>;
  /** Declared output filenames. */
  outputs?: readonly string[];
}

/** Derive a deterministic cache key: "<namespace>-<sha256>". */
export function computeCacheKey(inputs: CacheKeyInputs): string {
  const canonical: JsonValue = {
    namespace: inputs.namespace,
    toolchain: inputs.toolchain,
    lockDigest: inputs.lockDigest ?? null,
    sourceDigest: inputs.sourceDigest ?? null,
    flags: inputs.flags ? { ...inputs.flags } : {},
    outputs: inputs.outputs ? [...inputs.outputs] : [],
  };
  return `${inputs.namespace}-${stableDigest(canonical)}`;
}

/**
 * Hash the contents of several files into one digest. Each file is folded
 * in with its path relative to baseDir, sorted, so the result depends on
 * neither argument order nor checkout location.
 */
export async function digestFiles(paths: string[], baseDir: string = process.cwd()): Promise<string> {
  const hash = createHash('sha256');
  const files = paths
    .map((file) => ({ file, name: path.relative(baseDir, path.resolve(baseDir, file)).split(path.sep).join('/') }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const { file, name } of files) {
    hash.update(`${name}\0`);
    await new Promise<void>((resolve, reject) => {
      createReadStream(path.resolve(baseDir, file))
        .on('data', (chunk) => hash.update(chunk))
        .on('end', () => resolve())
        .on('error', reject);
    });
    hash.update('\0');
  }
  return hash.digest('hex');
}

/** Digest every file under a directory, skipping the named directories. */
export async function digestTree(root: string, ignore: string[] = ['.git', 'node_modules']): Promise<string> {
  const files: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (ignore.includes(entry.name)) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) await walk(full);
      else if (entry.isFile()) files.push(full);
    }
  };
  await walk(root);
  return digestFiles(files, root);
}

/** Result of a single-flight lookup. */
export interface CacheResult {
  entry: CacheEntry;
  /** hit: stored earlier; computed: produced by this caller; shared: produced by a concurrent caller. */
  outcome: CacheOutcome;
}

/** One shared computation and the callers still waiting on it. */
interface Flight {
  key: string;
  promise: Promise<CacheEntry>;
  controller: AbortController;
  waiters: number;
}

export class CacheManager {
  private inflight = new Map<string, Flight>();
  private log: Logger;

  constructor(
    private readonly backend: CacheBackend,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'cache' });
  }

  /** Look up a stored entry; null on miss. */
  async lookup(key: string): Promise<CacheEntry | null> {
    return this.backend.get(key);
  }

  /** Store a payload under a key. */
  async store(key: string, payload: CachePayload): Promise<CacheEntry> {
    const now = new Date().toISOString();
    const entry: CacheEntry = { key, payload, createdAt: now, lastUsedAt: now };
    await this.backend.put(entry);
    return entry;
  }

  /** Number of keys currently being produced. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  /**
   * Return the entry for a key, running the producer at most once across
   * concurrent callers. A failed producer rejects every waiter; the key is
   * released so a later call can try again.
   *
   * The producer gets a signal of its own, not the caller's. An aborted
   * caller stops waiting at once, but the shared work is only cancelled
   * once every caller waiting on it has aborted.
   */
  async getOrCompute(
    key: string,
    produce: (signal: AbortSignal) => Promise<CachePayload>,
    signal?: AbortSignal,
  ): Promise<CacheResult> {
    signal?.throwIfAborted();
    const pending = this.inflight.get(key);
    if (pending) {
      this.log.debug('Waiting on in-flight cache computation', { key });
      return { entry: await this.join(pending, signal), outcome: 'shared' };
    }

    let outcome: CacheOutcome = 'hit';
    const controller = new AbortController();
    const flight: Flight = {
      key,
      controller,
      waiters: 0,
      promise: (async () => {
        const existing = await this.backend.get(key);
        if (existing) {
          this.log.debug('Cache hit', { key });
          return existing;
        }
        outcome = 'computed';
        this.log.info('Cache miss, computing', { key });
        const payload = await produce(controller.signal);
        return this.store(key, payload);
      })(),
    };
    this.inflight.set(key, flight);
    void flight.promise.then(
      () => this.release(flight),
      () => this.release(flight),
    );
    return { entry: await this.join(flight, signal), outcome };
  }

  private join(flight: Flight, signal?: AbortSignal): Promise<CacheEntry> {
    flight.waiters += 1;
    if (!signal) return flight.promise;

    return new Promise<CacheEntry>((resolve, reject) => {
      const onAbort = () => {
        flight.waiters -= 1;
        if (flight.waiters === 0) {
          this.log.debug('Every waiter aborted, cancelling cache computation', { key: flight.key });
          this.release(flight);
          flight.controller.abort(signal.reason);
        }
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      void flight.promise.then(
        (entry) => {
          signal.removeEventListener('abort', onAbort);
          resolve(entry);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  /** Drop a flight from the map unless a newer one already replaced it. */
  private release(flight: Flight): void {
    if (this.inflight.get(flight.key) === flight) {
      this.inflight.delete(flight.key);
    }
  }
}
