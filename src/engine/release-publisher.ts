/**
 * Release Publisher.
 *
 * Turns a finished schedule into a published, versioned release:
 *
 * - Barrier: every dispatched job must be terminal before anything is evaluated.
 * - Gate: every required variant must have succeeded; failed optional
 *   variants are recorded as omitted.
 * - Idempotency: a version is append-only. Re-publishing identical content
 *   is a no-op success; different content is a VersionConflictError.
 * - Single writer: within the process, publish attempts for one version are
 *   serialized; across processes the sink's exclusive create decides.
 */

import { PipelineError, createTypedError, invalidVersionError, versionConflictError } from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { BuildJob, JobStatus } from '../domain/job';
import { MANIFEST_SCHEMA_VERSION, ManifestEntry, OmittedVariant, ReleaseManifest } from '../domain/manifest';
import { VariantSpec } from '../domain/variant';
import { EventPublisher } from '../events/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { ReleasePayload, ReleaseSink } from '../storage/store';
import { manifestDigest, renderChecksums } from './manifest';
import { ScheduleResult } from './scheduler';
import { isTerminalJobStatus } from './state-machine';

const MAX_VERSION_LENGTH = 128;
const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

/** Outcome of a publish attempt that did not throw. */
export type PublicationOutcome =
  | { kind: 'published'; manifest: ReleaseManifest }
  | { kind: 'unchanged'; manifest: ReleaseManifest }
  | { kind: 'blocked'; blockedBy: string[] };

/**
 * Check a version tag. Tags become directory names in file sinks, so
 * separators and dot-only names are rejected.
 */
export function validateVersionTag(version: string): void {
  if (version.trim().length === 0) {
    throw invalidVersionError(version, 'must not be empty');
  }
  if (version.length > MAX_VERSION_LENGTH) {
    throw invalidVersionError(version, `must be at most ${MAX_VERSION_LENGTH} characters`);
  }
  if (!VERSION_PATTERN.test(version)) {
    throw invalidVersionError(version, 'may only contain letters, digits, ".", "_", "+" and "-", and must start with a letter or digit');
  }
}

/**
 * Required variants that did not succeed, in resolver order. When the fully
 * resolved matrix is given, required variants that were never scheduled
 * block as well.
 */
export function blockingVariants(jobs: BuildJob[], resolved?: readonly VariantSpec[]): string[] {
  const byName = new Map(jobs.map((j) => [j.variant.name, j]));
  return releaseOrder(jobs, resolved)
    .filter((v) => v.required && byName.get(v.name)?.status !== JobStatus.Succeeded)
    .map((v) => v.name);
}

function releaseOrder(jobs: BuildJob[], resolved?: readonly VariantSpec[]): readonly VariantSpec[] {
  return resolved ?? [...jobs].sort((a, b) => a.index - b.index).map((j) => j.variant);
}

/**
 * Assemble the manifest for a set of terminal jobs (resolver order).
 * Variants of the resolved matrix that were not scheduled are omitted as
 * not selected.
 */
export function buildReleaseManifest(version: string, jobs: BuildJob[], resolved?: readonly VariantSpec[]): ReleaseManifest {
  const byName = new Map(jobs.map((j) => [j.variant.name, j]));
  const order = releaseOrder(jobs, resolved);
  const omitted: OmittedVariant[] = [];
  const entries: ManifestEntry[] = [];
  for (const variant of order) {
    const job = byName.get(variant.name);
    if (!job) {
      omitted.push({ variant: variant.name, status: 'not_selected', reason: 'RELEASE.NOT_SELECTED' });
    } else if (job.status === JobStatus.Succeeded) {
      entries.push(...job.entries);
    } else {
      omitted.push({ variant: variant.name, status: job.status, reason: job.error?.code ?? 'BUILD.FAILED' });
    }
  }

  return {
    schemaVersion: MANIFEST_SCHEMA_VERSION,
    version,
    status: omitted.length === 0 ? 'complete' : 'partial',
    variants: order.map((v) => v.name),
    entries,
    omitted,
  };
}

export class ReleasePublisher {
  /** Tail of the publish chain per version. */
  private locks = new Map<string, Promise<unknown>>();
  private log: Logger;

  constructor(
    private sink: ReleaseSink,
    private events?: EventPublisher,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'publisher' });
  }

  /**
   * Publish a release for a finished schedule. Pass the fully resolved
   * matrix when the schedule may cover only a selection of it.
   *
   * @throws VersionConflictError when the version holds a different manifest.
   * @throws PipelineError when a job is not terminal or the version tag is invalid.
   */
  async publish(version: string, schedule: ScheduleResult, resolved?: readonly VariantSpec[]): Promise<PublicationOutcome> {
    validateVersionTag(version);

    const pending = schedule.jobs.filter((j) => !isTerminalJobStatus(j.status));
    if (pending.length > 0) {
      throw new PipelineError(createTypedError({
        code: 'RELEASE.BARRIER',
        message: `Cannot publish while ${pending.length} job(s) are still running`,
        retryable: true,
        details: { pending: pending.map((j) => j.variant.name) },
      }));
    }

    return this.withVersionLock(version, () => this.publishLocked(version, schedule, resolved));
  }

  private async publishLocked(version: string, schedule: ScheduleResult, resolved?: readonly VariantSpec[]): Promise<PublicationOutcome> {
    const log = this.log.child({ runId: schedule.runId, version });

    const blockedBy = blockingVariants(schedule.jobs, resolved);
    if (blockedBy.length > 0) {
      log.error('Release blocked by required variants', { blockedBy });
      await this.safePublish(schedule.runId, 'release.blocked', version, { blockedBy });
      return { kind: 'blocked', blockedBy };
    }

    const manifest = buildReleaseManifest(version, schedule.jobs, resolved);
    const existing = await this.sink.getManifest(version);
    if (existing) {
      return this.resolveExisting(schedule.runId, manifest, existing, log);
    }

    const payloads: ReleasePayload[] = schedule.jobs
      .filter((j) => j.status === JobStatus.Succeeded)
      .flatMap((j) => j.artifacts.map((a) => ({ filename: a.filename, path: a.path })));

    const written = await this.sink.putRelease({ manifest, payloads, checksums: renderChecksums(manifest) });
    if (written === 'exists') {
      // Another writer claimed the version between the check and the write.
      const winner = await this.sink.getManifest(version);
      if (!winner) {
        throw new PipelineError(createTypedError({
          code: 'RELEASE.SINK_INCONSISTENT',
          message: `Sink reported version "${version}" as existing but returned no manifest`,
          retryable: true,
        }));
      }
      return this.resolveExisting(schedule.runId, manifest, winner, log);
    }

    log.info('Release published', {
      entries: manifest.entries.length,
      omitted: manifest.omitted.map((o) => o.variant),
      digest: manifestDigest(manifest),
    });
    await this.safePublish(schedule.runId, 'release.published', version, {
      status: manifest.status,
      entries: manifest.entries.length,
      omitted: manifest.omitted.length,
    });
    return { kind: 'published', manifest };
  }

  private async resolveExisting(
    runId: string,
    attempted: ReleaseManifest,
    existing: ReleaseManifest,
    log: Logger,
  ): Promise<PublicationOutcome> {
    const existingDigest = manifestDigest(existing);
    const attemptedDigest = manifestDigest(attempted);
    if (existingDigest === attemptedDigest) {
      log.info('Version already published with identical content', { digest: existingDigest });
      await this.safePublish(runId, 'release.unchanged', attempted.version, { digest: existingDigest });
      return { kind: 'unchanged', manifest: existing };
    }

    log.error('Version conflict', { existingDigest, attemptedDigest });
    await this.safePublish(runId, 'release.conflict', attempted.version, { existingDigest, attemptedDigest });
    throw versionConflictError(attempted.version, existingDigest, attemptedDigest);
  }

  private async withVersionLock<T>(version: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(version) ?? Promise.resolve();
    const run = previous.then(fn, fn);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(version, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(version) === tail) {
        this.locks.delete(version);
      }
    }
  }

  private async safePublish(runId: string, type: PipelineEventType, version: string, payload: Record<string, unknown>): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.publish(runId, type, { version, payload });
    } catch (err) {
      this.log.warn('Event publication failed', { runId, eventType: type, error: String(err) });
    }
  }
}
