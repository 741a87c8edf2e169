/**
 * Release Pipeline: the orchestration core.
 *
 * Resolver -> Scheduler -> per job (cache -> toolchain -> signer -> digest)
 * -> Publisher. Job-level failures stay inside their job result; only the
 * barrier-level decisions (blocked by a required variant, version
 * conflict) escalate to the pipeline outcome.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { Artifact, UNSIGNED } from '../domain/artifact';
import {
  PipelineError,
  TypedError,
  VersionConflictError,
  buildFailedError,
  invalidMatrixError,
  missingOutputError,
} from '../domain/errors';
import { AggregateResult, JobSummary, summarizeJob } from '../domain/job';
import { ManifestEntry, ReleaseManifest } from '../domain/manifest';
import { MatrixDefinition, VariantSpec } from '../domain/variant';
import { EventPublisher } from '../events/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { CachePayload, CachedFile, Store } from '../storage/store';
import { Toolchain } from '../toolchain/toolchain';
import { CacheManager, computeCacheKey } from './cache';
import { createManifestEntry, manifestDigest } from './manifest';
import { ReleasePublisher, blockingVariants, validateVersionTag } from './release-publisher';
import { resolveMatrix, selectVariants } from './resolver';
import { BuildScheduler, JobContext, JobHandler, JobOutput, ScheduleResult, SchedulerConfig } from './scheduler';
import { ArtifactSigner } from './signer';
import { ReleaseVerification, verifyRelease } from './verify';

export interface PipelineOptions {
  matrix: MatrixDefinition;
  toolchain: Toolchain;
  store: Store;
  /** Root for per-run job directories. Artifacts stay here until published. */
  workRoot: string;
  signer?: ArtifactSigner;
  scheduler?: Partial<SchedulerConfig>;
  /** Digest of dependency lock file contents. */
  lockDigest?: string;
  /** Digest of the source tree. */
  sourceDigest?: string;
  logger?: Logger;
}

/** What happened at the publication step. */
export type PublicationReport =
  | { kind: 'skipped' }
  | { kind: 'published'; manifestDigest: string }
  | { kind: 'unchanged'; manifestDigest: string }
  | { kind: 'blocked'; blockedBy: string[] }
  | { kind: 'conflict'; error: TypedError };

/** Final report: every variant's terminal state plus the publication decision. */
export interface PipelineReport {
  runId: string;
  version?: string;
  aggregate: AggregateResult;
  jobs: JobSummary[];
  /** Required variants that did not succeed. */
  blockedBy: string[];
  publication: PublicationReport;
  manifest?: ReleaseManifest;
}

/** A finished build, kept so it can be published (again) under a version. */
export interface PipelineRun {
  report: PipelineReport;
  schedule: ScheduleResult;
}

export class ReleasePipeline {
  readonly cache: CacheManager;
  readonly scheduler: BuildScheduler;
  readonly publisher: ReleasePublisher;
  readonly events: EventPublisher;
  private readonly signer: ArtifactSigner;
  private readonly log: Logger;

  constructor(private readonly options: PipelineOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'pipeline' });
    this.events = new EventPublisher(options.store.events, this.log);
    this.cache = new CacheManager(options.store.cache, this.log);
    this.scheduler = new BuildScheduler(options.scheduler, this.events, this.log);
    this.publisher = new ReleasePublisher(options.store.releases, this.events, this.log);
    this.signer = options.signer ?? new ArtifactSigner(undefined, this.log);
  }

  /**
   * Resolve the matrix and narrow it with a selector.
   *
   * @throws InvalidMatrixError before any job starts.
   */
  resolve(selector?: string): VariantSpec[] {
    return selectVariants(resolveMatrix(this.options.matrix), selector);
  }

  /** Build the selected variants without publishing. */
  async build(selector?: string): Promise<PipelineRun> {
    const variants = this.resolve(selector);
    const schedule = await this.runSchedule(variants);
    return { schedule, report: this.report(schedule, { kind: 'skipped' }) };
  }

  /**
   * Build every variant and publish the result under a version tag. A
   * version conflict is reported, not thrown; the built artifacts remain in
   * the returned schedule for a retry under a corrected version. A selector
   * may leave out optional variants only.
   *
   * @throws InvalidMatrixError when the selector leaves out a required variant.
   * @throws PipelineError (RELEASE.INVALID_VERSION) before any build for a malformed tag.
   */
  async release(version: string, selector?: string): Promise<PipelineRun> {
    validateVersionTag(version);
    const resolved = resolveMatrix(this.options.matrix);
    const variants = selectVariants(resolved, selector);
    const unselected = resolved
      .filter((v) => v.required && !variants.some((s) => s.name === v.name))
      .map((v) => v.name);
    if (unselected.length > 0) {
      throw invalidMatrixError(
        'REQUIRED_NOT_SELECTED',
        `Selector "${selector}" leaves out required variants: ${unselected.join(', ')}`,
        { selector, unselected },
      );
    }
    const schedule = await this.runSchedule(variants);
    return { schedule, report: await this.publish(version, schedule) };
  }

  /**
   * Publish an already finished schedule. Gated against the whole matrix, so
   * a schedule built from a narrowing selector is blocked by the required
   * variants it skipped.
   */
  async publish(version: string, schedule: ScheduleResult): Promise<PipelineReport> {
    try {
      const outcome = await this.publisher.publish(version, schedule, resolveMatrix(this.options.matrix));
      switch (outcome.kind) {
        case 'blocked':
          return this.report(schedule, { kind: 'blocked', blockedBy: outcome.blockedBy }, version);
        case 'published':
        case 'unchanged':
          return this.report(
            schedule,
            { kind: outcome.kind, manifestDigest: manifestDigest(outcome.manifest) },
            version,
            outcome.manifest,
          );
      }
    } catch (err) {
      if (err instanceof VersionConflictError) {
        return this.report(schedule, { kind: 'conflict', error: err.typedError }, version);
      }
      throw err;
    }
  }

  /**
   * Re-hash a published release against its manifest.
   *
   * @throws PipelineError (RELEASE.INVALID_VERSION) for a malformed tag.
   */
  async verifyRelease(version: string): Promise<ReleaseVerification> {
    validateVersionTag(version);
    const result = await verifyRelease(this.options.store.releases, version);
    const failed = result.entries.filter((e) => !e.ok);
    if (result.ok) {
      this.log.info('Release verified', { version, entries: result.entries.length });
    } else {
      this.log.error('Release verification failed', {
        version,
        found: result.found,
        failed: failed.map((e) => `${e.filename}: ${e.problem}`),
        checksumsMatch: result.checksumsMatch,
      });
    }
    return result;
  }

  private async runSchedule(variants: VariantSpec[]): Promise<ScheduleResult> {
    const runId = `run_${uuid()}`;
    await this.safePublish(runId, 'run.started', { variants: variants.map((v) => v.name) });
    const schedule = await this.scheduler.schedule(variants, this.createHandler(runId), runId);
    await this.safePublish(runId, 'run.completed', { aggregate: schedule.aggregate });
    return schedule;
  }

  private report(
    schedule: ScheduleResult,
    publication: PublicationReport,
    version?: string,
    manifest?: ReleaseManifest,
  ): PipelineReport {
    return {
      runId: schedule.runId,
      version,
      aggregate: schedule.aggregate,
      jobs: schedule.jobs.map(summarizeJob),
      blockedBy: publication.kind === 'skipped'
        ? blockingVariants(schedule.jobs)
        : blockingVariants(schedule.jobs, resolveMatrix(this.options.matrix)),
      publication,
      manifest,
    };
  }

  private createHandler(runId: string): JobHandler {
    return (context) => this.runVariant(runId, context);
  }

  /** One job: obtain outputs through the cache, sign them, digest the final bytes. */
  private async runVariant(runId: string, context: JobContext): Promise<JobOutput> {
    const { variant, signal, log } = context;
    const { toolchain, workRoot, lockDigest, sourceDigest } = this.options;
    const jobDir = path.join(workRoot, runId, variant.name);
    const outputDir = path.join(jobDir, 'out');
    await fs.mkdir(outputDir, { recursive: true });

    const depsKey = computeCacheKey({ namespace: 'dependencies', toolchain: toolchain.identity, lockDigest });
    const deps = await this.cache.getOrCompute(
      depsKey,
      (shared) => toolchain.resolveDependencies({ workDir: path.join(workRoot, 'deps', depsKey), signal: shared }),
      signal,
    );

    const outputsKey = computeCacheKey({
      namespace: 'outputs',
      toolchain: toolchain.identity,
      lockDigest,
      sourceDigest,
      flags: { ...variant.flags },
      outputs: variant.outputs,
    });
    const built = await this.cache.getOrCompute(outputsKey, async (shared): Promise<CachePayload> => {
      const result = await toolchain.build({
        variant,
        workDir: jobDir,
        outputDir,
        dependencies: deps.entry.payload,
        signal: shared,
      });
      if (result.exitCode !== 0) {
        throw new PipelineError(buildFailedError(variant.name, result.exitCode, result.stderrTail));
      }
      const missing = variant.outputs.filter((name) => !(name in result.outputPaths));
      if (missing.length > 0) {
        throw new PipelineError(missingOutputError(variant.name, missing));
      }
      const files: CachedFile[] = [];
      for (const name of variant.outputs) {
        files.push({ name, content: await fs.readFile(result.outputPaths[name]) });
      }
      return { files, metadata: { variant: variant.name, toolchain: toolchain.identity } };
    }, signal);
    log.debug('Outputs ready', { cache: built.outcome, key: outputsKey });

    // Artifacts get their own copies so signing never touches cached or toolchain bytes.
    const artifactDir = path.join(jobDir, 'artifacts');
    await fs.mkdir(artifactDir, { recursive: true });
    const byName = new Map(built.entry.payload.files.map((f) => [f.name, f.content]));
    const artifacts: Artifact[] = [];
    for (const filename of variant.outputs) {
      const content = byName.get(filename);
      if (!content) {
        throw new PipelineError(missingOutputError(variant.name, [filename]));
      }
      const artifactPath = path.join(artifactDir, filename);
      await fs.writeFile(artifactPath, content);
      artifacts.push({ variant: variant.name, filename, path: artifactPath, signature: UNSIGNED });
    }

    const finalArtifacts: Artifact[] = [];
    for (const artifact of artifacts) {
      finalArtifacts.push(await this.signer.sign(artifact));
    }
    signal.throwIfAborted();

    const entries: ManifestEntry[] = [];
    for (const artifact of finalArtifacts) {
      entries.push(await createManifestEntry(artifact));
    }

    return { artifacts: finalArtifacts, entries, cache: built.outcome };
  }

  private async safePublish(runId: string, type: 'run.started' | 'run.completed', payload: Record<string, unknown>): Promise<void> {
    try {
      await this.events.publish(runId, type, { payload });
    } catch (err) {
      this.log.warn('Event publication failed', { runId, eventType: type, error: String(err) });
    }
  }
}
