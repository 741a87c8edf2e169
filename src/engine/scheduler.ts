/**
 * Build Scheduler: bounded parallel execution of build jobs.
 *
 * Jobs are dispatched in resolver order to a fixed pool of workers and may
 * complete in any order. Every job has its own error channel: a failing or
 * timed-out job never cancels a sibling (fail-fast is off). The result
 * lists jobs in resolver order regardless of completion order, and is
 * returned only after every job reached a terminal state.
 */

import { availableParallelism } from 'os';
import { v4 as uuid } from 'uuid';
import { Artifact } from '../domain/artifact';
import { PipelineError, jobTimedOutError, toTypedError } from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { AggregateResult, BuildJob, CacheOutcome, JobStatus } from '../domain/job';
import { ManifestEntry } from '../domain/manifest';
import { VariantSpec } from '../domain/variant';
import { EventPublisher } from '../events/publisher';
import { Logger, logger as rootLogger } from '../logger';
import { transitionJobStatus } from './state-machine';

/** Scheduler configuration. */
export interface SchedulerConfig {
  /** Maximum jobs running at once. */
  maxConcurrency: number;
  /** Per-job deadline. */
  jobTimeoutMs: number;
  /** How long a timed-out job keeps its worker slot while its process winds down. */
  killGraceMs: number;
}

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

const DEFAULT_CONFIG: SchedulerConfig = {
  maxConcurrency: defaultConcurrency(),
  jobTimeoutMs: 30 * 60 * 1000,
  killGraceMs: 10_000,
};

/** Context handed to the job handler. */
export interface JobContext {
  jobId: string;
  variant: VariantSpec;
  /** Aborted when the deadline passes. */
  signal: AbortSignal;
  log: Logger;
}

/** What a successful job yields. */
export interface JobOutput {
  artifacts: Artifact[];
  entries: ManifestEntry[];
  cache?: CacheOutcome;
}

export type JobHandler = (context: JobContext) => Promise<JobOutput>;

/** All jobs of one scheduled matrix, in resolver order. */
export interface ScheduleResult {
  runId: string;
  jobs: BuildJob[];
  aggregate: AggregateResult;
}

type Settled = { kind: 'ok'; output: JobOutput } | { kind: 'error'; error: unknown };

/** Reduce terminal jobs to the aggregate outcome. */
export function aggregateResults(jobs: BuildJob[]): AggregateResult {
  const failed = jobs.filter((j) => j.status !== JobStatus.Succeeded).map((j) => j.variant.name);
  if (failed.length === 0) return { kind: 'AllSucceeded' };
  if (failed.length === jobs.length) return { kind: 'TotalFailure', failed };
  return { kind: 'PartialFailure', failed };
}

export class BuildScheduler {
  private config: SchedulerConfig;
  private log: Logger;

  constructor(
    config?: Partial<SchedulerConfig>,
    private events?: EventPublisher,
    log: Logger = rootLogger,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxConcurrency) || this.config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${this.config.maxConcurrency}`);
    }
    this.log = log.child({ component: 'scheduler' });
  }

  /** Run every variant as an isolated job and wait for all of them. */
  async schedule(variants: VariantSpec[], handler: JobHandler, runId: string = `run_${uuid()}`): Promise<ScheduleResult> {
    const queuedAt = new Date().toISOString();
    const jobs: BuildJob[] = variants.map((variant, index) => ({
      id: `job_${uuid()}`,
      variant,
      index,
      status: JobStatus.Pending,
      queuedAt,
      artifacts: [],
      entries: [],
    }));

    for (const job of jobs) {
      await this.safePublish(runId, 'job.pending', job);
    }

    const workerCount = Math.min(this.config.maxConcurrency, jobs.length);
    this.log.info('Scheduling build jobs', { runId, jobs: jobs.length, workers: workerCount });

    let next = 0;
    const worker = async (): Promise<void> => {
      while (next < jobs.length) {
        const job = jobs[next];
        next += 1;
        await this.runJob(runId, job, handler);
      }
    };
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    const ordered = [...jobs].sort((a, b) => a.index - b.index);
    const aggregate = aggregateResults(ordered);
    this.log.info('All build jobs finished', { runId, aggregate: aggregate.kind });
    return { runId, jobs: ordered, aggregate };
  }

  private async runJob(runId: string, job: BuildJob, handler: JobHandler): Promise<void> {
    const jobLog = this.log.child({ runId, jobId: job.id, variant: job.variant.name });
    const started = Date.now();
    this.transition(job, JobStatus.Running);
    job.startedAt = new Date(started).toISOString();
    await this.safePublish(runId, 'job.started', job);

    const controller = new AbortController();
    const settled: Promise<Settled> = handler({ jobId: job.id, variant: job.variant, signal: controller.signal, log: jobLog })
      .then(
        (output): Settled => ({ kind: 'ok', output }),
        (error: unknown): Settled => ({ kind: 'error', error }),
      );

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'deadline'>((resolve) => {
      deadlineTimer = setTimeout(() => resolve('deadline'), this.config.jobTimeoutMs);
    });
    const first = await Promise.race([settled, deadline]);
    clearTimeout(deadlineTimer);

    if (first === 'deadline') {
      controller.abort();
      this.complete(job, JobStatus.TimedOut, started);
      job.error = jobTimedOutError(job.variant.name, job.id, this.config.jobTimeoutMs);
      jobLog.warn('Build job timed out', { timeoutMs: this.config.jobTimeoutMs });
      await this.safePublish(runId, 'job.timed_out', job);
      await this.awaitGrace(settled, jobLog);
      return;
    }

    if (first.kind === 'ok') {
      job.artifacts = first.output.artifacts;
      job.entries = first.output.entries;
      job.cache = first.output.cache;
      this.complete(job, JobStatus.Succeeded, started);
      jobLog.info('Build job succeeded', { durationMs: job.durationMs, files: job.entries.length, cache: job.cache });
      await this.safePublish(runId, 'job.succeeded', job);
      return;
    }

    job.error = toTypedError(first.error, 'BUILD.FAILED', { variant: job.variant.name, jobId: job.id });
    this.complete(job, JobStatus.Failed, started);
    jobLog.error('Build job failed', { code: job.error.code, error: job.error.message });
    await this.safePublish(runId, 'job.failed', job);
  }

  /** Keep the worker slot until the aborted work settles or the grace period ends. */
  private async awaitGrace(settled: Promise<Settled>, jobLog: Logger): Promise<void> {
    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<'grace'>((resolve) => {
      graceTimer = setTimeout(() => resolve('grace'), this.config.killGraceMs);
    });
    const outcome = await Promise.race([settled, grace]);
    clearTimeout(graceTimer);
    if (outcome === 'grace') {
      jobLog.warn('Timed-out job did not stop within the grace period; releasing its slot', { graceMs: this.config.killGraceMs });
    }
  }

  private transition(job: BuildJob, target: JobStatus): void {
    const result = transitionJobStatus(job.id, job.status, target);
    if (!result.success) {
      throw new PipelineError(result.error);
    }
    job.status = result.newStatus;
  }

  private complete(job: BuildJob, status: JobStatus, started: number): void {
    this.transition(job, status);
    const completed = Date.now();
    job.completedAt = new Date(completed).toISOString();
    job.durationMs = completed - started;
  }

  private async safePublish(runId: string, type: PipelineEventType, job: BuildJob): Promise<void> {
    if (!this.events) return;
    try {
      await this.events.publish(runId, type, {
        jobId: job.id,
        variant: job.variant.name,
        payload: {
          status: job.status,
          required: job.variant.required,
          durationMs: job.durationMs,
          error: job.error,
        },
      });
    } catch (err) {
      this.log.warn('Event publication failed', { runId, eventType: type, error: String(err) });
    }
  }
}
