/**
 * Build job domain model.
 *
 * One BuildJob per resolved variant. The scheduler owns every job and moves
 * it through Pending -> Running -> {Succeeded, Failed, TimedOut}.
 */

import { Artifact } from './artifact';
import { TypedError } from './errors';
import { ManifestEntry } from './manifest';
import { VariantSpec } from './variant';

/** Job lifecycle states. */
export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  TimedOut = 'timed_out',
}

/** Valid state transitions for build jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Running],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed, JobStatus.TimedOut],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
  [JobStatus.TimedOut]: [],
};

/** How a job obtained its compiled outputs. */
export type CacheOutcome = 'hit' | 'computed' | 'shared';

/** One in-flight or completed build attempt. */
export interface BuildJob {
  id: string;
  variant: VariantSpec;
  status: JobStatus;
  /** Position of the variant in resolver order. */
  index: number;
  queuedAt: string;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Final (post-signing) artifacts of a succeeded job. */
  artifacts: Artifact[];
  /** One manifest entry per artifact, in declared output order. */
  entries: ManifestEntry[];
  cache?: CacheOutcome;
  error?: TypedError;
}

/** Aggregate outcome of a scheduled matrix. */
export type AggregateResult =
  | { kind: 'AllSucceeded' }
  | { kind: 'PartialFailure'; failed: string[] }
  | { kind: 'TotalFailure'; failed: string[] };

/** Compact, serializable view of a job for reports and API responses. */
export interface JobSummary {
  id: string;
  variant: string;
  required: boolean;
  status: JobStatus;
  durationMs?: number;
  cache?: CacheOutcome;
  files: string[];
  error?: TypedError;
}

export function summarizeJob(job: BuildJob): JobSummary {
  return {
    id: job.id,
    variant: job.variant.name,
    required: job.variant.required,
    status: job.status,
    durationMs: job.durationMs,
    cache: job.cache,
    files: job.entries.map((e) => e.filename),
    error: job.error,
  };
}
