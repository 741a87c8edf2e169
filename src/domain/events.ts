/**
 * Pipeline event domain model.
 *
 * Events are emitted as stable, versioned records for progress reporting
 * and downstream consumers. They are observational only.
 */

/** Event types emitted by the pipeline. */
export type PipelineEventType =
  | 'run.started'
  | 'run.completed'
  | 'job.pending'
  | 'job.started'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.timed_out'
  | 'release.published'
  | 'release.unchanged'
  | 'release.blocked'
  | 'release.conflict';

/** A pipeline event with stable schema. */
export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  jobId?: string;
  variant?: string;
  version?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Restrict delivery to one run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}
