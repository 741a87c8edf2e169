/**
 * Build job state machine.
 *
 * Enforces the Pending -> Running -> terminal lifecycle, producing typed
 * errors on invalid transitions. A job that already timed out can never be
 * flipped to Succeeded by a late toolchain result.
 */

import { JobStatus, VALID_JOB_TRANSITIONS } from '../domain/job';
import { TypedError, invalidTransitionError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a job state transition. */
export function transitionJobStatus(
  jobId: string,
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return { success: false, error: invalidTransitionError(jobId, current, target) };
  }
  return { success: true, newStatus: target };
}

/** Check if a job status is terminal. */
export function isTerminalJobStatus(status: JobStatus): boolean {
  return (
    status === JobStatus.Succeeded ||
    status === JobStatus.Failed ||
    status === JobStatus.TimedOut
  );
}
