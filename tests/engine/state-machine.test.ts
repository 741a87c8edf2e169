import { isTerminalJobStatus, transitionJobStatus } from '../../src/engine/state-machine';
import { JobStatus } from '../../src/domain/job';

describe('Build Job State Machine', () => {
  test('valid transition: pending -> running', () => {
    const result = transitionJobStatus('job_1', JobStatus.Pending, JobStatus.Running);
    expect(result).toEqual({ success: true, newStatus: JobStatus.Running });
  });

  test.each([JobStatus.Succeeded, JobStatus.Failed, JobStatus.TimedOut])('valid transition: running -> %s', (target) => {
    expect(transitionJobStatus('job_1', JobStatus.Running, target).success).toBe(true);
  });

  test('invalid transition: pending -> succeeded', () => {
    const result = transitionJobStatus('job_1', JobStatus.Pending, JobStatus.Succeeded);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('JOB.INVALID_TRANSITION');
      expect(result.error.jobId).toBe('job_1');
      expect(result.error.details).toEqual({ from: 'pending', to: 'succeeded' });
    }
  });

  test('a timed-out job cannot be flipped to succeeded', () => {
    expect(transitionJobStatus('job_1', JobStatus.TimedOut, JobStatus.Succeeded).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalJobStatus(JobStatus.Succeeded)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Failed)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.TimedOut)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Pending)).toBe(false);
    expect(isTerminalJobStatus(JobStatus.Running)).toBe(false);
  });
});
