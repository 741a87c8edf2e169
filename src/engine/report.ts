/**
 * Plain-text rendering of pipeline reports and release verifications for
 * the command line. Every variant appears with its terminal state.
 */

import { isSigned } from '../domain/artifact';
import { JobStatus, JobSummary } from '../domain/job';
import { PipelineReport } from './pipeline';
import { ReleaseVerification } from './verify';

const STATUS_LABEL: Record<JobStatus, string> = {
  [JobStatus.Pending]: 'PENDING',
  [JobStatus.Running]: 'RUNNING',
  [JobStatus.Succeeded]: 'OK',
  [JobStatus.Failed]: 'FAILED',
  [JobStatus.TimedOut]: 'TIMED OUT',
};

function formatJob(job: JobSummary): string {
  const parts = [`  ${STATUS_LABEL[job.status].padEnd(9)} ${job.variant}`];
  if (!job.required) parts.push('(optional)');
  if (job.durationMs !== undefined) parts.push(`${job.durationMs}ms`);
  if (job.cache) parts.push(`cache=${job.cache}`);
  if (job.error) parts.push(`${job.error.code}: ${job.error.message}`);
  return parts.join(' ');
}

export function renderReport(report: PipelineReport): string {
  const lines: string[] = [];
  lines.push(report.version ? `Release ${report.version} (${report.runId})` : `Build ${report.runId}`);
  lines.push('Variants:');
  for (const job of report.jobs) {
    lines.push(formatJob(job));
  }

  const aggregate = report.aggregate;
  lines.push(aggregate.kind === 'AllSucceeded' ? 'Result: AllSucceeded' : `Result: ${aggregate.kind} (${aggregate.failed.join(', ')})`);

  const publication = report.publication;
  switch (publication.kind) {
    case 'skipped':
      break;
    case 'published':
    case 'unchanged':
      lines.push(`Publication: ${publication.kind} (manifest ${publication.manifestDigest})`);
      break;
    case 'blocked':
      lines.push(`Publication: blocked by required variant(s): ${publication.blockedBy.join(', ')}`);
      break;
    case 'conflict':
      lines.push(`Publication: conflict: ${publication.error.message}`);
      break;
  }

  if (report.manifest) {
    for (const entry of report.manifest.entries) {
      const signature = isSigned(entry.signature) ? `signed:${entry.signature.alias}` : 'unsigned';
      lines.push(`  ${entry.sha256}  ${entry.filename}  ${entry.size}B  ${signature}`);
    }
    for (const omitted of report.manifest.omitted) {
      lines.push(`  omitted ${omitted.variant} (${omitted.reason})`);
    }
  }
  return lines.join('\n') + '\n';
}

export function renderVerification(result: ReleaseVerification): string {
  if (!result.found) {
    return `Release ${result.version}: not found\n`;
  }
  const lines = [`Release ${result.version}: ${result.ok ? 'verified' : 'FAILED'}`];
  for (const entry of result.entries) {
    lines.push(`  ${entry.ok ? 'OK' : entry.problem ?? 'failed'} ${entry.filename}`);
  }
  if (result.checksumsMatch === false) {
    lines.push('  SHA256SUMS does not match the manifest');
  }
  return lines.join('\n') + '\n';
}
