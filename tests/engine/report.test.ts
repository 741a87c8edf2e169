import { createTypedError } from '../../src/domain/errors';
import { JobStatus } from '../../src/domain/job';
import { PipelineReport } from '../../src/engine/pipeline';
import { renderReport, renderVerification } from '../../src/engine/report';

const sha = (c: string) => c.repeat(64);

const baseReport: PipelineReport = {
  runId: 'run_1',
  aggregate: { kind: 'PartialFailure', failed: ['direct-fips'] },
  jobs: [
    {
      id: 'job_1',
      variant: 'direct-fips',
      required: false,
      status: JobStatus.TimedOut,
      durationMs: 300,
      files: [],
      error: createTypedError({ code: 'BUILD.TIMED_OUT', message: 'took too long' }),
    },
    { id: 'job_2', variant: 'play-standard', required: true, status: JobStatus.Succeeded, durationMs: 12, cache: 'hit', files: ['play-standard.bin'] },
  ],
  blockedBy: [],
  publication: { kind: 'skipped' },
};

describe('renderReport', () => {
  it('lists every variant with its terminal state for a build', () => {
    expect(renderReport(baseReport)).toBe(
      [
        'Build run_1',
        'Variants:',
        '  TIMED OUT direct-fips (optional) 300ms BUILD.TIMED_OUT: took too long',
        '  OK        play-standard 12ms cache=hit',
        'Result: PartialFailure (direct-fips)',
        '',
      ].join('\n'),
    );
  });

  it('adds the publication decision and manifest entries for a release', () => {
    const text = renderReport({
      ...baseReport,
      version: '1.2.0',
      publication: { kind: 'published', manifestDigest: sha('d') },
      manifest: {
        schemaVersion: '1',
        version: '1.2.0',
        status: 'partial',
        variants: ['direct-fips', 'play-standard'],
        entries: [
          {
            variant: 'play-standard',
            filename: 'play-standard.bin',
            sha256: sha('a'),
            size: 42,
            signature: { kind: 'signed', alias: 'release', keyDigest: sha('b'), algorithm: 'ed25519' },
          },
        ],
        omitted: [{ variant: 'direct-fips', status: JobStatus.TimedOut, reason: 'BUILD.TIMED_OUT' }],
      },
    });

    expect(text.split('\n').slice(0, 1)).toEqual(['Release 1.2.0 (run_1)']);
    expect(text.split('\n').slice(5)).toEqual([
      `Publication: published (manifest ${sha('d')})`,
      `  ${sha('a')}  play-standard.bin  42B  signed:release`,
      '  omitted direct-fips (BUILD.TIMED_OUT)',
      '',
    ]);
  });

  it('names the blocking variants', () => {
    const text = renderReport({
      ...baseReport,
      version: '1.2.0',
      aggregate: { kind: 'PartialFailure', failed: ['play-standard'] },
      blockedBy: ['play-standard'],
      publication: { kind: 'blocked', blockedBy: ['play-standard'] },
    });
    expect(text).toContain('\nPublication: blocked by required variant(s): play-standard\n');
  });

  it('shows the conflict message', () => {
    const text = renderReport({
      ...baseReport,
      version: '1.2.0',
      publication: { kind: 'conflict', error: createTypedError({ code: 'RELEASE.VERSION_CONFLICT', message: 'Version 1.2.0 already holds different content' }) },
    });
    expect(text.endsWith('Publication: conflict: Version 1.2.0 already holds different content\n')).toBe(true);
  });
});

describe('renderVerification', () => {
  it('reports an unknown version', () => {
    expect(renderVerification({ version: '9.0.0', found: false, ok: false, entries: [], checksumsMatch: null })).toBe('Release 9.0.0: not found\n');
  });

  it('lists each file with its problem', () => {
    expect(
      renderVerification({
        version: '1.0.0',
        found: true,
        ok: false,
        entries: [
          { filename: 'a.bin', variant: 'a-x', ok: true },
          { filename: 'b.bin', variant: 'b-x', ok: false, problem: 'digest_mismatch' },
        ],
        checksumsMatch: false,
      }),
    ).toBe(['Release 1.0.0: FAILED', '  OK a.bin', '  digest_mismatch b.bin', '  SHA256SUMS does not match the manifest', ''].join('\n'));
  });
});
