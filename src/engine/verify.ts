/**
 * Published release verification.
 *
 * Re-hashes every payload a sink holds for a version and compares it to the
 * manifest. Entries recorded as signed must also carry a valid embedded
 * signature from the recorded key.
 */

import { createHash } from 'crypto';
import { ManifestEntry } from '../domain/manifest';
import { ReleaseSink } from '../storage/store';
import { renderChecksums } from './manifest';
import { verifySignedPayload } from './signer';

export type EntryProblem = 'missing' | 'size_mismatch' | 'digest_mismatch' | 'signature_invalid' | 'key_mismatch';

export interface EntryVerification {
  filename: string;
  variant: string;
  ok: boolean;
  problem?: EntryProblem;
}

export interface ReleaseVerification {
  version: string;
  /** False when the sink holds no manifest for the version. */
  found: boolean;
  ok: boolean;
  entries: EntryVerification[];
  /** Whether the stored SHA256SUMS matches the manifest; null when the sink keeps none. */
  checksumsMatch: boolean | null;
}

function checkEntry(entry: ManifestEntry, bytes: Buffer | null): EntryProblem | undefined {
  if (!bytes) return 'missing';
  if (bytes.length !== entry.size) return 'size_mismatch';
  if (createHash('sha256').update(bytes).digest('hex') !== entry.sha256) return 'digest_mismatch';
  if (entry.signature.kind === 'signed') {
    const verified = verifySignedPayload(bytes);
    if (!verified) return 'signature_invalid';
    if (verified.keyDigest !== entry.signature.keyDigest) return 'key_mismatch';
  }
  return undefined;
}

export async function verifyRelease(sink: ReleaseSink, version: string): Promise<ReleaseVerification> {
  const manifest = await sink.getManifest(version);
  if (!manifest) {
    return { version, found: false, ok: false, entries: [], checksumsMatch: null };
  }

  const entries: EntryVerification[] = [];
  for (const entry of manifest.entries) {
    const problem = checkEntry(entry, await sink.readPayload(version, entry.filename));
    entries.push({ filename: entry.filename, variant: entry.variant, ok: problem === undefined, problem });
  }

  const checksums = await sink.readChecksums(version);
  const checksumsMatch = checksums === null ? null : checksums === renderChecksums(manifest);

  return {
    version,
    found: true,
    ok: entries.every((e) => e.ok) && checksumsMatch !== false,
    entries,
    checksumsMatch,
  };
}
