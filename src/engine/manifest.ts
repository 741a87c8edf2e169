/**
 * Checksum & Manifest Generator.
 *
 * Digests are computed over the final (post-signing) bytes, the exact bytes
 * handed to the publication sink. Hashing before signing would publish a
 * checksum that matches nothing.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { Artifact, SignatureState } from '../domain/artifact';
import { digestError } from '../domain/errors';
import { ManifestEntry, ReleaseManifest } from '../domain/manifest';
import { JsonValue, stableDigest } from './stable-json';

/** SHA-256 and byte size of a file, streamed. */
export function digestFile(filePath: string): Promise<{ sha256: string; size: number }> {
  return new Promise((resolve, reject) => {
    const hash = createHash('sha256');
    let size = 0;
    createReadStream(filePath)
      .on('data', (chunk) => {
        size += chunk.length;
        hash.update(chunk);
      })
      .on('end', () => resolve({ sha256: hash.digest('hex'), size }))
      .on('error', reject);
  });
}

/**
 * Build the manifest entry for a final artifact.
 *
 * @throws DigestError when the payload cannot be read.
 */
export async function createManifestEntry(artifact: Artifact): Promise<ManifestEntry> {
  let digest: { sha256: string; size: number };
  try {
    digest = await digestFile(artifact.path);
  } catch (err) {
    throw digestError(artifact.filename, err instanceof Error ? err.message : String(err), artifact.variant);
  }
  return {
    variant: artifact.variant,
    filename: artifact.filename,
    sha256: digest.sha256,
    size: digest.size,
    signature: artifact.signature,
  };
}

function signatureToJson(state: SignatureState): JsonValue {
  return state.kind === 'signed'
    ? { kind: state.kind, alias: state.alias, keyDigest: state.keyDigest, algorithm: state.algorithm }
    : { kind: state.kind };
}

/** JSON form of a manifest, used for content comparison. */
function manifestToJson(manifest: ReleaseManifest): JsonValue {
  return {
    schemaVersion: manifest.schemaVersion,
    version: manifest.version,
    status: manifest.status,
    variants: [...manifest.variants],
    entries: manifest.entries.map((e) => ({
      variant: e.variant,
      filename: e.filename,
      sha256: e.sha256,
      size: e.size,
      signature: signatureToJson(e.signature),
    })),
    omitted: manifest.omitted.map((o) => ({ variant: o.variant, status: o.status, reason: o.reason })),
  };
}

/** Content digest of a manifest; equal digests mean identical releases. */
export function manifestDigest(manifest: ReleaseManifest): string {
  return stableDigest(manifestToJson(manifest));
}

/** Render a SHA256SUMS file ("<digest>  <filename>" per entry, manifest order). */
export function renderChecksums(manifest: ReleaseManifest): string {
  return manifest.entries.map((e) => `${e.sha256}  ${e.filename}\n`).join('');
}
