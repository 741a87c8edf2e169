/**
 * Release manifest domain model.
 *
 * The manifest is the only durable record the pipeline produces: a flat,
 * versioned, append-only description of every artifact in a release and
 * the digest of its published bytes.
 */

import { SignatureState } from './artifact';
import { JobStatus } from './job';

export const MANIFEST_SCHEMA_VERSION = '1';
export const MANIFEST_FILENAME = 'manifest.json';
export const CHECKSUMS_FILENAME = 'SHA256SUMS';

/** Metadata describing one released artifact. */
export interface ManifestEntry {
  variant: string;
  filename: string;
  /** Lowercase hex SHA-256 over the exact published bytes. */
  sha256: string;
  size: number;
  signature: SignatureState;
}

/** An optional variant that did not make it into the release. */
export interface OmittedVariant {
  variant: string;
  /** Terminal job status, or not_selected when no job was scheduled. */
  status: JobStatus | 'not_selected';
  /** Error code that ended the job, or RELEASE.NOT_SELECTED. */
  reason: string;
}

export type ReleaseStatus = 'complete' | 'partial';

/** The complete, ordered record of one release. */
export interface ReleaseManifest {
  schemaVersion: string;
  version: string;
  /** "partial" when optional variants were omitted. */
  status: ReleaseStatus;
  /** Every variant of the matrix, in resolver order. */
  variants: string[];
  entries: ManifestEntry[];
  omitted: OmittedVariant[];
}
