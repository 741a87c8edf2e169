/**
 * Toolchain collaborator contract.
 *
 * The application compiler is an opaque external process. The pipeline
 * hands it a variant and a working directory and gets back an exit status
 * plus the paths of the declared outputs it actually wrote.
 */

import { VariantSpec } from '../domain/variant';
import { CachePayload } from '../storage/store';

/** Request for the shared dependency-resolution layer. */
export interface DependencyRequest {
  /** Directory the resolved dependencies should live in. */
  workDir: string;
  signal: AbortSignal;
}

/** Request to build one variant. */
export interface BuildRequest {
  variant: VariantSpec;
  /** Per-job working directory; outputs are expected under outputDir. */
  workDir: string;
  outputDir: string;
  /** Resolved dependency layer, shared by every variant. */
  dependencies: CachePayload;
  /** Aborted when the job deadline passes. */
  signal: AbortSignal;
}

/** What the toolchain reports for one build. */
export interface BuildResult {
  /** Process exit status; null when the process was killed by a signal. */
  exitCode: number | null;
  /** Declared output name -> path, for every declared output that exists. */
  outputPaths: Record<string, string>;
  /** Tail of the toolchain's diagnostic output. */
  stderrTail?: string;
}

export interface Toolchain {
  /** Identity folded into every cache key (name and version). */
  readonly identity: string;
  resolveDependencies(request: DependencyRequest): Promise<CachePayload>;
  build(request: BuildRequest): Promise<BuildResult>;
}
