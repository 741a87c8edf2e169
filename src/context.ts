/**
 * Wires configuration into a ready-to-run pipeline. Shared by the CLI and
 * the HTTP server.
 */

import { RuntimeConfig, MatrixDocument } from './config';
import { configError } from './domain/errors';
import { digestFiles, digestTree } from './engine/cache';
import { ReleasePipeline } from './engine/pipeline';
import { ArtifactSigner, SigningCredential } from './engine/signer';
import { Logger, logger as rootLogger } from './logger';
import { createFileStore } from './storage/file-store';
import { Store } from './storage/store';
import { ProcessToolchain } from './toolchain/process-toolchain';
import { Toolchain } from './toolchain/toolchain';

export interface ReleaseContext {
  config: RuntimeConfig;
  document: MatrixDocument;
  store: Store;
  toolchain: Toolchain;
  signer: ArtifactSigner;
  pipeline: ReleasePipeline;
}

export interface ReleaseContextOptions {
  config: RuntimeConfig;
  document: MatrixDocument;
  credential?: SigningCredential;
  /** Defaults to the filesystem store under the configured directories. */
  store?: Store;
  /** Defaults to a ProcessToolchain running the configured command. */
  toolchain?: Toolchain;
  logger?: Logger;
}

/** The build command: RELEASE_TOOLCHAIN_CMD wins over the matrix document. */
export function resolveToolchainCommand(config: RuntimeConfig, document: MatrixDocument): string[] {
  const command = config.toolchainCommand ?? document.toolchain.command;
  if (!command || command.length === 0) {
    throw configError('MISSING_TOOLCHAIN_COMMAND', 'No build command: set toolchain.command in the matrix document or RELEASE_TOOLCHAIN_CMD');
  }
  return command;
}

export async function createReleaseContext(options: ReleaseContextOptions): Promise<ReleaseContext> {
  const { config, document } = options;
  const log = options.logger ?? rootLogger;

  const store = options.store ?? createFileStore({ cacheDir: config.cacheDir, outputDir: config.outputDir });
  const toolchain = options.toolchain ?? new ProcessToolchain({
    identity: document.toolchain.identity,
    command: resolveToolchainCommand(config, document),
    dependencyCommand: document.toolchain.dependencyCommand,
    killGraceMs: config.scheduler.killGraceMs,
    logger: log,
  });
  const signer = new ArtifactSigner(options.credential, log);

  const lockDigest = document.lockFiles.length > 0 ? await digestFiles(document.lockFiles, document.baseDir) : undefined;
  const sourceDigest = document.sourceDir ? await digestTree(document.sourceDir) : undefined;

  const pipeline = new ReleasePipeline({
    matrix: document.matrix,
    toolchain,
    store,
    signer,
    workRoot: config.workDir,
    scheduler: config.scheduler,
    lockDigest,
    sourceDigest,
    logger: log,
  });

  return { config, document, store, toolchain, signer, pipeline };
}
