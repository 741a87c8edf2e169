#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import path from 'path';
import { DEFAULT_MATRIX_FILE, loadMatrixDocument, loadRuntimeConfig, loadSigningCredential } from './config';
import { ReleaseContext, createReleaseContext } from './context';
import { PipelineError } from './domain/errors';
import { PipelineReport } from './engine/pipeline';
import { renderPreflight, runPreflight } from './engine/preflight';
import { renderReport, renderVerification } from './engine/report';
import { logger, setLogLevel } from './logger';
import { createApp } from './server';
import { Toolchain } from './toolchain/toolchain';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_PARTIAL_FAILURE = 2;
export const EXIT_TOTAL_FAILURE = 3;
export const EXIT_VERSION_CONFLICT = 4;
export const EXIT_VERIFY_FAILED = 5;

/** Process surroundings of the CLI; tests substitute their own. */
export interface CliIo {
  env: Record<string, string | undefined>;
  cwd: string;
  out(text: string): void;
  err(text: string): void;
  /** Replaces the process toolchain built from configuration. */
  toolchain?: Toolchain;
}

const defaultIo: CliIo = {
  env: process.env,
  cwd: process.cwd(),
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
};

/**
 * Map a report to an exit status. Zero means every variant built and the
 * release, if any, is complete; a release published with optional variants
 * omitted still reports partial failure.
 */
export function exitCodeFor(report: PipelineReport): number {
  if (report.publication.kind === 'conflict') return EXIT_VERSION_CONFLICT;
  if (report.aggregate.kind === 'TotalFailure') return EXIT_TOTAL_FAILURE;
  if (report.aggregate.kind === 'PartialFailure') return EXIT_PARTIAL_FAILURE;
  if (report.publication.kind === 'blocked') return EXIT_PARTIAL_FAILURE;
  if (report.manifest?.status === 'partial') return EXIT_PARTIAL_FAILURE;
  return EXIT_OK;
}

/** Exit status an action settles on; read once parsing finishes. */
export interface CliStatus {
  exitCode: number;
}

interface CommonOptions {
  matrix: string;
  json?: boolean;
}

async function loadContext(io: CliIo, options: CommonOptions): Promise<ReleaseContext> {
  const config = loadRuntimeConfig(io.env, io.cwd);
  if (config.logLevel) setLogLevel(config.logLevel);
  const document = await loadMatrixDocument(path.resolve(io.cwd, options.matrix));
  const credential = await loadSigningCredential(io.env);
  return createReleaseContext({ config, document, credential, toolchain: io.toolchain });
}

function watchProgress(io: CliIo, context: ReleaseContext): () => void {
  return context.pipeline.events.subscribe({
    eventTypes: ['job.started', 'job.succeeded', 'job.failed', 'job.timed_out'],
    callback: (event) => io.err(`[${event.type}] ${event.variant ?? ''}\n`),
  });
}

function printReport(io: CliIo, report: PipelineReport, json?: boolean): void {
  io.out(json ? JSON.stringify(report, null, 2) + '\n' : renderReport(report));
}

export function createProgram(io: CliIo = defaultIo, status: CliStatus = { exitCode: EXIT_OK }): Command {
  const program = new Command();

  program
    .name('variant-release')
    .description('Build every product variant in parallel and publish a verifiable release')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({ writeOut: io.out, writeErr: io.err });

  program
    .command('build')
    .description('Build the selected variants without publishing')
    .argument('[selector]', 'comma-separated variant name patterns ("*" wildcard, "all")', 'all')
    .option('-m, --matrix <file>', 'matrix document', DEFAULT_MATRIX_FILE)
    .option('--json', 'print the report as JSON')
    .action(async (selector: string, options: CommonOptions) => {
      const context = await loadContext(io, options);
      const unsubscribe = watchProgress(io, context);
      try {
        const { report } = await context.pipeline.build(selector);
        printReport(io, report, options.json);
        status.exitCode = exitCodeFor(report);
      } finally {
        unsubscribe();
      }
    });

  program
    .command('release')
    .description('Build every variant and publish the release under a version tag')
    .argument('<version>', 'release version tag')
    .option('-m, --matrix <file>', 'matrix document', DEFAULT_MATRIX_FILE)
    .option('--json', 'print the report as JSON')
    .action(async (version: string, options: CommonOptions) => {
      const context = await loadContext(io, options);
      const unsubscribe = watchProgress(io, context);
      try {
        const { report } = await context.pipeline.release(version);
        printReport(io, report, options.json);
        status.exitCode = exitCodeFor(report);
      } finally {
        unsubscribe();
      }
    });

  program
    .command('verify')
    .description('Check the build environment, and optionally a published release')
    .option('-m, --matrix <file>', 'matrix document', DEFAULT_MATRIX_FILE)
    .option('-r, --release <version>', 'also re-hash a published release')
    .action(async (options: CommonOptions & { release?: string }) => {
      const context = await loadContext(io, options);
      const preflight = await runPreflight(context.config, context.document, context.signer);
      io.out(renderPreflight(preflight));
      let ok = preflight.ok;
      if (options.release) {
        const verification = await context.pipeline.verifyRelease(options.release);
        io.out(renderVerification(verification));
        ok = ok && verification.ok;
      }
      status.exitCode = ok ? EXIT_OK : EXIT_VERIFY_FAILED;
    });

  program
    .command('serve')
    .description('Serve the release HTTP API')
    .option('-m, --matrix <file>', 'matrix document', DEFAULT_MATRIX_FILE)
    .action(async (options: CommonOptions) => {
      const context = await loadContext(io, options);
      const app = createApp(context);
      app.listen(context.config.port, () => {
        logger.info('Release API listening', { port: context.config.port });
      });
    });

  return program;
}

/** Run the CLI and return the exit status it settled on. */
export async function runCli(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const status: CliStatus = { exitCode: EXIT_OK };
  const program = createProgram(io, status);
  try {
    await program.parseAsync(argv);
    return status.exitCode;
  } catch (err) {
    if (err instanceof PipelineError) {
      io.err(`${err.typedError.code}: ${err.typedError.message}\n`);
      return EXIT_USAGE;
    }
    if (err instanceof CommanderError) {
      // commander already printed help or the usage problem
      return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    io.err(`${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_USAGE;
  }
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv);
}

if (require.main === module) {
  void main();
}
