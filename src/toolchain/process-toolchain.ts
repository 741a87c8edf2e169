/**
 * Process-backed toolchain.
 *
 * Runs a configured command once per variant. Variant settings reach the
 * command through environment variables; declared outputs are expected in
 * $VARIANT_OUTPUT_DIR. On abort the process gets SIGTERM, then SIGKILL once
 * the grace period has passed.
 */

import { spawn, SpawnOptions } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { PipelineError, createTypedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { CachePayload } from '../storage/store';
import { BuildRequest, BuildResult, DependencyRequest, Toolchain } from './toolchain';

/** The part of a child process the toolchain relies on. */
export interface SpawnedProcess {
  readonly stderr: { on(event: 'data', listener: (chunk: Buffer) => void): unknown } | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess;

export interface ProcessToolchainOptions {
  identity: string;
  /** Build command and arguments. */
  command: string[];
  /** Optional dependency-resolution command, run once per distinct lock digest. */
  dependencyCommand?: string[];
  /** Delay between SIGTERM and SIGKILL after an abort. */
  killGraceMs: number;
  /** Extra environment for every command. */
  env?: Record<string, string>;
  /** Bytes of stderr kept for failure reports. */
  stderrTailBytes?: number;
  spawnFn?: SpawnFn;
  logger?: Logger;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderrTail: string;
}

export class ProcessToolchain implements Toolchain {
  readonly identity: string;
  private readonly spawnFn: SpawnFn;
  private readonly log: Logger;

  constructor(private readonly options: ProcessToolchainOptions) {
    if (options.command.length === 0) {
      throw new Error('ProcessToolchain requires a non-empty command');
    }
    this.identity = options.identity;
    this.spawnFn = options.spawnFn ?? spawn;
    this.log = (options.logger ?? rootLogger).child({ component: 'toolchain' });
  }

  async resolveDependencies(request: DependencyRequest): Promise<CachePayload> {
    const command = this.options.dependencyCommand;
    if (!command || command.length === 0) {
      return { files: [], metadata: {} };
    }

    await fs.mkdir(request.workDir, { recursive: true });
    const exit = await this.run(command, request.workDir, {}, request.signal);
    if (exit.exitCode !== 0) {
      throw new PipelineError(createTypedError({
        code: 'BUILD.DEPENDENCIES_FAILED',
        message: `Dependency resolution exited with status ${exit.exitCode ?? exit.signal}`,
        retryable: true,
        details: { exitCode: exit.exitCode, signal: exit.signal, stderrTail: exit.stderrTail },
      }));
    }
    return { files: [], metadata: { directory: request.workDir } };
  }

  async build(request: BuildRequest): Promise<BuildResult> {
    const { variant } = request;
    await fs.mkdir(request.outputDir, { recursive: true });

    const env: Record<string, string> = {
      VARIANT_NAME: variant.name,
      VARIANT_CHANNEL: variant.channel,
      VARIANT_CRYPTO_MODE: variant.cryptoMode,
      VARIANT_FLAGS: JSON.stringify(variant.flags),
      VARIANT_OUTPUTS: variant.outputs.join(','),
      VARIANT_OUTPUT_DIR: request.outputDir,
    };
    const depsDir = request.dependencies.metadata.directory;
    if (depsDir) env.DEPS_DIR = depsDir;

    const exit = await this.run(this.options.command, request.workDir, env, request.signal);
    if (exit.exitCode !== 0) {
      return { exitCode: exit.exitCode, outputPaths: {}, stderrTail: exit.stderrTail };
    }

    const outputPaths: Record<string, string> = {};
    for (const name of variant.outputs) {
      const candidate = path.join(request.outputDir, name);
      try {
        const stat = await fs.stat(candidate);
        if (stat.isFile()) outputPaths[name] = candidate;
      } catch (err) {
        this.log.debug('Declared output not found', { variant: variant.name, output: name, error: String(err) });
      }
    }
    return { exitCode: exit.exitCode, outputPaths, stderrTail: exit.stderrTail };
  }

  /** Run one command to completion, honoring the abort signal. */
  run(command: string[], cwd: string, env: Record<string, string>, signal: AbortSignal): Promise<ProcessExit> {
    const [executable, ...args] = command;
    const maxTail = this.options.stderrTailBytes ?? 4096;
    const grace = this.options.killGraceMs;

    return new Promise<ProcessExit>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error(`Not started: ${executable} was aborted before launch`));
        return;
      }

      const child = this.spawnFn(executable, args, {
        cwd,
        env: { ...process.env, ...this.options.env, ...env },
        stdio: ['ignore', 'ignore', 'pipe'],
      });
      let tail = Buffer.alloc(0);
      let killTimer: NodeJS.Timeout | undefined;

      child.stderr?.on('data', (chunk: Buffer) => {
        tail = Buffer.concat([tail, chunk]);
        if (tail.length > maxTail) tail = tail.subarray(tail.length - maxTail);
      });

      const onAbort = () => {
        this.log.warn('Terminating toolchain process', { executable, graceMs: grace });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          this.log.warn('Toolchain ignored SIGTERM, killing', { executable });
          child.kill('SIGKILL');
        }, grace);
        killTimer.unref();
      };
      signal.addEventListener('abort', onAbort, { once: true });

      const cleanup = () => {
        signal.removeEventListener('abort', onAbort);
        if (killTimer) clearTimeout(killTimer);
      };

      child.once('error', (err) => {
        cleanup();
        reject(err);
      });
      child.once('close', (code, exitSignal) => {
        cleanup();
        resolve({ exitCode: code, signal: exitSignal, stderrTail: tail.toString('utf8') });
      });
    });
  }
}
