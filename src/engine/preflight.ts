/**
 * Environment checks run by `verify` before a release is attempted.
 */

import { constants, promises as fs } from 'fs';
import path from 'path';
import { v4 as uuid } from 'uuid';
import { RuntimeConfig, MatrixDocument } from '../config';
import { resolveToolchainCommand } from '../context';
import { PipelineError } from '../domain/errors';
import { validateMatrix } from './resolver';
import { ArtifactSigner } from './signer';

export interface PreflightCheck {
  name: string;
  ok: boolean;
  detail: string;
}

export interface PreflightReport {
  ok: boolean;
  checks: PreflightCheck[];
}

function describeError(err: unknown): string {
  if (err instanceof PipelineError) return `${err.typedError.code}: ${err.typedError.message}`;
  return err instanceof Error ? err.message : String(err);
}

async function isExecutable(file: string): Promise<boolean> {
  try {
    await fs.access(file, constants.X_OK);
    const stat = await fs.stat(file);
    return stat.isFile();
  } catch (err) {
    // Only a missing or non-executable file is a negative answer.
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT' || code === 'EACCES' || code === 'ENOTDIR') return false;
    throw err;
  }
}

/** Find an executable the way a shell would: paths are taken as-is, bare names are searched on PATH. */
export async function findExecutable(executable: string, envPath: string = process.env.PATH ?? ''): Promise<string | null> {
  if (executable.includes('/') || executable.includes(path.sep)) {
    return (await isExecutable(executable)) ? path.resolve(executable) : null;
  }
  for (const dir of envPath.split(path.delimiter).filter((d) => d.length > 0)) {
    const candidate = path.join(dir, executable);
    if (await isExecutable(candidate)) return candidate;
  }
  return null;
}

async function checkWritable(name: string, dir: string): Promise<PreflightCheck> {
  try {
    await fs.mkdir(dir, { recursive: true });
    const marker = path.join(dir, `.marker-${uuid()}`);
    await fs.writeFile(marker, '');
    await fs.rm(marker);
    return { name, ok: true, detail: dir };
  } catch (err) {
    return { name, ok: false, detail: `${dir}: ${describeError(err)}` };
  }
}

async function checkToolchain(config: RuntimeConfig, document: MatrixDocument): Promise<PreflightCheck> {
  const name = 'toolchain';
  try {
    const [executable] = resolveToolchainCommand(config, document);
    const found = await findExecutable(executable);
    return found
      ? { name, ok: true, detail: `${document.toolchain.identity} (${found})` }
      : { name, ok: false, detail: `Executable "${executable}" not found` };
  } catch (err) {
    return { name, ok: false, detail: describeError(err) };
  }
}

function checkMatrix(document: MatrixDocument): PreflightCheck {
  const result = validateMatrix(document.matrix);
  return result.valid
    ? { name: 'matrix', ok: true, detail: 'valid' }
    : { name: 'matrix', ok: false, detail: result.errors.map((e) => `${e.code}: ${e.message}`).join('; ') };
}

function checkSigning(signer: ArtifactSigner): PreflightCheck {
  if (!signer.enabled) {
    return { name: 'signing', ok: true, detail: 'not configured; artifacts will be published unsigned' };
  }
  try {
    const key = signer.loadKey();
    return { name: 'signing', ok: true, detail: `${key.algorithm} key ${key.keyDigest.slice(0, 16)}` };
  } catch (err) {
    return { name: 'signing', ok: false, detail: describeError(err) };
  }
}

export async function runPreflight(config: RuntimeConfig, document: MatrixDocument, signer: ArtifactSigner): Promise<PreflightReport> {
  const checks: PreflightCheck[] = [
    checkMatrix(document),
    await checkToolchain(config, document),
    await checkWritable('cache directory', config.cacheDir),
    await checkWritable('output directory', config.outputDir),
    await checkWritable('work directory', config.workDir),
    checkSigning(signer),
  ];
  return { ok: checks.every((c) => c.ok), checks };
}

export function renderPreflight(report: PreflightReport): string {
  return report.checks.map((c) => `${c.ok ? 'OK  ' : 'FAIL'} ${c.name}: ${c.detail}`).join('\n') + '\n';
}
