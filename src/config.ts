/**
 * Configuration loading.
 *
 * Runtime settings come from environment variables; the matrix and the
 * toolchain identity come from a JSON document checked into the project.
 * The signing credential is read only from the environment and the key
 * file it names, never from the matrix document.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { TypedError, configError, createTypedError } from './domain/errors';
import { MatrixDefinition, MatrixExclusion, VariantOverride } from './domain/variant';
import { SchedulerConfig, defaultConcurrency } from './engine/scheduler';
import { SigningCredential } from './engine/signer';
import { LogLevel, parseLogLevel } from './logger';

export const DEFAULT_MATRIX_FILE = 'release.matrix.json';

export interface RuntimeConfig {
  scheduler: SchedulerConfig;
  cacheDir: string;
  outputDir: string;
  workDir: string;
  /** Build command from RELEASE_TOOLCHAIN_CMD; overrides the matrix document. */
  toolchainCommand?: string[];
  logLevel?: LogLevel;
  port: number;
}

/** Toolchain section of the matrix document. */
export interface ToolchainSettings {
  /** Identity including version, e.g. "android-sdk@34.0.0". Part of every cache key. */
  identity: string;
  command?: string[];
  dependencyCommand?: string[];
}

/** The matrix document as loaded from disk, with paths resolved. */
export interface MatrixDocument {
  matrix: MatrixDefinition;
  toolchain: ToolchainSettings;
  /** Absolute paths of dependency lock files. */
  lockFiles: string[];
  /** Absolute path of the source tree, if declared. */
  sourceDir?: string;
  /** Directory the document was loaded from. */
  baseDir: string;
}

type Env = Record<string, string | undefined>;

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw configError('INVALID_ENV', `${name} must be a positive integer, got "${raw}"`, { variable: name });
  }
  return value;
}

/**
 * Commands run inside per-job directories, so an executable given as a
 * relative path ("./build.sh") is anchored to the directory it was declared in.
 */
function anchorCommand(command: string[], baseDir: string): string[] {
  const [executable, ...args] = command;
  if (executable.startsWith('./') || executable.startsWith('../')) {
    return [path.resolve(baseDir, executable), ...args];
  }
  return command;
}

function splitCommand(raw: string | undefined, cwd: string): string[] | undefined {
  if (!raw) return undefined;
  const parts = raw.trim().split(/\s+/).filter((p) => p.length > 0);
  return parts.length > 0 ? anchorCommand(parts, cwd) : undefined;
}

/** Read runtime settings from the environment. Relative directories resolve against cwd. */
export function loadRuntimeConfig(env: Env = process.env, cwd: string = process.cwd()): RuntimeConfig {
  const rawLevel = env.RELEASE_LOG_LEVEL;
  const logLevel = parseLogLevel(rawLevel);
  if (rawLevel && !logLevel) {
    throw configError('INVALID_ENV', `RELEASE_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${rawLevel}"`, {
      variable: 'RELEASE_LOG_LEVEL',
    });
  }

  return {
    scheduler: {
      maxConcurrency: positiveInt(env, 'RELEASE_CONCURRENCY', defaultConcurrency()),
      jobTimeoutMs: positiveInt(env, 'RELEASE_JOB_TIMEOUT_MS', 30 * 60 * 1000),
      killGraceMs: positiveInt(env, 'RELEASE_KILL_GRACE_MS', 10_000),
    },
    cacheDir: path.resolve(cwd, env.RELEASE_CACHE_DIR ?? '.release/cache'),
    outputDir: path.resolve(cwd, env.RELEASE_OUTPUT_DIR ?? '.release/releases'),
    workDir: path.resolve(cwd, env.RELEASE_WORK_DIR ?? '.release/work'),
    toolchainCommand: splitCommand(env.RELEASE_TOOLCHAIN_CMD, cwd),
    logLevel,
    port: positiveInt(env, 'PORT', 5000),
  };
}

/**
 * Read the signing credential. Returns undefined when none of the signing
 * variables is set; a partial set is a configuration error rather than a
 * silent fallback to unsigned output.
 */
export async function loadSigningCredential(env: Env = process.env): Promise<SigningCredential | undefined> {
  const keyFile = env.RELEASE_SIGNING_KEY_FILE;
  const alias = env.RELEASE_SIGNING_ALIAS;
  const passphrase = env.RELEASE_SIGNING_PASSPHRASE;

  if (!keyFile && !alias && passphrase === undefined) return undefined;
  if (!keyFile || !alias) {
    const missing = [
      ...(keyFile ? [] : ['RELEASE_SIGNING_KEY_FILE']),
      ...(alias ? [] : ['RELEASE_SIGNING_ALIAS']),
    ];
    throw configError('SIGNING_INCOMPLETE', `Signing is partially configured; missing ${missing.join(', ')}`, { missing });
  }

  let keyPem: string;
  try {
    keyPem = await fs.readFile(keyFile, 'utf8');
  } catch (err) {
    throw configError('SIGNING_KEY_UNREADABLE', `Could not read signing key file "${keyFile}": ${err instanceof Error ? err.message : String(err)}`);
  }
  return { keyPem, alias, passphrase: passphrase ?? '' };
}

// --- Matrix document structure ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

class StructureCheck {
  readonly errors: TypedError[] = [];

  fail(field: string, message: string): void {
    this.errors.push(createTypedError({ code: 'CONFIG.INVALID', message: `${field}: ${message}`, details: { field } }));
  }

  strings(value: unknown, field: string): string[] {
    if (!isStringArray(value)) {
      this.fail(field, 'must be an array of strings');
      return [];
    }
    return value;
  }

  optionalStrings(value: unknown, field: string): string[] | undefined {
    return value === undefined ? undefined : this.strings(value, field);
  }

  optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      this.fail(field, 'must be a string');
      return undefined;
    }
    return value;
  }
}

function parseExclusion(value: unknown, field: string, check: StructureCheck): MatrixExclusion {
  if (!isRecord(value)) {
    check.fail(field, 'must be an object');
    return {};
  }
  return {
    channel: check.optionalString(value.channel, `${field}.channel`),
    cryptoMode: check.optionalString(value.cryptoMode, `${field}.cryptoMode`),
    reason: check.optionalString(value.reason, `${field}.reason`),
  };
}

function parseOverride(value: unknown, field: string, check: StructureCheck): VariantOverride {
  if (!isRecord(value)) {
    check.fail(field, 'must be an object');
    return {};
  }
  const override: VariantOverride = {
    outputs: check.optionalStrings(value.outputs, `${field}.outputs`),
    tags: check.optionalStrings(value.tags, `${field}.tags`),
  };
  if (value.required !== undefined) {
    if (typeof value.required === 'boolean') override.required = value.required;
    else check.fail(`${field}.required`, 'must be a boolean');
  }
  if (value.flags !== undefined) {
    if (isStringRecord(value.flags)) override.flags = value.flags;
    else check.fail(`${field}.flags`, 'must map names to strings');
  }
  return override;
}

/**
 * Check the shape of a parsed matrix document. Semantic rules (unique axis
 * values, known variant names, non-empty result) belong to the resolver.
 *
 * @throws ConfigError (CONFIG.INVALID) listing every structural problem.
 */
export function parseMatrixDocument(raw: unknown, baseDir: string): MatrixDocument {
  const check = new StructureCheck();
  if (!isRecord(raw)) {
    throw configError('INVALID', 'Matrix document must be a JSON object');
  }

  const axes = isRecord(raw.axes) ? raw.axes : undefined;
  if (!axes) check.fail('axes', 'must be an object');
  const channels = check.strings(axes?.channels, 'axes.channels');
  const cryptoModes = check.strings(axes?.cryptoModes, 'axes.cryptoModes');

  let exclusions: MatrixExclusion[] | undefined;
  if (raw.exclusions !== undefined) {
    if (Array.isArray(raw.exclusions)) {
      exclusions = raw.exclusions.map((e, i) => parseExclusion(e, `exclusions[${i}]`, check));
    } else {
      check.fail('exclusions', 'must be an array');
    }
  }

  let variants: Record<string, VariantOverride> | undefined;
  if (raw.variants !== undefined) {
    if (isRecord(raw.variants)) {
      variants = {};
      for (const [name, value] of Object.entries(raw.variants)) {
        variants[name] = parseOverride(value, `variants.${name}`, check);
      }
    } else {
      check.fail('variants', 'must be an object keyed by variant name');
    }
  }

  const toolchainRaw = isRecord(raw.toolchain) ? raw.toolchain : undefined;
  let identity = '';
  if (!toolchainRaw) {
    check.fail('toolchain', 'must be an object');
  } else if (typeof toolchainRaw.identity !== 'string' || toolchainRaw.identity.trim() === '') {
    check.fail('toolchain.identity', 'must be a non-empty string');
  } else {
    identity = toolchainRaw.identity;
  }

  const command = check.optionalStrings(toolchainRaw?.command, 'toolchain.command');
  const dependencyCommand = check.optionalStrings(toolchainRaw?.dependencyCommand, 'toolchain.dependencyCommand');
  const lockFiles = check.optionalStrings(raw.lockFiles, 'lockFiles') ?? [];
  const sourceDir = check.optionalString(raw.sourceDir, 'sourceDir');

  const document: MatrixDocument = {
    matrix: {
      axes: { channels, cryptoModes },
      exclusions,
      variants,
      defaultOutputs: check.optionalStrings(raw.defaultOutputs, 'defaultOutputs'),
    },
    toolchain: {
      identity,
      command: command && command.length > 0 ? anchorCommand(command, baseDir) : undefined,
      dependencyCommand: dependencyCommand && dependencyCommand.length > 0 ? anchorCommand(dependencyCommand, baseDir) : undefined,
    },
    lockFiles: lockFiles.map((f) => path.resolve(baseDir, f)),
    sourceDir: sourceDir === undefined ? undefined : path.resolve(baseDir, sourceDir),
    baseDir,
  };

  if (check.errors.length > 0) {
    throw configError('INVALID', `Matrix document is invalid: ${check.errors[0].message}`, { errors: check.errors });
  }
  return document;
}

/** Load and structurally check a matrix document from disk. */
export async function loadMatrixDocument(filePath: string): Promise<MatrixDocument> {
  const absolute = path.resolve(filePath);
  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (err) {
    throw configError('MATRIX_UNREADABLE', `Could not read matrix document "${absolute}": ${err instanceof Error ? err.message : String(err)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw configError('INVALID', `Matrix document "${absolute}" is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseMatrixDocument(raw, path.dirname(absolute));
}
