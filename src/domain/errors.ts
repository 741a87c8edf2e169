/**
 * Typed error model for machine-actionable error handling.
 *
 * Job-level failures are recorded as TypedError values on the job rather
 * than thrown, so one broken variant never unwinds its siblings. Errors that
 * must stop the whole pipeline (bad matrix, version conflict) are thrown as
 * PipelineError subclasses that carry the same TypedError payload.
 */

/** Typed suggested fix that an operator or tool can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure carried in job results, reports and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.TIMED_OUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Variant the error belongs to, if any. */
  variant?: string;
  /** Build job the error belongs to, if any. */
  jobId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  variant?: string;
  jobId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    variant: params.variant,
    jobId: params.jobId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Thrown error classes ---

/** Base class for every error the pipeline throws. */
export class PipelineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineError';
  }
}

/** Malformed matrix definition. Raised before any job starts. */
export class InvalidMatrixError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'InvalidMatrixError';
  }
}

/** A configured signing credential could not be used. Fatal for the job only. */
export class SigningError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'SigningError';
  }
}

/** An artifact payload could not be read while computing its digest. */
export class DigestError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'DigestError';
  }
}

/** A different manifest has already been published under the version tag. */
export class VersionConflictError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'VersionConflictError';
  }
}

/** Runtime configuration or matrix document is unusable. */
export class ConfigError extends PipelineError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConfigError';
  }
}

/** Normalize anything thrown inside a job into a TypedError. */
export function toTypedError(err: unknown, fallbackCode: string, context: { variant?: string; jobId?: string } = {}): TypedError {
  if (err instanceof PipelineError) {
    return {
      ...err.typedError,
      variant: err.typedError.variant ?? context.variant,
      jobId: err.typedError.jobId ?? context.jobId,
    };
  }
  return createTypedError({
    code: fallbackCode,
    message: err instanceof Error ? err.message : String(err),
    variant: context.variant,
    jobId: context.jobId,
    retryable: false,
  });
}

// --- Common error factory functions ---

export function invalidMatrixError(code: string, message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): InvalidMatrixError {
  return new InvalidMatrixError(
    createTypedError({
      code: `MATRIX.${code}`,
      message,
      retryable: false,
      details,
      suggestedFixes: fixes,
    }),
  );
}

export function buildFailedError(variant: string, exitCode: number | null, stderrTail?: string): TypedError {
  return createTypedError({
    code: 'BUILD.FAILED',
    message: exitCode === null
      ? `Toolchain for "${variant}" terminated without an exit status`
      : `Toolchain for "${variant}" exited with status ${exitCode}`,
    variant,
    retryable: false,
    details: { exitCode, ...(stderrTail ? { stderrTail } : {}) },
  });
}

export function missingOutputError(variant: string, missing: string[]): TypedError {
  return createTypedError({
    code: 'BUILD.MISSING_OUTPUT',
    message: `Declared outputs missing for "${variant}": ${missing.join(', ')}`,
    variant,
    retryable: false,
    details: { missing },
    suggestedFixes: [
      { type: 'FIX_OUTPUTS', params: { missing }, description: 'Make the toolchain write every declared output, or remove it from the matrix' },
    ],
  });
}

export function jobTimedOutError(variant: string, jobId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'BUILD.TIMED_OUT',
    message: `Build for "${variant}" exceeded its deadline of ${timeoutMs}ms`,
    variant,
    jobId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function signingError(code: string, message: string, variant?: string): SigningError {
  return new SigningError(
    createTypedError({
      code: `SIGNING.${code}`,
      message,
      variant,
      retryable: false,
      suggestedFixes: [
        { type: 'CHECK_SIGNING_CREDENTIAL', params: {}, description: 'Verify the signing key file, alias and passphrase' },
      ],
    }),
  );
}

export function digestError(filename: string, cause: string, variant?: string): DigestError {
  return new DigestError(
    createTypedError({
      code: 'DIGEST.IO',
      message: `Could not read "${filename}" to compute its digest: ${cause}`,
      variant,
      retryable: true,
      details: { filename },
    }),
  );
}

export function versionConflictError(version: string, existingDigest: string, attemptedDigest: string): VersionConflictError {
  return new VersionConflictError(
    createTypedError({
      code: 'RELEASE.VERSION_CONFLICT',
      message: `Version "${version}" is already published with different content`,
      retryable: false,
      details: { version, existingDigest, attemptedDigest },
      suggestedFixes: [
        { type: 'USE_NEW_VERSION', params: { version }, description: 'Publish the rebuilt artifacts under a new version tag' },
      ],
    }),
  );
}

export function invalidVersionError(version: string, reason: string): PipelineError {
  return new PipelineError(
    createTypedError({
      code: 'RELEASE.INVALID_VERSION',
      message: `Invalid version tag "${version}": ${reason}`,
      retryable: false,
      details: { version },
    }),
  );
}

export function configError(code: string, message: string, details?: Record<string, unknown>): ConfigError {
  return new ConfigError(
    createTypedError({
      code: `CONFIG.${code}`,
      message,
      retryable: false,
      details,
    }),
  );
}

export function invalidTransitionError(jobId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'JOB.INVALID_TRANSITION',
    message: `Cannot transition job from "${from}" to "${to}"`,
    jobId,
    retryable: false,
    details: { from, to },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace each occurrence of the given secrets in a message with its masked
 * form. Used before signing failures are turned into typed errors, since
 * crypto error strings can echo key material.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of key material
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
