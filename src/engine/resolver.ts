/**
 * Variant Matrix Resolver.
 *
 * Expands a declarative matrix into an ordered list of VariantSpec values.
 * Pure: identical input always yields identical output, sorted by channel
 * then crypto mode (code-unit order, independent of locale).
 */

import { SuggestedFix, TypedError, createTypedError, invalidMatrixError } from '../domain/errors';
import {
  DEFAULT_OUTPUT_TEMPLATES,
  MatrixDefinition,
  MatrixExclusion,
  VariantSpec,
  expandOutputTemplate,
  variantName,
} from '../domain/variant';

/** Characters allowed in axis values; they end up in filenames and env vars. */
const AXIS_VALUE_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.]*$/;

/** Validation result for a matrix definition. */
export interface MatrixValidationResult {
  valid: boolean;
  errors: TypedError[];
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function matrixProblem(code: string, message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({ code: `MATRIX.${code}`, message, retryable: false, details, suggestedFixes: fixes });
}

function isExcluded(channel: string, cryptoMode: string, exclusions: MatrixExclusion[]): boolean {
  return exclusions.some(
    (ex) =>
      (ex.channel === undefined || ex.channel === channel) &&
      (ex.cryptoMode === undefined || ex.cryptoMode === cryptoMode),
  );
}

function validateAxis(axis: 'channels' | 'cryptoModes', values: string[], errors: TypedError[]): void {
  if (values.length === 0) {
    errors.push(matrixProblem('EMPTY_AXIS', `Matrix axis "${axis}" has no values`, { axis }, [
      { type: 'ADD_AXIS_VALUE', params: { axis }, description: `Declare at least one value for "${axis}"` },
    ]));
    return;
  }
  const seen = new Set<string>();
  for (const value of values) {
    if (!AXIS_VALUE_PATTERN.test(value)) {
      errors.push(matrixProblem('INVALID_VALUE', `Axis "${axis}" value "${value}" must match ${AXIS_VALUE_PATTERN}`, { axis, value }));
    }
    if (seen.has(value)) {
      errors.push(matrixProblem('DUPLICATE_VALUE', `Axis "${axis}" declares "${value}" more than once`, { axis, value }));
    }
    seen.add(value);
  }
}

function validateExclusions(matrix: MatrixDefinition, errors: TypedError[]): void {
  const channels = new Set(matrix.axes.channels);
  const cryptoModes = new Set(matrix.axes.cryptoModes);

  (matrix.exclusions ?? []).forEach((ex, index) => {
    if (ex.channel === undefined && ex.cryptoMode === undefined) {
      errors.push(matrixProblem('EMPTY_EXCLUSION', `Exclusion #${index} names neither a channel nor a crypto mode`, { index }));
      return;
    }
    if (ex.channel !== undefined && !channels.has(ex.channel)) {
      errors.push(matrixProblem('UNDEFINED_EXCLUSION_VALUE', `Exclusion #${index} references undefined channel "${ex.channel}"`, {
        index,
        channel: ex.channel,
      }));
    }
    if (ex.cryptoMode !== undefined && !cryptoModes.has(ex.cryptoMode)) {
      errors.push(matrixProblem('UNDEFINED_EXCLUSION_VALUE', `Exclusion #${index} references undefined crypto mode "${ex.cryptoMode}"`, {
        index,
        cryptoMode: ex.cryptoMode,
      }));
    }
  });
}

function isPlainFilename(name: string): boolean {
  return name.length > 0 && name !== '.' && name !== '..' && !/[\\/]/.test(name) && !name.includes('\0');
}

/**
 * Expand without validation. Callers must have validated the matrix; the
 * result is sorted by channel then crypto mode.
 */
function expand(matrix: MatrixDefinition): VariantSpec[] {
  const exclusions = matrix.exclusions ?? [];
  const channels = [...matrix.axes.channels].sort(compareStrings);
  const cryptoModes = [...matrix.axes.cryptoModes].sort(compareStrings);
  const variants: VariantSpec[] = [];

  for (const channel of channels) {
    for (const cryptoMode of cryptoModes) {
      if (isExcluded(channel, cryptoMode, exclusions)) continue;
      const name = variantName(channel, cryptoMode);
      const override = matrix.variants?.[name] ?? {};
      const templates = override.outputs ?? matrix.defaultOutputs ?? DEFAULT_OUTPUT_TEMPLATES;
      variants.push(Object.freeze({
        name,
        channel,
        cryptoMode,
        required: override.required ?? true,
        outputs: Object.freeze(templates.map((t) => expandOutputTemplate(t, channel, cryptoMode))),
        flags: Object.freeze({ ...override.flags, channel, cryptoMode }),
        tags: Object.freeze([...(override.tags ?? [])].sort(compareStrings)),
      }));
    }
  }
  return variants;
}

/** Validate a matrix definition, collecting every problem. */
export function validateMatrix(matrix: MatrixDefinition): MatrixValidationResult {
  const errors: TypedError[] = [];

  validateAxis('channels', matrix.axes.channels, errors);
  validateAxis('cryptoModes', matrix.axes.cryptoModes, errors);
  validateExclusions(matrix, errors);
  if (errors.length > 0) {
    return { valid: false, errors };
  }

  const variants = expand(matrix);
  if (variants.length === 0) {
    errors.push(matrixProblem('EMPTY_MATRIX', 'Every combination of the matrix is excluded'));
  }

  const known = new Set(variants.map((v) => v.name));
  for (const name of Object.keys(matrix.variants ?? {})) {
    if (!known.has(name)) {
      errors.push(matrixProblem('UNKNOWN_VARIANT', `Override "${name}" does not match any resolved variant`, { variant: name }, [
        { type: 'REMOVE_OVERRIDE', params: { variant: name } },
      ]));
    }
  }

  const owners = new Map<string, string>();
  for (const variant of variants) {
    if (variant.outputs.length === 0) {
      errors.push(matrixProblem('NO_OUTPUTS', `Variant "${variant.name}" declares no outputs`, { variant: variant.name }));
    }
    for (const filename of variant.outputs) {
      if (!isPlainFilename(filename)) {
        errors.push(matrixProblem('INVALID_OUTPUT', `Output "${filename}" of "${variant.name}" is not a plain filename`, {
          variant: variant.name,
          filename,
        }));
        continue;
      }
      const owner = owners.get(filename);
      if (owner !== undefined) {
        errors.push(matrixProblem('DUPLICATE_OUTPUT', `Output "${filename}" is declared by both "${owner}" and "${variant.name}"`, {
          filename,
          variants: [owner, variant.name],
        }, [
          { type: 'USE_VARIANT_PLACEHOLDER', params: { filename }, description: 'Include {variant} in the output template' },
        ]));
      } else {
        owners.set(filename, variant.name);
      }
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Resolve a matrix into concrete variants.
 *
 * @throws InvalidMatrixError when an axis is empty, an exclusion references
 * an undefined value, or the expanded matrix is otherwise unusable.
 */
export function resolveMatrix(matrix: MatrixDefinition): VariantSpec[] {
  const validation = validateMatrix(matrix);
  if (!validation.valid) {
    const [first] = validation.errors;
    throw invalidMatrixError(first.code.replace(/^MATRIX\./, ''), first.message, {
      ...first.details,
      errors: validation.errors.map((e) => ({ code: e.code, message: e.message })),
    }, first.suggestedFixes);
  }
  return expand(matrix);
}

function selectorToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

/**
 * Narrow resolved variants with a comma-separated selector of name patterns
 * ("*" matches any run of characters). "all" and "*" select everything.
 * Resolver order is preserved.
 */
export function selectVariants(variants: VariantSpec[], selector?: string): VariantSpec[] {
  const patterns = (selector ?? 'all')
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  if (patterns.length === 0 || patterns.includes('all') || patterns.includes('*')) {
    return variants;
  }

  const unmatched = patterns.filter((p) => !variants.some((v) => selectorToRegExp(p).test(v.name)));
  const selected = variants.filter((v) => patterns.some((p) => selectorToRegExp(p).test(v.name)));
  if (unmatched.length > 0 || selected.length === 0) {
    throw invalidMatrixError('EMPTY_SELECTION', `Selector "${selector}" matches no variant for: ${unmatched.join(', ')}`, {
      selector,
      unmatched,
      available: variants.map((v) => v.name),
    });
  }
  return selected;
}
