/**
 * Variant matrix domain model.
 *
 * A matrix declares the axes a product is built across (distribution
 * channel x crypto mode), the combinations that are invalid, and per-variant
 * overrides. The resolver expands it into concrete VariantSpec values.
 */

/** Declared axes of the matrix. Every value must be unique within its axis. */
export interface MatrixAxes {
  channels: string[];
  cryptoModes: string[];
}

/**
 * An invalid combination. Naming only a channel (or only a crypto mode)
 * excludes every combination that carries that value.
 */
export interface MatrixExclusion {
  channel?: string;
  cryptoMode?: string;
  reason?: string;
}

/** Per-variant settings keyed by variant name in the matrix definition. */
export interface VariantOverride {
  /** Optional variants may fail without blocking publication. Defaults to required. */
  required?: boolean;
  /** Output filename templates; replaces the matrix default. */
  outputs?: string[];
  /** Extra build flags passed to the toolchain and folded into cache keys. */
  flags?: Record<string, string>;
  tags?: string[];
}

/** Declarative matrix input. */
export interface MatrixDefinition {
  axes: MatrixAxes;
  exclusions?: MatrixExclusion[];
  variants?: Record<string, VariantOverride>;
  /**
   * Output filename templates applied to every variant without its own list.
   * Supports the {variant}, {channel} and {cryptoMode} placeholders.
   */
  defaultOutputs?: string[];
}

/** One buildable product configuration. Immutable once resolved. */
export interface VariantSpec {
  readonly name: string;
  readonly channel: string;
  readonly cryptoMode: string;
  readonly required: boolean;
  /** Concrete output filenames, in declaration order. */
  readonly outputs: readonly string[];
  readonly flags: Readonly<Record<string, string>>;
  readonly tags: readonly string[];
}

export const DEFAULT_OUTPUT_TEMPLATES = ['{variant}.bin'];

/** Canonical variant name for a channel/crypto-mode pair. */
export function variantName(channel: string, cryptoMode: string): string {
  return `${channel}-${cryptoMode}`;
}

/** Expand an output filename template for one variant. */
export function expandOutputTemplate(template: string, channel: string, cryptoMode: string): string {
  return template
    .split('{variant}').join(variantName(channel, cryptoMode))
    .split('{channel}').join(channel)
    .split('{cryptoMode}').join(cryptoMode);
}
