import { InvalidMatrixError } from '../../src/domain/errors';
import { MatrixDefinition } from '../../src/domain/variant';
import { resolveMatrix, selectVariants, validateMatrix } from '../../src/engine/resolver';

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidMatrixError) return err.typedError.code;
    throw err;
  }
  throw new Error('expected an InvalidMatrixError');
}

describe('Variant Matrix Resolver', () => {
  const matrix: MatrixDefinition = {
    axes: { channels: ['store', 'enterprise'], cryptoModes: ['standard', 'fips'] },
    exclusions: [{ channel: 'store', cryptoMode: 'fips', reason: 'not certified for store builds' }],
  };

  test('expands the cartesian product minus exclusions, sorted by channel then crypto mode', () => {
    const variants = resolveMatrix(matrix);
    expect(variants.map((v) => v.name)).toEqual(['enterprise-fips', 'enterprise-standard', 'store-standard']);
  });

  test('is deterministic regardless of axis declaration order', () => {
    const reordered: MatrixDefinition = {
      ...matrix,
      axes: { channels: ['enterprise', 'store'], cryptoModes: ['fips', 'standard'] },
    };
    expect(resolveMatrix(reordered)).toEqual(resolveMatrix(matrix));
  });

  test('applies defaults: required, one output per variant, axis flags', () => {
    const [first] = resolveMatrix(matrix);
    expect(first.required).toBe(true);
    expect(first.outputs).toEqual(['enterprise-fips.bin']);
    expect(first.flags).toEqual({ channel: 'enterprise', cryptoMode: 'fips' });
    expect(Object.isFrozen(first)).toBe(true);
  });

  test('applies per-variant overrides and output templates', () => {
    const variants = resolveMatrix({
      ...matrix,
      defaultOutputs: ['app-{channel}-{cryptoMode}.apk'],
      variants: {
        'enterprise-fips': { required: false, outputs: ['{variant}.aab', '{variant}.mapping'], flags: { minify: 'true' }, tags: ['b', 'a'] },
      },
    });
    const fips = variants.find((v) => v.name === 'enterprise-fips');
    expect(fips?.required).toBe(false);
    expect(fips?.outputs).toEqual(['enterprise-fips.aab', 'enterprise-fips.mapping']);
    expect(fips?.flags).toEqual({ minify: 'true', channel: 'enterprise', cryptoMode: 'fips' });
    expect(fips?.tags).toEqual(['a', 'b']);
    expect(variants.find((v) => v.name === 'store-standard')?.outputs).toEqual(['app-store-standard.apk']);
  });

  test('an exclusion naming only one axis removes every combination with that value', () => {
    const variants = resolveMatrix({ ...matrix, exclusions: [{ cryptoMode: 'fips' }] });
    expect(variants.map((v) => v.name)).toEqual(['enterprise-standard', 'store-standard']);
  });

  test('rejects an empty axis before expanding', () => {
    expect(codeOf(() => resolveMatrix({ axes: { channels: [], cryptoModes: ['standard'] } }))).toBe('MATRIX.EMPTY_AXIS');
  });

  test('rejects an exclusion that references an undefined value', () => {
    expect(codeOf(() => resolveMatrix({ ...matrix, exclusions: [{ channel: 'beta' }] }))).toBe('MATRIX.UNDEFINED_EXCLUSION_VALUE');
  });

  test('rejects duplicate and malformed axis values', () => {
    const result = validateMatrix({ axes: { channels: ['store', 'store', 'bad/name'], cryptoModes: ['standard'] } });
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['MATRIX.DUPLICATE_VALUE', 'MATRIX.INVALID_VALUE']);
  });

  test('rejects a matrix whose every combination is excluded', () => {
    expect(codeOf(() => resolveMatrix({ ...matrix, exclusions: [{ channel: 'store' }, { channel: 'enterprise' }] }))).toBe('MATRIX.EMPTY_MATRIX');
  });

  test('rejects overrides for variants that do not exist', () => {
    expect(codeOf(() => resolveMatrix({ ...matrix, variants: { 'store-fips': { required: false } } }))).toBe('MATRIX.UNKNOWN_VARIANT');
  });

  test('rejects two variants publishing the same filename', () => {
    expect(codeOf(() => resolveMatrix({ ...matrix, defaultOutputs: ['app.apk'] }))).toBe('MATRIX.DUPLICATE_OUTPUT');
  });

  test('rejects output names that are paths', () => {
    expect(codeOf(() => resolveMatrix({ ...matrix, defaultOutputs: ['../{variant}.apk'] }))).toBe('MATRIX.INVALID_OUTPUT');
  });

  test('lists every problem in the thrown error details', () => {
    try {
      resolveMatrix({ axes: { channels: [], cryptoModes: [] } });
      throw new Error('expected failure');
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidMatrixError);
      if (err instanceof InvalidMatrixError) {
        expect(err.typedError.details?.errors).toEqual([
          { code: 'MATRIX.EMPTY_AXIS', message: 'Matrix axis "channels" has no values' },
          { code: 'MATRIX.EMPTY_AXIS', message: 'Matrix axis "cryptoModes" has no values' },
        ]);
      }
    }
  });
});

describe('selectVariants', () => {
  const variants = resolveMatrix({
    axes: { channels: ['store', 'enterprise'], cryptoModes: ['standard', 'fips'] },
  });

  test('"all", "*" and no selector select every variant', () => {
    expect(selectVariants(variants)).toHaveLength(4);
    expect(selectVariants(variants, 'all')).toHaveLength(4);
    expect(selectVariants(variants, '*')).toHaveLength(4);
  });

  test('glob patterns keep resolver order', () => {
    expect(selectVariants(variants, '*-fips, store-standard').map((v) => v.name)).toEqual([
      'enterprise-fips',
      'store-fips',
      'store-standard',
    ]);
  });

  test('a pattern that matches nothing is an error', () => {
    expect(codeOf(() => selectVariants(variants, 'store-*,beta-*'))).toBe('MATRIX.EMPTY_SELECTION');
  });

  test('dots in patterns are literal', () => {
    expect(codeOf(() => selectVariants(variants, 'store.standard'))).toBe('MATRIX.EMPTY_SELECTION');
  });
});
