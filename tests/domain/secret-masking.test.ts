/**
 * Secret masking keeps passphrases out of signing error messages.
 */

import { maskSecret, maskSecretsInMessage } from '../../src/domain/errors';

describe('maskSecret', () => {
  it('masks all but the last 4 characters of long secrets', () => {
    expect(maskSecret('test-passphrase')).toBe('***********rase');
  });

  it('fully masks secrets shorter than 8 characters', () => {
    expect(maskSecret('short')).toBe('****');
    expect(maskSecret('1234567')).toBe('****');
    expect(maskSecret('')).toBe('****');
  });

  it('preserves the last 4 characters of an 8-character secret', () => {
    expect(maskSecret('12345678')).toBe('****5678');
  });
});

describe('maskSecretsInMessage', () => {
  it('masks every occurrence of each secret', () => {
    expect(maskSecretsInMessage('bad decrypt with test-passphrase (test-passphrase)', ['test-passphrase'])).toBe(
      'bad decrypt with ***********rase (***********rase)',
    );
  });

  it('treats regex-special characters literally', () => {
    expect(maskSecretsInMessage('failed: key+special.chars?', ['key+special.chars?'])).toBe('failed: **************ars?');
  });

  it('ignores empty secrets', () => {
    expect(maskSecretsInMessage('unchanged', ['', 'absent-secret'])).toBe('unchanged');
  });
});
