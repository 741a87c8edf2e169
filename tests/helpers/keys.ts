import { generateKeyPairSync } from 'crypto';

export const TEST_PASSPHRASE = 'test-passphrase';

/** Throwaway Ed25519 key, PEM-encoded and encrypted with TEST_PASSPHRASE. */
export function generateEncryptedEd25519Key(): string {
  const { privateKey } = generateKeyPairSync('ed25519', {
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem', cipher: 'aes-256-cbc', passphrase: TEST_PASSPHRASE },
  });
  return privateKey;
}

export function generatePlainRsaKey(): string {
  const { privateKey } = generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });
  return privateKey;
}
