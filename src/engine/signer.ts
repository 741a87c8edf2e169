/**
 * Artifact Signer.
 *
 * Without a credential, artifacts pass through untouched and stay
 * unsigned. With a credential, signing either succeeds or fails the job:
 * a caller that asked for signing never receives a silently unsigned
 * artifact.
 *
 * Signed payload layout (the signature block is appended to the original bytes):
 *
 *   original bytes | block JSON (utf8) | uint32 BE length of block JSON | "VRSIG1"
 *
 * The block carries the public key, so a published artifact can be checked
 * without access to the credential.
 */

import { KeyObject, createHash, createPrivateKey, createPublicKey, sign, verify } from 'crypto';
import { promises as fs } from 'fs';
import { v4 as uuid } from 'uuid';
import { Artifact, SignatureState } from '../domain/artifact';
import { maskSecretsInMessage, signingError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

/** Signing credential, supplied only through a secure channel. */
export interface SigningCredential {
  /** PEM-encoded private key, optionally encrypted. */
  keyPem: string;
  alias: string;
  passphrase: string;
}

/** Metadata appended to a signed payload. */
export interface SignatureBlock {
  alias: string;
  algorithm: string;
  keyDigest: string;
  /** Base64 DER (SPKI) public key. */
  publicKey: string;
  /** Base64 signature over the original bytes. */
  signature: string;
}

export const SIGNATURE_MAGIC = Buffer.from('VRSIG1', 'utf8');

export interface LoadedKey {
  privateKey: KeyObject;
  publicDer: Buffer;
  keyDigest: string;
  algorithm: string;
  /** Digest name for crypto.sign; null for EdDSA keys, which hash internally. */
  digest: string | null;
}

function describeKey(privateKey: KeyObject): { algorithm: string; digest: string | null } | null {
  switch (privateKey.asymmetricKeyType) {
    case 'ed25519':
    case 'ed448':
      return { algorithm: privateKey.asymmetricKeyType, digest: null };
    case 'rsa':
      return { algorithm: 'rsa-sha256', digest: 'sha256' };
    case 'rsa-pss':
      return { algorithm: 'rsa-pss-sha256', digest: 'sha256' };
    case 'ec':
      return { algorithm: 'ecdsa-sha256', digest: 'sha256' };
    default:
      return null;
  }
}

/** Append a signature block to payload bytes. */
export function encodeSignedPayload(payload: Buffer, block: SignatureBlock): Buffer {
  const json = Buffer.from(JSON.stringify(block), 'utf8');
  const length = Buffer.alloc(4);
  length.writeUInt32BE(json.length, 0);
  return Buffer.concat([payload, json, length, SIGNATURE_MAGIC]);
}

/** Split signed bytes into the original payload and its block; null when unsigned. */
export function decodeSignedPayload(bytes: Buffer): { payload: Buffer; block: SignatureBlock } | null {
  const trailer = SIGNATURE_MAGIC.length + 4;
  if (bytes.length < trailer) return null;
  if (!bytes.subarray(bytes.length - SIGNATURE_MAGIC.length).equals(SIGNATURE_MAGIC)) return null;

  const jsonLength = bytes.readUInt32BE(bytes.length - trailer);
  const jsonStart = bytes.length - trailer - jsonLength;
  if (jsonStart < 0) return null;

  try {
    const block: SignatureBlock = JSON.parse(bytes.subarray(jsonStart, bytes.length - trailer).toString('utf8'));
    return { payload: bytes.subarray(0, jsonStart), block };
  } catch {
    return null;
  }
}

/**
 * Check a signed payload against its embedded public key. Returns the
 * digest of the key that signed it, or null when the bytes are unsigned,
 * tampered with, or the key does not match its recorded digest.
 */
export function verifySignedPayload(bytes: Buffer): { keyDigest: string; alias: string } | null {
  const decoded = decodeSignedPayload(bytes);
  if (!decoded) return null;
  const { payload, block } = decoded;

  const publicDer = Buffer.from(block.publicKey, 'base64');
  if (createHash('sha256').update(publicDer).digest('hex') !== block.keyDigest) return null;

  const publicKey = createPublicKey({ key: publicDer, format: 'der', type: 'spki' });
  const digest = block.algorithm === 'ed25519' || block.algorithm === 'ed448' ? null : 'sha256';
  const ok = verify(digest, payload, publicKey, Buffer.from(block.signature, 'base64'));
  return ok ? { keyDigest: block.keyDigest, alias: block.alias } : null;
}

export class ArtifactSigner {
  private loaded?: LoadedKey;
  private log: Logger;

  constructor(
    private readonly credential?: SigningCredential,
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'signer' });
  }

  /** Whether a credential is configured. */
  get enabled(): boolean {
    return this.credential !== undefined;
  }

  /**
   * Load and check the credential. Throws SigningError on a bad passphrase,
   * corrupt key material or an unsupported key type.
   */
  loadKey(): LoadedKey {
    if (this.loaded) return this.loaded;
    const credential = this.credential;
    if (!credential) {
      throw signingError('NOT_CONFIGURED', 'No signing credential is configured');
    }

    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey({ key: credential.keyPem, format: 'pem', passphrase: credential.passphrase });
    } catch (err) {
      const raw = err instanceof Error ? err.message : String(err);
      throw signingError(
        'INVALID_CREDENTIAL',
        `Could not load signing key "${credential.alias}": ${maskSecretsInMessage(raw, [credential.passphrase])}`,
      );
    }

    const described = describeKey(privateKey);
    if (!described) {
      throw signingError('UNSUPPORTED_KEY', `Key type "${privateKey.asymmetricKeyType}" of "${credential.alias}" cannot sign artifacts`);
    }

    const publicDer = createPublicKey(privateKey).export({ type: 'spki', format: 'der' });
    this.loaded = {
      privateKey,
      publicDer,
      keyDigest: createHash('sha256').update(publicDer).digest('hex'),
      ...described,
    };
    this.log.info('Signing key loaded', { alias: credential.alias, algorithm: described.algorithm });
    return this.loaded;
  }

  /**
   * Sign an artifact. Unsigned artifacts come back unchanged when no
   * credential is configured; otherwise the payload file is replaced by the
   * signed bytes and a new, signed Artifact is returned.
   */
  async sign(artifact: Artifact): Promise<Artifact> {
    const credential = this.credential;
    if (!credential) {
      return artifact;
    }
    if (artifact.signature.kind === 'signed') {
      throw signingError('ALREADY_SIGNED', `Artifact "${artifact.filename}" is already signed`, artifact.variant);
    }

    const key = this.loadKey();

    let original: Buffer;
    try {
      original = await fs.readFile(artifact.path);
    } catch (err) {
      throw signingError('PAYLOAD_UNREADABLE', `Could not read "${artifact.filename}" for signing: ${String(err)}`, artifact.variant);
    }

    let signature: Buffer;
    try {
      signature = sign(key.digest, original, key.privateKey);
    } catch (err) {
      const raw = err instanceof Error ? err.message : String(err);
      throw signingError('FAILED', `Signing "${artifact.filename}" failed: ${maskSecretsInMessage(raw, [credential.passphrase])}`, artifact.variant);
    }

    const signed = encodeSignedPayload(original, {
      alias: credential.alias,
      algorithm: key.algorithm,
      keyDigest: key.keyDigest,
      publicKey: key.publicDer.toString('base64'),
      signature: signature.toString('base64'),
    });

    // Replace the unsigned payload; it is not retained.
    const tmp = `${artifact.path}.signing-${uuid()}`;
    await fs.writeFile(tmp, signed);
    await fs.rename(tmp, artifact.path);

    const state: SignatureState = {
      kind: 'signed',
      alias: credential.alias,
      keyDigest: key.keyDigest,
      algorithm: key.algorithm,
    };
    this.log.debug('Artifact signed', { variant: artifact.variant, filename: artifact.filename });
    return { ...artifact, signature: state };
  }
}
