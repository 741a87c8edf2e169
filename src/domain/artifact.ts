/**
 * Artifact domain model.
 *
 * Artifacts are build outputs referenced by a local payload path rather than
 * held in memory. An artifact is never mutated: signing produces a new
 * Artifact whose payload replaces the unsigned bytes.
 */

/** Signing state of an artifact. A signed artifact always names the key that signed it. */
export type SignatureState =
  | { kind: 'unsigned' }
  | {
      kind: 'signed';
      /** Key alias from the signing credential. */
      alias: string;
      /** SHA-256 hex digest of the signer's DER-encoded public key. */
      keyDigest: string;
      /** Signature algorithm, e.g. "ed25519" or "rsa-sha256". */
      algorithm: string;
    };

export const UNSIGNED: SignatureState = { kind: 'unsigned' };

/** A build output file. */
export interface Artifact {
  readonly variant: string;
  /** Published filename; unique across the whole release. */
  readonly filename: string;
  /** Local path of the payload bytes. */
  readonly path: string;
  readonly signature: SignatureState;
}

export function isSigned(state: SignatureState): state is Extract<SignatureState, { kind: 'signed' }> {
  return state.kind === 'signed';
}
