// @keel/core - CryptoProvider abstraction

import type { PublicKey, SealedPayload } from './types.js'

/**
 * CryptoProvider abstraction for all cryptographic operations.
 *
 * The envelope codec and token verifier never touch `node:crypto` directly;
 * everything goes through this interface so a KMS/HSM-backed or test
 * implementation can be swapped in.
 *
 * Every async method may reject. Callers translate failures into their own error
 * model (EncryptionError for the codec, `false` for the verifier).
 *
 * Default implementation: NodeCryptoProvider.
 */
export interface CryptoProvider {
  /**
   * Hybrid seal: encrypts `plaintext` under a fresh symmetric key and wraps
   * that key for the single recipient `publicKey`.
   */
  seal(plaintext: Uint8Array, publicKey: PublicKey): Promise<SealedPayload>

  /**
   * Hybrid open: unwraps `sealedKey` with `publicKey`, then decrypts
   * `message`. Inverse of the authority's seal.
   */
  open(sealedKey: Uint8Array, message: Uint8Array, publicKey: PublicKey): Promise<Uint8Array>

  /**
   * Verifies `signature` over `data` with `publicKey`.
   * Returns false for a well-formed but wrong signature.
   */
  verify(data: Uint8Array, signature: Uint8Array, publicKey: PublicKey): Promise<boolean>

  /** Generates cryptographically secure random bytes. */
  randomBytes(length: number): Uint8Array
}
