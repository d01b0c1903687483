// @keel/core - node:crypto based CryptoProvider implementation

import {
  constants,
  createCipheriv,
  createDecipheriv,
  createPublicKey,
  publicDecrypt,
  publicEncrypt,
  randomBytes as nodeRandomBytes,
  verify as nodeVerify,
} from 'node:crypto'
import type { KeyObject } from 'node:crypto'
import type { CryptoProvider } from './crypto-provider.js'
import type { PublicKey, SealedPayload } from './types.js'
import {
  AUTH_TAG_SIZE,
  DEFAULT_SIGNATURE_ALGORITHM,
  IV_SIZE,
  SYMMETRIC_KEY_SIZE,
} from './types.js'
import { concatBuffers, utf8Decode } from './encoding.js'

const SYMMETRIC_ALGORITHM = 'aes-256-gcm'

const PEM_PREFIX = '-----BEGIN'

/** Options for NodeCryptoProvider */
export interface NodeCryptoProviderOptions {
  /** Digest used for token signatures (default: 'sha1') */
  readonly signatureAlgorithm?: string | undefined
}

/**
 * Default CryptoProvider implementation on `node:crypto`.
 *
 * - seal: AES-256-GCM payload, key wrapped with RSA-OAEP (SHA-256)
 * - open: key unwrapped with RSA PKCS#1 v1.5 public decryption, AES-256-GCM payload
 * - verify: RSA signature with the configured digest (SHA-1 unless told otherwise)
 *
 * Sealed message layout: `[ iv:12 ][ ciphertext ][ tag:16 ]`
 *
 * Seal and open both take the authority's public key. The authority opens
 * what we seal with its private key, and wraps what it sends us with that
 * same private key, so one public key serves both directions.
 */
export class NodeCryptoProvider implements CryptoProvider {
  private readonly signatureAlgorithm: string

  /** Parsed keys, keyed by the cached PublicKey instance */
  private readonly keyObjects = new WeakMap<PublicKey, KeyObject>()

  constructor(options: NodeCryptoProviderOptions = {}) {
    this.signatureAlgorithm = options.signatureAlgorithm ?? DEFAULT_SIGNATURE_ALGORITHM
  }

  async seal(plaintext: Uint8Array, publicKey: PublicKey): Promise<SealedPayload> {
    const key = this.importPublicKey(publicKey)
    const symmetricKey = this.randomBytes(SYMMETRIC_KEY_SIZE)
    const iv = this.randomBytes(IV_SIZE)

    const cipher = createCipheriv(SYMMETRIC_ALGORITHM, symmetricKey, iv)
    const ciphertext = concatBuffers(cipher.update(plaintext), cipher.final())
    const tag = cipher.getAuthTag()

    const sealedKey = publicEncrypt(
      { key, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: 'sha256' },
      symmetricKey,
    )

    return {
      sealedKey: new Uint8Array(sealedKey),
      message: concatBuffers(iv, ciphertext, tag),
    }
  }

  async open(sealedKey: Uint8Array, message: Uint8Array, publicKey: PublicKey): Promise<Uint8Array> {
    const key = this.importPublicKey(publicKey)
    const symmetricKey = publicDecrypt({ key, padding: constants.RSA_PKCS1_PADDING }, sealedKey)
    if (symmetricKey.length !== SYMMETRIC_KEY_SIZE) {
      throw new Error(
        `Unwrapped key is ${String(symmetricKey.length)} bytes, expected ${String(SYMMETRIC_KEY_SIZE)}`,
      )
    }
    if (message.length < IV_SIZE + AUTH_TAG_SIZE) {
      throw new Error('Sealed message is shorter than iv and tag')
    }

    const iv = message.subarray(0, IV_SIZE)
    const ciphertext = message.subarray(IV_SIZE, message.length - AUTH_TAG_SIZE)
    const tag = message.subarray(message.length - AUTH_TAG_SIZE)

    const decipher = createDecipheriv(SYMMETRIC_ALGORITHM, symmetricKey, iv)
    decipher.setAuthTag(tag)
    return concatBuffers(decipher.update(ciphertext), decipher.final())
  }

  async verify(data: Uint8Array, signature: Uint8Array, publicKey: PublicKey): Promise<boolean> {
    return nodeVerify(this.signatureAlgorithm, data, this.importPublicKey(publicKey), signature)
  }

  randomBytes(length: number): Uint8Array {
    return new Uint8Array(nodeRandomBytes(length))
  }

  /**
   * Accepts PEM text or DER SubjectPublicKeyInfo.
   *
   * @throws {Error} If the bytes are not a usable public key
   */
  private importPublicKey(publicKey: PublicKey): KeyObject {
    const cached = this.keyObjects.get(publicKey)
    if (cached !== undefined) {
      return cached
    }

    const text = utf8Decode(publicKey)
    const keyObject = text.trimStart().startsWith(PEM_PREFIX)
      ? createPublicKey(text)
      : createPublicKey({ key: Buffer.from(publicKey), format: 'der', type: 'spki' })

    this.keyObjects.set(publicKey, keyObject)
    return keyObject
  }
}
