// @keel/core - Envelope codec (hybrid encrypt/decrypt of structured data)

import type { CryptoProvider } from './crypto-provider.js'
import type { PublicKeyCache } from './key-cache.js'
import type { Envelope, EnvelopeString, SealedPayload } from './types.js'
import { EncryptionError, describeError } from './errors.js'
import {
  bytesEqual,
  decodeBase64Json,
  encodeBase64Json,
  fromBase64,
  toBase64,
  utf8DecodeStrict,
  utf8Encode,
} from './encoding.js'
import { envelopeSchema } from './schema.js'

/** Envelope fields after base64 decoding */
export interface ParsedEnvelope {
  readonly sealedKey: Uint8Array
  readonly message: Uint8Array
}

/**
 * Encrypts `data` for the remote authority.
 *
 * Steps:
 * 1. Serialize `data` to JSON
 * 2. Get the authority key (may fetch it)
 * 3. Seal: fresh symmetric key, payload encrypted, key wrapped
 * 4. Reject empty output and output identical to the plaintext
 * 5. Encode: base64(JSON({ key: base64(sealedKey), message: base64(message) }))
 *
 * @throws {EncryptionError} If `data` cannot be serialized or sealing fails
 * @throws {RemoteCommunicationError} If the public key cannot be fetched
 */
export async function encryptEnvelope(
  cryptoProvider: CryptoProvider,
  keyCache: PublicKeyCache,
  data: unknown,
): Promise<EnvelopeString> {
  const plaintext = serialize(data)
  const publicKey = await keyCache.get()

  let sealed: SealedPayload
  try {
    sealed = await cryptoProvider.seal(plaintext, publicKey)
  } catch (error) {
    throw new EncryptionError(`Unable to encrypt a message: ${describeError(error)}`, {
      cause: error,
    })
  }

  // A seal that hands the plaintext back must never pass as encryption
  if (
    sealed.sealedKey.length === 0 ||
    sealed.message.length === 0 ||
    bytesEqual(sealed.message, plaintext)
  ) {
    throw new EncryptionError('Unable to encrypt a message: sealing did not produce ciphertext')
  }

  const envelope: Envelope = {
    key: toBase64(sealed.sealedKey),
    message: toBase64(sealed.message),
  }
  return encodeBase64Json(envelope) as EnvelopeString
}

/**
 * Decrypts an envelope sent by the remote authority.
 *
 * The envelope is fully decoded and checked before the key is fetched or any
 * crypto runs.
 *
 * @throws {EncryptionError} If the envelope is malformed, opening fails, or
 *   the plaintext is not JSON
 * @throws {RemoteCommunicationError} If the public key cannot be fetched
 */
export async function decryptEnvelope(
  cryptoProvider: CryptoProvider,
  keyCache: PublicKeyCache,
  cypherText: string,
): Promise<unknown> {
  const parsed = parseEnvelope(cypherText)
  if (parsed === null) {
    throw new EncryptionError('Encrypted message is not understood')
  }

  const publicKey = await keyCache.get()

  let plaintext: Uint8Array
  try {
    plaintext = await cryptoProvider.open(parsed.sealedKey, parsed.message, publicKey)
  } catch (error) {
    throw new EncryptionError(`Unable to decrypt a message: ${describeError(error)}`, {
      cause: error,
    })
  }

  try {
    const value: unknown = JSON.parse(utf8DecodeStrict(plaintext))
    return value
  } catch (error) {
    throw new EncryptionError('Decrypted message is not valid JSON', { cause: error })
  }
}

/**
 * Decodes an envelope string into its raw fields.
 *
 * @returns ParsedEnvelope, or null if any layer (base64, JSON, shape, field
 *   base64, non-empty bytes) is wrong
 */
export function parseEnvelope(cypherText: string): ParsedEnvelope | null {
  const decoded = decodeBase64Json(cypherText)
  if (!decoded.ok) {
    return null
  }

  const envelope = envelopeSchema.safeParse(decoded.value)
  if (!envelope.success) {
    return null
  }

  const sealedKey = fromBase64(envelope.data.key)
  const message = fromBase64(envelope.data.message)
  if (sealedKey === null || message === null || sealedKey.length === 0 || message.length === 0) {
    return null
  }

  return { sealedKey, message }
}

function serialize(data: unknown): Uint8Array {
  let json: string | undefined
  try {
    json = JSON.stringify(data)
  } catch (error) {
    throw new EncryptionError(`Unable to serialize a message: ${describeError(error)}`, {
      cause: error,
    })
  }
  // JSON.stringify returns undefined for undefined, functions and symbols
  if (json === undefined) {
    throw new EncryptionError('Unable to serialize a message: value has no JSON form')
  }
  return utf8Encode(json)
}
