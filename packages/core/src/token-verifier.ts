// @keel/core - Fail-closed verification of authority-issued tokens

import type { CryptoProvider } from './crypto-provider.js'
import type { PublicKeyCache } from './key-cache.js'
import type { MalformedTokenReason, ParsedToken, PublicKey, TokenVerdict } from './types.js'
import { DEFAULT_FRESHNESS_WINDOW_SECONDS } from './types.js'
import { decodeBase64Json, fromBase64, utf8Decode } from './encoding.js'
import { tokenEnvelopeSchema } from './schema.js'

/**
 * Numeric string as the authority's platform reads one: optional surrounding
 * whitespace, optional sign, digits with an optional fraction (`5.`, `.5`),
 * optional exponent. No hex, no `Infinity`.
 */
const NUMERIC_TIMESTAMP = /^[ \t\n\r\v\f]*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?[ \t\n\r\v\f]*$/

export type TokenParseResult =
  | { readonly ok: true; readonly value: ParsedToken }
  | { readonly ok: false; readonly reason: MalformedTokenReason }

/**
 * Decodes a token string into timestamp and signature.
 *
 * Wire format: `base64(JSON({ time: base64(decimal), signature: base64(bytes) }))`
 *
 * Never throws. Any broken layer yields `{ ok: false }` with the reason.
 */
export function parseTokenEnvelope(encryptedRemoteToken: string): TokenParseResult {
  const decoded = decodeBase64Json(encryptedRemoteToken)
  if (!decoded.ok) {
    return { ok: false, reason: 'malformed_envelope' }
  }

  // Rejects numbers, arrays, null and objects missing either field
  const envelope = tokenEnvelopeSchema.safeParse(decoded.value)
  if (!envelope.success) {
    return { ok: false, reason: 'malformed_envelope' }
  }

  const timestampBytes = fromBase64(envelope.data.time)
  if (timestampBytes === null) {
    return { ok: false, reason: 'malformed_timestamp' }
  }
  const timestampText = utf8Decode(timestampBytes)
  if (!NUMERIC_TIMESTAMP.test(timestampText)) {
    return { ok: false, reason: 'malformed_timestamp' }
  }

  const signature = fromBase64(envelope.data.signature)
  if (signature === null || signature.length === 0) {
    return { ok: false, reason: 'malformed_signature' }
  }

  return {
    ok: true,
    value: { timestampBytes, timestamp: Number(timestampText), signature },
  }
}

/**
 * Checks `remoteTimestamp` against `[trusted - window, trusted + window]`, inclusive.
 * A captured token is only replayable inside this window.
 */
export function isWithinWindow(
  remoteTimestamp: number,
  trustedTimestamp: number,
  windowSeconds: number,
): boolean {
  return (
    remoteTimestamp >= trustedTimestamp - windowSeconds &&
    remoteTimestamp <= trustedTimestamp + windowSeconds
  )
}

/**
 * Verifies a token issued by the remote authority.
 *
 * Steps:
 * 1. Parse envelope, timestamp and signature (malformed on any failure)
 * 2. Freshness window check against the caller's clock reading
 * 3. Get the authority key (may fetch it)
 * 4. Signature check over the raw timestamp bytes
 *
 * Never rejects. Key fetch failures and provider errors become `invalid`.
 *
 * @param cryptoProvider - CryptoProvider for signature verification
 * @param keyCache - Source of the authority key
 * @param encryptedRemoteToken - Token as received
 * @param trustedTimestamp - Verifier's clock reading, seconds
 * @param windowSeconds - Allowed skew either side (default: 20)
 */
export async function verifyToken(
  cryptoProvider: CryptoProvider,
  keyCache: PublicKeyCache,
  encryptedRemoteToken: string,
  trustedTimestamp: number,
  windowSeconds: number = DEFAULT_FRESHNESS_WINDOW_SECONDS,
): Promise<TokenVerdict> {
  const parsed = parseTokenEnvelope(encryptedRemoteToken)
  if (!parsed.ok) {
    return { status: 'malformed', reason: parsed.reason }
  }
  if (!Number.isFinite(trustedTimestamp)) {
    return { status: 'malformed', reason: 'malformed_timestamp' }
  }

  const token = parsed.value
  if (!isWithinWindow(token.timestamp, trustedTimestamp, windowSeconds)) {
    return { status: 'invalid', reason: 'outside_window' }
  }

  let publicKey: PublicKey
  try {
    publicKey = await keyCache.get()
  } catch {
    return { status: 'invalid', reason: 'key_unavailable' }
  }

  let signatureOk: boolean
  try {
    signatureOk = await cryptoProvider.verify(token.timestampBytes, token.signature, publicKey)
  } catch {
    signatureOk = false
  }

  return signatureOk ? { status: 'valid' } : { status: 'invalid', reason: 'invalid_signature' }
}

/**
 * Boolean collapse of `verifyToken`: true only for a fresh token carrying a
 * valid authority signature.
 */
export async function isValidToken(
  cryptoProvider: CryptoProvider,
  keyCache: PublicKeyCache,
  encryptedRemoteToken: string,
  trustedTimestamp: number,
  windowSeconds: number = DEFAULT_FRESHNESS_WINDOW_SECONDS,
): Promise<boolean> {
  const verdict = await verifyToken(
    cryptoProvider,
    keyCache,
    encryptedRemoteToken,
    trustedTimestamp,
    windowSeconds,
  )
  return verdict.status === 'valid'
}
