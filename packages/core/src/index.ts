// @keel/core - Public API surface
// Envelope protocol with the remote authority: hybrid encryption and token verification

// ============================================================
// Types
// ============================================================

export type { CryptoProvider } from './crypto-provider.js'

export type {
  PublicKey,
  EnvelopeString,
  Envelope,
  TokenEnvelope,
  SealedPayload,
  ParsedToken,
  TokenVerdict,
  MalformedTokenReason,
  InvalidTokenReason,
} from './types.js'

export type { Transport, TransportResponse } from './transport.js'

export type { PublicKeyCache, PublicKeyCacheConfig, PublicKeyCacheListener } from './key-cache.js'

export type { ParsedEnvelope } from './envelope.js'

export type { TokenParseResult } from './token-verifier.js'

export type { NodeCryptoProviderOptions } from './node-crypto-provider.js'

// ============================================================
// Errors
// ============================================================

export { KeelError, RemoteCommunicationError, EncryptionError, describeError } from './errors.js'

// ============================================================
// CryptoProvider
// ============================================================

export { NodeCryptoProvider } from './node-crypto-provider.js'

// ============================================================
// Transport & Key Cache
// ============================================================

export { expectSuccess } from './transport.js'

export { createPublicKeyCache } from './key-cache.js'

// ============================================================
// Envelope Operations
// ============================================================

export { encryptEnvelope, decryptEnvelope, parseEnvelope } from './envelope.js'

// ============================================================
// Token Operations
// ============================================================

export { verifyToken, isValidToken, parseTokenEnvelope, isWithinWindow } from './token-verifier.js'

// ============================================================
// Schemas
// ============================================================

export { envelopeSchema, tokenEnvelopeSchema } from './schema.js'

// ============================================================
// Constants
// ============================================================

export {
  PUBLIC_KEY_PATH,
  SITE_UPDATE_PATH,
  SUCCESS_STATUS,
  DEFAULT_FRESHNESS_WINDOW_SECONDS,
  DEFAULT_SIGNATURE_ALGORITHM,
  SYMMETRIC_KEY_SIZE,
  IV_SIZE,
  AUTH_TAG_SIZE,
} from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export { toBase64, fromBase64, utf8Encode, utf8Decode, utf8DecodeStrict } from './encoding.js'
