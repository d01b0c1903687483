// @keel/core - Types, constants, and branded types

// ============================================================
// Branded Types
// ============================================================

declare const PUBLIC_KEY_BRAND: unique symbol
declare const ENVELOPE_BRAND: unique symbol

/**
 * The remote authority's public key as fetched from `/public-key`.
 * PEM text or DER SubjectPublicKeyInfo bytes; the provider decides.
 */
export type PublicKey = Uint8Array & { readonly [PUBLIC_KEY_BRAND]: 'KeelPublicKey' }

/** Branded string for a base64-encoded envelope produced by `encryptEnvelope` */
export type EnvelopeString = string & { readonly [ENVELOPE_BRAND]: 'KeelEnvelope' }

// ============================================================
// Wire Structures
// ============================================================

/** Hybrid-encrypted payload. Both fields are base64. */
export interface Envelope {
  /** Per-message symmetric key, wrapped with the authority key */
  readonly key: string
  /** Payload ciphertext */
  readonly message: string
}

/** Authority-issued authentication token. Both fields are base64. */
export interface TokenEnvelope {
  /** Decimal ASCII timestamp (seconds) */
  readonly time: string
  /** Signature over the raw timestamp bytes */
  readonly signature: string
}

/** Output of a seal operation, before base64 encoding */
export interface SealedPayload {
  readonly sealedKey: Uint8Array
  readonly message: Uint8Array
}

// ============================================================
// Token Verification Results (never throw)
// ============================================================

/** Why a structurally broken token was rejected */
export type MalformedTokenReason =
  | 'malformed_envelope'
  | 'malformed_timestamp'
  | 'malformed_signature'

/** Why a well-formed token was rejected */
export type InvalidTokenReason = 'outside_window' | 'key_unavailable' | 'invalid_signature'

/**
 * Tri-state token verdict. Callers of `isValidToken` only ever see the
 * boolean collapse; the reason is for logs and tests.
 */
export type TokenVerdict =
  | { readonly status: 'valid' }
  | { readonly status: 'invalid'; readonly reason: InvalidTokenReason }
  | { readonly status: 'malformed'; readonly reason: MalformedTokenReason }

/** Token envelope after decoding, before any crypto runs */
export interface ParsedToken {
  /** Raw timestamp bytes exactly as signed */
  readonly timestampBytes: Uint8Array
  /** Numeric value of the timestamp (seconds) */
  readonly timestamp: number
  readonly signature: Uint8Array
}

// ============================================================
// Protocol Constants
// ============================================================

/** Path serving the authority's base64-encoded public key */
export const PUBLIC_KEY_PATH = '/public-key'

/** Path accepting encrypted site data */
export const SITE_UPDATE_PATH = '/site-update'

/** Only status accepted from the authority */
export const SUCCESS_STATUS = 200

/** Token freshness window in seconds, applied on both sides of the trusted timestamp */
export const DEFAULT_FRESHNESS_WINDOW_SECONDS = 20

/** Default digest for token signatures, the one the authority signs with */
export const DEFAULT_SIGNATURE_ALGORITHM = 'sha1'

/** Symmetric key size in bytes (AES-256) */
export const SYMMETRIC_KEY_SIZE = 32

/** AES-GCM IV size in bytes */
export const IV_SIZE = 12

/** AES-GCM authentication tag size in bytes */
export const AUTH_TAG_SIZE = 16
