// @keel/client - Types and configuration interfaces

import type { CryptoProvider, PublicKey, Transport, TokenVerdict } from '@keel/core'

// ============================================================
// Logger
// ============================================================

/** Structured fields attached to a log line */
export type LogContext = Readonly<Record<string, unknown>>

/**
 * Minimal logging seam. The client never logs payloads, keys or tokens,
 * only events and reason codes.
 */
export interface Logger {
  debug(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
}

// ============================================================
// Client Configuration
// ============================================================

/** The `fetch` signature the default transport calls */
export type FetchFunction = typeof fetch

/**
 * Configuration for a Keel client.
 *
 * @example
 * ```typescript
 * const keel = createKeelClient({
 *   baseUrl: 'https://authority.example.com',
 *   username: 'site',
 *   password: process.env.AUTHORITY_PASSWORD,
 * })
 *
 * await keel.postData({ modules: [] })
 * ```
 */
export interface KeelClientConfig {
  // ---- Authority ----

  /** Base URL of the remote authority (http or https) */
  readonly baseUrl: string

  /** Basic auth username; no credentials are sent when empty */
  readonly username?: string | undefined

  /** Basic auth password */
  readonly password?: string | undefined

  // ---- Verification ----

  /** Digest for token signatures (default: 'sha1') */
  readonly signatureAlgorithm?: string | undefined

  /** Allowed clock skew either side of the trusted timestamp, in seconds (default: 20) */
  readonly freshnessWindow?: number | undefined

  // ---- Overrides ----

  /** Custom transport (default: HttpTransport on `baseUrl`) */
  readonly transport?: Transport | undefined

  /** `fetch` used by the default transport (default: global fetch) */
  readonly fetch?: FetchFunction | undefined

  /** Custom CryptoProvider (default: NodeCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined

  /** Logger (default: silent) */
  readonly logger?: Logger | undefined
}

// ============================================================
// Resolved Configuration (defaults applied)
// ============================================================

/**
 * Validated configuration with defaults applied.
 * Exposed as `keel.config` on a KeelClient.
 */
export interface ResolvedKeelConfig {
  readonly baseUrl: string
  readonly username: string | undefined
  readonly password: string | undefined
  readonly signatureAlgorithm: string
  readonly freshnessWindow: number
}

// ============================================================
// Client Instance
// ============================================================

/**
 * A client bound to one remote authority.
 *
 * Created by `createKeelClient(config)`. Holds the public key cache for
 * its own lifetime.
 */
export interface KeelClient {
  /** The authority's public key, fetched on first use */
  publicKey(): Promise<PublicKey>

  /** Encrypts `data` into an envelope string only the authority can open */
  encrypt(data: unknown): Promise<string>

  /** Decrypts an envelope string sealed by the authority */
  decrypt(cypherText: string): Promise<unknown>

  /**
   * True only if `token` was signed by the authority within the freshness
   * window around `timestamp` (default: now, in whole seconds).
   *
   * Malformed tokens, bad signatures and key fetch failures resolve to
   * false. It rejects only when the configured logger throws.
   */
  isValidToken(token: string, timestamp?: number): Promise<boolean>

  /** Like `isValidToken`, with the reason for a rejection. Same rejection rule. */
  verifyToken(token: string, timestamp?: number): Promise<TokenVerdict>

  /** Encrypts `data` and posts it to the authority's site update endpoint */
  postData(data: unknown): Promise<void>

  /** Resolved configuration (readonly) */
  readonly config: ResolvedKeelConfig
}
