// @keel/client - Public API surface

// ============================================================
// Types
// ============================================================

export type {
  KeelClient,
  KeelClientConfig,
  ResolvedKeelConfig,
  Logger,
  LogContext,
  FetchFunction,
} from './types.js'

export type { HttpTransportOptions } from './http-transport.js'

// ============================================================
// Client Factory
// ============================================================

export { createKeelClient } from './client.js'

// ============================================================
// Configuration
// ============================================================

export { resolveConfig, KeelConfigError } from './config.js'

// ============================================================
// Transport
// ============================================================

export { HttpTransport } from './http-transport.js'

// ============================================================
// Logging
// ============================================================

export { silentLogger } from './logger.js'

// ============================================================
// Re-exports from @keel/core (convenience)
// ============================================================

export {
  KeelError,
  RemoteCommunicationError,
  EncryptionError,
  NodeCryptoProvider,
} from '@keel/core'

export type {
  CryptoProvider,
  PublicKey,
  Transport,
  TransportResponse,
  TokenVerdict,
} from '@keel/core'
