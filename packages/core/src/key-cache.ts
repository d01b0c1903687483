// @keel/core - Process-lifetime cache for the authority's public key

import { RemoteCommunicationError } from './errors.js'
import { fromBase64 } from './encoding.js'
import type { Transport } from './transport.js'
import { expectSuccess } from './transport.js'
import type { PublicKey } from './types.js'
import { PUBLIC_KEY_PATH, SUCCESS_STATUS } from './types.js'

/**
 * Holds the remote authority's public key.
 *
 * - Empty on creation, populated by the first successful `get()`
 * - Never invalidated: the key lives as long as the cache
 * - Failed fetches are not cached; the next `get()` tries again
 * - Concurrent `get()` calls share a single in-flight fetch
 */
export interface PublicKeyCache {
  /**
   * Returns the cached key, fetching it first if the cache is empty.
   *
   * @throws {RemoteCommunicationError} If the authority does not answer 200
   *   or the body is not a base64-encoded key
   */
  get(): Promise<PublicKey>

  /** The cached key, or undefined while the cache is empty. Never fetches. */
  readonly cached: PublicKey | undefined
}

/**
 * Observes network fetches. Called once per fetch, however many callers
 * are waiting on it. Cache hits are not reported.
 */
export interface PublicKeyCacheListener {
  fetchStarted?(path: string): void
  fetchSucceeded?(publicKey: PublicKey): void
  fetchFailed?(error: unknown): void
}

/**
 * Configuration for the public key cache.
 */
export interface PublicKeyCacheConfig {
  /** Path the key is served from (default: '/public-key') */
  readonly path?: string | undefined

  /** Fetch observer, e.g. for logging */
  readonly listener?: PublicKeyCacheListener | undefined
}

/**
 * Creates an empty public key cache backed by `transport`.
 *
 * @param transport - Transport used for the one-time key fetch
 * @param config - Optional cache configuration
 */
export function createPublicKeyCache(
  transport: Transport,
  config?: PublicKeyCacheConfig,
): PublicKeyCache {
  const path = config?.path ?? PUBLIC_KEY_PATH
  const listener = config?.listener

  let publicKey: PublicKey | undefined
  let inFlight: Promise<PublicKey> | undefined

  async function fetchPublicKey(): Promise<PublicKey> {
    const body = expectSuccess(await transport.get(path))
    const bytes = fromBase64(body.trim())
    if (bytes === null || bytes.length === 0) {
      throw new RemoteCommunicationError(SUCCESS_STATUS, 'Public key response is not a base64-encoded key')
    }
    return bytes as PublicKey
  }

  async function observedFetch(): Promise<PublicKey> {
    listener?.fetchStarted?.(path)
    let key: PublicKey
    try {
      key = await fetchPublicKey()
    } catch (error) {
      listener?.fetchFailed?.(error)
      throw error
    }
    listener?.fetchSucceeded?.(key)
    return key
  }

  return {
    get(): Promise<PublicKey> {
      if (publicKey !== undefined) {
        return Promise.resolve(publicKey)
      }

      // Check-then-fetch-then-store: only the first caller starts a fetch
      if (inFlight === undefined) {
        inFlight = observedFetch()
          .then((key) => {
            publicKey = key
            return key
          })
          .finally(() => {
            inFlight = undefined
          })
      }
      return inFlight
    },

    get cached(): PublicKey | undefined {
      return publicKey
    },
  }
}
