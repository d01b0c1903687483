// @keel/client - Client instance (orchestration layer)

import {
  NodeCryptoProvider,
  createPublicKeyCache,
  encryptEnvelope,
  decryptEnvelope,
  verifyToken as coreVerifyToken,
  expectSuccess,
  describeError,
  SITE_UPDATE_PATH,
} from '@keel/core'
import type { CryptoProvider, PublicKey, TokenVerdict, Transport } from '@keel/core'
import { resolveConfig } from './config.js'
import { HttpTransport } from './http-transport.js'
import { silentLogger } from './logger.js'
import type { KeelClient, KeelClientConfig, Logger } from './types.js'

/** Current time in whole seconds */
function currentTimestamp(): number {
  return Math.floor(Date.now() / 1000)
}

/**
 * Creates a client for one remote authority.
 *
 * Nothing is fetched until the first call that needs the public key.
 *
 * @throws {KeelConfigError} If the configuration is invalid
 *
 * @example
 * ```typescript
 * const keel = createKeelClient({ baseUrl: 'https://authority.example.com' })
 *
 * if (await keel.isValidToken(request.headers['x-authority-token'])) {
 *   await keel.postData(collectSiteData())
 * }
 * ```
 */
export function createKeelClient(config: KeelClientConfig): KeelClient {
  const resolved = resolveConfig(config)
  const logger: Logger = config.logger ?? silentLogger
  const cryptoProvider: CryptoProvider =
    config.cryptoProvider ??
    new NodeCryptoProvider({ signatureAlgorithm: resolved.signatureAlgorithm })
  const transport: Transport =
    config.transport ??
    new HttpTransport({
      baseUrl: resolved.baseUrl,
      username: resolved.username,
      password: resolved.password,
      fetch: config.fetch,
    })
  const keyCache = createPublicKeyCache(transport, {
    listener: {
      fetchStarted(path) {
        logger.debug('Fetching authority public key', { path })
      },
      fetchSucceeded(publicKey) {
        logger.debug('Authority public key cached', { bytes: publicKey.length })
      },
      fetchFailed(error) {
        logger.warn('Authority public key fetch failed', { error: describeError(error) })
      },
    },
  })

  async function verify(token: string, timestamp: number | undefined): Promise<TokenVerdict> {
    const verdict = await coreVerifyToken(
      cryptoProvider,
      keyCache,
      token,
      timestamp ?? currentTimestamp(),
      resolved.freshnessWindow,
    )
    if (verdict.status !== 'valid') {
      logger.warn('Authority token rejected', { status: verdict.status, reason: verdict.reason })
    }
    return verdict
  }

  async function encrypt(data: unknown): Promise<string> {
    try {
      return await encryptEnvelope(cryptoProvider, keyCache, data)
    } catch (error) {
      logger.warn('Encryption failed', { error: describeError(error) })
      throw error
    }
  }

  return {
    config: resolved,

    publicKey(): Promise<PublicKey> {
      return keyCache.get()
    },

    encrypt,

    async decrypt(cypherText: string): Promise<unknown> {
      try {
        return await decryptEnvelope(cryptoProvider, keyCache, cypherText)
      } catch (error) {
        logger.warn('Decryption failed', { error: describeError(error) })
        throw error
      }
    },

    async isValidToken(token: string, timestamp?: number): Promise<boolean> {
      const verdict = await verify(token, timestamp)
      return verdict.status === 'valid'
    },

    verifyToken(token: string, timestamp?: number): Promise<TokenVerdict> {
      return verify(token, timestamp)
    },

    async postData(data: unknown): Promise<void> {
      const envelope = await encrypt(data)
      expectSuccess(await transport.post(SITE_UPDATE_PATH, envelope))
      logger.debug('Site data posted', { path: SITE_UPDATE_PATH })
    },
  }
}
