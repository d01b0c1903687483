// @keel/client - Default fetch-based transport

import { RemoteCommunicationError, describeError, toBase64, utf8Encode } from '@keel/core'
import type { Transport, TransportResponse } from '@keel/core'
import type { FetchFunction } from './types.js'

export interface HttpTransportOptions {
  readonly baseUrl: string
  /** Basic auth is sent only when this is non-empty */
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly fetch?: FetchFunction | undefined
}

/**
 * Talks to the authority over HTTP(S).
 *
 * Resolves with the status, status text and body for every response,
 * redirects followed. Only a request that never got a response rejects,
 * with RemoteCommunicationError status 0.
 */
export class HttpTransport implements Transport {
  private readonly baseUrl: string
  private readonly authorization: string | undefined
  private readonly fetchFn: FetchFunction

  constructor(options: HttpTransportOptions) {
    this.baseUrl = options.baseUrl
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init))
    this.authorization =
      options.username !== undefined && options.username !== ''
        ? `Basic ${toBase64(utf8Encode(`${options.username}:${options.password ?? ''}`))}`
        : undefined
  }

  get(path: string): Promise<TransportResponse> {
    return this.request(path, { method: 'GET' })
  }

  post(path: string, body: string): Promise<TransportResponse> {
    return this.request(path, {
      method: 'POST',
      body,
      headers: { 'content-type': 'text/plain; charset=utf-8' },
    })
  }

  private buildUrl(path: string): string {
    if (!this.baseUrl.endsWith('/') && !path.startsWith('/')) {
      return `${this.baseUrl}/${path}`
    }
    if (this.baseUrl.endsWith('/') && path.startsWith('/')) {
      return `${this.baseUrl}${path.slice(1)}`
    }
    return `${this.baseUrl}${path}`
  }

  private async request(
    path: string,
    init: { method: string; body?: string; headers?: Record<string, string> },
  ): Promise<TransportResponse> {
    const headers: Record<string, string> = { ...init.headers }
    if (this.authorization !== undefined) {
      headers['authorization'] = this.authorization
    }

    let response: Response
    try {
      response = await this.fetchFn(this.buildUrl(path), {
        ...init,
        headers,
        redirect: 'follow',
      })
    } catch (err) {
      throw new RemoteCommunicationError(0, `Network error calling ${path}: ${describeError(err)}`, {
        cause: err,
      })
    }

    let body: string
    try {
      body = await response.text()
    } catch (err) {
      throw new RemoteCommunicationError(
        response.status,
        `Unreadable response from ${path}: ${describeError(err)}`,
        { cause: err },
      )
    }

    return { status: response.status, reason: response.statusText, body }
  }
}
