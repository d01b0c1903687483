// @keel/core - Transport capability consumed by the core

import { RemoteCommunicationError } from './errors.js'
import { SUCCESS_STATUS } from './types.js'

/** A response from the authority, whatever its status */
export interface TransportResponse {
  readonly status: number
  /** Human-readable status text (e.g. "Internal Server Error") */
  readonly reason: string
  readonly body: string
}

/**
 * Moves bytes to and from the remote authority.
 *
 * Implementations resolve with the response for any HTTP status and reject
 * with RemoteCommunicationError (status 0) when the authority cannot be
 * reached. Deciding which statuses count as success is the core's job.
 */
export interface Transport {
  /** Fetches `path` */
  get(path: string): Promise<TransportResponse>

  /** Sends `body` to `path` */
  post(path: string, body: string): Promise<TransportResponse>
}

/**
 * Returns the response body if the authority answered 200.
 *
 * @throws {RemoteCommunicationError} For any other status
 */
export function expectSuccess(response: TransportResponse): string {
  if (response.status !== SUCCESS_STATUS) {
    throw new RemoteCommunicationError(response.status, response.reason)
  }
  return response.body
}
