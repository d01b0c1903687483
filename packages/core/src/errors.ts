// @keel/core - Error taxonomy

/** Base class for every error this library throws */
export class KeelError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'KeelError'
  }
}

/**
 * The authority answered with something other than 200, or could not be
 * reached at all (status 0).
 */
export class RemoteCommunicationError extends KeelError {
  constructor(
    public readonly status: number,
    public readonly reason: string,
    options?: ErrorOptions,
  ) {
    super(`Unable to communicate with the remote authority (${String(status)}) ${reason}`, options)
    this.name = 'RemoteCommunicationError'
  }
}

/**
 * Sealing or opening failed, or the envelope was not understood.
 * The underlying crypto error, when there is one, is the `cause`.
 */
export class EncryptionError extends KeelError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'EncryptionError'
  }
}

/** Renders an unknown thrown value for inclusion in an error message */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
