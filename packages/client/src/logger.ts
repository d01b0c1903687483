// @keel/client - Default logger

import type { Logger } from './types.js'

/** Discards everything. The default when no logger is configured. */
export const silentLogger: Logger = {
  debug() {},
  warn() {},
}
