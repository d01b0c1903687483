// @keel/client - Configuration validation and defaults

import { z } from 'zod'
import { KeelError, DEFAULT_FRESHNESS_WINDOW_SECONDS, DEFAULT_SIGNATURE_ALGORITHM } from '@keel/core'
import type { KeelClientConfig, ResolvedKeelConfig } from './types.js'

/** Invalid options passed to `createKeelClient` */
export class KeelConfigError extends KeelError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid Keel configuration: ${issues.join('; ')}`)
    this.name = 'KeelConfigError'
  }
}

// Only the primitive options; injected collaborators are taken as given
const configSchema = z.object({
  baseUrl: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'Must be an http or https URL' }),
  username: z.string().optional(),
  password: z.string().optional(),
  signatureAlgorithm: z.string().min(1).default(DEFAULT_SIGNATURE_ALGORITHM),
  freshnessWindow: z.number().int().nonnegative().default(DEFAULT_FRESHNESS_WINDOW_SECONDS),
})

/**
 * Validates `config` and applies defaults.
 *
 * @throws {KeelConfigError} Listing every invalid option as `path: message`
 */
export function resolveConfig(config: KeelClientConfig): ResolvedKeelConfig {
  const parsed = configSchema.safeParse({
    baseUrl: config.baseUrl,
    username: config.username,
    password: config.password,
    signatureAlgorithm: config.signatureAlgorithm,
    freshnessWindow: config.freshnessWindow,
  })

  if (!parsed.success) {
    throw new KeelConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  return {
    baseUrl: parsed.data.baseUrl,
    username: parsed.data.username,
    password: parsed.data.password,
    signatureAlgorithm: parsed.data.signatureAlgorithm,
    freshnessWindow: parsed.data.freshnessWindow,
  }
}
