// @keel/core - Wire structure schemas

import { z } from 'zod'

/** `{ key, message }`, both non-empty strings. Extra fields are dropped. */
export const envelopeSchema = z.object({
  key: z.string().min(1),
  message: z.string().min(1),
})

/** `{ time, signature }`, both non-empty strings. Extra fields are dropped. */
export const tokenEnvelopeSchema = z.object({
  time: z.string().min(1),
  signature: z.string().min(1),
})
