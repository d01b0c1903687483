// @keel/core - Encoding utilities (base64, UTF-8, JSON)

const encoder = new TextEncoder()
const decoder = new TextDecoder()
const strictDecoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Encodes bytes as standard base64 (RFC 4648, padded).
 * Pure function, zero dependencies.
 */
export function toBase64(buffer: Uint8Array): string {
  let binary = ''
  for (const byte of buffer) {
    binary += String.fromCharCode(byte)
  }
  return btoa(binary)
}

/**
 * Decodes standard base64 to bytes. Whitespace is ignored.
 *
 * @returns null if the input is not valid base64
 */
export function fromBase64(encoded: string): Uint8Array | null {
  let binary: string
  try {
    binary = atob(encoded)
  } catch {
    return null
  }
  const bytes = new Uint8Array(binary.length)
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i)
  }
  return bytes
}

export function utf8Encode(text: string): Uint8Array {
  return encoder.encode(text)
}

export function utf8Decode(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}

/**
 * Like `utf8Decode`, but malformed sequences throw instead of becoming U+FFFD.
 *
 * @throws {TypeError} If `bytes` is not valid UTF-8
 */
export function utf8DecodeStrict(bytes: Uint8Array): string {
  return strictDecoder.decode(bytes)
}

/**
 * Decodes a base64 string and parses the result as JSON.
 *
 * @returns `{ ok: false }` when either step fails, so callers never see a
 *   half-decoded value
 */
export function decodeBase64Json(encoded: string): { ok: true; value: unknown } | { ok: false } {
  const bytes = fromBase64(encoded)
  if (bytes === null) {
    return { ok: false }
  }
  try {
    const value: unknown = JSON.parse(utf8Decode(bytes))
    return { ok: true, value }
  } catch {
    return { ok: false }
  }
}

/** JSON-encodes a value and base64-encodes the UTF-8 result */
export function encodeBase64Json(value: unknown): string {
  return toBase64(utf8Encode(JSON.stringify(value)))
}

/**
 * Byte-wise equality. Not constant-time; only used to compare ciphertext
 * against plaintext.
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Concatenates multiple Uint8Arrays into a single Uint8Array.
 * Used for iv | ciphertext | tag assembly.
 */
export function concatBuffers(...buffers: Uint8Array[]): Uint8Array {
  let totalLength = 0
  for (const buf of buffers) {
    totalLength += buf.length
  }

  const result = new Uint8Array(totalLength)
  let offset = 0
  for (const buf of buffers) {
    result.set(buf, offset)
    offset += buf.length
  }

  return result
}
