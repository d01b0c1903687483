import { describe, it, expect } from 'vitest'
import { NodeCryptoProvider } from '../src/node-crypto-provider.js'
import { createPublicKeyCache } from '../src/key-cache.js'
import { toBase64, utf8Encode } from '../src/encoding.js'
import { createTestAuthority, flipBit, MemoryTransport, ok } from './fixtures/authority.js'

describe('NodeCryptoProvider', () => {
  const provider = new NodeCryptoProvider()
  const authority = createTestAuthority()
  const other = createTestAuthority()

  describe('randomBytes', () => {
    it('should return buffer of requested length', () => {
      const bytes = provider.randomBytes(16)
      expect(bytes).toBeInstanceOf(Uint8Array)
      expect(bytes.length).toBe(16)
    })

    it('should return different values on each call', () => {
      const a = provider.randomBytes(32)
      const b = provider.randomBytes(32)
      // Extremely unlikely to be equal
      expect(a).not.toEqual(b)
    })
  })

  describe('seal', () => {
    it('should lay out the message as iv | ciphertext | tag', async () => {
      const publicKey = await authority.publicKey()
      const plaintext = utf8Encode('{"site":"example"}')
      const sealed = await provider.seal(plaintext, publicKey)

      expect(sealed.message.length).toBe(12 + plaintext.length + 16)
      // 2048-bit RSA wraps to 256 bytes
      expect(sealed.sealedKey.length).toBe(256)
    })

    it('should produce output the authority can open', async () => {
      const publicKey = await authority.publicKey()
      const plaintext = utf8Encode('site data')
      const sealed = await provider.seal(plaintext, publicKey)

      expect(authority.openBytes(sealed)).toEqual(plaintext)
    })

    it('should use a fresh key and iv per call', async () => {
      const publicKey = await authority.publicKey()
      const plaintext = utf8Encode('same input')
      const a = await provider.seal(plaintext, publicKey)
      const b = await provider.seal(plaintext, publicKey)

      expect(a.message).not.toEqual(b.message)
      expect(a.sealedKey).not.toEqual(b.sealedKey)
    })

    it('should reject key material that is not a public key', async () => {
      const cache = createPublicKeyCache(new MemoryTransport(() => ok(toBase64(utf8Encode('junk')))))
      const junk = await cache.get()
      await expect(provider.seal(utf8Encode('x'), junk)).rejects.toThrow()
    })
  })

  describe('open', () => {
    it('should open what the authority sealed', async () => {
      const publicKey = await authority.publicKey()
      const plaintext = utf8Encode('authority data')
      const sealed = authority.sealBytes(plaintext)

      const opened = await provider.open(sealed.sealedKey, sealed.message, publicKey)
      expect(opened).toEqual(plaintext)
    })

    it('should reject a tampered message', async () => {
      const publicKey = await authority.publicKey()
      const sealed = authority.sealBytes(utf8Encode('authority data'))

      await expect(
        provider.open(sealed.sealedKey, flipBit(sealed.message, 14), publicKey),
      ).rejects.toThrow()
    })

    it('should reject a key wrapped by another authority', async () => {
      const publicKey = await authority.publicKey()
      const sealed = other.sealBytes(utf8Encode('authority data'))

      await expect(provider.open(sealed.sealedKey, sealed.message, publicKey)).rejects.toThrow()
    })

    it('should reject a message shorter than iv and tag', async () => {
      const publicKey = await authority.publicKey()
      const sealed = authority.sealBytes(utf8Encode('x'))

      await expect(
        provider.open(sealed.sealedKey, sealed.message.subarray(0, 20), publicKey),
      ).rejects.toThrow('Sealed message is shorter than iv and tag')
    })
  })

  describe('verify', () => {
    it('should accept an authority signature', async () => {
      const publicKey = await authority.publicKey()
      const data = utf8Encode('1700000000')
      expect(await provider.verify(data, authority.signBytes(data), publicKey)).toBe(true)
    })

    it('should reject a signature over different data', async () => {
      const publicKey = await authority.publicKey()
      const signature = authority.signBytes(utf8Encode('1700000000'))
      expect(await provider.verify(utf8Encode('1700000001'), signature, publicKey)).toBe(false)
    })

    it('should reject a tampered signature', async () => {
      const publicKey = await authority.publicKey()
      const data = utf8Encode('1700000000')
      const original = authority.signBytes(data)
      const signature = flipBit(original, original.length - 1)
      expect(await provider.verify(data, signature, publicKey)).toBe(false)
    })

    it('should reject a signature from another authority', async () => {
      const publicKey = await authority.publicKey()
      const data = utf8Encode('1700000000')
      expect(await provider.verify(data, other.signBytes(data), publicKey)).toBe(false)
    })

    it('should reject when configured for a different digest', async () => {
      const sha512 = new NodeCryptoProvider({ signatureAlgorithm: 'sha512' })
      const publicKey = await authority.publicKey()
      const data = utf8Encode('1700000000')
      expect(await sha512.verify(data, authority.signBytes(data), publicKey)).toBe(false)
    })

    it('should verify SHA-1 signatures by default', async () => {
      const sha1Authority = createTestAuthority('sha1')
      const publicKey = await sha1Authority.publicKey()
      const data = utf8Encode('1700000000')
      expect(await provider.verify(data, sha1Authority.signBytes(data), publicKey)).toBe(true)
    })

    it('should accept DER-encoded keys', async () => {
      const cache = createPublicKeyCache(
        new MemoryTransport(() => ok(toBase64(authority.publicKeyDer))),
      )
      const derKey = await cache.get()
      const data = utf8Encode('1700000000')
      expect(await provider.verify(data, authority.signBytes(data), derKey)).toBe(true)
    })
  })
})
