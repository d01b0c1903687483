import { describe, it, expect } from 'vitest'

describe('@keel/core', () => {
  it('should export from package', async () => {
    const mod = await import('../src/index.js')
    expect(mod).toBeDefined()
    expect(typeof mod.encryptEnvelope).toBe('function')
    expect(typeof mod.isValidToken).toBe('function')
  })
})
