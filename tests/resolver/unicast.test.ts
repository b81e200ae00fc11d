import { describe, it, expect, vi } from 'vitest'
import { UnicastResolver } from '../../src/resolver/unicast.js'
import { ResolutionError } from '../../src/resolver/errors.js'

describe('UnicastResolver', () => {
  it('returns IP literals without calling the lookup', async () => {
    const lookup = vi.fn()
    const resolver = new UnicastResolver({ lookup })
    await expect(resolver.lookup('10.0.0.5')).resolves.toEqual(['10.0.0.5'])
    await expect(resolver.lookup('fe80::1')).resolves.toEqual(['fe80::1'])
    expect(lookup).not.toHaveBeenCalled()
  })

  it('returns every address from the lookup', async () => {
    const lookup = vi.fn().mockResolvedValue(['192.168.1.20', 'fd00::20'])
    const resolver = new UnicastResolver({ lookup })
    await expect(resolver.lookup('nas')).resolves.toEqual(['192.168.1.20', 'fd00::20'])
    expect(lookup).toHaveBeenCalledWith('nas')
  })

  it('fails with NO_ADDRESSES on an empty result', async () => {
    const resolver = new UnicastResolver({ lookup: async () => [] })
    const err = await resolver.lookup('nas').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(ResolutionError)
    expect(err).toMatchObject({ code: 'NO_ADDRESSES', message: 'no addresses returned for nas' })
  })

  it('passes lookup errors through', async () => {
    const failure = Object.assign(new Error('getaddrinfo ENOTFOUND nas'), { code: 'ENOTFOUND' })
    const resolver = new UnicastResolver({ lookup: async () => Promise.reject(failure) })
    await expect(resolver.lookup('nas')).rejects.toBe(failure)
  })

  it('fails with CANCELLED when the signal is already aborted', async () => {
    const lookup = vi.fn()
    const resolver = new UnicastResolver({ lookup })
    const controller = new AbortController()
    controller.abort()
    await expect(resolver.lookup('nas', controller.signal)).rejects.toMatchObject({
      code: 'CANCELLED',
    })
    expect(lookup).not.toHaveBeenCalled()
  })

  it('stops waiting when the signal aborts mid-lookup', async () => {
    const resolver = new UnicastResolver({ lookup: () => new Promise<string[]>(() => {}) })
    const controller = new AbortController()
    const pending = resolver.lookup('nas', controller.signal)
    controller.abort()
    await expect(pending).rejects.toMatchObject({ code: 'CANCELLED' })
  })
})
