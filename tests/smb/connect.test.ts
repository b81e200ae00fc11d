import { describe, it, expect, vi, beforeEach } from 'vitest'
import SMB2 from '@marsaud/smb2'
import { openShare, type ConnectOptions } from '../../src/smb/connect.js'
import { SmbError } from '../../src/smb/errors.js'
import { AddressError } from '../../src/address/server-address.js'
import { ResolutionEngine, ResolutionError, LlmnrResolver, UnicastResolver } from '../../src/resolver/index.js'

vi.mock('@marsaud/smb2', () => ({
  default: vi.fn(),
}))

function engineFor(addresses: string[]): ResolutionEngine {
  const multicast = new LlmnrResolver()
  vi.spyOn(multicast, 'lookup').mockRejectedValue(new ResolutionError('NO_RESPONSES', 'no LLMNR responses'))
  return new ResolutionEngine({
    unicast: new UnicastResolver({ lookup: async () => addresses }),
    multicast,
  })
}

describe('openShare', () => {
  let debug: ReturnType<typeof vi.fn>
  let options: ConnectOptions

  beforeEach(() => {
    vi.clearAllMocks()
    debug = vi.fn()
    options = {
      address: 'nas',
      share: 'public',
      user: 'backup',
      password: 'test-secret',
      timeoutMs: 5000,
      engine: engineFor(['10.0.0.7', '10.0.0.8']),
      probe: vi.fn(async (host: string) => {
        if (host === '10.0.0.7') throw new Error('ECONNREFUSED')
      }),
      debug,
    }
  })

  it('opens the share on the first address that accepts connections', async () => {
    const share = await openShare(options)

    expect(share.address).toBe('10.0.0.8')
    expect(SMB2).toHaveBeenCalledWith({
      share: '\\\\10.0.0.8\\public',
      domain: '',
      username: 'backup',
      password: 'test-secret',
      port: 445,
      autoCloseTimeout: 0,
    })
    expect(debug.mock.calls.map((call) => call[0])).toEqual([
      'connect 10.0.0.7:445 failed: ECONNREFUSED',
      'connected to 10.0.0.8:445',
    ])
  })

  it('probes the explicit port with the connection timeout', async () => {
    await openShare({ ...options, address: 'nas:1445', domain: 'WORKGROUP' })

    expect(options.probe).toHaveBeenCalledWith('10.0.0.7', 1445, 5000)
    expect(SMB2).toHaveBeenCalledWith(expect.objectContaining({ port: 1445, domain: 'WORKGROUP' }))
  })

  it('uses the configured default port', async () => {
    await openShare({ ...options, defaultPort: '139' })
    expect(options.probe).toHaveBeenLastCalledWith('10.0.0.8', 139, 5000)
  })

  it('connects to an IP literal without resolving', async () => {
    const engine = new ResolutionEngine()
    const resolve = vi.spyOn(engine, 'resolve')
    const share = await openShare({ ...options, address: '10.0.0.8:445', engine })

    expect(share.address).toBe('10.0.0.8')
    await expect(resolve.mock.results[0].value).resolves.toEqual(['10.0.0.8'])
  })

  it('fails with UNREACHABLE when the host does not resolve', async () => {
    const err = await openShare({ ...options, engine: engineFor([]) }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SmbError)
    expect(err).toMatchObject({
      code: 'UNREACHABLE',
      message: 'resolve host nas: no IP addresses found for nas: no LLMNR responses',
    })
    expect(SMB2).not.toHaveBeenCalled()
  })

  it('fails with UNREACHABLE when no address accepts connections', async () => {
    const probe = vi.fn(async () => {
      throw new Error('ECONNREFUSED')
    })
    await expect(openShare({ ...options, probe })).rejects.toMatchObject({
      code: 'UNREACHABLE',
      message: 'dial nas:445: ECONNREFUSED',
    })
    expect(probe).toHaveBeenCalledTimes(2)
  })

  it('passes address parse errors through', async () => {
    await expect(openShare({ ...options, address: '' })).rejects.toBeInstanceOf(AddressError)
  })
})
