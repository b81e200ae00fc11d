import { connect as connectTcp } from 'node:net'
import SMB2 from '@marsaud/smb2'
import { parseServerAddress, DEFAULT_SMB_PORT } from '../address/server-address.js'
import { ResolutionEngine } from '../resolver/index.js'
import { SmbError, errorMessage } from './errors.js'
import { RemoteShare } from './share.js'

/** Check that `host:port` accepts TCP connections within `timeoutMs`. */
export type ProbeFn = (host: string, port: number, timeoutMs: number) => Promise<void>

export interface ConnectOptions {
  /** Server address as typed by the user: host, host:port, [v6]:port ... */
  address: string
  share: string
  user: string
  password: string
  domain?: string
  /** Resolution budget and per-address connect timeout */
  timeoutMs: number
  defaultPort?: string
  engine?: ResolutionEngine
  probe?: ProbeFn
  /** Receives one line per address tried */
  debug?: (message: string) => void
}

export const probeTcp: ProbeFn = (host, port, timeoutMs) =>
  new Promise<void>((resolve, reject) => {
    const socket = connectTcp({ host, port })
    socket.setTimeout(timeoutMs)
    socket.once('connect', () => {
      socket.destroy()
      resolve()
    })
    socket.once('timeout', () => {
      socket.destroy()
      reject(new Error(`connect ${host}:${port}: timed out after ${timeoutMs}ms`))
    })
    socket.once('error', (err) => {
      socket.destroy()
      reject(err)
    })
  })

/**
 * Resolve the server, connect to the first address that accepts TCP
 * connections (in resolver preference order), and open the share there.
 */
export async function openShare(options: ConnectOptions): Promise<RemoteShare> {
  const { host, port } = parseServerAddress(options.address, options.defaultPort ?? DEFAULT_SMB_PORT)
  const engine = options.engine ?? new ResolutionEngine()
  const probe = options.probe ?? probeTcp
  const debug = options.debug ?? (() => undefined)

  let addresses: readonly string[]
  try {
    addresses = await engine.resolve(host, options.timeoutMs)
  } catch (err) {
    throw new SmbError('UNREACHABLE', `resolve host ${host}: ${errorMessage(err)}`, { cause: err })
  }

  let lastError: unknown
  for (const address of addresses) {
    try {
      await probe(address, Number(port), options.timeoutMs)
    } catch (err) {
      debug(`connect ${address}:${port} failed: ${errorMessage(err)}`)
      lastError = err
      continue
    }

    debug(`connected to ${address}:${port}`)
    const client = new SMB2({
      share: `\\\\${address}\\${options.share}`,
      domain: options.domain ?? '',
      username: options.user,
      password: options.password,
      port: Number(port),
      autoCloseTimeout: 0,
    })
    return new RemoteShare(client, address)
  }

  throw new SmbError('UNREACHABLE', `dial ${host}:${port}: ${errorMessage(lastError)}`, {
    cause: lastError,
  })
}
