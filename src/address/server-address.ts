import { isIP } from 'node:net'

/** Default SMB port (direct TCP transport) */
export const DEFAULT_SMB_PORT = '445'

export type AddressErrorCode = 'EMPTY_ADDRESS' | 'ADDRESS_PARSE'

/** Server address error carrying the rejected input */
export class AddressError extends Error {
  constructor(
    public readonly code: AddressErrorCode,
    message: string,
    public readonly input: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'AddressError'
  }
}

/** A server address split into host and port; `port` is never empty. */
export interface HostSpec {
  host: string
  port: string
}

type SplitFailure =
  | 'missing port in address'
  | "missing ']' in address"
  | 'too many colons in address'
  | "unexpected '[' in address"
  | "unexpected ']' in address"

type SplitResult = { ok: true; host: string; port: string } | { ok: false; reason: SplitFailure }

/**
 * Split "host:port", "[host]:port" or "[host%zone]:port" on the last colon.
 * A host containing colons must be bracketed.
 */
function splitHostPort(address: string): SplitResult {
  const colon = address.lastIndexOf(':')
  if (colon < 0) return { ok: false, reason: 'missing port in address' }

  let host: string
  let openFrom = 0
  let closeFrom = 0

  if (address.startsWith('[')) {
    const end = address.indexOf(']')
    if (end < 0) return { ok: false, reason: "missing ']' in address" }
    if (end + 1 === address.length) return { ok: false, reason: 'missing port in address' }
    if (end + 1 !== colon) {
      return {
        ok: false,
        reason: address[end + 1] === ':' ? 'too many colons in address' : 'missing port in address',
      }
    }
    host = address.slice(1, end)
    openFrom = 1
    closeFrom = end + 1
  } else {
    host = address.slice(0, colon)
    if (host.includes(':')) return { ok: false, reason: 'too many colons in address' }
  }

  if (address.indexOf('[', openFrom) >= 0) return { ok: false, reason: "unexpected '[' in address" }
  if (address.indexOf(']', closeFrom) >= 0) return { ok: false, reason: "unexpected ']' in address" }

  return { ok: true, host, port: address.slice(colon + 1) }
}

function parseError(address: string, reason: string): AddressError {
  return new AddressError('ADDRESS_PARSE', `parse server address "${address}": ${reason}`, address, {
    cause: new Error(reason),
  })
}

/**
 * Parse a user-supplied server address into host and port.
 *
 * Accepts `host`, `host:port`, `a.b.c.d`, `[v6]`, `[v6]:port` and bare IPv6
 * literals. The port defaults to `defaultPort` when absent or empty.
 *
 * @throws AddressError EMPTY_ADDRESS for empty input, ADDRESS_PARSE otherwise
 */
export function parseServerAddress(address: string, defaultPort: string = DEFAULT_SMB_PORT): HostSpec {
  if (address === '') {
    throw new AddressError('EMPTY_ADDRESS', 'server address is required', address)
  }

  if (address.startsWith('[') && address.endsWith(']')) {
    return checked(address, { host: address.slice(1, -1), port: defaultPort })
  }

  const split = splitHostPort(address)
  if (split.ok) {
    return checked(address, { host: split.host, port: split.port || defaultPort })
  }
  if (split.reason === 'missing port in address') {
    const host = address.startsWith('[') ? address.replace(/^\[+|\]+$/g, '') : address
    return checked(address, { host, port: defaultPort })
  }
  if (isIP(address) !== 0) {
    return { host: address, port: defaultPort }
  }

  throw parseError(address, split.reason)
}

function checked(address: string, spec: HostSpec): HostSpec {
  if (spec.host === '') {
    throw parseError(address, 'missing host in address')
  }
  if (!/^\d{1,5}$/.test(spec.port) || Number(spec.port) > 65535) {
    throw parseError(address, `invalid port "${spec.port}"`)
  }
  return spec
}
