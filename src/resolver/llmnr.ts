/**
 * LLMNR resolver: Link-Local Multicast Name Resolution (RFC 4795).
 *
 * Sends one query carrying A and AAAA questions to the LLMNR multicast groups
 * and collects every answer that arrives before the window closes. Responders
 * on the segment reply directly to the querying socket, so nothing joins the
 * multicast groups.
 *
 * Node's dgram sockets are bound to one address family, so the IPv4 query
 * goes out on a `udp4` socket and the IPv6 query on a separate `udp6` socket.
 * The IPv6 side is best-effort: hosts without an IPv6 stack still get an
 * answer over IPv4.
 */

import { createSocket } from 'node:dgram'
import {
  answerAddresses,
  decodeAnswers,
  encodePacket,
  FLAGS_QUERY,
  RECORD_CLASS,
  RECORD_TYPE,
  type NamePacket,
  type NameRecord,
} from './name-packet.js'
import { dedupeAddresses } from './ip-set.js'
import { ResolutionError, cancelledError, isDeadlineExceeded } from './errors.js'

/** LLMNR multicast group (IPv4) */
export const LLMNR_IPV4_GROUP = '224.0.0.252'
/** LLMNR multicast group (IPv6, link-local scope) */
export const LLMNR_IPV6_GROUP = 'ff02::1:3'
/** LLMNR port */
export const LLMNR_PORT = 5355
/** Window used when the caller passes a non-positive timeout */
export const LLMNR_MIN_TIMEOUT_MS = 500

export interface LlmnrOptions {
  /** IPv4 group override for testing (default: 224.0.0.252) */
  ipv4Group?: string
  /** IPv6 group override for testing (default: ff02::1:3) */
  ipv6Group?: string
  /** Port override for testing (default: 5355) */
  port?: number
  /** Collection window for non-positive timeouts (default: 500) */
  minTimeoutMs?: number
  /** Receives diagnostics about the best-effort IPv6 query */
  debug?: (message: string) => void
}

/**
 * Build the query message for `hostname`: id 0, RD clear, one A and one AAAA
 * question for the fully-qualified name.
 */
export function buildQuery(hostname: string): NamePacket {
  const name = hostname.endsWith('.') ? hostname : `${hostname}.`
  return {
    header: {
      id: 0,
      flags: FLAGS_QUERY,
      qdcount: 2,
      ancount: 0,
      nscount: 0,
      arcount: 0,
    },
    questions: [
      { name, type: RECORD_TYPE.A, class: RECORD_CLASS.IN },
      { name, type: RECORD_TYPE.AAAA, class: RECORD_CLASS.IN },
    ],
    answers: [],
    authorities: [],
    additionals: [],
  }
}

export class LlmnrResolver {
  private readonly ipv4Group: string
  private readonly ipv6Group: string
  private readonly port: number
  private readonly minTimeoutMs: number
  private readonly debug: (message: string) => void

  constructor(options: LlmnrOptions = {}) {
    this.ipv4Group = options.ipv4Group ?? LLMNR_IPV4_GROUP
    this.ipv6Group = options.ipv6Group ?? LLMNR_IPV6_GROUP
    this.port = options.port ?? LLMNR_PORT
    this.minTimeoutMs = options.minTimeoutMs ?? LLMNR_MIN_TIMEOUT_MS
    this.debug = options.debug ?? (() => undefined)
  }

  /**
   * Query the segment for `hostname` and collect answers for `timeoutMs`.
   * Aborting `signal` closes the window early; an abort whose reason is
   * `deadlineExceeded()` counts as the window running out.
   *
   * @throws ResolutionError SOCKET on a send or receive failure of the IPv4
   *   socket, NO_RESPONSES if no address arrived in time, CANCELLED if the
   *   caller's signal ended the window before anything arrived
   */
  async lookup(hostname: string, timeoutMs: number, signal?: AbortSignal): Promise<readonly string[]> {
    if (signal?.aborted) {
      throw cancelledError(hostname, signal.reason)
    }

    const windowMs = timeoutMs > 0 ? timeoutMs : this.minTimeoutMs
    const query = encodePacket(buildQuery(hostname))
    const collected: string[] = []
    let aborted = false

    const collect = (msg: Buffer): void => {
      let answers: NameRecord[]
      try {
        answers = decodeAnswers(msg)
      } catch {
        return // not an LLMNR response
      }
      collected.push(...answerAddresses(answers))
    }

    const socket = createSocket('udp4')
    const socket6 = createSocket('udp6')
    socket.on('message', collect)
    socket6.on('message', collect)
    socket6.on('error', (err) => {
      this.debug(`LLMNR IPv6 socket error: ${err.message}`)
    })

    try {
      await new Promise<void>((resolve, reject) => {
        function finish(err?: Error): void {
          clearTimeout(timer)
          signal?.removeEventListener('abort', onAbort)
          if (err) reject(err)
          else resolve()
        }
        function onAbort(): void {
          // The budget deadline closes the window like the timer does
          aborted = !isDeadlineExceeded(signal?.reason)
          finish()
        }

        const timer = setTimeout(finish, windowMs)
        signal?.addEventListener('abort', onAbort, { once: true })

        socket.on('error', (err) => {
          finish(new ResolutionError('SOCKET', `LLMNR socket error: ${err.message}`, { cause: err }))
        })
        socket.bind({ port: 0 }, () => {
          socket.send(query, this.port, this.ipv4Group, (err) => {
            if (err) {
              finish(
                new ResolutionError('SOCKET', `LLMNR query to ${this.ipv4Group} failed: ${err.message}`, {
                  cause: err,
                }),
              )
            }
          })
        })

        socket6.bind({ port: 0 }, () => {
          socket6.send(query, this.port, this.ipv6Group, (err) => {
            if (err) this.debug(`LLMNR IPv6 query skipped: ${err.message}`)
          })
        })
      })
    } finally {
      socket.close()
      socket6.close()
    }

    if (collected.length === 0) {
      if (aborted) throw cancelledError(hostname, signal?.reason)
      throw new ResolutionError('NO_RESPONSES', `no LLMNR responses for ${hostname}`)
    }
    return dedupeAddresses(collected)
  }
}
