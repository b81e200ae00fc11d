import { lookup as systemLookup } from 'node:dns/promises'
import { isIP } from 'node:net'
import { ResolutionError, cancelledError } from './errors.js'

/** Hostname → address lookup, normally the system resolver. */
export type LookupFn = (hostname: string) => Promise<string[]>

export interface UnicastOptions {
  /** Lookup override for testing (default: dns.lookup with all: true) */
  lookup?: LookupFn
}

async function lookupAll(hostname: string): Promise<string[]> {
  const results = await systemLookup(hostname, { all: true })
  return results.map((result) => result.address)
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts. The underlying
 * lookup cannot be cancelled; its eventual result is discarded.
 */
function raceAbort<T>(promise: Promise<T>, hostname: string, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(cancelledError(hostname, signal.reason))
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

/**
 * Standard (unicast) name lookup through the system resolver.
 */
export class UnicastResolver {
  private readonly lookupFn: LookupFn

  constructor(options: UnicastOptions = {}) {
    this.lookupFn = options.lookup ?? lookupAll
  }

  /**
   * Resolve `hostname` to one or more addresses. IP literals are returned
   * as-is without touching the network.
   *
   * @throws ResolutionError CANCELLED if `signal` is or becomes aborted,
   *   NO_ADDRESSES if the lookup yields nothing
   */
  async lookup(hostname: string, signal?: AbortSignal): Promise<string[]> {
    if (isIP(hostname) !== 0) return [hostname]

    if (signal?.aborted) {
      throw cancelledError(hostname, signal.reason)
    }

    const addresses = await raceAbort(this.lookupFn(hostname), hostname, signal)
    if (addresses.length === 0) {
      throw new ResolutionError('NO_ADDRESSES', `no addresses returned for ${hostname}`)
    }
    return addresses
  }
}
