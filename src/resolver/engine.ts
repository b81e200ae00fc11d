import { isIP } from 'node:net'
import {
  AggregateResolutionError,
  cancelledError,
  deadlineExceeded,
  isCancelled,
  isNotFound,
  type ResolutionAttempt,
  type ResolutionStrategy,
} from './errors.js'
import { dedupeAddresses } from './ip-set.js'
import { LlmnrResolver } from './llmnr.js'
import { UnicastResolver } from './unicast.js'

/** Suffix tried as a second name variant by each protocol */
export const LOCAL_SUFFIX = '.local'
/** Overall budget used when the caller passes a non-positive timeout */
export const DEFAULT_RESOLVE_TIMEOUT_MS = 3000

/** The single deadline shared by every tier of one resolve() call. */
export interface ResolutionBudget {
  readonly deadline: number
  /** Aborts at the deadline or when the caller's signal aborts */
  readonly signal: AbortSignal
  remaining(): number
}

interface Tier {
  strategy: ResolutionStrategy
  hostname: string
  run(budget: ResolutionBudget): Promise<readonly string[]>
}

export interface EngineOptions {
  unicast?: UnicastResolver
  multicast?: LlmnrResolver
  /** Observer for every tier attempt, in order */
  onAttempt?: (attempt: ResolutionAttempt) => void
}

function startBudget(
  timeoutMs: number,
  parent?: AbortSignal,
): ResolutionBudget & { release(): void } {
  const deadline = Date.now() + timeoutMs
  const controller = new AbortController()
  const onParentAbort = (): void => controller.abort(parent?.reason)

  if (parent?.aborted) {
    controller.abort(parent.reason)
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true })
  }
  const timer = setTimeout(() => {
    controller.abort(deadlineExceeded())
  }, timeoutMs)

  return {
    deadline,
    signal: controller.signal,
    remaining: () => deadline - Date.now(),
    release() {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    },
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/** Cancellations rank below not-found results, which rank below real errors. */
function causeRank(err: Error): number {
  if (isCancelled(err)) return 0
  if (isNotFound(err)) return 1
  return 2
}

/** The last error of the highest rank. */
function mostSpecificCause(attempts: readonly ResolutionAttempt[]): Error | undefined {
  let cause: Error | undefined
  for (const { error } of attempts) {
    if (error && (!cause || causeRank(error) >= causeRank(cause))) {
      cause = error
    }
  }
  return cause
}

/**
 * Host resolution engine.
 *
 * Resolves a hostname through an ordered list of tiers: system lookup of the
 * exact name, system lookup of `<name>.local`, LLMNR for the exact name, LLMNR
 * for `<name>.local`. The first tier to produce an address ends the search.
 * All tiers share one deadline, so the whole call is bounded by `timeoutMs`.
 */
export class ResolutionEngine {
  private readonly unicast: UnicastResolver
  private readonly multicast: LlmnrResolver
  private readonly onAttempt?: (attempt: ResolutionAttempt) => void

  constructor(options: EngineOptions = {}) {
    this.unicast = options.unicast ?? new UnicastResolver()
    this.multicast = options.multicast ?? new LlmnrResolver()
    this.onAttempt = options.onAttempt
  }

  /**
   * Resolve `hostname` to an ordered, deduplicated list of addresses.
   *
   * @param timeoutMs - Budget for the whole call; non-positive means 3000 ms
   * @throws AggregateResolutionError if no tier produced an address
   */
  async resolve(hostname: string, timeoutMs: number, signal?: AbortSignal): Promise<readonly string[]> {
    if (isIP(hostname) !== 0) return [hostname]

    const budget = startBudget(timeoutMs > 0 ? timeoutMs : DEFAULT_RESOLVE_TIMEOUT_MS, signal)
    try {
      return await this.runTiers(hostname, budget)
    } finally {
      budget.release()
    }
  }

  private tiersFor(hostname: string): Tier[] {
    const names = hostname.toLowerCase().endsWith(LOCAL_SUFFIX)
      ? [hostname]
      : [hostname, hostname + LOCAL_SUFFIX]

    const unicast = names.map<Tier>((name) => ({
      strategy: 'unicast',
      hostname: name,
      run: (budget) => this.unicast.lookup(name, budget.signal),
    }))
    const multicast = names.map<Tier>((name) => ({
      strategy: 'multicast',
      hostname: name,
      run: (budget) => this.multicast.lookup(name, budget.remaining(), budget.signal),
    }))
    return [...unicast, ...multicast]
  }

  private async runTiers(hostname: string, budget: ResolutionBudget): Promise<readonly string[]> {
    const attempts: ResolutionAttempt[] = []
    const collected: string[] = []

    for (const tier of this.tiersFor(hostname)) {
      let attempt: ResolutionAttempt

      if (budget.signal.aborted || budget.remaining() <= 0) {
        attempt = {
          strategy: tier.strategy,
          hostname: tier.hostname,
          addresses: [],
          error: cancelledError(tier.hostname, budget.signal.reason),
        }
        attempts.push(attempt)
        this.onAttempt?.(attempt)
        break
      }

      try {
        const addresses = await tier.run(budget)
        attempt = { strategy: tier.strategy, hostname: tier.hostname, addresses }
      } catch (err) {
        attempt = { strategy: tier.strategy, hostname: tier.hostname, addresses: [], error: toError(err) }
      }
      attempts.push(attempt)
      this.onAttempt?.(attempt)

      collected.push(...attempt.addresses)
      if (attempt.addresses.length > 0) break
    }

    if (collected.length > 0) {
      return dedupeAddresses(collected)
    }
    throw new AggregateResolutionError(hostname, attempts, mostSpecificCause(attempts))
  }
}
