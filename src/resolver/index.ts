export { ResolutionEngine, LOCAL_SUFFIX, DEFAULT_RESOLVE_TIMEOUT_MS } from './engine.js'
export type { EngineOptions, ResolutionBudget } from './engine.js'

export { UnicastResolver } from './unicast.js'
export type { UnicastOptions, LookupFn } from './unicast.js'

export {
  LlmnrResolver,
  buildQuery,
  LLMNR_IPV4_GROUP,
  LLMNR_IPV6_GROUP,
  LLMNR_PORT,
  LLMNR_MIN_TIMEOUT_MS,
} from './llmnr.js'
export type { LlmnrOptions } from './llmnr.js'

export { dedupeAddresses, canonicalAddress } from './ip-set.js'

export { ResolutionError, AggregateResolutionError, deadlineExceeded, isDeadlineExceeded } from './errors.js'
export type { ResolutionErrorCode, ResolutionAttempt, ResolutionStrategy } from './errors.js'
