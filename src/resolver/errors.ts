export type ResolutionErrorCode =
  | 'NO_ADDRESSES'
  | 'NO_RESPONSES'
  | 'CANCELLED'
  | 'DEADLINE_EXCEEDED'
  | 'SOCKET'
  | 'ALL_TIERS_FAILED'

export class ResolutionError extends Error {
  constructor(
    public readonly code: ResolutionErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'ResolutionError'
  }
}

/** Strategy that produced a resolution attempt. */
export type ResolutionStrategy = 'unicast' | 'multicast'

export interface ResolutionAttempt {
  strategy: ResolutionStrategy
  hostname: string
  addresses: readonly string[]
  error?: Error
}

/**
 * Raised when every resolution tier failed. `cause` is the most specific
 * failure seen; `attempts` lists every tier that ran, in order.
 */
export class AggregateResolutionError extends ResolutionError {
  constructor(
    public readonly hostname: string,
    public readonly attempts: readonly ResolutionAttempt[],
    cause?: Error,
  ) {
    const detail = cause ? `: ${cause.message}` : ''
    super('ALL_TIERS_FAILED', `no IP addresses found for ${hostname}${detail}`, { cause })
    this.name = 'AggregateResolutionError'
  }
}

/** Not-found outcomes, as opposed to errors that explain why a tier failed. */
export function isNotFound(err: Error): boolean {
  return (
    err instanceof ResolutionError &&
    (err.code === 'NO_ADDRESSES' || err.code === 'NO_RESPONSES')
  )
}

export function cancelledError(hostname: string, reason?: unknown): ResolutionError {
  return new ResolutionError('CANCELLED', `lookup of ${hostname} cancelled`, {
    cause: reason,
  })
}

/** Abort reason of a resolution budget whose deadline has passed. */
export function deadlineExceeded(): ResolutionError {
  return new ResolutionError('DEADLINE_EXCEEDED', 'resolution deadline exceeded')
}

export function isDeadlineExceeded(reason: unknown): boolean {
  return reason instanceof ResolutionError && reason.code === 'DEADLINE_EXCEEDED'
}

export function isCancelled(err: Error): boolean {
  return err instanceof ResolutionError && err.code === 'CANCELLED'
}
