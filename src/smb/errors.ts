/** Typed SMB operation error codes */
export type SmbErrorCode = 'UNREACHABLE' | 'REMOTE_IO' | 'LOCAL_IO'

export class SmbError extends Error {
  constructor(
    public readonly code: SmbErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'SmbError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
