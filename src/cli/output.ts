/**
 * Consistent CLI output helpers.
 *
 * All output uses process.stdout/stderr.write for testability.
 * No colors, no emojis -- clean text output only.
 */
let verbose = false

export const output = {
  /** Enable or disable debug() output (--verbose). */
  setVerbose(enabled: boolean): void {
    verbose = enabled
  },

  /** Write an informational message to stdout. */
  info(message: string): void {
    process.stdout.write(message + '\n')
  },

  /** Write a success message to stdout, prefixed with "OK:". */
  success(message: string): void {
    process.stdout.write('OK: ' + message + '\n')
  },

  /** Write an error message to stderr, prefixed with "Error:". */
  error(message: string): void {
    process.stderr.write('Error: ' + message + '\n')
  },

  /** Write a diagnostic line to stderr when verbose output is on. */
  debug(message: string): void {
    if (verbose) process.stderr.write('debug: ' + message + '\n')
  },
}
