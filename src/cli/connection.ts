import type { Command } from 'commander'
import { loadConfig } from '../config/index.js'
import {
  LlmnrResolver,
  ResolutionEngine,
  type ResolutionAttempt,
} from '../resolver/index.js'
import { openShare, type RemoteShare } from '../smb/index.js'
import type { SmbputConfig } from '../types/config.js'
import { output } from './output.js'

/** Flags shared by every command */
export interface CommonFlags {
  timeout?: string
  config?: string
  verbose?: boolean
}

/** Flags of the commands that open a share */
export interface ConnectionFlags extends CommonFlags {
  server?: string
  share?: string
  user?: string
  password?: string
  domain?: string
}

export interface Settings {
  config: SmbputConfig
  timeoutMs: number
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-t, --timeout <ms>', 'resolve and connect timeout in milliseconds')
    .option('-c, --config <path>', 'configuration file path')
    .option('-v, --verbose', 'print resolution and connection details')
}

export function addConnectionOptions(command: Command): Command {
  return addCommonOptions(
    command
      .option('-s, --server <address>', 'SMB server address (host or host:port)')
      .option('--share <name>', 'SMB share name')
      .option('-u, --user <name>', 'SMB username')
      .option('-p, --password <password>', 'SMB password (or set SMB_PASSWORD)')
      .option('-d, --domain <domain>', 'SMB domain'),
  )
}

/**
 * Load configuration and apply the command-line overrides.
 *
 * @throws ConfigError for an invalid config file
 */
export function loadSettings(flags: CommonFlags): Settings {
  output.setVerbose(flags.verbose === true)
  const config = loadConfig(flags.config)

  let timeoutMs = config.connection.timeoutMs
  if (flags.timeout !== undefined) {
    timeoutMs = parseInt(flags.timeout, 10)
    if (isNaN(timeoutMs) || timeoutMs < 1) {
      throw new Error(`Invalid timeout "${flags.timeout}": must be a positive number of milliseconds`)
    }
  }
  return { config, timeoutMs }
}

export function formatAttempt(attempt: ResolutionAttempt): string {
  const outcome = attempt.error
    ? `failed (${attempt.error.message})`
    : attempt.addresses.join(', ')
  return `${attempt.strategy} ${attempt.hostname}: ${outcome}`
}

export function createEngine(config: SmbputConfig): ResolutionEngine {
  const { multicast } = config.resolver
  return new ResolutionEngine({
    multicast: new LlmnrResolver({
      ipv4Group: multicast.ipv4Group,
      ipv6Group: multicast.ipv6Group,
      port: multicast.port,
      minTimeoutMs: multicast.minTimeoutMs,
      debug: output.debug,
    }),
    onAttempt: (attempt) => output.debug(formatAttempt(attempt)),
  })
}

/**
 * Validate connection flags, open the share, run `action`, and always close
 * the share afterwards.
 */
export async function withShare(
  flags: ConnectionFlags,
  action: (share: RemoteShare) => Promise<void>,
): Promise<void> {
  const { config, timeoutMs } = loadSettings(flags)
  const user = flags.user ?? config.credentials.user
  const password = flags.password ?? process.env.SMB_PASSWORD

  if (!flags.server || !user || !password) {
    throw new Error('server, user, and password are required')
  }
  if (!flags.share) {
    throw new Error('share is required for this command')
  }

  const share = await openShare({
    address: flags.server,
    share: flags.share,
    user,
    password,
    domain: flags.domain ?? config.credentials.domain,
    timeoutMs,
    defaultPort: String(config.server.defaultPort),
    engine: createEngine(config),
    debug: output.debug,
  })
  try {
    await action(share)
  } finally {
    share.close()
  }
}

/** Report a failed command and exit with status 1. */
export function fail(err: unknown): void {
  output.error(err instanceof Error ? err.message : String(err))
  process.exit(1)
}
