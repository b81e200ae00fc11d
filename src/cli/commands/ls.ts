import type { Command } from 'commander'
import type { RemoteEntry } from '../../smb/index.js'
import { addConnectionOptions, fail, withShare, type ConnectionFlags } from '../connection.js'
import { output } from '../output.js'

/** `d 2026-01-01T00:00:00Z         1024 name` */
export function formatEntry(entry: RemoteEntry): string {
  const kind = entry.isDirectory ? 'd' : '-'
  const mtime = entry.mtime.toISOString().replace(/\.\d{3}Z$/, 'Z')
  return `${kind} ${mtime} ${String(entry.size).padStart(12)} ${entry.name}`
}

export function registerLsCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('ls')
      .description('List a remote directory')
      .argument('[remote]', 'remote directory', '.'),
  ).action(async (remote: string, options: ConnectionFlags) => {
    try {
      await withShare(options, async (share) => {
        for (const entry of await share.list(remote)) {
          output.info(formatEntry(entry))
        }
      })
    } catch (err) {
      fail(err)
    }
  })
}
