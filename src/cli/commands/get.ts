import type { Command } from 'commander'
import { addConnectionOptions, fail, withShare, type ConnectionFlags } from '../connection.js'
import { output } from '../output.js'

export function registerGetCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('get')
      .description('Download a remote file')
      .argument('<remote>', 'remote file path')
      .argument('<local>', 'local destination path'),
  ).action(async (remote: string, local: string, options: ConnectionFlags) => {
    try {
      await withShare(options, (share) => share.download(remote, local))
      output.success(`${remote} -> ${local}`)
    } catch (err) {
      fail(err)
    }
  })
}
