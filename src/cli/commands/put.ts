import type { Command } from 'commander'
import { addConnectionOptions, fail, withShare, type ConnectionFlags } from '../connection.js'
import { output } from '../output.js'

export function registerPutCommand(program: Command): void {
  addConnectionOptions(
    program
      .command('put')
      .description('Upload a local file')
      .argument('<local>', 'local file path')
      .argument('<remote>', 'remote destination path'),
  ).action(async (local: string, remote: string, options: ConnectionFlags) => {
    try {
      await withShare(options, (share) => share.upload(local, remote))
      output.success(`${local} -> ${remote}`)
    } catch (err) {
      fail(err)
    }
  })
}
