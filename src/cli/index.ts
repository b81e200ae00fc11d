#!/usr/bin/env node
import { Command } from 'commander'
import { registerResolveCommand } from './commands/resolve.js'
import { registerLsCommand } from './commands/ls.js'
import { registerGetCommand } from './commands/get.js'
import { registerPutCommand } from './commands/put.js'

const program = new Command()

program
  .name('smbput')
  .description('SMB file transfer for small networks, with DNS and LLMNR host resolution')
  .version('0.1.0')

registerResolveCommand(program)
registerLsCommand(program)
registerGetCommand(program)
registerPutCommand(program)

export { program }

await program.parseAsync()
