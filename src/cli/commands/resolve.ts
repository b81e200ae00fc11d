/**
 * `smbput resolve` -- resolve a server address the way every other command
 * does before connecting, and print the addresses in preference order.
 */

import type { Command } from 'commander'
import { parseServerAddress } from '../../address/server-address.js'
import { addCommonOptions, createEngine, fail, loadSettings, type CommonFlags } from '../connection.js'
import { output } from '../output.js'

export function registerResolveCommand(program: Command): void {
  addCommonOptions(
    program
      .command('resolve')
      .description('Resolve a server address to IP addresses (DNS, then LLMNR)')
      .argument('<address>', 'server address (host or host:port)'),
  ).action(async (address: string, options: CommonFlags) => {
    try {
      const { config, timeoutMs } = loadSettings(options)
      const { host } = parseServerAddress(address, String(config.server.defaultPort))
      const addresses = await createEngine(config).resolve(host, timeoutMs)
      for (const ip of addresses) {
        output.info(ip)
      }
    } catch (err) {
      fail(err)
    }
  })
}
