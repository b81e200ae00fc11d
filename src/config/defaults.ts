import type { SmbputConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: SmbputConfig = {
  server: {
    defaultPort: 445,
  },
  connection: {
    timeoutMs: 10000,
  },
  resolver: {
    multicast: {
      ipv4Group: '224.0.0.252',
      ipv6Group: 'ff02::1:3',
      port: 5355,
      minTimeoutMs: 500,
    },
  },
  credentials: {
    domain: '',
  },
}
