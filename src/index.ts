export { parseServerAddress, AddressError, DEFAULT_SMB_PORT } from './address/server-address.js'
export type { HostSpec, AddressErrorCode } from './address/server-address.js'
export * from './resolver/index.js'
export * from './smb/index.js'
export { loadConfig, ConfigError, ENV_PREFIX, DEFAULT_CONFIG } from './config/index.js'
export type { SmbputConfig } from './types/config.js'
