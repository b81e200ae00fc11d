export { openShare, probeTcp } from './connect.js'
export type { ConnectOptions, ProbeFn } from './connect.js'
export { RemoteShare } from './share.js'
export type { RemoteEntry } from './share.js'
export { normalizeRemotePath, toSmbPath, REMOTE_ROOT } from './remote-path.js'
export { SmbError } from './errors.js'
export type { SmbErrorCode } from './errors.js'
