import { posix } from 'node:path'

/** Share root */
export const REMOTE_ROOT = '.'

/**
 * Normalize a remote path to a slash-separated path relative to the share
 * root. Backslashes are accepted as separators and `..` segments stop at the
 * root instead of escaping it.
 *
 * `""`, `"."` and `"/"` all map to `"."`.
 */
export function normalizeRemotePath(path: string): string {
  if (path === '') return REMOTE_ROOT

  const relative = path.replaceAll('\\', '/').replace(/^\//, '')
  const clean = posix.normalize('/' + relative).replace(/\/+$/, '')
  if (clean === '') return REMOTE_ROOT
  return clean.slice(1)
}

/**
 * Convert a normalized remote path to the backslash form used on the wire,
 * with the share root as the empty string.
 */
export function toSmbPath(remotePath: string): string {
  return remotePath === REMOTE_ROOT ? '' : remotePath.replaceAll('/', '\\')
}
