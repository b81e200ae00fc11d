import { mkdir, readFile, stat, writeFile } from 'node:fs/promises'
import { dirname, posix } from 'node:path'
import type SMB2 from '@marsaud/smb2'
import { normalizeRemotePath, toSmbPath, REMOTE_ROOT } from './remote-path.js'
import { SmbError, errorMessage } from './errors.js'

/** One directory entry of a remote listing */
export interface RemoteEntry {
  name: string
  isDirectory: boolean
  size: number
  mtime: Date
}

/**
 * A mounted share. Every remote path is normalized before it reaches the
 * SMB client, so callers may pass POSIX or Windows style paths.
 */
export class RemoteShare {
  constructor(
    private readonly client: SMB2,
    /** Address the share was opened on */
    public readonly address: string,
  ) {}

  /** List the entries of a remote directory (default: share root). */
  async list(remote: string = REMOTE_ROOT): Promise<RemoteEntry[]> {
    const dir = normalizeRemotePath(remote)
    const names = await this.call<string[]>(`readdir ${dir}`, (cb) =>
      this.client.readdir(toSmbPath(dir), cb),
    )

    const entries: RemoteEntry[] = []
    for (const name of names) {
      const path = normalizeRemotePath(`${dir}/${name}`)
      const stats = await this.call<SMB2.Stats>(`stat ${path}`, (cb) =>
        this.client.stat(toSmbPath(path), cb),
      )
      entries.push({
        name,
        isDirectory: stats.isDirectory(),
        size: stats.size,
        mtime: stats.mtime,
      })
    }
    return entries
  }

  /** Copy a remote file to `local`, creating local parent directories. */
  async download(remote: string, local: string): Promise<void> {
    const path = normalizeRemotePath(remote)
    const dir = dirname(local)
    if (dir !== '.') {
      await this.local(`mkdir ${dir}`, () => mkdir(dir, { recursive: true }))
    }

    const data = await this.call<Buffer>(`open remote ${path}`, (cb) =>
      this.client.readFile(toSmbPath(path), cb),
    )
    await this.local(`create local ${local}`, () => writeFile(local, data))
  }

  /** Copy a local file to `remote`, creating remote parent directories. */
  async upload(local: string, remote: string): Promise<void> {
    const info = await this.local(`stat local ${local}`, () => stat(local))
    if (info.isDirectory()) {
      throw new SmbError('LOCAL_IO', `local path ${local} is a directory`)
    }

    const path = normalizeRemotePath(remote)
    const dir = posix.dirname(path)
    if (dir !== REMOTE_ROOT) {
      await this.ensureDirectory(dir)
    }

    const data = await this.local(`open local ${local}`, () => readFile(local))
    await this.call<void>(`create remote ${path}`, (cb) =>
      this.client.writeFile(toSmbPath(path), data, (err) => cb(err, undefined)),
    )
  }

  /** Create each missing directory along `dir`, parents first. */
  private async ensureDirectory(dir: string): Promise<void> {
    let current = ''
    for (const segment of dir.split('/')) {
      current = current ? `${current}/${segment}` : segment
      const smbPath = toSmbPath(current)
      const exists = await this.call<boolean>(`stat remote ${current}`, (cb) =>
        this.client.exists(smbPath, cb),
      )
      if (!exists) {
        await this.call<void>(`mkdir remote ${current}`, (cb) =>
          this.client.mkdir(smbPath, (err) => cb(err, undefined)),
        )
      }
    }
  }

  close(): void {
    this.client.disconnect()
  }

  private call<T>(
    operation: string,
    invoke: (cb: (err: Error | null, result: T) => void) => void,
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      invoke((err, result) => {
        if (err) {
          reject(new SmbError('REMOTE_IO', `${operation}: ${err.message}`, { cause: err }))
        } else {
          resolve(result)
        }
      })
    })
  }

  private async local<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run()
    } catch (err) {
      throw new SmbError('LOCAL_IO', `${operation}: ${errorMessage(err)}`, { cause: err })
    }
  }
}
