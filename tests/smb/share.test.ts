/**
 * Tests for RemoteShare against an in-memory SMB client.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { RemoteShare } from '../../src/smb/share.js'
import { SmbError } from '../../src/smb/errors.js'

function enoent(path: string): Error {
  return Object.assign(new Error(`ENOENT: ${path}`), { code: 'ENOENT' })
}

/** Keys are SMB paths: backslash separated, '' is the share root. */
class MemoryClient {
  files = new Map<string, Buffer>()
  dirs = new Set<string>([''])
  mtime = new Date('2024-03-01T10:00:00Z')

  readdir = vi.fn((path: string, cb: (err: Error | null, files: string[]) => void) => {
    if (!this.dirs.has(path)) return cb(enoent(path), [])
    const prefix = path ? `${path}\\` : ''
    const children = [...this.dirs, ...this.files.keys()]
      .filter((p) => p !== path && p.startsWith(prefix) && !p.slice(prefix.length).includes('\\'))
      .map((p) => p.slice(prefix.length))
    cb(null, children)
  })

  stat = vi.fn((path: string, cb: (err: Error | null, stats: { isDirectory(): boolean; size: number; mtime: Date }) => void) => {
    const file = this.files.get(path)
    const isDir = this.dirs.has(path)
    if (!file && !isDir) return cb(enoent(path), { isDirectory: () => false, size: 0, mtime: this.mtime })
    cb(null, { isDirectory: () => isDir, size: file ? file.length : 0, mtime: this.mtime })
  })

  exists = vi.fn((path: string, cb: (err: Error | null, exists: boolean) => void) => {
    cb(null, this.dirs.has(path) || this.files.has(path))
  })

  mkdir = vi.fn((path: string, cb: (err: Error | null) => void) => {
    this.dirs.add(path)
    cb(null)
  })

  readFile = vi.fn((path: string, cb: (err: Error | null, data: Buffer) => void) => {
    const file = this.files.get(path)
    if (!file) return cb(enoent(path), Buffer.alloc(0))
    cb(null, file)
  })

  writeFile = vi.fn((path: string, data: Buffer, cb: (err: Error | null) => void) => {
    this.files.set(path, data)
    cb(null)
  })

  disconnect = vi.fn()
}

describe('RemoteShare', () => {
  let client: MemoryClient
  let share: RemoteShare
  let tempDir: string

  beforeEach(() => {
    client = new MemoryClient()
    client.dirs.add('docs')
    client.files.set('docs\\notes.txt', Buffer.from('hello'))
    client.files.set('readme.md', Buffer.from('# share'))
    share = new RemoteShare(client, '10.0.0.5')
    tempDir = mkdtempSync(join(tmpdir(), 'smbput-share-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('remembers the address it was opened on', () => {
    expect(share.address).toBe('10.0.0.5')
  })

  describe('list()', () => {
    it('lists the share root by default', async () => {
      const entries = await share.list()
      expect(client.readdir).toHaveBeenCalledWith('', expect.any(Function))
      expect(entries).toEqual([
        { name: 'docs', isDirectory: true, size: 0, mtime: client.mtime },
        { name: 'readme.md', isDirectory: false, size: 7, mtime: client.mtime },
      ])
    })

    it('accepts Windows style paths', async () => {
      const entries = await share.list('\\docs\\')
      expect(client.readdir).toHaveBeenCalledWith('docs', expect.any(Function))
      expect(client.stat).toHaveBeenCalledWith('docs\\notes.txt', expect.any(Function))
      expect(entries.map((e) => e.name)).toEqual(['notes.txt'])
    })

    it('wraps client errors as REMOTE_IO', async () => {
      await expect(share.list('missing')).rejects.toMatchObject({
        code: 'REMOTE_IO',
        message: 'readdir missing: ENOENT: missing',
      })
    })
  })

  describe('download()', () => {
    it('writes the remote file locally, creating parent directories', async () => {
      const local = join(tempDir, 'a', 'b', 'notes.txt')
      await share.download('/docs/notes.txt', local)
      expect(client.readFile).toHaveBeenCalledWith('docs\\notes.txt', expect.any(Function))
      expect(readFileSync(local, 'utf8')).toBe('hello')
    })

    it('fails with REMOTE_IO for a missing remote file', async () => {
      const err = await share.download('docs/none.txt', join(tempDir, 'none.txt')).catch((e: unknown) => e)
      expect(err).toBeInstanceOf(SmbError)
      expect(err).toMatchObject({ code: 'REMOTE_IO', message: 'open remote docs/none.txt: ENOENT: docs\\none.txt' })
    })
  })

  describe('upload()', () => {
    it('writes the local file and creates missing remote directories', async () => {
      const local = join(tempDir, 'report.txt')
      writeFileSync(local, 'quarterly')

      await share.upload(local, 'docs/2024/q1/report.txt')

      expect(client.mkdir.mock.calls.map((call) => call[0])).toEqual(['docs\\2024', 'docs\\2024\\q1'])
      expect(client.files.get('docs\\2024\\q1\\report.txt')?.toString()).toBe('quarterly')
    })

    it('writes at the share root without touching directories', async () => {
      const local = join(tempDir, 'root.txt')
      writeFileSync(local, 'top')

      await share.upload(local, 'root.txt')

      expect(client.exists).not.toHaveBeenCalled()
      expect(client.files.get('root.txt')?.toString()).toBe('top')
    })

    it('rejects a local directory with LOCAL_IO', async () => {
      const dir = join(tempDir, 'folder')
      mkdirSync(dir)
      await expect(share.upload(dir, 'folder')).rejects.toMatchObject({
        code: 'LOCAL_IO',
        message: `local path ${dir} is a directory`,
      })
      expect(client.writeFile).not.toHaveBeenCalled()
    })

    it('rejects a missing local file with LOCAL_IO', async () => {
      const missing = join(tempDir, 'missing.txt')
      const err = await share.upload(missing, 'missing.txt').catch((e: unknown) => e)
      expect(err).toBeInstanceOf(SmbError)
      expect(err).toMatchObject({ code: 'LOCAL_IO' })
      expect(err instanceof Error && err.message.startsWith(`stat local ${missing}: `)).toBe(true)
    })
  })

  it('disconnects on close', () => {
    share.close()
    expect(client.disconnect).toHaveBeenCalledOnce()
  })
})
