// @marsaud/smb2 ships no type declarations; this covers the calls smbput makes.
declare module '@marsaud/smb2' {
  namespace SMB2 {
    interface Options {
      /** UNC share path, e.g. \\\\10.0.0.5\\public */
      share: string
      domain?: string
      username: string
      password: string
      port?: number
      /** 0 keeps the connection open until disconnect() */
      autoCloseTimeout?: number
    }

    interface Stats {
      isDirectory(): boolean
      size: number
      mtime: Date
    }
  }

  class SMB2 {
    constructor(options: SMB2.Options)
    readdir(path: string, callback: (err: Error | null, files: string[]) => void): void
    stat(path: string, callback: (err: Error | null, stats: SMB2.Stats) => void): void
    exists(path: string, callback: (err: Error | null, exists: boolean) => void): void
    mkdir(path: string, callback: (err: Error | null) => void): void
    readFile(path: string, callback: (err: Error | null, data: Buffer) => void): void
    writeFile(path: string, data: Buffer, callback: (err: Error | null) => void): void
    disconnect(): void
  }

  export = SMB2
}
