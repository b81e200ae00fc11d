import { Type, type Static } from '@sinclair/typebox'

/** smbput configuration schema for smbput.config.json */
export const SmbputConfigSchema = Type.Object({
  server: Type.Object({
    defaultPort: Type.Integer({ minimum: 1, maximum: 65535, default: 445 }),
  }),
  connection: Type.Object({
    /** Budget for resolving the server, and for each TCP connection attempt */
    timeoutMs: Type.Integer({ minimum: 1, default: 10000 }),
  }),
  resolver: Type.Object({
    multicast: Type.Object({
      ipv4Group: Type.String({ minLength: 1, default: '224.0.0.252' }),
      ipv6Group: Type.String({ minLength: 1, default: 'ff02::1:3' }),
      port: Type.Integer({ minimum: 1, maximum: 65535, default: 5355 }),
      minTimeoutMs: Type.Integer({ minimum: 1, default: 500 }),
    }),
  }),
  credentials: Type.Object({
    user: Type.Optional(Type.String({ minLength: 1 })),
    domain: Type.String({ default: '' }),
  }),
})

export type SmbputConfig = Static<typeof SmbputConfigSchema>
