/**
 * DNS message encoder/decoder (RFC 1035) for Link-Local Multicast Name
 * Resolution (RFC 4795), which reuses the DNS wire format unchanged.
 *
 * Supports A (1) and AAAA (28) address records. Compression pointers are
 * followed on decode; encoding never compresses.
 */

import ipaddr from 'ipaddr.js'

/** Resource record types */
export const RECORD_TYPE = {
  A: 1,
  AAAA: 28,
} as const

export type RecordType = (typeof RECORD_TYPE)[keyof typeof RECORD_TYPE]

/** Record class IN (Internet) */
export const RECORD_CLASS = {
  IN: 1,
} as const

/** Query with every flag clear, including RD (recursion is meaningless on-link). */
export const FLAGS_QUERY = 0x0000
/** QR bit set */
export const FLAGS_RESPONSE = 0x8000

const HEADER_SIZE = 12
const MAX_LABEL_LENGTH = 63
const MAX_NAME_LENGTH = 255

export interface NameHeader {
  id: number
  flags: number
  qdcount: number
  ancount: number
  nscount: number
  arcount: number
}

export interface NameQuestion {
  name: string
  type: number
  class: number
}

export interface NameRecord {
  name: string
  type: number
  class: number
  ttl: number
  rdata: Buffer
}

export interface NamePacket {
  header: NameHeader
  questions: NameQuestion[]
  answers: NameRecord[]
  authorities: NameRecord[]
  additionals: NameRecord[]
}

// ─── Names ───────────────────────────────────────────────────────────────────

/**
 * Encode a domain name as length-prefixed labels ending in the root label.
 * A trailing dot is accepted; "host.local." and "host.local" encode the same.
 */
export function encodeName(name: string): Buffer {
  const parts: Buffer[] = []

  for (const label of name.replace(/\.$/, '').split('.')) {
    if (label.length === 0) continue
    const labelBuf = Buffer.from(label, 'utf8')
    if (labelBuf.length > MAX_LABEL_LENGTH) {
      throw new Error(`DNS label exceeds 63 bytes: "${label}"`)
    }
    parts.push(Buffer.from([labelBuf.length]), labelBuf)
  }
  parts.push(Buffer.from([0]))

  const encoded = Buffer.concat(parts)
  if (encoded.length > MAX_NAME_LENGTH) {
    throw new Error(`DNS name exceeds 255 bytes: "${name}"`)
  }
  return encoded
}

/**
 * Decode a domain name at `offset`. `bytesRead` counts only the bytes at
 * `offset` itself, so a compression pointer contributes two bytes.
 */
export function decodeName(
  buf: Buffer,
  offset: number,
): { name: string; bytesRead: number } {
  const labels: string[] = []
  const visited = new Set<number>()
  let pos = offset
  let bytesRead = 0
  let jumped = false

  for (;;) {
    if (pos >= buf.length) {
      throw new Error('DNS name extends beyond packet')
    }
    const len = buf.readUInt8(pos)

    if (len === 0) {
      if (!jumped) bytesRead += 1
      break
    }

    if ((len & 0xc0) === 0xc0) {
      if (pos + 1 >= buf.length) {
        throw new Error('DNS name compression pointer truncated')
      }
      const pointer = buf.readUInt16BE(pos) & 0x3fff
      if (visited.has(pointer)) {
        throw new Error('DNS name compression loop')
      }
      visited.add(pointer)
      if (!jumped) bytesRead += 2
      jumped = true
      pos = pointer
      continue
    }

    if ((len & 0xc0) !== 0) {
      throw new Error(`Unsupported DNS label type: 0x${len.toString(16)}`)
    }
    if (pos + 1 + len > buf.length) {
      throw new Error('DNS label extends beyond packet')
    }

    labels.push(buf.toString('utf8', pos + 1, pos + 1 + len))
    if (!jumped) bytesRead += 1 + len
    pos += 1 + len
  }

  return { name: labels.join('.'), bytesRead }
}

// ─── Header ──────────────────────────────────────────────────────────────────

export function encodeHeader(header: NameHeader): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE)
  buf.writeUInt16BE(header.id, 0)
  buf.writeUInt16BE(header.flags, 2)
  buf.writeUInt16BE(header.qdcount, 4)
  buf.writeUInt16BE(header.ancount, 6)
  buf.writeUInt16BE(header.nscount, 8)
  buf.writeUInt16BE(header.arcount, 10)
  return buf
}

export function decodeHeader(buf: Buffer): NameHeader {
  if (buf.length < HEADER_SIZE) {
    throw new Error(`DNS header too short: ${buf.length} bytes`)
  }
  return {
    id: buf.readUInt16BE(0),
    flags: buf.readUInt16BE(2),
    qdcount: buf.readUInt16BE(4),
    ancount: buf.readUInt16BE(6),
    nscount: buf.readUInt16BE(8),
    arcount: buf.readUInt16BE(10),
  }
}

// ─── Questions and records ───────────────────────────────────────────────────

export function encodeQuestion(question: NameQuestion): Buffer {
  const tail = Buffer.alloc(4)
  tail.writeUInt16BE(question.type, 0)
  tail.writeUInt16BE(question.class, 2)
  return Buffer.concat([encodeName(question.name), tail])
}

export function decodeQuestion(
  buf: Buffer,
  offset: number,
): { question: NameQuestion; bytesRead: number } {
  const { name, bytesRead: nameBytes } = decodeName(buf, offset)
  const pos = offset + nameBytes

  if (pos + 4 > buf.length) {
    throw new Error('DNS question truncated')
  }

  return {
    question: {
      name,
      type: buf.readUInt16BE(pos),
      class: buf.readUInt16BE(pos + 2),
    },
    bytesRead: nameBytes + 4,
  }
}

export function encodeRecord(record: NameRecord): Buffer {
  const fixed = Buffer.alloc(10)
  fixed.writeUInt16BE(record.type, 0)
  fixed.writeUInt16BE(record.class, 2)
  fixed.writeUInt32BE(record.ttl, 4)
  fixed.writeUInt16BE(record.rdata.length, 8)
  return Buffer.concat([encodeName(record.name), fixed, record.rdata])
}

export function decodeRecord(
  buf: Buffer,
  offset: number,
): { record: NameRecord; bytesRead: number } {
  const { name, bytesRead: nameBytes } = decodeName(buf, offset)
  let pos = offset + nameBytes

  if (pos + 10 > buf.length) {
    throw new Error('DNS resource record truncated')
  }

  const type = buf.readUInt16BE(pos)
  const cls = buf.readUInt16BE(pos + 2)
  const ttl = buf.readUInt32BE(pos + 4)
  const rdlength = buf.readUInt16BE(pos + 8)
  pos += 10

  if (pos + rdlength > buf.length) {
    throw new Error('DNS RDATA extends beyond packet')
  }

  return {
    record: { name, type, class: cls, ttl, rdata: Buffer.from(buf.subarray(pos, pos + rdlength)) },
    bytesRead: nameBytes + 10 + rdlength,
  }
}

// ─── Address RDATA ───────────────────────────────────────────────────────────

export function encodeA(ip: string): Buffer {
  if (!ipaddr.IPv4.isValidFourPartDecimal(ip)) {
    throw new Error(`Invalid IPv4 address: ${ip}`)
  }
  return Buffer.from(ipaddr.IPv4.parse(ip).toByteArray())
}

export function decodeA(rdata: Buffer): string {
  if (rdata.length !== 4) {
    throw new Error(`Invalid A record RDATA length: ${rdata.length}`)
  }
  return `${rdata[0]}.${rdata[1]}.${rdata[2]}.${rdata[3]}`
}

export function encodeAAAA(ip: string): Buffer {
  if (!ipaddr.IPv6.isValid(ip)) {
    throw new Error(`Invalid IPv6 address: ${ip}`)
  }
  return Buffer.from(ipaddr.IPv6.parse(ip).toByteArray())
}

/** Decode AAAA RDATA to its RFC 5952 text form. */
export function decodeAAAA(rdata: Buffer): string {
  if (rdata.length !== 16) {
    throw new Error(`Invalid AAAA record RDATA length: ${rdata.length}`)
  }
  return new ipaddr.IPv6([...rdata]).toRFC5952String()
}

// ─── Messages ────────────────────────────────────────────────────────────────

export function encodePacket(packet: NamePacket): Buffer {
  return Buffer.concat([
    encodeHeader(packet.header),
    ...packet.questions.map(encodeQuestion),
    ...packet.answers.map(encodeRecord),
    ...packet.authorities.map(encodeRecord),
    ...packet.additionals.map(encodeRecord),
  ])
}

function decodeRecords(
  buf: Buffer,
  offset: number,
  count: number,
): { records: NameRecord[]; offset: number } {
  const records: NameRecord[] = []
  for (let i = 0; i < count; i++) {
    const { record, bytesRead } = decodeRecord(buf, offset)
    records.push(record)
    offset += bytesRead
  }
  return { records, offset }
}

export function decodePacket(buf: Buffer): NamePacket {
  const header = decodeHeader(buf)
  let offset = HEADER_SIZE

  const questions: NameQuestion[] = []
  for (let i = 0; i < header.qdcount; i++) {
    const { question, bytesRead } = decodeQuestion(buf, offset)
    questions.push(question)
    offset += bytesRead
  }

  const answers = decodeRecords(buf, offset, header.ancount)
  const authorities = decodeRecords(buf, answers.offset, header.nscount)
  const additionals = decodeRecords(buf, authorities.offset, header.arcount)

  return {
    header,
    questions,
    answers: answers.records,
    authorities: authorities.records,
    additionals: additionals.records,
  }
}

/**
 * Decode only the answer section of a response. Answers before the first
 * malformed record are returned; authority and additional records are never
 * read. Throws if the header or question section is malformed.
 */
export function decodeAnswers(buf: Buffer): NameRecord[] {
  const header = decodeHeader(buf)
  let offset = HEADER_SIZE

  for (let i = 0; i < header.qdcount; i++) {
    offset += decodeQuestion(buf, offset).bytesRead
  }

  const answers: NameRecord[] = []
  for (let i = 0; i < header.ancount; i++) {
    let decoded: { record: NameRecord; bytesRead: number }
    try {
      decoded = decodeRecord(buf, offset)
    } catch {
      break
    }
    answers.push(decoded.record)
    offset += decoded.bytesRead
  }
  return answers
}

/** Extract the addresses carried by A and AAAA answers, in answer order. */
export function answerAddresses(answers: readonly NameRecord[]): string[] {
  const addresses: string[] = []
  for (const answer of answers) {
    if (answer.type === RECORD_TYPE.A && answer.rdata.length === 4) {
      addresses.push(decodeA(answer.rdata))
    } else if (answer.type === RECORD_TYPE.AAAA && answer.rdata.length === 16) {
      addresses.push(decodeAAAA(answer.rdata))
    }
  }
  return addresses
}
