/**
 * DNS Wire Format Encoder/Decoder
 *
 * Implements DNS message encoding and decoding per RFC 1035. Names are
 * decompressed on decode but never compressed on encode.
 */

import { randomInt } from 'node:crypto'
import { DNSFormatError } from './errors.js'
import { normalizeName } from './record.js'
import type {
  DNSMessage,
  DNSQuestion,
  DNSRecord,
  DNSRecordValue,
} from './types.js'
import { DNSRecordType, DNSResponseCode } from './types.js'

// Re-export for use by other modules
export type { DNSMessage, DNSRecord }

// DNS Header flags bit positions
const QR_BIT = 15 // Query/Response
const RD_BIT = 8 // Recursion Desired
const RA_BIT = 7 // Recursion Available
const RCODE_MASK = 0xf

const HEADER_SIZE = 12
const CLASS_IN = 1
const POINTER_MASK = 0xc0
const MAX_LABEL_LENGTH = 63

/** Largest TTL a record may carry on the wire (RFC 2181 section 8) */
export const MAX_TTL = 0x7fffffff

export interface DecodeOptions {
  /** Timestamp stamped on decoded records as fetchedAt */
  now?: number
}

function ensureAvailable(
  buffer: Buffer,
  offset: number,
  length: number,
  what: string,
): void {
  if (offset < 0 || offset + length > buffer.length) {
    throw new DNSFormatError(
      `Truncated ${what}: need ${length} bytes at offset ${offset}, message is ${buffer.length} bytes`,
      offset,
    )
  }
}

/**
 * Decode a DNS wire format message into structured format
 */
export function decodeDNSMessage(
  buffer: Buffer,
  options: DecodeOptions = {},
): DNSMessage {
  const now = options.now ?? Date.now()
  ensureAvailable(buffer, 0, HEADER_SIZE, 'header')

  const id = buffer.readUInt16BE(0)
  const flags = buffer.readUInt16BE(2)
  const qdcount = buffer.readUInt16BE(4)
  const ancount = buffer.readUInt16BE(6)
  const nscount = buffer.readUInt16BE(8)
  const arcount = buffer.readUInt16BE(10)

  const isResponse = Boolean((flags >> QR_BIT) & 1)
  const recursionDesired = Boolean((flags >> RD_BIT) & 1)
  const recursionAvailable = Boolean((flags >> RA_BIT) & 1)

  let offset = HEADER_SIZE

  const questions: DNSQuestion[] = []
  for (let i = 0; i < qdcount; i++) {
    const { name, newOffset } = decodeDomainName(buffer, offset)
    ensureAvailable(buffer, newOffset, 4, 'question')
    // class is always IN for this resolver
    questions.push({ name, type: buffer.readUInt16BE(newOffset) })
    offset = newOffset + 4
  }

  const decodeSection = (count: number): DNSRecord[] => {
    const records: DNSRecord[] = []
    for (let i = 0; i < count; i++) {
      const { record, newOffset } = decodeResourceRecord(buffer, offset, now)
      offset = newOffset
      records.push(record)
    }
    return records
  }

  const answers = decodeSection(ancount)
  const authority = decodeSection(nscount)
  const additional = decodeSection(arcount)

  const message: DNSMessage = {
    id,
    isResponse,
    recursionDesired,
    recursionAvailable,
    questions,
    answers,
    authority,
    additional,
  }
  if (isResponse) {
    message.responseCode = flags & RCODE_MASK
  }
  return message
}

/**
 * Encode a DNS message into wire format
 */
export function encodeDNSMessage(message: DNSMessage): Buffer {
  const parts: Buffer[] = []

  const header = Buffer.alloc(HEADER_SIZE)
  header.writeUInt16BE(message.id & 0xffff, 0)

  let flags = 0
  if (message.isResponse) flags |= 1 << QR_BIT
  if (message.recursionDesired) flags |= 1 << RD_BIT
  if (message.recursionAvailable) flags |= 1 << RA_BIT
  flags |= (message.responseCode ?? DNSResponseCode.NOERROR) & RCODE_MASK
  header.writeUInt16BE(flags, 2)

  // Counts are always derived from the sections
  header.writeUInt16BE(message.questions.length, 4)
  header.writeUInt16BE(message.answers.length, 6)
  header.writeUInt16BE(message.authority.length, 8)
  header.writeUInt16BE(message.additional.length, 10)
  parts.push(header)

  for (const question of message.questions) {
    parts.push(encodeDomainName(question.name))
    const qFooter = Buffer.alloc(4)
    qFooter.writeUInt16BE(question.type, 0)
    qFooter.writeUInt16BE(CLASS_IN, 2)
    parts.push(qFooter)
  }

  for (const record of [
    ...message.answers,
    ...message.authority,
    ...message.additional,
  ]) {
    parts.push(encodeResourceRecord(record))
  }

  return Buffer.concat(parts)
}

/**
 * Decode a domain name from DNS wire format
 * Handles compression pointers (RFC 1035 Section 4.1.4)
 *
 * Each pointer must target an offset strictly below the start of the name
 * or the previous pointer target, so a chain of pointers always ends.
 */
export function decodeDomainName(
  buffer: Buffer,
  offset: number,
): { name: string; newOffset: number } {
  const labels: string[] = []
  let currentOffset = offset
  let jumped = false
  let jumpOffset = offset
  let pointerBound = offset

  while (true) {
    ensureAvailable(buffer, currentOffset, 1, 'name')
    const len = buffer.readUInt8(currentOffset)

    // Compression pointer (top 2 bits = 11)
    if ((len & POINTER_MASK) === POINTER_MASK) {
      ensureAvailable(buffer, currentOffset, 2, 'compression pointer')
      const pointer = buffer.readUInt16BE(currentOffset) & 0x3fff
      if (pointer >= pointerBound) {
        throw new DNSFormatError(
          `Compression pointer to ${pointer} does not point backwards`,
          currentOffset,
        )
      }
      if (!jumped) {
        jumpOffset = currentOffset + 2
        jumped = true
      }
      pointerBound = pointer
      currentOffset = pointer
      continue
    }

    if ((len & POINTER_MASK) !== 0) {
      throw new DNSFormatError(
        `Unsupported label type 0x${len.toString(16)}`,
        currentOffset,
      )
    }

    // End of name
    if (len === 0) {
      currentOffset += 1
      break
    }

    currentOffset += 1
    ensureAvailable(buffer, currentOffset, len, 'label')
    // One character per byte so any label survives a decode/encode cycle
    labels.push(
      buffer.toString('latin1', currentOffset, currentOffset + len),
    )
    currentOffset += len
  }

  return {
    name: labels.join('.'),
    newOffset: jumped ? jumpOffset : currentOffset,
  }
}

/**
 * Encode a domain name into wire format (uncompressed)
 */
export function encodeDomainName(name: string): Buffer {
  const normalized = normalizeName(name)
  if (!normalized) {
    return Buffer.from([0])
  }

  const parts: Buffer[] = []
  for (const label of normalized.split('.')) {
    if (label.length === 0) continue
    const bytes = Buffer.from(label, 'latin1')
    if (bytes.length > MAX_LABEL_LENGTH) {
      throw new Error(
        `DNS label too long: ${bytes.length} > ${MAX_LABEL_LENGTH}`,
      )
    }
    parts.push(Buffer.from([bytes.length]), bytes)
  }

  // Null terminator
  parts.push(Buffer.from([0]))

  return Buffer.concat(parts)
}

// ============================================================================
// RDATA codecs
// ============================================================================

interface RDataCodec {
  decode(buffer: Buffer, offset: number, length: number): string
  encode(value: string): Buffer
}

type InterpretedType =
  | typeof DNSRecordType.A
  | typeof DNSRecordType.AAAA
  | typeof DNSRecordType.CNAME
  | typeof DNSRecordType.NS

function isInterpretedType(type: number): type is InterpretedType {
  return (
    type === DNSRecordType.A ||
    type === DNSRecordType.AAAA ||
    type === DNSRecordType.CNAME ||
    type === DNSRecordType.NS
  )
}

function expectLength(actual: number, expected: number, type: string): void {
  if (actual !== expected) {
    throw new DNSFormatError(
      `${type} RDATA must be ${expected} bytes, got ${actual}`,
    )
  }
}

const nameCodec: RDataCodec = {
  decode(buffer, offset, length) {
    // Decoded against the whole message so compressed targets resolve
    const { name, newOffset } = decodeDomainName(buffer, offset)
    if (newOffset > offset + length) {
      throw new DNSFormatError('Name overruns RDATA', offset)
    }
    return name
  },
  encode: encodeDomainName,
}

const RDATA_CODECS: Record<InterpretedType, RDataCodec> = {
  [DNSRecordType.A]: {
    decode(buffer, offset, length) {
      expectLength(length, 4, 'A')
      return Array.from(buffer.subarray(offset, offset + 4)).join('.')
    },
    encode: parseIPv4,
  },
  [DNSRecordType.AAAA]: {
    decode(buffer, offset, length) {
      expectLength(length, 16, 'AAAA')
      return formatIPv6(buffer.subarray(offset, offset + 16))
    },
    encode: parseIPv6,
  },
  [DNSRecordType.CNAME]: nameCodec,
  [DNSRecordType.NS]: nameCodec,
}

/**
 * Decode a resource record from DNS wire format
 */
function decodeResourceRecord(
  buffer: Buffer,
  offset: number,
  now: number,
): { record: DNSRecord; newOffset: number } {
  const { name, newOffset: nameOffset } = decodeDomainName(buffer, offset)
  ensureAvailable(buffer, nameOffset, 10, 'resource record header')

  const type = buffer.readUInt16BE(nameOffset)
  // class (nameOffset + 2) is ignored
  const rawTtl = buffer.readUInt32BE(nameOffset + 4)
  const rdlength = buffer.readUInt16BE(nameOffset + 8)
  const rdataOffset = nameOffset + 10
  ensureAvailable(buffer, rdataOffset, rdlength, 'RDATA')

  let value: DNSRecordValue
  if (isInterpretedType(type)) {
    value = RDATA_CODECS[type].decode(buffer, rdataOffset, rdlength)
  } else {
    value = Buffer.from(buffer.subarray(rdataOffset, rdataOffset + rdlength))
  }

  return {
    record: {
      name,
      type,
      value,
      // Values with the top bit set are treated as zero (RFC 2181)
      ttl: rawTtl > MAX_TTL ? 0 : rawTtl,
      fetchedAt: now,
    },
    newOffset: rdataOffset + rdlength,
  }
}

/**
 * Wire TTL: clamped to [0, 2^31 - 1]; records that never expire are sent
 * with the maximum
 */
export function wireTtl(ttl: number): number {
  if (ttl < 0) return MAX_TTL
  return Math.min(Math.floor(ttl), MAX_TTL)
}

/**
 * Encode a resource record into DNS wire format
 */
function encodeResourceRecord(record: DNSRecord): Buffer {
  const rdata = encodeRData(record.type, record.value)

  const header = Buffer.alloc(10)
  header.writeUInt16BE(record.type, 0)
  header.writeUInt16BE(CLASS_IN, 2)
  header.writeUInt32BE(wireTtl(record.ttl), 4)
  header.writeUInt16BE(rdata.length, 8)

  return Buffer.concat([encodeDomainName(record.name), header, rdata])
}

/**
 * Encode RDATA based on record type
 */
function encodeRData(type: number, value: DNSRecordValue): Buffer {
  if (Buffer.isBuffer(value)) {
    return value
  }
  if (isInterpretedType(type)) {
    return RDATA_CODECS[type].encode(value)
  }
  // Opaque type given as text
  return Buffer.from(value)
}

/**
 * Parse dotted-quad IPv4 address to 4-byte buffer
 */
function parseIPv4(address: string): Buffer {
  const parts = address.split('.').map((p) => Number(p))
  if (
    parts.length !== 4 ||
    parts.some((p) => !Number.isInteger(p) || p < 0 || p > 255)
  ) {
    throw new Error(`Invalid IPv4 address: ${address}`)
  }
  return Buffer.from(parts)
}

/**
 * Format IPv6 address from 16-byte buffer
 */
function formatIPv6(buffer: Buffer): string {
  const groups: string[] = []
  for (let i = 0; i < 16; i += 2) {
    groups.push(buffer.readUInt16BE(i).toString(16))
  }
  return groups.join(':')
}

/**
 * Parse IPv6 address string to 16-byte buffer
 */
function parseIPv6(address: string): Buffer {
  const buffer = Buffer.alloc(16)

  // Handle :: expansion
  let fullAddress = address
  if (address.includes('::')) {
    const parts = address.split('::')
    const left = parts[0] ? parts[0].split(':') : []
    const right = parts[1] ? parts[1].split(':') : []
    const missing = 8 - left.length - right.length
    const middle = Array<string>(Math.max(missing, 0)).fill('0')
    fullAddress = [...left, ...middle, ...right].join(':')
  }

  const groups = fullAddress.split(':')
  if (groups.length !== 8) {
    throw new Error(`Invalid IPv6 address: ${address}`)
  }
  for (let i = 0; i < 8; i++) {
    const value = Number.parseInt(groups[i] || '0', 16)
    if (Number.isNaN(value) || value < 0 || value > 0xffff) {
      throw new Error(`Invalid IPv6 address: ${address}`)
    }
    buffer.writeUInt16BE(value, i * 2)
  }

  return buffer
}

// ============================================================================
// Message construction
// ============================================================================

export interface QueryOptions {
  id?: number
  recursionDesired?: boolean
}

/**
 * Create a single-question query with a random transaction ID
 */
export function createQuery(
  name: string,
  type: number,
  options: QueryOptions = {},
): DNSMessage {
  return {
    id: options.id ?? randomInt(0, 0x10000),
    isResponse: false,
    recursionDesired: options.recursionDesired ?? false,
    recursionAvailable: false,
    questions: [{ name: normalizeName(name), type }],
    answers: [],
    authority: [],
    additional: [],
  }
}

/**
 * Create a response echoing the query's ID, questions and RD flag
 */
export function createDNSResponse(
  query: DNSMessage,
  answers: DNSRecord[],
  additional: DNSRecord[] = [],
  rcode: number = DNSResponseCode.NOERROR,
): DNSMessage {
  return {
    id: query.id,
    isResponse: true,
    responseCode: rcode,
    recursionDesired: query.recursionDesired,
    recursionAvailable: true,
    questions: query.questions,
    answers,
    authority: [],
    additional,
  }
}

/**
 * Create a bare error response for a query whose body could not be used
 */
export function createErrorResponse(id: number, rcode: number): DNSMessage {
  return {
    id,
    isResponse: true,
    responseCode: rcode,
    recursionDesired: false,
    recursionAvailable: true,
    questions: [],
    answers: [],
    authority: [],
    additional: [],
  }
}

/**
 * Whether a response carries an error other than NXDOMAIN
 */
export function isUpstreamError(message: DNSMessage): boolean {
  const rcode = message.responseCode ?? DNSResponseCode.NOERROR
  return (
    rcode !== DNSResponseCode.NOERROR && rcode !== DNSResponseCode.NXDOMAIN
  )
}
