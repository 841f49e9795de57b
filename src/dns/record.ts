/**
 * Resource record helpers: construction, expiry and presentation
 */

import { recordTypeName } from './record-types.js'
import type { DNSRecord, DNSRecordValue } from './types.js'

/**
 * Strip surrounding whitespace and the trailing root dot. Case is kept;
 * comparisons go through the lower-cased zone path.
 */
export function normalizeName(name: string): string {
  const trimmed = name.trim()
  return trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed
}

/**
 * Normalized name with ASCII letters lower-cased (RFC 4343). Other bytes
 * are kept as they are.
 */
export function canonicalName(name: string): string {
  return normalizeName(name).replace(/[A-Z]+/g, (letters) =>
    letters.toLowerCase(),
  )
}

export function createRecord(
  type: number,
  name: string,
  value: DNSRecordValue,
  ttl = -1,
  fetchedAt: number = Date.now(),
): DNSRecord {
  return { name: normalizeName(name), type, value, ttl, fetchedAt }
}

/** Epoch milliseconds after which the record is stale; Infinity for ttl < 0 */
export function recordExpiry(record: DNSRecord): number {
  if (record.ttl < 0) return Number.POSITIVE_INFINITY
  return record.fetchedAt + record.ttl * 1000
}

export function isExpired(
  record: DNSRecord,
  now: number = Date.now(),
): boolean {
  return now > recordExpiry(record)
}

function formatValue(value: DNSRecordValue): string {
  if (typeof value === 'string') return value
  return `\\# ${value.length} ${value.toString('hex')}`
}

/**
 * Zone-file style line: `name. ttl TYPE value`. Opaque values use the
 * RFC 3597 `\# <length> <hex>` form.
 */
export function formatRecord(record: DNSRecord): string {
  return `${record.name}. ${record.ttl} ${recordTypeName(record.type)} ${formatValue(record.value)}`
}
