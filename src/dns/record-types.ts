/**
 * IANA registries for RR types and response codes
 */

import { z } from 'zod'
import registry from './record-types.json' with { type: 'json' }
import { DNSResponseCode } from './types.js'

export const UNKNOWN_TYPE = 'UNKNOWN'

const RecordTypeRegistrySchema = z.record(
  z.string(),
  z.number().int().min(1).max(65535),
)

const codesByName = new Map<string, number>()
const namesByCode = new Map<number, string>()

for (const [name, code] of Object.entries(
  RecordTypeRegistrySchema.parse(registry),
)) {
  codesByName.set(name, code)
  namesByCode.set(code, name)
}

/**
 * Mnemonic for a type code, or UNKNOWN for codes outside the registry
 */
export function recordTypeName(code: number): string {
  return namesByCode.get(code) ?? UNKNOWN_TYPE
}

/**
 * Type code for a mnemonic (case-insensitive). Accepts the RFC 3597
 * generic form `TYPE123` as well.
 */
export function recordTypeCode(name: string): number | undefined {
  const upper = name.trim().toUpperCase()
  const known = codesByName.get(upper)
  if (known !== undefined) return known

  const generic = upper.match(/^TYPE(\d{1,5})$/)
  if (generic?.[1]) {
    const code = Number.parseInt(generic[1], 10)
    if (code >= 1 && code <= 65535) return code
  }
  return undefined
}

const responseCodeNames = new Map<number, string>(
  Object.entries(DNSResponseCode).map(([name, code]) => [code, name]),
)

export function responseCodeName(code: number): string {
  return responseCodeNames.get(code) ?? `RCODE${code}`
}
