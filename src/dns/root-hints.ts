/**
 * Root server hints
 *
 * The root zone is seeded with never-expiring NS and A records for the
 * root servers so that every delegation walk has somewhere to start.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import { createRecord } from './record.js'
import bundledHints from './root-hints.json' with { type: 'json' }
import type { DNSRecord, RootHint } from './types.js'
import { DNSRecordType } from './types.js'
import { ZoneCache, type ZoneCacheOptions } from './zone-cache.js'

/** Zone holding the NS records for the root server names themselves */
export const ROOT_SERVERS_ZONE = 'root-servers.net'

const IPv4Schema = z
  .string()
  .regex(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/, 'Expected IPv4')
  .refine(
    (value) => value.split('.').every((octet) => Number(octet) <= 255),
    'IPv4 octet out of range',
  )

export const RootHintsSchema = z
  .array(
    z.object({
      name: z.string().min(1),
      address: IPv4Schema,
    }),
  )
  .min(1)

export function getBundledRootHints(): RootHint[] {
  return RootHintsSchema.parse(bundledHints)
}

/**
 * Read hints from a JSON file, or the bundled list when no file is given
 */
export async function loadRootHints(file?: string): Promise<RootHint[]> {
  if (!file) return getBundledRootHints()

  let raw: unknown
  try {
    raw = JSON.parse(await readFile(file, 'utf-8'))
  } catch (error) {
    throw new ConfigurationError(`Cannot read root hints from ${file}`, {
      cause: error instanceof Error ? error.message : String(error),
    })
  }

  const parsed = RootHintsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid root hints in ${file}`, {
      issues: parsed.error.issues,
    })
  }
  return parsed.data
}

/**
 * Seed records: NS at the root and at root-servers.net for every server,
 * plus each server's A record. None of them expire.
 */
export function createRootHintRecords(hints: readonly RootHint[]): DNSRecord[] {
  const records: DNSRecord[] = []

  for (const hint of hints) {
    records.push(createRecord(DNSRecordType.NS, '', hint.name))
  }
  for (const hint of hints) {
    if (hint.name.toLowerCase().endsWith(`.${ROOT_SERVERS_ZONE}`)) {
      records.push(createRecord(DNSRecordType.NS, ROOT_SERVERS_ZONE, hint.name))
    }
  }
  for (const hint of hints) {
    records.push(createRecord(DNSRecordType.A, hint.name, hint.address))
  }

  return records
}

export interface SeededCacheOptions extends ZoneCacheOptions {
  hints?: readonly RootHint[]
}

/**
 * A cache whose root zone is primed with the root hints
 */
export function createSeededCache(options: SeededCacheOptions = {}): ZoneCache {
  const cache = new ZoneCache(options)
  cache.insert(createRootHintRecords(options.hints ?? getBundledRootHints()))
  return cache
}
