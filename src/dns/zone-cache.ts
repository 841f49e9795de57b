/**
 * Hierarchical record cache
 *
 * Records live in a tree of zones keyed by label, read right-to-left from
 * the root (`www.example.com` is root → com → example → www). The same
 * walk serves cache hits and delegation discovery.
 *
 * Expired records are purged lazily: `getRecords` drops every expired
 * record of the zone it reads, in the same step as the read. Zones are
 * never removed by traversal, only by an explicit `prune()`.
 */

import { canonicalName, isExpired } from './record.js'
import type { DNSRecord } from './types.js'

export class Zone {
  readonly children = new Map<string, Zone>()
  records: DNSRecord[] = []
}

export interface ZoneMatch {
  zone: Zone
  /** Prefix of the requested path that exists in the tree */
  matched: string[]
}

export interface CacheLookup extends ZoneMatch {
  path: string[]
  /** Whether the whole path was found */
  exact: boolean
}

export interface ZoneCacheStats {
  zones: number
  records: number
}

export interface PruneResult {
  recordsRemoved: number
  zonesRemoved: number
}

export interface ZoneCacheOptions {
  /** Clock in epoch milliseconds */
  now?: () => number
}

/**
 * Split a name into lower-cased labels ordered from least to most specific
 */
export function toZonePath(name: string): string[] {
  const normalized = canonicalName(name)
  if (!normalized) return []
  return normalized
    .split('.')
    .filter((label) => label.length > 0)
    .reverse()
}

export class ZoneCache {
  readonly root = new Zone()
  private readonly now: () => number

  constructor(options: ZoneCacheOptions = {}) {
    this.now = options.now ?? Date.now
  }

  /**
   * Deepest existing zone along `path` and the labels matched to reach it
   */
  getZone(path: readonly string[]): ZoneMatch {
    let zone = this.root
    const matched: string[] = []

    for (const label of path) {
      const child = zone.children.get(label)
      if (!child) break
      zone = child
      matched.push(label)
    }

    return { zone, matched }
  }

  lookup(name: string): CacheLookup {
    const path = toZonePath(name)
    const { zone, matched } = this.getZone(path)
    return { zone, matched, path, exact: matched.length === path.length }
  }

  /**
   * Unexpired records of `type` held directly at `zone`. Expired records of
   * any type found at the zone are removed as part of the read.
   */
  getRecords(zone: Zone, type: number): DNSRecord[] {
    const now = this.now()
    const live: DNSRecord[] = []
    const found: DNSRecord[] = []

    for (const record of zone.records) {
      if (isExpired(record, now)) continue
      live.push(record)
      if (record.type === type) found.push(record)
    }

    if (live.length !== zone.records.length) {
      zone.records = live
    }
    return found
  }

  /**
   * Cache records under their names, creating missing zones on the way.
   * Records are stamped with the cache clock; duplicates are kept.
   */
  insert(records: readonly DNSRecord[]): void {
    const fetchedAt = this.now()
    const byName = new Map<string, DNSRecord[]>()

    for (const record of records) {
      const key = canonicalName(record.name)
      const group = byName.get(key)
      const cached = { ...record, fetchedAt }
      if (group) {
        group.push(cached)
      } else {
        byName.set(key, [cached])
      }
    }

    for (const [name, group] of byName) {
      const path = toZonePath(name)
      const closest = this.getZone(path)
      let zone = closest.zone

      // Only the missing suffix is created
      for (const label of path.slice(closest.matched.length)) {
        const child = new Zone()
        zone.children.set(label, child)
        zone = child
      }

      zone.records.push(...group)
    }
  }

  /**
   * Drop expired records everywhere and remove leaf zones left empty
   */
  prune(): PruneResult {
    const now = this.now()
    const result: PruneResult = { recordsRemoved: 0, zonesRemoved: 0 }

    const visit = (zone: Zone): void => {
      const live = zone.records.filter((record) => !isExpired(record, now))
      result.recordsRemoved += zone.records.length - live.length
      zone.records = live

      for (const [label, child] of zone.children) {
        visit(child)
        if (child.records.length === 0 && child.children.size === 0) {
          zone.children.delete(label)
          result.zonesRemoved++
        }
      }
    }

    visit(this.root)
    return result
  }

  stats(): ZoneCacheStats {
    const stats: ZoneCacheStats = { zones: 0, records: 0 }
    const stack: Zone[] = [this.root]

    while (stack.length > 0) {
      const zone = stack.pop()
      if (!zone) break
      stats.zones++
      stats.records += zone.records.length
      stack.push(...zone.children.values())
    }

    return stats
  }
}
