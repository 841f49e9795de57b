/**
 * Tests for root hint loading and cache seeding
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, test } from 'vitest'
import { ConfigurationError } from './errors.js'
import {
  createRootHintRecords,
  createSeededCache,
  getBundledRootHints,
  loadRootHints,
} from './root-hints.js'
import { DNSRecordType } from './types.js'

describe('root hints', () => {
  test('bundled list has the thirteen root servers', () => {
    const hints = getBundledRootHints()

    expect(hints).toHaveLength(13)
    expect(hints[0]).toEqual({ name: 'a.root-servers.net', address: '198.41.0.4' })
    expect(hints[12]).toEqual({
      name: 'm.root-servers.net',
      address: '202.12.27.33',
    })
  })

  test('seed records are NS at the root, NS at root-servers.net, then A', () => {
    const records = createRootHintRecords([
      { name: 'a.root-servers.net', address: '198.41.0.4' },
      { name: 'ns.example.test', address: '192.0.2.7' },
    ])

    expect(
      records.map((record) => [record.name, record.type, record.value]),
    ).toEqual([
      ['', DNSRecordType.NS, 'a.root-servers.net'],
      ['', DNSRecordType.NS, 'ns.example.test'],
      ['root-servers.net', DNSRecordType.NS, 'a.root-servers.net'],
      ['a.root-servers.net', DNSRecordType.A, '198.41.0.4'],
      ['ns.example.test', DNSRecordType.A, '192.0.2.7'],
    ])
    expect(records.every((record) => record.ttl === -1)).toBe(true)
  })

  test('seeded cache answers for the root and the root servers', () => {
    const cache = createSeededCache()

    expect(cache.getRecords(cache.root, DNSRecordType.NS)).toHaveLength(13)

    const lookup = cache.lookup('a.root-servers.net')
    expect(lookup.exact).toBe(true)
    expect(
      cache.getRecords(lookup.zone, DNSRecordType.A).map((r) => r.value),
    ).toEqual(['198.41.0.4'])

    // root, net, root-servers and a..m
    expect(cache.stats()).toEqual({ zones: 16, records: 39 })
  })

  describe('loadRootHints', () => {
    let dir: string

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'root-hints-'))
    })

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true })
    })

    test('without a file the bundled list is used', async () => {
      expect(await loadRootHints()).toEqual(getBundledRootHints())
    })

    test('reads a custom hints file', async () => {
      const file = join(dir, 'custom.json')
      await writeFile(
        file,
        JSON.stringify([{ name: 'root.test', address: '127.0.0.1' }]),
      )

      expect(await loadRootHints(file)).toEqual([
        { name: 'root.test', address: '127.0.0.1' },
      ])
    })

    test('rejects addresses that are not IPv4', async () => {
      const file = join(dir, 'invalid.json')
      await writeFile(
        file,
        JSON.stringify([{ name: 'root.test', address: '2001:db8::1' }]),
      )

      await expect(loadRootHints(file)).rejects.toBeInstanceOf(
        ConfigurationError,
      )
    })

    test('rejects files that are not JSON', async () => {
      const file = join(dir, 'broken.json')
      await writeFile(file, 'not json')

      await expect(loadRootHints(file)).rejects.toBeInstanceOf(
        ConfigurationError,
      )
    })

    test('rejects missing files', async () => {
      await expect(
        loadRootHints(join(dir, 'missing.json')),
      ).rejects.toBeInstanceOf(ConfigurationError)
    })
  })
})
