/**
 * Tests for the UDP query server
 *
 * Covers:
 * - Multi-question replies built from the cache
 * - SERVFAIL replacing partial answers
 * - FORMERR for malformed datagrams, SERVFAIL for unexpected failures
 * - A full exchange over a loopback socket
 */

import * as dgram from 'node:dgram'
import { afterEach, describe, expect, test } from 'vitest'
import { createLogger } from '../logger.js'
import { UpstreamError } from './errors.js'
import { Resolver } from './resolver.js'
import { createSeededCache } from './root-hints.js'
import { DNSServer } from './server.js'
import type { DNSMessage } from './types.js'
import { DNSRecordType, DNSResponseCode } from './types.js'
import type { UpstreamTransport } from './upstream.js'
import {
  createDNSResponse,
  createQuery,
  decodeDNSMessage,
  encodeDNSMessage,
} from './wire-format.js'

const silent = createLogger('test', { silent: true })

class FailingTransport implements UpstreamTransport {
  calls = 0

  constructor(private readonly failure?: Error) {}

  async query(address: string): Promise<DNSMessage> {
    this.calls++
    throw this.failure ?? new UpstreamError('unreachable', address)
  }
}

function createServer(failure?: Error): {
  server: DNSServer
  transport: FailingTransport
} {
  const cache = createSeededCache()
  const transport = new FailingTransport(failure)
  const resolver = new Resolver({ cache, transport, logger: silent })
  const server = new DNSServer({
    resolver,
    cache,
    host: '127.0.0.1',
    port: 0,
    logger: silent,
  })
  return { server, transport }
}

function withQuestions(
  id: number,
  recursionDesired: boolean,
  names: string[],
): DNSMessage {
  return {
    ...createQuery('', DNSRecordType.A, { id, recursionDesired }),
    questions: names.map((name) => ({ name, type: DNSRecordType.A })),
  }
}

describe('DNSServer', () => {
  let running: DNSServer | null = null

  afterEach(async () => {
    await running?.stop()
    running = null
  })

  // ============================================================================
  // handleQuery
  // ============================================================================

  describe('handleQuery', () => {
    test('answers every question in one reply', async () => {
      const { server } = createServer()

      const response = await server.handleQuery(
        withQuestions(0x0a0b, false, ['a.root-servers.net', 'b.root-servers.net']),
      )

      expect(response.id).toBe(0x0a0b)
      expect(response.isResponse).toBe(true)
      expect(response.recursionAvailable).toBe(true)
      expect(response.responseCode).toBe(DNSResponseCode.NOERROR)
      expect(response.questions).toHaveLength(2)
      expect(response.answers.map((r) => r.value)).toEqual([
        '198.41.0.4',
        '170.247.170.2',
      ])
    })

    test('a failed question turns the reply into SERVFAIL with no records', async () => {
      const { server, transport } = createServer()

      const response = await server.handleQuery(
        withQuestions(7, true, ['a.root-servers.net', 'www.example.com']),
      )

      expect(response.responseCode).toBe(DNSResponseCode.SERVFAIL)
      expect(response.answers).toEqual([])
      expect(response.additional).toEqual([])
      expect(transport.calls).toBe(13)
    })

    test('iterative questions never reach upstream', async () => {
      const { server, transport } = createServer()

      const response = await server.handleQuery(
        withQuestions(8, false, ['www.example.com']),
      )

      expect(response.responseCode).toBe(DNSResponseCode.NOERROR)
      expect(response.answers).toHaveLength(13)
      expect(response.additional).toHaveLength(13)
      expect(transport.calls).toBe(0)
    })
  })

  // ============================================================================
  // handleDatagram
  // ============================================================================

  describe('handleDatagram', () => {
    test('decodes, resolves and encodes', async () => {
      const { server } = createServer()
      const query = createQuery('a.root-servers.net', DNSRecordType.A, {
        id: 0x4242,
        recursionDesired: true,
      })

      const reply = await server.handleDatagram(encodeDNSMessage(query))
      expect(reply).not.toBeNull()
      if (!reply) return

      const response = decodeDNSMessage(reply)
      expect(response.id).toBe(0x4242)
      expect(response.isResponse).toBe(true)
      expect(response.recursionDesired).toBe(true)
      expect(response.recursionAvailable).toBe(true)
      expect(response.answers.map((r) => r.value)).toEqual(['198.41.0.4'])
    })

    test('malformed queries get FORMERR with their ID', async () => {
      const { server } = createServer()

      const reply = await server.handleDatagram(Buffer.from([0x12, 0x34, 0x01]))
      expect(reply).not.toBeNull()
      if (!reply) return

      const response = decodeDNSMessage(reply)
      expect(response.id).toBe(0x1234)
      expect(response.responseCode).toBe(DNSResponseCode.FORMERR)
      expect(response.questions).toEqual([])
    })

    test('labels with bytes outside ASCII are answered', async () => {
      const { server } = createServer()
      const label = Buffer.alloc(30, 0xff)
      const query = Buffer.concat([
        Buffer.from([0x00, 0x2a, 0x00, 0x00, 0x00, 0x01]),
        Buffer.alloc(6),
        Buffer.from([label.length]),
        label,
        Buffer.from([0, 0, DNSRecordType.A, 0, 1]),
      ])

      const reply = await server.handleDatagram(query)
      expect(reply).not.toBeNull()
      if (!reply) return

      const response = decodeDNSMessage(reply)
      expect(response.id).toBe(0x2a)
      expect(response.responseCode).toBe(DNSResponseCode.NOERROR)
      expect(response.questions[0]?.name).toBe('\u00ff'.repeat(30))
      expect(response.answers).toHaveLength(13)
    })

    test('unexpected failures are answered with SERVFAIL', async () => {
      const { server } = createServer(new Error('socket exploded'))
      const query = createQuery('www.example.com', DNSRecordType.A, {
        id: 0x3131,
        recursionDesired: true,
      })

      const reply = await server.handleDatagram(encodeDNSMessage(query))
      expect(reply).not.toBeNull()
      if (!reply) return

      const response = decodeDNSMessage(reply)
      expect(response.id).toBe(0x3131)
      expect(response.responseCode).toBe(DNSResponseCode.SERVFAIL)
      expect(response.questions).toEqual([])
    })

    test('datagrams without an ID are dropped', async () => {
      const { server } = createServer()

      expect(await server.handleDatagram(Buffer.from([0x12]))).toBeNull()
    })

    test('responses sent to the server are dropped', async () => {
      const { server } = createServer()
      const stray = createDNSResponse(
        createQuery('example.com', DNSRecordType.A, { id: 1 }),
        [],
      )

      expect(await server.handleDatagram(encodeDNSMessage(stray))).toBeNull()
    })
  })

  // ============================================================================
  // Socket
  // ============================================================================

  describe('start', () => {
    test('answers a client over UDP', async () => {
      const { server } = createServer()
      running = server
      const { address, port } = await server.start()

      const client = dgram.createSocket('udp4')
      try {
        const reply = await new Promise<Buffer>((resolve, reject) => {
          client.once('message', (msg) => resolve(msg))
          client.once('error', reject)
          client.send(
            encodeDNSMessage(
              createQuery('m.root-servers.net', DNSRecordType.A, { id: 99 }),
            ),
            port,
            address,
          )
        })

        const response = decodeDNSMessage(reply)
        expect(response.id).toBe(99)
        expect(response.answers.map((r) => r.value)).toEqual(['202.12.27.33'])
      } finally {
        client.close()
      }
    })

    test('cannot be started twice', async () => {
      const { server } = createServer()
      running = server
      await server.start()

      await expect(server.start()).rejects.toThrow('DNS server already started')
    })
  })
})
