/**
 * Upstream DNS transport
 *
 * Sends a single query datagram to one nameserver address and waits for the
 * reply carrying the same transaction ID. Every query has a timeout.
 */

import * as dgram from 'node:dgram'
import { createLogger, type Logger } from '../logger.js'
import { DNSError, DNSErrorCode, UpstreamError } from './errors.js'
import type { DNSMessage } from './types.js'
import { decodeDNSMessage, encodeDNSMessage } from './wire-format.js'

const DNS_PORT = 53
const DNS_TIMEOUT_MS = 5000

/**
 * Capability the resolution engine uses to talk to nameservers
 */
export interface UpstreamTransport {
  query(address: string, message: DNSMessage): Promise<DNSMessage>
}

export interface UdpUpstreamOptions {
  port?: number
  timeoutMs?: number
  logger?: Logger
}

interface PendingQuery {
  resolve: (response: DNSMessage) => void
  reject: (error: Error) => void
  timeout: ReturnType<typeof setTimeout>
  address: string
}

export class UdpUpstreamTransport implements UpstreamTransport {
  private socket: dgram.Socket | null = null
  private binding: Promise<void> | null = null
  private pendingQueries: Map<number, PendingQuery> = new Map()
  private queryIdCounter = Math.floor(Math.random() * 0x10000)
  private readonly port: number
  private readonly timeoutMs: number
  private readonly log: Logger

  constructor(options: UdpUpstreamOptions = {}) {
    this.port = options.port ?? DNS_PORT
    this.timeoutMs = options.timeoutMs ?? DNS_TIMEOUT_MS
    this.log = options.logger ?? createLogger('dns:upstream')
  }

  /**
   * Bind the UDP socket used for upstream queries
   */
  async initialize(): Promise<void> {
    if (!this.binding) {
      this.binding = this.bind().catch((error: unknown) => {
        this.binding = null
        throw error
      })
    }
    return this.binding
  }

  private bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = dgram.createSocket('udp4')

      const onStartupError = (err: Error) => {
        socket.close()
        reject(err)
      }
      socket.once('error', onStartupError)

      socket.on('message', (msg, rinfo) => {
        this.handleResponse(msg, rinfo.address)
      })

      socket.once('listening', () => {
        socket.off('error', onStartupError)
        socket.on('error', (err) => {
          this.log.error('Socket error', { error: err.message })
        })
        this.socket = socket
        const address = socket.address()
        this.log.debug('Upstream socket bound', {
          address: address.address,
          port: address.port,
        })
        resolve()
      })

      // Ephemeral port; the 'listening' handler resolves
      socket.bind(0)
    })
  }

  /**
   * Send `message` to `address` and wait for the matching reply. The
   * message ID is replaced with one unique among in-flight queries.
   */
  async query(address: string, message: DNSMessage): Promise<DNSMessage> {
    await this.initialize()
    const socket = this.socket
    if (!socket) {
      throw new UpstreamError('Socket not initialized', address)
    }

    const queryId = this.nextQueryId()
    const encoded = encodeDNSMessage({ ...message, id: queryId })

    return new Promise<DNSMessage>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingQueries.delete(queryId)
        reject(
          new UpstreamError(
            `DNS query timeout to ${address} after ${this.timeoutMs}ms`,
            address,
          ),
        )
      }, this.timeoutMs)

      this.pendingQueries.set(queryId, { resolve, reject, timeout, address })

      socket.send(encoded, this.port, address, (err) => {
        if (err) {
          clearTimeout(timeout)
          this.pendingQueries.delete(queryId)
          reject(new UpstreamError(err.message, address))
        }
      })
    })
  }

  private nextQueryId(): number {
    for (let attempt = 0; attempt < 0x10000; attempt++) {
      this.queryIdCounter = (this.queryIdCounter + 1) % 0x10000
      if (!this.pendingQueries.has(this.queryIdCounter)) {
        return this.queryIdCounter
      }
    }
    throw new DNSError(
      'No free transaction IDs for upstream queries',
      DNSErrorCode.TRANSPORT_ERROR,
    )
  }

  /**
   * Handle response from upstream nameserver. A reply that cannot be
   * decoded fails the query it answers, when its ID and sender match one.
   */
  private handleResponse(data: Buffer, from: string): void {
    let response: DNSMessage
    try {
      response = decodeDNSMessage(data)
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      const pending =
        data.length >= 2 ? this.takePending(data.readUInt16BE(0), from) : null
      if (!pending) {
        this.log.warn('Dropping undecodable upstream reply', {
          from,
          error: reason,
        })
        return
      }
      pending.reject(
        new UpstreamError(`Malformed reply from ${from}: ${reason}`, from),
      )
      return
    }

    const pending = this.takePending(response.id, from)
    if (!pending) {
      this.log.debug('Ignoring unexpected upstream reply', {
        from,
        id: response.id,
      })
      return
    }
    pending.resolve(response)
  }

  /**
   * Remove and return the query `id` if it was sent to `from`
   */
  private takePending(id: number, from: string): PendingQuery | null {
    const pending = this.pendingQueries.get(id)
    if (!pending || pending.address !== from) return null
    clearTimeout(pending.timeout)
    this.pendingQueries.delete(id)
    return pending
  }

  /**
   * Reject everything in flight and release the socket
   */
  close(): void {
    for (const [id, pending] of this.pendingQueries) {
      clearTimeout(pending.timeout)
      pending.reject(new UpstreamError('Transport closing', pending.address))
      this.pendingQueries.delete(id)
    }

    if (this.socket) {
      this.socket.close()
      this.socket = null
    }
    this.binding = null
  }
}
