/**
 * UDP query server
 *
 * Decodes each datagram, resolves every question through the resolver and
 * replies to the sender. Datagrams are handled strictly one after another.
 */

import * as dgram from 'node:dgram'
import { createLogger, type Logger } from '../logger.js'
import { DNSFormatError, ResolutionFailure } from './errors.js'
import { recordTypeName, responseCodeName } from './record-types.js'
import type { Resolver } from './resolver.js'
import type { DNSMessage, DNSRecord } from './types.js'
import { DNSResponseCode } from './types.js'
import {
  createDNSResponse,
  createErrorResponse,
  decodeDNSMessage,
  encodeDNSMessage,
} from './wire-format.js'
import type { ZoneCache } from './zone-cache.js'

export interface DNSServerOptions {
  resolver: Resolver
  host?: string
  port?: number
  /** Cache swept with prune() on this interval; 0 or unset disables it */
  cache?: ZoneCache
  pruneIntervalSeconds?: number
  logger?: Logger
}

export interface ServerAddress {
  address: string
  port: number
}

export class DNSServer {
  private readonly resolver: Resolver
  private readonly host: string
  private readonly port: number
  private readonly cache: ZoneCache | undefined
  private readonly pruneIntervalMs: number
  private readonly log: Logger
  private socket: dgram.Socket | null = null
  private pruneTimer: ReturnType<typeof setInterval> | null = null
  private queue: Promise<void> = Promise.resolve()

  constructor(options: DNSServerOptions) {
    this.resolver = options.resolver
    this.host = options.host ?? '0.0.0.0'
    this.port = options.port ?? 53
    this.cache = options.cache
    this.pruneIntervalMs = Math.max(0, options.pruneIntervalSeconds ?? 0) * 1000
    this.log = options.logger ?? createLogger('dns:server')
  }

  /**
   * Build the reply for a decoded query. A failed question turns the
   * whole reply into SERVFAIL with no records.
   */
  async handleQuery(query: DNSMessage): Promise<DNSMessage> {
    const answers: DNSRecord[] = []
    const additional: DNSRecord[] = []

    for (const question of query.questions) {
      this.log.debug('Answering question', {
        id: query.id,
        type: recordTypeName(question.type),
        name: question.name,
        mode: query.recursionDesired ? 'recursive' : 'iterative',
      })

      try {
        const result = await this.resolver.resolve(
          question.type,
          question.name,
          query.recursionDesired,
        )
        answers.push(...result.answers)
        additional.push(...result.additional)
      } catch (error) {
        if (!(error instanceof ResolutionFailure)) throw error
        this.log.warn('Resolution failed', {
          id: query.id,
          name: question.name,
          error: error.message,
        })
        return createDNSResponse(query, [], [], DNSResponseCode.SERVFAIL)
      }
    }

    return createDNSResponse(query, answers, additional)
  }

  /**
   * Wire-level handling: returns the reply bytes, or null when the datagram
   * is too short to even carry a transaction ID or is itself a response.
   * A query that cannot be answered gets SERVFAIL without its questions.
   */
  async handleDatagram(data: Buffer): Promise<Buffer | null> {
    let query: DNSMessage
    try {
      query = decodeDNSMessage(data)
    } catch (error) {
      if (!(error instanceof DNSFormatError)) throw error
      this.log.warn('Malformed query', { error: error.message })
      if (data.length < 2) return null
      return encodeDNSMessage(
        createErrorResponse(data.readUInt16BE(0), DNSResponseCode.FORMERR),
      )
    }

    if (query.isResponse) {
      this.log.debug('Ignoring datagram with QR set', { id: query.id })
      return null
    }

    try {
      const response = await this.handleQuery(query)
      return this.encodeReply(query, response)
    } catch (error) {
      this.log.error('Failed to answer query', {
        id: query.id,
        error: error instanceof Error ? error.message : String(error),
      })
      return encodeDNSMessage(
        createErrorResponse(query.id, DNSResponseCode.SERVFAIL),
      )
    }
  }

  private encodeReply(query: DNSMessage, response: DNSMessage): Buffer {
    this.log.debug('Responding', {
      id: query.id,
      rcode: responseCodeName(response.responseCode ?? DNSResponseCode.NOERROR),
      answers: response.answers.length,
      additional: response.additional.length,
    })
    return encodeDNSMessage(response)
  }

  /**
   * Bind the listener; resolves with the bound address
   */
  async start(): Promise<ServerAddress> {
    if (this.socket) {
      throw new Error('DNS server already started')
    }

    const socket = dgram.createSocket('udp4')
    await new Promise<void>((resolve, reject) => {
      const onStartupError = (err: Error) => {
        socket.close()
        reject(err)
      }
      socket.once('error', onStartupError)
      socket.once('listening', () => {
        socket.off('error', onStartupError)
        resolve()
      })
      socket.bind(this.port, this.host)
    })

    socket.on('error', (err) => {
      this.log.error('UDP socket error', { error: err.message })
    })
    socket.on('message', (msg, rinfo) => {
      this.queue = this.queue.then(() => this.process(socket, msg, rinfo))
    })
    this.socket = socket

    if (this.cache && this.pruneIntervalMs > 0) {
      const cache = this.cache
      this.pruneTimer = setInterval(() => {
        const result = cache.prune()
        this.log.debug('Pruned cache', { ...result })
      }, this.pruneIntervalMs)
      this.pruneTimer.unref()
    }

    const bound = socket.address()
    this.log.info(`DNS server listening on udp://${bound.address}:${bound.port}`)
    return { address: bound.address, port: bound.port }
  }

  private async process(
    socket: dgram.Socket,
    msg: Buffer,
    rinfo: dgram.RemoteInfo,
  ): Promise<void> {
    try {
      const reply = await this.handleDatagram(msg)
      if (!reply) return
      await new Promise<void>((resolve, reject) => {
        socket.send(reply, rinfo.port, rinfo.address, (err) =>
          err ? reject(err) : resolve(),
        )
      })
    } catch (error) {
      this.log.error('Failed to answer query', {
        client: `${rinfo.address}:${rinfo.port}`,
        error: error instanceof Error ? error.message : String(error),
      })
    }
  }

  /**
   * Stop listening once the query being processed has been answered
   */
  async stop(): Promise<void> {
    if (this.pruneTimer) {
      clearInterval(this.pruneTimer)
      this.pruneTimer = null
    }

    const socket = this.socket
    if (!socket) return
    this.socket = null
    socket.removeAllListeners('message')

    await this.queue
    await new Promise<void>((resolve) => socket.close(() => resolve()))
    this.log.info('DNS server stopped')
  }
}
