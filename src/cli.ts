#!/usr/bin/env node
/**
 * dns-recursor CLI
 *
 * - dns-recursor serve - Run the resolver on UDP
 * - dns-recursor query <name> [type] - Send one query to a DNS server
 */

import { isIPv4 } from 'node:net'
import { Command, InvalidArgumentError } from 'commander'
import { loadResolverConfig, type ResolverConfig } from './dns/config.js'
import { DNSError } from './dns/errors.js'
import { formatRecord } from './dns/record.js'
import {
  recordTypeCode,
  recordTypeName,
  responseCodeName,
} from './dns/record-types.js'
import { Resolver } from './dns/resolver.js'
import { createSeededCache, loadRootHints } from './dns/root-hints.js'
import { DNSServer } from './dns/server.js'
import type { DNSMessage, DNSRecord } from './dns/types.js'
import { DNSResponseCode } from './dns/types.js'
import { UdpUpstreamTransport } from './dns/upstream.js'
import { createQuery } from './dns/wire-format.js'
import { createLogger } from './logger.js'

const log = createLogger('dns:cli')

interface ServeOptions {
  host?: string
  port?: number
  upstreamPort?: number
  timeout?: number
  maxReferrals?: number
  prefetch: boolean
}

interface QueryCommandOptions {
  server: string
  port: number
  recurse: boolean
  timeout: number
}

function parseInteger(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.')
  }
  return parsed
}

function parsePort(value: string): number {
  const port = parseInteger(value)
  if (port > 65535) {
    throw new InvalidArgumentError('Expected a port between 0 and 65535.')
  }
  return port
}

function serveOverrides(options: ServeOptions): Partial<ResolverConfig> {
  const overrides: Partial<ResolverConfig> = {}
  if (options.host !== undefined) overrides.host = options.host
  if (options.port !== undefined) overrides.port = options.port
  if (options.upstreamPort !== undefined)
    overrides.upstreamPort = options.upstreamPort
  if (options.timeout !== undefined)
    overrides.upstreamTimeoutMs = options.timeout
  if (options.maxReferrals !== undefined)
    overrides.maxReferrals = options.maxReferrals
  if (!options.prefetch) overrides.prefetchZones = []
  return overrides
}

async function serve(options: ServeOptions): Promise<void> {
  const config = loadResolverConfig(process.env, serveOverrides(options))
  const hints = await loadRootHints(config.rootHintsFile)
  const cache = createSeededCache({ hints })
  const transport = new UdpUpstreamTransport({
    port: config.upstreamPort,
    timeoutMs: config.upstreamTimeoutMs,
  })
  const resolver = new Resolver({
    cache,
    transport,
    maxReferrals: config.maxReferrals,
    resolveNameserverAddresses: config.resolveNameserverAddresses,
  })

  log.info('Root hints loaded', {
    servers: hints.length,
    source: config.rootHintsFile ?? 'bundled',
  })
  await resolver.prefetch(config.prefetchZones)

  const server = new DNSServer({
    resolver,
    cache,
    host: config.host,
    port: config.port,
    pruneIntervalSeconds: config.pruneIntervalSeconds,
  })
  await server.start()

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down DNS server...`)
    server.stop().then(
      () => {
        transport.close()
        process.exit(0)
      },
      (error: unknown) => {
        log.error('Failed to stop DNS server', {
          error: error instanceof Error ? error.message : String(error),
        })
        process.exit(1)
      },
    )
  }

  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))
}

function printSection(title: string, records: DNSRecord[]): void {
  if (records.length === 0) return
  console.log(`\n;; ${title} SECTION:`)
  for (const record of records) {
    console.log(formatRecord(record))
  }
}

function printResponse(response: DNSMessage): void {
  const rcode = response.responseCode ?? DNSResponseCode.NOERROR
  const flags = [
    response.isResponse ? 'qr' : '',
    response.recursionDesired ? 'rd' : '',
    response.recursionAvailable ? 'ra' : '',
  ].filter(Boolean)

  console.log(
    `;; status: ${responseCodeName(rcode)}, id: ${response.id}, flags: ${flags.join(' ')}`,
  )
  console.log('\n;; QUESTION SECTION:')
  for (const question of response.questions) {
    console.log(`;${question.name}. ${recordTypeName(question.type)}`)
  }
  printSection('ANSWER', response.answers)
  printSection('AUTHORITY', response.authority)
  printSection('ADDITIONAL', response.additional)
}

async function query(
  name: string,
  typeName: string,
  options: QueryCommandOptions,
): Promise<void> {
  const type = recordTypeCode(typeName)
  if (type === undefined) {
    throw new InvalidArgumentError(`Unknown record type: ${typeName}`)
  }
  if (!isIPv4(options.server)) {
    throw new InvalidArgumentError(
      `Server must be an IPv4 address: ${options.server}`,
    )
  }

  const transport = new UdpUpstreamTransport({
    port: options.port,
    timeoutMs: options.timeout,
  })
  try {
    const response = await transport.query(
      options.server,
      createQuery(name, type, { recursionDesired: options.recurse }),
    )
    printResponse(response)
  } finally {
    transport.close()
  }
}

const program = new Command()

program
  .name('dns-recursor')
  .description('Recursive and iterative DNS resolver')
  .version('0.1.0')

program
  .command('serve')
  .description('Answer DNS queries over UDP')
  .option('--host <host>', 'interface to bind (env DNS_HOST)')
  .option('-p, --port <port>', 'UDP port to listen on (env DNS_PORT)', parsePort)
  .option(
    '--upstream-port <port>',
    'port of upstream nameservers (env DNS_UPSTREAM_PORT)',
    parsePort,
  )
  .option(
    '-t, --timeout <ms>',
    'upstream reply timeout (env DNS_UPSTREAM_TIMEOUT_MS)',
    parseInteger,
  )
  .option(
    '--max-referrals <count>',
    'referrals followed per question (env DNS_MAX_REFERRALS)',
    parseInteger,
  )
  .option('--no-prefetch', 'skip fetching TLD nameservers at startup')
  .action(serve)

program
  .command('query')
  .description('Send one query to a DNS server and print the reply')
  .argument('<name>', 'domain name to look up')
  .argument('[type]', 'record type', 'A')
  .option('-s, --server <address>', 'IPv4 address of the server', '127.0.0.1')
  .option('-p, --port <port>', 'server port', parsePort, 53)
  .option('--no-recurse', 'ask for an iterative answer')
  .option('-t, --timeout <ms>', 'reply timeout', parseInteger, 5000)
  .action(query)

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof DNSError) {
    log.error(error.message, { code: error.code, ...error.details })
  } else {
    log.error(error instanceof Error ? error.message : String(error))
  }
  process.exitCode = 1
})
