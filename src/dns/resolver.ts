/**
 * Resolution engine
 *
 * Answers a (type, name) question from the zone cache and, in recursive
 * mode, follows delegations upstream one level at a time:
 *
 * 1. exact zone match holding records of the type → answer
 * 2. exact zone match holding a CNAME → answer with the CNAME
 * 3. otherwise walk toward the root to the nearest zone with NS records
 * 4. iterative: return those NS records plus any cached glue A records
 * 5. recursive: ask each nameserver address in turn and ingest the reply;
 *    an answer to the question is returned, anything else starts again
 *    from step 1
 *
 * A reply answering the question is returned as received, so records with
 * a zero TTL still answer the query that fetched them. An NXDOMAIN reply
 * ends the walk with an empty result. Running out of candidates or
 * referrals raises ResolutionFailure.
 */

import { createLogger, type Logger } from '../logger.js'
import { DNSError, ResolutionFailure, UpstreamError } from './errors.js'
import { canonicalName, normalizeName } from './record.js'
import { recordTypeName, responseCodeName } from './record-types.js'
import type { DNSMessage, DNSRecord, ResolutionResult } from './types.js'
import { DNSRecordType, DNSResponseCode } from './types.js'
import type { UpstreamTransport } from './upstream.js'
import { createQuery, isUpstreamError } from './wire-format.js'
import type { ZoneCache } from './zone-cache.js'

const DEFAULT_MAX_REFERRALS = 16

export interface ResolverOptions {
  cache: ZoneCache
  transport: UpstreamTransport
  /** Upper bound on referral-following retries for one question */
  maxReferrals?: number
  /** Resolve nameserver addresses that are not cached as glue */
  resolveNameserverAddresses?: boolean
  logger?: Logger
}

interface Delegation {
  zone: string
  nameservers: DNSRecord[]
}

/** Shared across the nested lookups made for one question */
interface ResolutionBudget {
  referrals: number
  resolvingNameservers: Set<string>
}

type UpstreamOutcome =
  | { kind: 'answer'; answers: DNSRecord[] }
  | { kind: 'referral' }
  | { kind: 'nxdomain' }
  | { kind: 'nodata' }

function emptyResult(): ResolutionResult {
  return { answers: [], additional: [] }
}

function zoneName(path: readonly string[]): string {
  return [...path].reverse().join('.')
}

/**
 * Answer records for the question: records of the asked type at the name,
 * otherwise a CNAME at the name
 */
function answersFor(
  response: DNSMessage,
  type: number,
  name: string,
): DNSRecord[] {
  const owner = canonicalName(name)
  const atName = response.answers.filter(
    (record) => canonicalName(record.name) === owner,
  )
  const matching = atName.filter((record) => record.type === type)
  if (matching.length > 0) return matching
  return atName.filter((record) => record.type === DNSRecordType.CNAME)
}

export class Resolver {
  private readonly cache: ZoneCache
  private readonly transport: UpstreamTransport
  private readonly maxReferrals: number
  private readonly resolveNameserverAddresses: boolean
  private readonly log: Logger

  constructor(options: ResolverOptions) {
    this.cache = options.cache
    this.transport = options.transport
    this.maxReferrals = options.maxReferrals ?? DEFAULT_MAX_REFERRALS
    this.resolveNameserverAddresses = options.resolveNameserverAddresses ?? true
    this.log = options.logger ?? createLogger('dns:resolver')
  }

  /**
   * Resolve one question. Empty answers mean the name does not exist
   * upstream; ResolutionFailure means no upstream could be reached.
   */
  async resolve(
    type: number,
    name: string,
    recursive: boolean,
  ): Promise<ResolutionResult> {
    return this.run(type, normalizeName(name), recursive, {
      referrals: 0,
      resolvingNameservers: new Set(),
    })
  }

  /**
   * Fetch NS records for each zone so later questions skip the root.
   * Failures are logged and do not stop the remaining zones.
   */
  async prefetch(zones: readonly string[]): Promise<void> {
    for (const zone of zones) {
      this.log.info('Prefetching NS records', { zone })
      try {
        const { answers } = await this.resolve(DNSRecordType.NS, zone, true)
        this.log.debug('Prefetched NS records', {
          zone,
          nameservers: answers.length,
        })
      } catch (error) {
        if (!(error instanceof DNSError)) throw error
        this.log.warn('Prefetch failed', { zone, error: error.message })
      }
    }
  }

  private async run(
    type: number,
    name: string,
    recursive: boolean,
    budget: ResolutionBudget,
  ): Promise<ResolutionResult> {
    this.log.debug('Resolving', {
      type: recordTypeName(type),
      name,
      mode: recursive ? 'recursive' : 'iterative',
    })

    while (true) {
      const lookup = this.cache.lookup(name)

      if (lookup.exact) {
        const records = this.cache.getRecords(lookup.zone, type)
        if (records.length > 0) {
          return { answers: records, additional: [] }
        }

        // The client follows the alias itself
        const aliases = this.cache.getRecords(lookup.zone, DNSRecordType.CNAME)
        if (aliases.length > 0) {
          return { answers: aliases, additional: [] }
        }
      }

      const delegation = this.findDelegation(lookup.matched)

      if (!recursive) {
        return {
          answers: delegation.nameservers,
          additional: delegation.nameservers.flatMap((ns) =>
            this.cachedAddressRecords(ns.value),
          ),
        }
      }

      const outcome = await this.queryDelegation(type, name, delegation, budget)
      if (outcome.kind === 'answer') {
        return { answers: outcome.answers, additional: [] }
      }
      if (outcome.kind !== 'referral') {
        return emptyResult()
      }

      budget.referrals++
      if (budget.referrals > this.maxReferrals) {
        throw new ResolutionFailure(
          `Referral limit of ${this.maxReferrals} exceeded resolving ${recordTypeName(type)} ${name}`,
          { name, type, maxReferrals: this.maxReferrals },
        )
      }
    }
  }

  /**
   * Nearest zone at or above `path` that holds NS records
   */
  private findDelegation(path: readonly string[]): Delegation {
    let current = [...path]

    while (true) {
      const { zone } = this.cache.getZone(current)
      const nameservers = this.cache.getRecords(zone, DNSRecordType.NS)
      if (nameservers.length > 0) {
        return { zone: zoneName(current), nameservers }
      }
      if (current.length === 0) {
        throw new ResolutionFailure('No nameservers cached, not even at the root')
      }
      current = current.slice(0, -1)
    }
  }

  /**
   * Cached A records for a nameserver host; never touches the network
   */
  private cachedAddressRecords(host: DNSRecord['value']): DNSRecord[] {
    if (typeof host !== 'string') return []
    const lookup = this.cache.lookup(host)
    if (!lookup.exact) return []
    return this.cache.getRecords(lookup.zone, DNSRecordType.A)
  }

  private async nameserverAddresses(
    host: string,
    budget: ResolutionBudget,
  ): Promise<string[]> {
    const toAddresses = (records: DNSRecord[]) =>
      records.flatMap((record) =>
        record.type === DNSRecordType.A && typeof record.value === 'string'
          ? [record.value]
          : [],
      )

    const cached = toAddresses(this.cachedAddressRecords(host))
    if (cached.length > 0 || !this.resolveNameserverAddresses) {
      return cached
    }

    // A nameserver whose address depends on itself cannot be reached
    const key = canonicalName(host)
    if (budget.resolvingNameservers.has(key)) return []

    budget.resolvingNameservers.add(key)
    try {
      this.log.debug('Resolving nameserver address', { nameserver: host })
      const { answers } = await this.run(DNSRecordType.A, host, true, budget)
      return toAddresses(answers)
    } catch (error) {
      if (!(error instanceof ResolutionFailure)) throw error
      this.log.warn('Nameserver address unavailable', {
        nameserver: host,
        error: error.message,
      })
      return []
    } finally {
      budget.resolvingNameservers.delete(key)
    }
  }

  /**
   * Ask the delegation's nameservers, one address at a time, until one
   * gives a usable reply
   */
  private async queryDelegation(
    type: number,
    name: string,
    delegation: Delegation,
    budget: ResolutionBudget,
  ): Promise<UpstreamOutcome> {
    let attempts = 0

    for (const nameserver of delegation.nameservers) {
      if (typeof nameserver.value !== 'string') continue
      const addresses = await this.nameserverAddresses(nameserver.value, budget)

      for (const address of addresses) {
        attempts++
        this.log.debug('Upstream query', {
          server: address,
          nameserver: nameserver.value,
          zone: delegation.zone,
          type: recordTypeName(type),
          name,
        })

        let response: DNSMessage
        try {
          response = await this.exchange(address, type, name)
        } catch (error) {
          if (!(error instanceof UpstreamError)) throw error
          this.log.warn('Upstream query failed', {
            server: address,
            code: error.code,
            error: error.message,
          })
          continue
        }

        if (response.responseCode === DNSResponseCode.NXDOMAIN) {
          this.log.debug('Name does not exist', { server: address, name })
          return { kind: 'nxdomain' }
        }

        this.ingest(response)

        const answers = answersFor(response, type, name)
        if (answers.length > 0) {
          return { kind: 'answer', answers }
        }

        const referred = response.authority.some(
          (record) => record.type === DNSRecordType.NS,
        )
        if (response.answers.length === 0 && !referred) {
          return { kind: 'nodata' }
        }
        return { kind: 'referral' }
      }
    }

    throw new ResolutionFailure(
      `All nameservers for ${delegation.zone || '.'} failed resolving ${recordTypeName(type)} ${name}`,
      { zone: delegation.zone, name, type, attempts },
    )
  }

  /**
   * One upstream round trip. Error codes other than NXDOMAIN are raised
   * as UpstreamError, like transport failures.
   */
  private async exchange(
    address: string,
    type: number,
    name: string,
  ): Promise<DNSMessage> {
    const response = await this.transport.query(
      address,
      createQuery(name, type, { recursionDesired: false }),
    )
    if (isUpstreamError(response)) {
      const rcode = response.responseCode ?? DNSResponseCode.NOERROR
      throw new UpstreamError(
        `${address} answered ${responseCodeName(rcode)}`,
        address,
        rcode,
      )
    }
    return response
  }

  private ingest(response: DNSMessage): void {
    // OPT pseudo-records describe the transport, not the zone
    this.cache.insert(
      [...response.answers, ...response.authority, ...response.additional].filter(
        (record) => record.type !== DNSRecordType.OPT,
      ),
    )
  }
}
