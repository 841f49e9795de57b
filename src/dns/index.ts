/**
 * DNS Module - Recursive/iterative resolver
 *
 * Answers UDP DNS queries from a hierarchical zone cache and, when
 * recursion is requested, walks the delegation chain from the root hints
 * down to the authoritative servers, caching what it learns.
 *
 * RFC Compliance:
 * - RFC 1035: DNS wire format (names are decompressed, never compressed)
 * - RFC 2181: TTL range
 * - RFC 3596: AAAA records
 *
 * @example
 * ```typescript
 * import {
 *   createSeededCache,
 *   DNSServer,
 *   Resolver,
 *   UdpUpstreamTransport,
 * } from 'dns-recursor'
 *
 * const cache = createSeededCache()
 * const resolver = new Resolver({ cache, transport: new UdpUpstreamTransport() })
 * await resolver.prefetch(['com', 'net'])
 *
 * const server = new DNSServer({ resolver, port: 10053 })
 * await server.start()
 * ```
 */

// Configuration
export {
  createDefaultResolverConfig,
  DEFAULT_PREFETCH_ZONES,
  loadResolverConfig,
  type ResolverConfig,
  ResolverConfigSchema,
  validateResolverConfig,
} from './config.js'
// Errors
export {
  ConfigurationError,
  DNSError,
  DNSErrorCode,
  DNSFormatError,
  ResolutionFailure,
  UpstreamError,
} from './errors.js'
// Records
export {
  createRecord,
  formatRecord,
  isExpired,
  normalizeName,
  recordExpiry,
} from './record.js'
export {
  recordTypeCode,
  recordTypeName,
  responseCodeName,
  UNKNOWN_TYPE,
} from './record-types.js'
// Resolution engine
export { Resolver, type ResolverOptions } from './resolver.js'
// Root hints
export {
  createRootHintRecords,
  createSeededCache,
  getBundledRootHints,
  loadRootHints,
  ROOT_SERVERS_ZONE,
} from './root-hints.js'
// Server loop
export { DNSServer, type DNSServerOptions } from './server.js'
// Types
export {
  type DNSMessage,
  type DNSQuestion,
  type DNSRecord,
  DNSRecordType,
  type DNSRecordValue,
  DNSResponseCode,
  type ResolutionResult,
  type RootHint,
} from './types.js'
// Upstream transport
export {
  UdpUpstreamTransport,
  type UpstreamTransport,
} from './upstream.js'
// Wire format encoder/decoder
export {
  createDNSResponse,
  createErrorResponse,
  createQuery,
  decodeDNSMessage,
  encodeDNSMessage,
  isUpstreamError,
  MAX_TTL,
} from './wire-format.js'
// Zone cache
export { toZonePath, Zone, ZoneCache } from './zone-cache.js'
