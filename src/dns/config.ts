/**
 * Resolver configuration
 *
 * Defaults, environment loading and validation. CLI flags are applied as
 * overrides on top of the environment.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors.js'

export const DEFAULT_PREFETCH_ZONES = ['com', 'org', 'net', 'edu', 'gov', 'mil']

const PortSchema = z.number().int().min(0).max(65535)

export const ResolverConfigSchema = z.object({
  /** Interface to bind the UDP listener to */
  host: z.string().min(1),
  /** UDP listen port (53 needs privileges; 10053 is a common stand-in) */
  port: PortSchema,
  /** Port upstream nameservers are queried on */
  upstreamPort: PortSchema.min(1),
  /** Per-attempt wait for an upstream reply */
  upstreamTimeoutMs: z.number().int().positive(),
  /** Upper bound on referral-following retries for one question */
  maxReferrals: z.number().int().positive(),
  /** Zones whose NS records are fetched at startup */
  prefetchZones: z.array(z.string()),
  /** JSON file with root server hints; the bundled list when unset */
  rootHintsFile: z.string().min(1).optional(),
  /** Interval of the full cache prune; 0 disables it */
  pruneIntervalSeconds: z.number().int().nonnegative(),
  /** Resolve nameserver addresses missing from the cache before giving up */
  resolveNameserverAddresses: z.boolean(),
})

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>

// Default configuration factory
export function createDefaultResolverConfig(
  overrides: Partial<ResolverConfig> = {},
): ResolverConfig {
  return {
    host: '0.0.0.0',
    port: 53,
    upstreamPort: 53,
    upstreamTimeoutMs: 5000,
    maxReferrals: 16,
    prefetchZones: [...DEFAULT_PREFETCH_ZONES],
    pruneIntervalSeconds: 0,
    resolveNameserverAddresses: true,
    ...overrides,
  }
}

const intFromEnv = z.coerce.number().int()
const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes')
const listFromEnv = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean),
)

const EnvSchema = z.object({
  DNS_HOST: z.string().min(1).optional(),
  DNS_PORT: intFromEnv.optional(),
  DNS_UPSTREAM_PORT: intFromEnv.optional(),
  DNS_UPSTREAM_TIMEOUT_MS: intFromEnv.optional(),
  DNS_MAX_REFERRALS: intFromEnv.optional(),
  DNS_PREFETCH_ZONES: listFromEnv.optional(),
  DNS_ROOT_HINTS_FILE: z.string().min(1).optional(),
  DNS_PRUNE_INTERVAL_SECONDS: intFromEnv.optional(),
  DNS_RESOLVE_NS_ADDRESSES: booleanFromEnv.optional(),
})

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ')
}

/**
 * Check a complete configuration object
 */
export function validateResolverConfig(config: ResolverConfig): ResolverConfig {
  const result = ResolverConfigSchema.safeParse(config)
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid resolver configuration: ${formatIssues(result.error)}`,
      { issues: result.error.issues },
    )
  }
  return result.data
}

/**
 * Build the configuration from environment variables and explicit
 * overrides (overrides win)
 */
export function loadResolverConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ResolverConfig> = {},
): ResolverConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value !== '',
    ),
  )
  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment: ${formatIssues(parsed.error)}`,
      { issues: parsed.error.issues },
    )
  }

  const vars = parsed.data
  const fromEnv: Partial<ResolverConfig> = {}
  if (vars.DNS_HOST !== undefined) fromEnv.host = vars.DNS_HOST
  if (vars.DNS_PORT !== undefined) fromEnv.port = vars.DNS_PORT
  if (vars.DNS_UPSTREAM_PORT !== undefined)
    fromEnv.upstreamPort = vars.DNS_UPSTREAM_PORT
  if (vars.DNS_UPSTREAM_TIMEOUT_MS !== undefined)
    fromEnv.upstreamTimeoutMs = vars.DNS_UPSTREAM_TIMEOUT_MS
  if (vars.DNS_MAX_REFERRALS !== undefined)
    fromEnv.maxReferrals = vars.DNS_MAX_REFERRALS
  if (vars.DNS_PREFETCH_ZONES !== undefined)
    fromEnv.prefetchZones = vars.DNS_PREFETCH_ZONES
  if (vars.DNS_ROOT_HINTS_FILE !== undefined)
    fromEnv.rootHintsFile = vars.DNS_ROOT_HINTS_FILE
  if (vars.DNS_PRUNE_INTERVAL_SECONDS !== undefined)
    fromEnv.pruneIntervalSeconds = vars.DNS_PRUNE_INTERVAL_SECONDS
  if (vars.DNS_RESOLVE_NS_ADDRESSES !== undefined)
    fromEnv.resolveNameserverAddresses = vars.DNS_RESOLVE_NS_ADDRESSES

  return validateResolverConfig(
    createDefaultResolverConfig({ ...fromEnv, ...overrides }),
  )
}
