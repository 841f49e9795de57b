/**
 * DNS Types for the recursive resolver
 *
 * Records, questions and messages as they flow between the wire format
 * codec, the zone cache and the resolution engine.
 */

// DNS Record Types (RFC 1035, RFC 3596, RFC 6891)
export const DNSRecordType = {
  A: 1,
  NS: 2,
  CNAME: 5,
  SOA: 6,
  MX: 15,
  TXT: 16,
  AAAA: 28,
  OPT: 41,
} as const

export type DNSRecordType = (typeof DNSRecordType)[keyof typeof DNSRecordType]

// DNS Response Codes (RFC 1035, RFC 2136, RFC 6895)
export const DNSResponseCode = {
  NOERROR: 0,
  FORMERR: 1, // Format error
  SERVFAIL: 2, // Server failure
  NXDOMAIN: 3, // Non-existent domain
  NOTIMP: 4, // Not implemented
  REFUSED: 5, // Query refused
  YXDOMAIN: 6,
  YXRRSET: 7,
  NXRRSET: 8,
  NOTAUTH: 9,
  NOTZONE: 10,
  DSOTYPENI: 11,
  BADVERS: 16,
  BADKEY: 17,
  BADTIME: 18,
  BADMODE: 19,
  BADNAME: 20,
  BADALG: 21,
  BADTRUNC: 22,
  BADCOOKIE: 23,
} as const

export type DNSResponseCode =
  (typeof DNSResponseCode)[keyof typeof DNSResponseCode]

/**
 * Record value: a string for the interpreted types (A, AAAA, CNAME, NS),
 * raw RDATA bytes for everything else.
 */
export type DNSRecordValue = string | Buffer

// DNS Resource Record
export interface DNSRecord {
  /** Fully-qualified name without the trailing dot; the root is '' */
  name: string
  /** IANA type code */
  type: number
  value: DNSRecordValue
  /** Seconds; negative means the record never expires */
  ttl: number
  /** Epoch milliseconds at which the record was created or cached */
  fetchedAt: number
}

// DNS Question
export interface DNSQuestion {
  name: string
  type: number
}

// DNS Message (header flags other than QR/RD/RA/RCODE are always zero)
export interface DNSMessage {
  id: number
  isResponse: boolean
  /** Only present on responses */
  responseCode?: number
  recursionDesired: boolean
  recursionAvailable: boolean
  questions: DNSQuestion[]
  answers: DNSRecord[]
  authority: DNSRecord[]
  additional: DNSRecord[]
}

// Outcome of resolving one question
export interface ResolutionResult {
  answers: DNSRecord[]
  additional: DNSRecord[]
}

// Root server hint (name + IPv4 address)
export interface RootHint {
  name: string
  address: string
}
