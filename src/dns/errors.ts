/**
 * DNS resolver error types
 */

export const DNSErrorCode = {
  FORMAT_ERROR: 'FORMAT_ERROR',
  UPSTREAM_ERROR: 'UPSTREAM_ERROR',
  TRANSPORT_ERROR: 'TRANSPORT_ERROR',
  RESOLUTION_FAILURE: 'RESOLUTION_FAILURE',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const
export type DNSErrorCode = (typeof DNSErrorCode)[keyof typeof DNSErrorCode]

export class DNSError extends Error {
  constructor(
    message: string,
    public readonly code: DNSErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'DNSError'
  }
}

/** Malformed wire input; decoding cannot proceed */
export class DNSFormatError extends DNSError {
  constructor(message: string, offset?: number) {
    super(
      message,
      DNSErrorCode.FORMAT_ERROR,
      offset === undefined ? undefined : { offset },
    )
    this.name = 'DNSFormatError'
  }
}

/**
 * A single upstream attempt failed, either in transport or because the
 * server answered with an error code other than NXDOMAIN.
 */
export class UpstreamError extends DNSError {
  constructor(
    message: string,
    public readonly server: string,
    public readonly responseCode?: number,
  ) {
    super(
      message,
      responseCode === undefined
        ? DNSErrorCode.TRANSPORT_ERROR
        : DNSErrorCode.UPSTREAM_ERROR,
      { server, responseCode },
    )
    this.name = 'UpstreamError'
  }
}

/** Every upstream candidate was exhausted or the hop limit was reached */
export class ResolutionFailure extends DNSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, DNSErrorCode.RESOLUTION_FAILURE, details)
    this.name = 'ResolutionFailure'
  }
}

export class ConfigurationError extends DNSError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, DNSErrorCode.CONFIG_ERROR, details)
    this.name = 'ConfigurationError'
  }
}
