/**
 * Error Classification
 *
 * Failure classes raised by the scraper and the mapping used to record a
 * failed site slot. Validation and extraction misses are not errors: they
 * drop the item and log.
 */

export const ERROR_CODES = {
  // Transport
  TRANSPORT_FAILED: 'TRANSPORT_FAILED',

  // Extraction
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',

  // Configuration
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  ADAPTER_NOT_REGISTERED: 'ADAPTER_NOT_REGISTERED',

  // Request
  NO_SITES_SELECTED: 'NO_SITES_SELECTED',
  INVALID_REQUEST: 'INVALID_REQUEST',

  // Internal
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export type FailureKind = 'transport' | 'extraction' | 'configuration' | 'request' | 'unexpected'

/**
 * Error note stored in a failed site slot.
 */
export interface FailureNote {
  kind: FailureKind
  code: ErrorCode
  message: string
  isRetryable: boolean
}

export class PriceHoundError extends Error {
  readonly code: ErrorCode
  readonly kind: FailureKind
  readonly isRetryable: boolean

  constructor(
    message: string,
    options: { code: ErrorCode; kind: FailureKind; isRetryable?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = options.code
    this.kind = options.kind
    this.isRetryable = options.isRetryable ?? false
  }
}

/**
 * Network error, timeout or non-2xx response that survived the retry policy.
 */
export class TransportError extends PriceHoundError {
  readonly url: string
  readonly statusCode?: number
  readonly attempts: number

  constructor(url: string, detail: { message: string; statusCode?: number; attempts: number }) {
    super(`Failed to fetch ${url}: ${detail.message}`, {
      code: ERROR_CODES.TRANSPORT_FAILED,
      kind: 'transport',
      isRetryable: true,
    })
    this.url = url
    this.statusCode = detail.statusCode
    this.attempts = detail.attempts
  }
}

/**
 * A page could not be queried at all (e.g. a malformed selector).
 * A selector that simply matches nothing is not an ExtractionError.
 */
export class ExtractionError extends PriceHoundError {
  constructor(selector: string, cause: unknown) {
    super(`Selector could not be evaluated: ${selector}`, {
      code: ERROR_CODES.EXTRACTION_FAILED,
      kind: 'extraction',
      cause,
    })
  }
}

export class ConfigurationError extends PriceHoundError {
  constructor(message: string, options: { code?: ErrorCode; cause?: unknown } = {}) {
    super(message, {
      code: options.code ?? ERROR_CODES.CONFIGURATION_ERROR,
      kind: 'configuration',
      cause: options.cause,
    })
  }
}

export class AdapterNotRegisteredError extends ConfigurationError {
  readonly site: string

  constructor(site: string) {
    super(`No adapter registered for site '${site}'`, {
      code: ERROR_CODES.ADAPTER_NOT_REGISTERED,
    })
    this.site = site
  }
}

export class InvalidRequestError extends PriceHoundError {
  constructor(message: string, code: ErrorCode = ERROR_CODES.INVALID_REQUEST) {
    super(message, { code, kind: 'request' })
  }
}

export class NoSitesSelectedError extends InvalidRequestError {
  readonly requested: string[]

  constructor(requested: string[]) {
    super(
      requested.length > 0
        ? `None of the requested sites are registered: ${requested.join(', ')}`
        : 'No sites were requested',
      ERROR_CODES.NO_SITES_SELECTED
    )
    this.requested = requested
  }
}

/**
 * Classify any thrown value into the note stored against a failed site.
 */
export function classifyError(error: unknown): FailureNote {
  if (error instanceof PriceHoundError) {
    return {
      kind: error.kind,
      code: error.code,
      message: error.message,
      isRetryable: error.isRetryable,
    }
  }

  if (error instanceof Error) {
    return {
      kind: 'unexpected',
      code: ERROR_CODES.UNEXPECTED_ERROR,
      message: error.message || 'An unexpected error occurred',
      isRetryable: false,
    }
  }

  return {
    kind: 'unexpected',
    code: ERROR_CODES.UNEXPECTED_ERROR,
    message: String(error),
    isRetryable: false,
  }
}
