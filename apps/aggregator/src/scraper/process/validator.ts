/**
 * ProductRecord Validator (Fail-Closed)
 *
 * The single gate between raw extraction and a ProductRecord. A candidate
 * that fails is dropped by the adapter and logged; it never surfaces to
 * the caller as an error.
 */

import type { ProductCandidate } from '../types.js'
import { isValidUrl } from '../utils/url.js'

export type ValidationFailureReason =
  | 'MISSING_REQUIRED_FIELD'
  | 'TITLE_TOO_SHORT'
  | 'INVALID_PRICE'
  | 'INVALID_URL'

export type ValidationResult = { ok: true } | { ok: false; reason: ValidationFailureReason }

/** Minimum title length after trimming */
export const MIN_TITLE_LENGTH = 3

/**
 * Fields that must be non-empty strings.
 * `price` is required too but may be null (no parseable price).
 */
const REQUIRED_TEXT_FIELDS = ['title', 'url', 'site'] as const

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== ''
}

/**
 * Check a candidate and report the first failed rule.
 */
export function checkProductRecord(candidate: ProductCandidate): ValidationResult {
  for (const field of REQUIRED_TEXT_FIELDS) {
    if (!isNonEmptyString(candidate[field])) {
      return { ok: false, reason: 'MISSING_REQUIRED_FIELD' }
    }
  }

  if (!('price' in candidate) || candidate.price === undefined) {
    return { ok: false, reason: 'MISSING_REQUIRED_FIELD' }
  }

  const { title, price, url } = candidate

  if (typeof title !== 'string' || title.trim().length < MIN_TITLE_LENGTH) {
    return { ok: false, reason: 'TITLE_TOO_SHORT' }
  }

  if (price !== null && (typeof price !== 'number' || !Number.isFinite(price) || price < 0)) {
    return { ok: false, reason: 'INVALID_PRICE' }
  }

  if (typeof url !== 'string' || !isValidUrl(url)) {
    return { ok: false, reason: 'INVALID_URL' }
  }

  return { ok: true }
}

/**
 * True when the candidate may become a ProductRecord.
 */
export function validateProductRecord(candidate: ProductCandidate): boolean {
  return checkProductRecord(candidate).ok
}

/**
 * Map a failure reason to a human-readable message.
 */
export function validationReasonToMessage(reason: ValidationFailureReason): string {
  switch (reason) {
    case 'MISSING_REQUIRED_FIELD':
      return 'Required field was missing'
    case 'TITLE_TOO_SHORT':
      return `Title was shorter than ${MIN_TITLE_LENGTH} characters`
    case 'INVALID_PRICE':
      return 'Price was not a non-negative number'
    case 'INVALID_URL':
      return 'URL was not an absolute http(s) URL'
  }
}

/**
 * Collapse whitespace runs and strip zero-width characters.
 */
export function sanitizeText(text: string | null | undefined): string {
  if (!text) return ''
  return text
    .replace(/[\u200b\u200c\u200d]/g, '')
    .split(/\s+/)
    .filter(Boolean)
    .join(' ')
}
