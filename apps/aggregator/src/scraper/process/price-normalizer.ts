/**
 * Price Normalizer
 *
 * Turns raw price text ("$1,299.99", "19,99 €", "From $49.99") into a
 * canonical non-negative number and a currency code.
 *
 * Malformed input is expected, not exceptional: every function here
 * returns a value instead of throwing.
 */

/** Symbols stripped before numeric extraction */
const CURRENCY_SYMBOLS_PATTERN = /[$€£¥₹₽¢]/g

/** Descriptive tokens and ISO codes stripped before numeric extraction */
const DESCRIPTIVE_TOKENS_PATTERN = /(USD|EUR|GBP|INR|JPY|RUB|AUD|CAD|Price|From|Starting at|Sale|Now)/gi

/**
 * Numeric patterns, most specific first. The first one that matches
 * anywhere wins. Digit guards keep a pattern from matching the tail of a
 * longer number ("1299.99" must not read as "299.99").
 */
const PRICE_PATTERNS: RegExp[] = [
  /(?<!\d)\d{1,3}(?:,\d{3})*\.\d{2}(?!\d)/, // US grouped with cents: 1,299.99
  /(?<!\d)\d{1,3}(?:\.\d{3})*,\d{2}(?!\d)/, // EU grouped with cents: 1.299,99
  /(?<!\d)\d+\.\d{2}(?!\d)/, // Plain decimal: 19.99
  /(?<!\d)\d+,\d{2}(?!\d)/, // Comma decimal: 19,99
  /(?<!\d)(?:\d{1,3}(?:,\d{3})+|\d{1,3}(?:\.\d{3})+|\d+)(?!\d)/, // Integer, optionally grouped: 1,299 or 1.299 or 19
]

/**
 * A minus sign before the amount with no digits ahead of it ("-$5.00",
 * "− 5"). A dash between two amounts ("$10 - $19.99") is a range.
 */
const NEGATIVE_PREFIX_PATTERN = /^\D*[-−]\s*$/

/**
 * Symbol → code, checked in this order. The first symbol present wins,
 * and a symbol always beats a conflicting code token.
 */
const CURRENCY_SYMBOLS: ReadonlyArray<readonly [string, string]> = [
  ['$', 'USD'],
  ['€', 'EUR'],
  ['£', 'GBP'],
  ['¥', 'JPY'],
  ['₹', 'INR'],
  ['₽', 'RUB'],
  ['¢', 'USD'],
]

/** Code tokens recognized when no symbol is present, checked in this order */
const CURRENCY_CODES = ['USD', 'EUR', 'GBP', 'JPY', 'INR', 'RUB', 'AUD', 'CAD'] as const

const DISPLAY_SYMBOLS: Record<string, string> = {
  USD: '$',
  EUR: '€',
  GBP: '£',
  JPY: '¥',
  INR: '₹',
  RUB: '₽',
}

export const DEFAULT_CURRENCY = 'USD'

/**
 * Resolve separators in a matched amount to a plain decimal string.
 *
 * - Both `,` and `.`: the later one is the decimal point.
 * - Only `,`: decimal when exactly two digits follow the last comma,
 *   grouping otherwise.
 * - Only `.`: grouping when exactly three digits follow the last dot.
 */
function resolveSeparators(amount: string): string {
  const lastComma = amount.lastIndexOf(',')
  const lastDot = amount.lastIndexOf('.')

  if (lastComma !== -1 && lastDot !== -1) {
    return lastComma > lastDot
      ? amount.replace(/\./g, '').replace(',', '.')
      : amount.replace(/,/g, '')
  }

  if (lastComma !== -1) {
    return amount.length - lastComma === 3
      ? amount.replace(',', '.')
      : amount.replace(/,/g, '')
  }

  if (lastDot !== -1 && amount.length - lastDot === 4) {
    return amount.replace(/\./g, '')
  }

  return amount
}

/**
 * Parse raw price text into a canonical number.
 *
 * @returns the amount, or null for empty, unparseable or negative-looking text
 */
export function normalizePrice(rawText: string | null | undefined): number | null {
  if (!rawText) return null

  const cleaned = rawText
    .trim()
    .replace(CURRENCY_SYMBOLS_PATTERN, '')
    .replace(DESCRIPTIVE_TOKENS_PATTERN, '')

  for (const pattern of PRICE_PATTERNS) {
    const match = pattern.exec(cleaned)
    if (!match) continue

    // Sign conventions for discounts are not interpreted
    if (NEGATIVE_PREFIX_PATTERN.test(cleaned.slice(0, match.index))) {
      return null
    }

    const value = Number.parseFloat(resolveSeparators(match[0]))
    return Number.isFinite(value) && value >= 0 ? value : null
  }

  return null
}

/**
 * Detect the currency of raw price text.
 * Symbols are checked before code tokens; USD when nothing is recognized.
 */
export function extractCurrency(rawText: string | null | undefined): string {
  if (!rawText) return DEFAULT_CURRENCY

  for (const [symbol, code] of CURRENCY_SYMBOLS) {
    if (rawText.includes(symbol)) {
      return code
    }
  }

  for (const code of CURRENCY_CODES) {
    if (new RegExp(`(?<![A-Za-z])${code}(?![A-Za-z])`, 'i').test(rawText)) {
      return code
    }
  }

  return DEFAULT_CURRENCY
}

/**
 * Format a price for display, e.g. `formatPrice(1299, 'EUR')` → "€1299.00".
 * Unknown codes fall back to `$`.
 */
export function formatPrice(price: number, currency: string = DEFAULT_CURRENCY): string {
  const symbol = DISPLAY_SYMBOLS[currency] ?? '$'
  return `${symbol}${price.toFixed(2)}`
}
