/**
 * URL Utilities
 *
 * Syntax checks, absolutization of scraped hrefs against a site origin,
 * and search URL construction.
 */

/**
 * Validate that a URL is absolute with an http(s) scheme and a host.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname !== ''
  } catch {
    return false
  }
}

/**
 * Rewrite a scraped href as an absolute URL.
 *
 * - Absolute http(s) URLs are returned unchanged
 * - Protocol-relative URLs (`//host/path`) get https
 * - Paths are resolved against the site origin
 *
 * Empty input yields an empty string. Input that cannot be resolved is
 * returned as-is for the validator to reject.
 *
 * @param origin - Site origin, e.g. "https://www.walmart.com"
 */
export function absolutizeUrl(href: string | null | undefined, origin: string): string {
  const value = href?.trim()
  if (!value) return ''

  if (/^https?:\/\//i.test(value)) {
    return value
  }

  if (value.startsWith('//')) {
    return `https:${value}`
  }

  try {
    return new URL(value, origin).toString()
  } catch {
    return value
  }
}

/**
 * Encode a query the way HTML forms do (spaces become `+`).
 */
export function encodeQuery(query: string): string {
  return encodeURIComponent(query.trim()).replace(/%20/g, '+')
}

/**
 * Fill the `{query}` placeholder of a search URL template.
 *
 * @example buildSearchUrl('https://www.ebay.com/sch/i.html?_nkw={query}', 'usb hub')
 *   // → 'https://www.ebay.com/sch/i.html?_nkw=usb+hub'
 */
export function buildSearchUrl(template: string, query: string): string {
  return template.replace('{query}', encodeQuery(query))
}
