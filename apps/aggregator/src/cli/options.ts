/**
 * CLI option resolution: turns parsed argv into one command.
 */

import { InvalidRequestError } from '../scraper/errors.js'
import { DEFAULT_MAX_RESULTS_PER_SITE } from '../scraper/orchestrator.js'
import { DEFAULT_TOP_N } from '../scraper/process/result-aggregator.js'
import { parseCommandLine, type FlagValue } from './parse-flags.js'

export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['best-deals', 'compare', 'list-sites', 'help'])

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'list-sites' }
  | { kind: 'scrape-url'; url: string; site: string }
  | { kind: 'best-deals'; query: string; topN: number; maxResults: number }
  | { kind: 'compare'; query: string; maxResults: number }
  | { kind: 'subset'; query: string; sites: string[]; maxResults: number }
  | { kind: 'combined'; query: string; maxResults: number }

export interface CliOptions {
  command: CliCommand

  /** Write JSON results here as well as printing them */
  outputPath?: string

  /** Sites file override */
  configPath?: string
}

export const USAGE = [
  'Usage: pricehound <query> [options]',
  '',
  'Options:',
  '  --max-results <n>      Maximum results per site (default: 10)',
  '  --sites <id...>        Search only these sites (space or comma separated)',
  '  --best-deals           Show the cheapest listings across all sites',
  '  --top <n>              Number of best deals to show (default: 5)',
  '  --compare              Show a price comparison summary',
  '  --url <url> --site <id>  Scrape a single product page',
  '  --list-sites           List the configured sites',
  '  --output <file>        Also write the results to a JSON file',
  '  --config <file>        Sites file (default: config/sites.json, or $PRICEHOUND_CONFIG)',
].join('\n')

function asString(value: FlagValue | undefined, flag: string): string | undefined {
  if (value === undefined) return undefined
  if (typeof value !== 'string') {
    throw new InvalidRequestError(`--${flag} requires a value`)
  }
  return value
}

function asPositiveInt(value: FlagValue | undefined, flag: string, fallback: number): number {
  const text = asString(value, flag)
  if (text === undefined) return fallback
  if (!/^\d+$/.test(text) || Number.parseInt(text, 10) < 1) {
    throw new InvalidRequestError(`--${flag} must be a positive integer, got '${text}'`)
  }
  return Number.parseInt(text, 10)
}

export function splitSiteList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map(site => site.trim().toLowerCase())
    .filter(Boolean)
}

/**
 * Resolve argv (without the node and script entries) into CLI options.
 * @throws InvalidRequestError on missing or malformed arguments
 */
export function parseCliOptions(argv: string[]): CliOptions {
  const { positionals, flags } = parseCommandLine(argv, BOOLEAN_FLAGS)

  const outputPath = asString(flags.output, 'output')
  const configPath = asString(flags.config, 'config')
  const withPaths = (command: CliCommand): CliOptions => ({ command, outputPath, configPath })

  if (flags.help === true) {
    return withPaths({ kind: 'help' })
  }

  if (flags['list-sites'] === true) {
    return withPaths({ kind: 'list-sites' })
  }

  const url = asString(flags.url, 'url')
  if (url !== undefined) {
    const site = asString(flags.site, 'site')
    if (!site) {
      throw new InvalidRequestError('--url requires --site')
    }
    return withPaths({ kind: 'scrape-url', url, site: site.toLowerCase() })
  }

  const query = positionals.join(' ').trim()
  if (query === '') {
    throw new InvalidRequestError('A search query is required')
  }

  const maxResults = asPositiveInt(flags['max-results'], 'max-results', DEFAULT_MAX_RESULTS_PER_SITE)

  if (flags['best-deals'] === true) {
    const topN = asPositiveInt(flags.top, 'top', DEFAULT_TOP_N)
    return withPaths({ kind: 'best-deals', query, topN, maxResults })
  }

  if (flags.compare === true) {
    return withPaths({ kind: 'compare', query, maxResults })
  }

  const sites = asString(flags.sites, 'sites')
  if (sites !== undefined) {
    return withPaths({ kind: 'subset', query, sites: splitSiteList(sites), maxResults })
  }

  return withPaths({ kind: 'combined', query, maxResults })
}
