/**
 * CLI command runner.
 *
 * Exit codes: 0 success, 1 runtime failure, 2 usage or configuration error.
 */

import type { ILogger } from '@pricehound/logger'
import type { PriceQuerySurface } from '../scraper/types.js'
import { classifyError } from '../scraper/errors.js'
import { parseCliOptions, USAGE, type CliCommand } from './options.js'
import {
  renderBestDeals,
  renderCombined,
  renderComparison,
  renderProduct,
  renderSiteList,
  renderSiteResults,
} from './render.js'

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliIO {
  stdout(line: string): void
  stderr(line: string): void
  writeFile(path: string, content: string): void
}

export interface CliDeps {
  /** Build the query surface from an optional sites file override */
  createSurface(configPath: string | undefined): PriceQuerySurface
  logger: ILogger
}

interface CommandOutput {
  lines: string[]
  /** JSON-serializable result for --output */
  data: unknown
}

async function execute(command: Exclude<CliCommand, { kind: 'help' }>, surface: PriceQuerySurface): Promise<CommandOutput> {
  switch (command.kind) {
    case 'list-sites': {
      const sites = surface.listRegisteredSites()
      return { lines: renderSiteList(sites), data: sites }
    }
    case 'scrape-url': {
      const record = await surface.scrapeUrl(command.url, command.site)
      return { lines: renderProduct(record), data: record }
    }
    case 'best-deals': {
      const deals = await surface.bestDeals(command.query, command.topN, command.maxResults)
      return { lines: renderBestDeals(deals), data: deals }
    }
    case 'compare': {
      const report = await surface.compare(command.query, command.maxResults)
      return { lines: renderComparison(report), data: report }
    }
    case 'subset': {
      const results = await surface.searchSubset(command.query, command.sites, command.maxResults)
      return { lines: renderSiteResults(results), data: results }
    }
    case 'combined': {
      const records = await surface.searchAllCombined(command.query, command.maxResults)
      return { lines: renderCombined(records), data: records }
    }
  }
}

function exitCodeFor(error: unknown): number {
  const { kind } = classifyError(error)
  return kind === 'configuration' || kind === 'request' ? EXIT_USAGE : EXIT_FAILURE
}

export async function runCli(argv: string[], io: CliIO, deps: CliDeps): Promise<number> {
  const log = deps.logger

  try {
    const options = parseCliOptions(argv)
    const { command } = options

    if (command.kind === 'help') {
      io.stdout(USAGE)
      return EXIT_OK
    }

    const surface = deps.createSurface(options.configPath)
    log.debug('Running command', { command: command.kind })

    const output = await execute(command, surface)
    for (const line of output.lines) {
      io.stdout(line)
    }

    if (options.outputPath) {
      io.writeFile(options.outputPath, JSON.stringify(output.data, null, 2))
      io.stdout(`Results saved to ${options.outputPath}`)
    }

    return EXIT_OK
  } catch (error) {
    const code = exitCodeFor(error)
    const { message } = classifyError(error)
    io.stderr(`Error: ${message}`)
    if (code === EXIT_USAGE) {
      io.stderr(USAGE)
    } else {
      log.error('Command failed', {}, error)
    }
    return code
  }
}
