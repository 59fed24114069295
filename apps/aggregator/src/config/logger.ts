/**
 * Aggregator Logger Configuration
 *
 * Pre-configured loggers for aggregator components
 */

import { createLogger } from '@pricehound/logger'

// Root logger for the aggregator. Logs go to stderr; stdout carries CLI results.
export const logger = createLogger('aggregator', {
  sink: (_entry, formatted) => {
    process.stderr.write(`${formatted}\n`)
  },
})

// Pre-configured child loggers for common components
export const loggers = {
  cli: logger.child('cli'),
  config: logger.child('config'),
  scraper: logger.child('scraper'),
}
