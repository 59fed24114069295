/**
 * Environment loader - must be imported first before any other modules
 *
 * Loads apps/aggregator/.env.local in development only; production
 * environments inject variables directly.
 */
import { config } from 'dotenv'
import { fileURLToPath } from 'url'

if (process.env.NODE_ENV !== 'production') {
  config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) })
}
