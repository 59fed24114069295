/**
 * Site Configuration
 *
 * Loads the sites file (JSON), validates it, and resolves per-site values
 * against the scraper-wide defaults. The result is deeply frozen and passed
 * explicitly to the orchestrator and adapters; nothing reads it globally.
 *
 * Lookup order for the file: explicit path (--config), PRICEHOUND_CONFIG,
 * then config/sites.json beside this package.
 */

import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { z } from 'zod'
import type { AppConfig, SiteConfig } from '../scraper/types.js'
import { ConfigurationError } from '../scraper/errors.js'

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/sites.json', import.meta.url))

export const CONFIG_PATH_ENV = 'PRICEHOUND_CONFIG'

// =============================================================================
// Schema
// =============================================================================

const selectorsSchema = z.object({
  title: z.string().min(1),
  price: z.string().min(1),
  image: z.string().default(''),
  availability: z.string().default(''),
})

const siteSchema = z.object({
  enabled: z.boolean().default(true),
  searchUrlTemplate: z
    .string()
    .url()
    .refine(value => value.includes('{query}'), {
      message: 'must contain a {query} placeholder',
    }),
  selectors: selectorsSchema,
  rateLimitDelaySeconds: z.number().nonnegative().optional(),
  timeoutSeconds: z.number().positive().optional(),
  userAgent: z.string().min(1).optional(),
})

const scraperSchema = z.object({
  maxConcurrency: z.number().int().positive().default(5),
  rateLimitDelaySeconds: z.number().nonnegative().default(1),
  timeoutSeconds: z.number().positive().default(10),
  userAgent: z.string().min(1).optional(),
})

export const configFileSchema = z.object({
  scraper: scraperSchema.default({}),
  sites: z.record(siteSchema),
})

export type ConfigFile = z.infer<typeof configFileSchema>

// =============================================================================
// Loading
// =============================================================================

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}

/**
 * Validate a parsed sites document and resolve per-site defaults.
 * @throws ConfigurationError listing every schema violation
 */
export function parseConfig(raw: unknown): AppConfig {
  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    })
  }

  const { scraper, sites } = parsed.data

  const resolvedSites: Record<string, SiteConfig> = {}
  for (const [siteId, site] of Object.entries(sites)) {
    resolvedSites[siteId] = {
      enabled: site.enabled,
      searchUrlTemplate: site.searchUrlTemplate,
      selectors: site.selectors,
      rateLimitDelaySeconds: site.rateLimitDelaySeconds ?? scraper.rateLimitDelaySeconds,
      timeoutSeconds: site.timeoutSeconds ?? scraper.timeoutSeconds,
      userAgent: site.userAgent ?? scraper.userAgent,
    }
  }

  return deepFreeze({ scraper, sites: resolvedSites })
}

/**
 * Read and validate the sites file.
 * @throws ConfigurationError when the file is missing, unreadable or invalid
 */
export function loadConfig(path: string): AppConfig {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`Configuration file could not be read: ${path}`, { cause: error })
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Configuration file is not valid JSON: ${path}`, { cause: error })
  }

  return parseConfig(raw)
}

/**
 * Pick the sites file to load.
 */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return explicitPath || env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH
}

/**
 * Ids of enabled sites, ascending.
 */
export function getEnabledSites(config: AppConfig): string[] {
  return Object.entries(config.sites)
    .filter(([, site]) => site.enabled)
    .map(([siteId]) => siteId)
    .sort()
}
