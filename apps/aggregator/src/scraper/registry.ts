/**
 * Adapter Registry
 *
 * Adapters are registered explicitly at startup, keyed by site id, and stay
 * fixed for the lifetime of the orchestrator that owns the registry.
 */

import type { SiteAdapter } from './types.js'
import { AdapterNotRegisteredError, ConfigurationError } from './errors.js'

export interface AdapterRegistry {
  register(adapter: SiteAdapter): void
  get(siteId: string): SiteAdapter | undefined
  list(): string[]
  size(): number
}

/**
 * In-memory adapter registry implementation.
 */
export class InMemoryAdapterRegistry implements AdapterRegistry {
  private readonly adapters = new Map<string, SiteAdapter>()

  /**
   * Register an adapter.
   * @throws ConfigurationError if an adapter with the same id is already registered
   */
  register(adapter: SiteAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new ConfigurationError(`Adapter with ID '${adapter.id}' is already registered`)
    }

    this.adapters.set(adapter.id, adapter)
  }

  /**
   * Get adapter by site id.
   */
  get(siteId: string): SiteAdapter | undefined {
    return this.adapters.get(siteId)
  }

  /**
   * Get adapter by site id.
   * @throws AdapterNotRegisteredError if none is registered
   */
  require(siteId: string): SiteAdapter {
    const adapter = this.adapters.get(siteId)
    if (!adapter) {
      throw new AdapterNotRegisteredError(siteId)
    }
    return adapter
  }

  /**
   * List registered site ids in ascending order.
   */
  list(): string[] {
    return Array.from(this.adapters.keys()).sort()
  }

  /**
   * Get count of registered adapters.
   */
  size(): number {
    return this.adapters.size
  }
}
