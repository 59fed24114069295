import { describe, it, expect } from 'vitest'
import { InMemoryAdapterRegistry } from '../registry.js'
import { AdapterNotRegisteredError, ConfigurationError } from '../errors.js'
import type { SiteAdapter } from '../types.js'

function stubAdapter(id: string): SiteAdapter {
  return { id, scrapeOne: async () => null, search: async () => [] }
}

describe('InMemoryAdapterRegistry', () => {
  it('registers and looks up adapters by site id', () => {
    const registry = new InMemoryAdapterRegistry()
    const ebay = stubAdapter('ebay')

    registry.register(stubAdapter('walmart'))
    registry.register(ebay)

    expect(registry.get('ebay')).toBe(ebay)
    expect(registry.get('target')).toBeUndefined()
    expect(registry.list()).toEqual(['ebay', 'walmart'])
    expect(registry.size()).toBe(2)
  })

  it('rejects a second adapter for the same id', () => {
    const registry = new InMemoryAdapterRegistry()
    registry.register(stubAdapter('ebay'))

    expect(() => registry.register(stubAdapter('ebay'))).toThrow(ConfigurationError)
  })

  it('require throws for unknown ids', () => {
    const registry = new InMemoryAdapterRegistry()

    expect(() => registry.require('target')).toThrow(AdapterNotRegisteredError)
    expect(() => registry.require('target')).toThrow("No adapter registered for site 'target'")
  })
})
