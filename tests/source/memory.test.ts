/**
 * Tests for the in-memory catalog source
 */

import { describe, it, expect } from 'vitest'
import { MemoryCatalogSource } from '../../src/source/memory.js'
import { rawFeature, rawOp } from '../fixtures.js'

describe('MemoryCatalogSource', () => {
  it('should serve copies of its listings', async () => {
    const operations = [rawOp('Microsoft.Compute/virtualMachines/read')]
    const source = new MemoryCatalogSource({ operations })

    const listed = await source.listProviderOperations()
    listed[0].operation = 'changed'

    expect(await source.listProviderOperations()).toEqual(operations)
    expect(operations[0].operation).toBe('Microsoft.Compute/virtualMachines/read')
  })

  it('should filter features by provider case-insensitively', async () => {
    const source = new MemoryCatalogSource({
      features: [rawFeature('Microsoft.Compute', 'A'), rawFeature('Microsoft.Quantum', 'B')]
    })

    expect((await source.listProviderFeatures('microsoft.quantum')).map(f => f.featureName)).toEqual(['B'])
    expect(await source.listProviderFeatures()).toHaveLength(2)
  })

  it('should default to empty listings and a memory name', async () => {
    const source = new MemoryCatalogSource()

    expect(source.name).toBe('memory://catalog')
    expect(await source.listProviderOperations()).toEqual([])
    expect(await source.listProviderFeatures()).toEqual([])
  })
})
