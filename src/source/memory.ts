/**
 * In-memory catalog source
 *
 * Serves fixed listings; used for embedding and tests.
 */

import type { RawFeature, RawOperation } from '../types.js'
import type { CatalogSource } from './types.js'

export interface MemoryCatalogData {
  operations?: RawOperation[]
  features?: RawFeature[]
}

export class MemoryCatalogSource implements CatalogSource {
  readonly name: string
  private readonly operations: RawOperation[]
  private readonly features: RawFeature[]

  constructor(data: MemoryCatalogData = {}, name: string = 'memory://catalog') {
    this.name = name
    this.operations = data.operations ?? []
    this.features = data.features ?? []
  }

  async listProviderOperations(): Promise<RawOperation[]> {
    return this.operations.map(op => ({ ...op }))
  }

  async listProviderFeatures(providerNamespace?: string): Promise<RawFeature[]> {
    const wanted = providerNamespace?.toLowerCase()
    return this.features
      .filter(feature => !wanted || feature.providerName.toLowerCase() === wanted)
      .map(feature => ({ ...feature }))
  }
}
