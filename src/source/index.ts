/**
 * Catalog sources
 *
 * Source URLs:
 *   azure://<subscription-id>   live Azure Resource Manager listings
 *   file://<path>               JSON dump (see file.ts)
 *   <path>.json                 same as file://
 */

import { InvalidConfigError, UnsupportedSourceError } from '../lib/errors.js'
import { AzureCatalogSource } from './azure.js'
import { FileCatalogSource } from './file.js'
import type { CatalogSource } from './types.js'

export type { CatalogSource } from './types.js'
export { AzureCatalogSource } from './azure.js'
export { FileCatalogSource, parseCatalogDump } from './file.js'
export { MemoryCatalogSource, type MemoryCatalogData } from './memory.js'

const AZURE_SCHEME = 'azure://'
const FILE_SCHEME = 'file://'

export function createCatalogSource(url: string | null): CatalogSource {
  if (!url) {
    throw new InvalidConfigError(
      'no catalog source configured (use --source, "source" in azcatalog.yaml, AZCATALOG_SOURCE or AZURE_SUBSCRIPTION_ID)'
    )
  }

  if (url.startsWith(AZURE_SCHEME)) {
    const subscriptionId = url.slice(AZURE_SCHEME.length).replace(/\/+$/, '')
    if (!subscriptionId) {
      throw new UnsupportedSourceError(url)
    }
    return AzureCatalogSource.connect(subscriptionId)
  }

  if (url.startsWith(FILE_SCHEME)) {
    const filePath = url.slice(FILE_SCHEME.length)
    if (!filePath) {
      throw new UnsupportedSourceError(url)
    }
    return new FileCatalogSource(filePath)
  }

  if (!url.includes('://') && url.toLowerCase().endsWith('.json')) {
    return new FileCatalogSource(url)
  }

  throw new UnsupportedSourceError(url)
}
