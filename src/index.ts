/**
 * azure-provider-catalog
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  RawOperation,
  RawFeature,
  ServiceRecord,
  FeatureRecord,
  OperationRecord,
  DeltaStatus,
  DeltaEntry,
  ServiceNameDelta,
  Extraction,
  ExtractionMode,
  CatalogExtraction,
  ProgressCallback,
  CatalogConfig,
  TrackerSettings
} from './types.js'

export { UNKNOWN_NAMESPACE, NO_OPERATIONS_SENTINEL } from './types.js'

// Domain
export * from './domain/index.js'

// Sources
export {
  createCatalogSource,
  AzureCatalogSource,
  FileCatalogSource,
  MemoryCatalogSource,
  parseCatalogDump,
  type CatalogSource,
  type MemoryCatalogData
} from './source/index.js'

// Run orchestration
export {
  extractCatalog,
  runTracking,
  diffAgainstSnapshot,
  type ExtractOptions,
  type TrackOptions,
  type TrackingResult,
  type DiffReport
} from './lib/tracker.js'

// Storage
export {
  loadOperationSnapshot,
  loadServiceSnapshot,
  commitSnapshot,
  type LoadedSnapshot,
  type CommitTarget
} from './lib/snapshot.js'
export { writeExports, getExportPaths, type ExportOptions, type ExportResult } from './lib/exports.js'
export { formatCsv, parseCsv } from './lib/csv.js'

// Config utilities
export { loadConfig, findConfigFile, parseConfig, resolveSettings } from './lib/config-loader.js'

// Errors
export * from './lib/errors.js'
