/**
 * Azure Provider Catalog - Type Definitions
 */

// ============================================================================
// Raw Source Records
// ============================================================================

/**
 * One operation entry as returned by the provider-operations listing.
 *
 * `operation` is the slash-delimited permission string, e.g.
 * `Microsoft.Compute/virtualMachines/read`. Nothing is trimmed or validated yet.
 */
export interface RawOperation {
  /** Display name of the provider (e.g. "Microsoft Compute") */
  providerNamespace: string
  operation: string
  operationName: string
  resourceName: string
  isDataAction: boolean
  description: string
}

/**
 * One feature-registration entry as returned by the provider-features listing.
 */
export interface RawFeature {
  /** Display name of the provider, when the source knows it */
  providerNamespace?: string
  providerName: string
  featureName: string
  registrationState: string
  description: string
}

// ============================================================================
// Normalized Records
// ============================================================================

export interface ServiceRecord {
  readonly namespace: string
  readonly providerName: string
  readonly description: string
}

export interface FeatureRecord {
  readonly namespace: string
  readonly providerName: string
  readonly featureName: string
  readonly registrationState: string
  readonly description: string
}

export interface OperationRecord {
  readonly namespace: string
  readonly providerName: string
  /** Permission string, empty for a no-operations placeholder */
  readonly operation: string
  readonly operationName: string
  readonly resourceName: string
  readonly description: string
  readonly isDataAction: boolean
}

/** Namespace used for providers known only from the feature listing */
export const UNKNOWN_NAMESPACE = '-'

/** operationName of the placeholder emitted for providers without operations */
export const NO_OPERATIONS_SENTINEL = '** No operations discovered **'

// ============================================================================
// Delta Types
// ============================================================================

export type DeltaStatus = 'New' | 'Deprecated'

/**
 * A change between two snapshots. Wraps the record from whichever side
 * carries the key; the record itself is never modified.
 */
export interface DeltaEntry {
  readonly record: OperationRecord
  readonly status: DeltaStatus
}

export interface ServiceNameDelta {
  /** Provider names present now but not in the previous snapshot */
  readonly added: readonly string[]
  /** Provider names present previously but gone now */
  readonly removed: readonly string[]
}

// ============================================================================
// Extraction Types
// ============================================================================

export interface Extraction<T> {
  records: T[]
  warnings: string[]
}

/**
 * What a run pulls and produces.
 * - full: services, features and operations
 * - services: services only (still needs both listings to derive them)
 * - features: features only, without listing operations
 */
export type ExtractionMode = 'full' | 'services' | 'features'

export interface CatalogExtraction {
  mode: ExtractionMode
  services: ServiceRecord[]
  features: FeatureRecord[]
  operations: OperationRecord[]
  /** Non-fatal, per-record issues found while extracting */
  warnings: string[]
}

/**
 * Optional progress observer. Purely presentational.
 */
export type ProgressCallback = (completed: number, total: number, label: string) => void

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Shape of azcatalog.yaml
 */
export interface CatalogConfig {
  /** Source URL: azure://<subscription-id>, file://<path> or a .json path */
  source?: string
  snapshot?: {
    input?: string
    output?: string
    services?: string
    features?: string
  }
  history?: string
  exports?: {
    dir?: string
    prefix?: string
    note?: boolean
  }
  mode?: ExtractionMode
  commit?: boolean
  scan_documentation?: boolean
}

/**
 * Fully resolved settings for one run
 */
export interface TrackerSettings {
  source: string | null
  inputSnapshotPath: string
  outputSnapshotPath: string
  servicesSnapshotPath: string | null
  featuresSnapshotPath: string | null
  historyLogPath: string
  exportDir: string
  exportPrefix: string
  mode: ExtractionMode
  addNote: boolean
  commit: boolean
  scanDocumentation: boolean
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  // Global flags
  config?: string
  source?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  // Snapshot / history flags
  input?: string
  output?: string
  servicesSnapshot?: string
  featuresSnapshot?: string
  history?: string
  commit?: boolean
  // Export flags
  outDir?: string
  prefix?: string
  servicesOnly?: boolean
  featuresOnly?: boolean
  note?: boolean
  scanDocs?: boolean
}
