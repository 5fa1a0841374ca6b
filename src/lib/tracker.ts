/**
 * Catalog Tracker
 *
 * Orchestrates one run:
 *   1. extract the catalog from the source (nothing is written if this fails)
 *   2. write the table exports
 *   3. load the previous snapshot
 *   4. compute the service-name and operation deltas
 *   5. append the history entry
 *   6. commit the current snapshot (only when enabled)
 *
 * Steps 3-6 need the Operations table, so they only run in full mode.
 */

import type {
  CatalogExtraction,
  DeltaEntry,
  ExtractionMode,
  OperationRecord,
  ProgressCallback,
  RawFeature,
  RawOperation,
  ServiceNameDelta,
  TrackerSettings
} from '../types.js'
import type { CatalogSource } from '../source/types.js'
import { extractFeatures, extractOperations, extractServices, countOperations } from '../domain/extract.js'
import { computeOperationDelta, computeServiceNameDelta, summarizeDelta, type DeltaSummary } from '../domain/delta.js'
import { appendHistoryEntry, formatHistoryDate, renderHistoryEntry } from '../domain/history.js'
import { commitSnapshot, loadOperationSnapshot, loadServiceSnapshot } from './snapshot.js'
import { writeExports, type ExportedTable } from './exports.js'
import { SourceUnavailableError, toError } from './errors.js'

// ============================================================================
// Types
// ============================================================================

export interface ExtractOptions {
  mode?: ExtractionMode
  onProgress?: ProgressCallback
}

export interface TrackOptions {
  /** Date stamped on the history entry and the note row (default: today) */
  date?: Date | string
  onProgress?: ProgressCallback
}

export interface TrackingCounts {
  services: number
  features: number
  operations: number
  providersWithoutOperations: number
}

export interface DiffReport {
  previousPath: string
  /** false on a first run: every current operation is New */
  previousFound: boolean
  serviceNameDelta: ServiceNameDelta
  delta: DeltaEntry[]
  summary: DeltaSummary
}

export interface TrackingResult {
  source: string
  mode: ExtractionMode
  date: string
  counts: TrackingCounts
  exports: ExportedTable[]
  /** null outside full mode */
  diff: DiffReport | null
  historyLogPath: string | null
  historyCreated: boolean
  /** Files replaced by the commit; empty on a dry run */
  committed: string[]
  /** Extraction and snapshot warnings, deduplicated, in the order found */
  warnings: string[]
  /** Informational messages about requested but inactive options */
  notices: string[]
}

export const SCAN_DOCUMENTATION_NOTICE =
  'Documentation scanning is not implemented; --scan-docs has no effect'

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)]
}

// ============================================================================
// Extraction
// ============================================================================

async function pull<T>(source: CatalogSource, what: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call()
  } catch (error) {
    if (error instanceof SourceUnavailableError) throw error
    const cause = toError(error)
    throw new SourceUnavailableError(source.name, `listing ${what} failed: ${cause.message}`, cause)
  }
}

/**
 * Pull the listings the mode needs and normalize them.
 *
 * @throws SourceUnavailableError when the source fails or returns nothing usable
 */
export async function extractCatalog(source: CatalogSource, options: ExtractOptions = {}): Promise<CatalogExtraction> {
  const mode = options.mode ?? 'full'
  const report = options.onProgress ?? (() => {})
  const total = mode === 'features' ? 2 : 3
  let completed = 0

  let rawOperations: RawOperation[] = []
  if (mode !== 'features') {
    report(completed, total, 'Listing provider operations')
    rawOperations = await pull(source, 'provider operations', () => source.listProviderOperations())
    if (rawOperations.length === 0) {
      throw new SourceUnavailableError(source.name, 'no provider operations returned')
    }
    completed++
  }

  report(completed, total, 'Listing provider features')
  const rawFeatures: RawFeature[] = await pull(source, 'provider features', () => source.listProviderFeatures())
  if (mode === 'features' && rawFeatures.length === 0) {
    throw new SourceUnavailableError(source.name, 'no provider features returned')
  }
  completed++

  report(completed, total, 'Normalizing records')
  let extraction: CatalogExtraction
  if (mode === 'features') {
    extraction = { mode, services: [], features: extractFeatures(rawFeatures), operations: [], warnings: [] }
  } else {
    const services = extractServices(rawOperations, rawFeatures)
    const operations = mode === 'full'
      ? extractOperations(rawOperations, services.records)
      : { records: [], warnings: [] }

    extraction = {
      mode,
      services: services.records,
      features: mode === 'full' ? extractFeatures(rawFeatures, services.records) : [],
      operations: operations.records,
      warnings: unique([...services.warnings, ...operations.warnings])
    }
  }
  completed++
  report(completed, total, 'Done')

  return extraction
}

// ============================================================================
// Diff
// ============================================================================

/**
 * Compare the stored snapshot(s) with the current operations.
 *
 * The previous provider set comes from the Services snapshot when one is
 * configured and present, otherwise from the previous Operations snapshot.
 */
export function diffAgainstSnapshot(
  current: readonly OperationRecord[],
  currentProviders: readonly { providerName: string }[],
  previousPath: string,
  servicesSnapshotPath: string | null = null
): { report: DiffReport; warnings: string[] } {
  const previous = loadOperationSnapshot(previousPath)
  const warnings = [...previous.warnings]

  let previousProviders: readonly { providerName: string }[] = previous.records
  if (servicesSnapshotPath) {
    const services = loadServiceSnapshot(servicesSnapshotPath)
    warnings.push(...services.warnings)
    if (services.found) previousProviders = services.records
  }

  const delta = computeOperationDelta(previous.records, current)
  return {
    report: {
      previousPath,
      previousFound: previous.found,
      serviceNameDelta: computeServiceNameDelta(previousProviders, currentProviders),
      delta,
      summary: summarizeDelta(delta)
    },
    warnings
  }
}

// ============================================================================
// Run
// ============================================================================

export async function runTracking(
  source: CatalogSource,
  settings: TrackerSettings,
  options: TrackOptions = {}
): Promise<TrackingResult> {
  const date = formatHistoryDate(options.date ?? new Date())
  const notices = settings.scanDocumentation ? [SCAN_DOCUMENTATION_NOTICE] : []

  const extraction = await extractCatalog(source, { mode: settings.mode, onProgress: options.onProgress })
  const warnings = [...extraction.warnings]
  const counts = countOperations(extraction.operations)

  const exported = writeExports(extraction, {
    dir: settings.exportDir,
    prefix: settings.exportPrefix,
    addNote: settings.addNote,
    date
  })

  const result: TrackingResult = {
    source: source.name,
    mode: extraction.mode,
    date,
    counts: {
      services: extraction.services.length,
      features: extraction.features.length,
      operations: counts.operations,
      providersWithoutOperations: counts.providersWithoutOperations
    },
    exports: exported.tables,
    diff: null,
    historyLogPath: null,
    historyCreated: false,
    committed: [],
    warnings,
    notices
  }

  if (extraction.mode !== 'full') {
    return result
  }

  const diff = diffAgainstSnapshot(
    extraction.operations,
    extraction.services,
    settings.inputSnapshotPath,
    settings.servicesSnapshotPath
  )
  result.warnings = unique([...warnings, ...diff.warnings])
  result.diff = diff.report

  const entry = renderHistoryEntry(
    date,
    extraction.operations,
    diff.report.serviceNameDelta,
    diff.report.delta,
    result.warnings
  )
  result.historyCreated = appendHistoryEntry(settings.historyLogPath, entry)
  result.historyLogPath = settings.historyLogPath

  if (settings.commit) {
    const committed = commitSnapshot(
      {
        operationsPath: settings.outputSnapshotPath,
        servicesPath: settings.servicesSnapshotPath,
        featuresPath: settings.featuresSnapshotPath
      },
      extraction.operations,
      extraction.services,
      extraction.features
    )
    result.committed = committed.written
  }

  return result
}
