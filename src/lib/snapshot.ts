/**
 * Snapshot Storage
 *
 * The Operations snapshot is the Operations table written as CSV. It is the
 * baseline the next run compares against, and it is only ever replaced
 * wholesale by commitSnapshot().
 *
 * Loading never fails the run:
 * - missing file        → empty snapshot (first run)
 * - malformed content   → warnings plus whatever rows parsed
 */

import fs from 'node:fs'
import type { FeatureRecord, OperationRecord, ServiceRecord } from '../types.js'
import { parseCsv } from './csv.js'
import { featuresTable, operationsTable, parseBoolean, renderCsv, servicesTable } from './tables.js'
import { StagedWriteFailure, writeFilesAtomic, type FileWrite } from './fs-store.js'
import { CommitWriteError, MalformedOperationError, toError } from './errors.js'
import { parseProviderName } from '../domain/records.js'

// ============================================================================
// Types
// ============================================================================

export interface LoadedSnapshot<T> {
  records: T[]
  warnings: string[]
  /** false when the file does not exist */
  found: boolean
}

export interface CommitTarget {
  operationsPath: string
  servicesPath?: string | null
  featuresPath?: string | null
}

export interface CommitResult {
  written: string[]
}

// ============================================================================
// Loading
// ============================================================================

type RowReader<T> = (get: (column: string) => string) => T

function loadTable<T>(
  filePath: string,
  requiredColumns: readonly string[],
  read: RowReader<T>
): LoadedSnapshot<T> {
  if (!fs.existsSync(filePath)) {
    return { records: [], warnings: [], found: false }
  }

  const warnings: string[] = []
  const content = fs.readFileSync(filePath, 'utf-8')
  const parsed = parseCsv(content)
  if (parsed.error) {
    warnings.push(`${filePath}: ${parsed.error}; using the ${Math.max(0, parsed.rows.length - 1)} rows read before it`)
  }

  const [header, ...rows] = parsed.rows
  if (!header) {
    if (!parsed.error) warnings.push(`${filePath}: file is empty`)
    return { records: [], warnings, found: true }
  }

  const index = new Map(header.map((name, i) => [name.trim(), i]))
  const missing = requiredColumns.filter(column => !index.has(column))
  if (missing.length > 0) {
    warnings.push(`${filePath}: missing column(s) ${missing.join(', ')}; snapshot ignored`)
    return { records: [], warnings, found: true }
  }

  const records: T[] = []
  rows.forEach((row, i) => {
    // header is line 1
    const rowNumber = i + 2
    if (row.length !== header.length) {
      warnings.push(`${filePath}: row ${rowNumber} has ${row.length} fields, expected ${header.length}; skipped`)
      return
    }
    const get = (column: string): string => {
      const position = index.get(column)
      return position === undefined ? '' : row[position]
    }
    try {
      records.push(read(get))
    } catch (error) {
      if (!(error instanceof MalformedOperationError)) throw error
      warnings.push(`${filePath}: row ${rowNumber}: ${error.message}; skipped`)
    }
  })

  return { records, warnings, found: true }
}

/**
 * Load an Operations snapshot.
 *
 * The table has no ProviderName column: it comes from the operation string,
 * or from ResourceName for placeholder rows.
 */
export function loadOperationSnapshot(filePath: string): LoadedSnapshot<OperationRecord> {
  return loadTable(filePath, ['Operation'], (get) => {
    const operation = get('Operation').trim()
    const resourceName = get('ResourceName')
    const namespace = get('ProviderNamespace')
    return {
      namespace,
      providerName: operation ? parseProviderName(operation, namespace) : resourceName,
      operation,
      operationName: get('OperationName'),
      resourceName,
      description: get('Description'),
      isDataAction: parseBoolean(get('IsDataAction'))
    }
  })
}

/**
 * Load a Services snapshot
 */
export function loadServiceSnapshot(filePath: string): LoadedSnapshot<ServiceRecord> {
  return loadTable(filePath, ['ProviderName'], (get) => ({
    namespace: get('ProviderNamespace'),
    providerName: get('ProviderName').trim(),
    description: get('Description')
  }))
}

// ============================================================================
// Commit
// ============================================================================

/**
 * Replace the stored snapshot(s) with the current run's output.
 *
 * All files are staged before any is renamed into place; on failure nothing
 * staged is left behind and the previous snapshot stays as it was.
 */
export function commitSnapshot(
  target: CommitTarget,
  operations: readonly OperationRecord[],
  services?: readonly ServiceRecord[],
  features?: readonly FeatureRecord[]
): CommitResult {
  const writes: FileWrite[] = [
    { path: target.operationsPath, content: renderCsv(operationsTable, operations) }
  ]
  if (target.servicesPath && services) {
    writes.push({ path: target.servicesPath, content: renderCsv(servicesTable, services) })
  }
  if (target.featuresPath && features) {
    writes.push({ path: target.featuresPath, content: renderCsv(featuresTable, features) })
  }

  try {
    writeFilesAtomic(writes)
  } catch (error) {
    if (error instanceof StagedWriteFailure) {
      throw new CommitWriteError(error.target, toError(error.cause))
    }
    throw new CommitWriteError(target.operationsPath, toError(error))
  }

  return { written: writes.map(w => w.path) }
}
