/**
 * Table Exports
 *
 * Writes the record sets a run produced as CSV and fixed-width text:
 *
 *   <dir>/<prefix>Services.csv    <dir>/<prefix>Services.txt
 *   <dir>/<prefix>Features.csv    <dir>/<prefix>Features.txt
 *   <dir>/<prefix>Operations.csv  <dir>/<prefix>Operations.txt
 *
 * Only the tables the extraction mode produced are written.
 */

import path from 'node:path'
import type { CatalogExtraction, OperationRecord } from '../types.js'
import {
  createNoteRow,
  featuresTable,
  operationsTable,
  renderCsv,
  renderText,
  servicesTable,
  type TableDefinition,
  type TableName
} from './tables.js'
import { StagedWriteFailure, writeFilesAtomic, type FileWrite } from './fs-store.js'
import { ExportWriteError, toError } from './errors.js'
import { countOperations } from '../domain/extract.js'
import { distinctProviderNames } from '../domain/records.js'
import { formatHistoryDate } from '../domain/history.js'

// =============================================================================
// Types
// =============================================================================

export interface ExportOptions {
  dir: string
  prefix: string
  /** Prepend the reserved note row to the Operations table */
  addNote?: boolean
  /** Date shown in the note row (YYYY-MM-DD) */
  date?: string
}

export interface ExportedTable {
  table: TableName
  rows: number
  csvPath: string
  textPath: string
}

export interface ExportResult {
  tables: ExportedTable[]
}

// =============================================================================
// Export
// =============================================================================

export function getExportPaths(dir: string, prefix: string, table: string): { csvPath: string; textPath: string } {
  const base = path.join(dir, `${prefix}${table}`)
  return { csvPath: `${base}.csv`, textPath: `${base}.txt` }
}

function withNote(operations: readonly OperationRecord[], date: string): OperationRecord[] {
  const counts = countOperations(operations)
  return [createNoteRow(date, counts.operations, distinctProviderNames(operations).length), ...operations]
}

/**
 * Write every table the extraction holds. All files are staged first, so a
 * failure leaves earlier exports untouched.
 */
export function writeExports(extraction: CatalogExtraction, options: ExportOptions): ExportResult {
  const { dir, prefix, addNote = false } = options
  const date = options.date ?? formatHistoryDate(new Date())

  const writes: FileWrite[] = []
  const tables: ExportedTable[] = []

  const add = <T>(table: TableDefinition<T>, records: readonly T[]) => {
    const paths = getExportPaths(dir, prefix, table.name)
    writes.push({ path: paths.csvPath, content: renderCsv(table, records) })
    writes.push({ path: paths.textPath, content: renderText(table, records) })
    tables.push({ table: table.name, rows: records.length, ...paths })
  }

  if (extraction.mode !== 'features') {
    add(servicesTable, extraction.services)
  }
  if (extraction.mode !== 'services') {
    add(featuresTable, extraction.features)
  }
  if (extraction.mode === 'full') {
    add(operationsTable, addNote ? withNote(extraction.operations, date) : extraction.operations)
  }

  try {
    writeFilesAtomic(writes)
  } catch (error) {
    if (error instanceof StagedWriteFailure) {
      throw new ExportWriteError(error.target, toError(error.cause))
    }
    throw new ExportWriteError(dir, toError(error))
  }

  return { tables }
}
