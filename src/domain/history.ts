/**
 * History Log
 *
 * Renders one change report per run and appends it to a cumulative log.
 *
 * Entry layout:
 *   ================================================================
 *   2026-01-31: 1200 actions across 210 services. 3 changes: 2 new; 1 deprecated.
 *   WARNING: <source warning>
 *
 *   New services: Microsoft.Foo
 *   Deprecated services: (none)
 *
 *   Deprecated actions:
 *   <table>
 *
 *   New actions:
 *   <table>
 */

import { existsSync } from 'node:fs'
import type { DeltaEntry, OperationRecord, ServiceNameDelta } from '../types.js'
import { formatFixedWidth, type FixedWidthColumn } from '../lib/fixed-width.js'
import { formatBoolean } from '../lib/tables.js'
import { appendFileAtomic, StagedWriteFailure } from '../lib/fs-store.js'
import { HistoryWriteError, toError } from '../lib/errors.js'
import { summarizeDelta } from './delta.js'
import { distinctProviderNames, isPlaceholder } from './records.js'

export const HISTORY_DIVIDER = '='.repeat(80)

export const HISTORY_BANNER = [
  'Azure provider operations history',
  'Each entry records the operations added and deprecated since the previous committed snapshot.',
  ''
].join('\n')

const DELTA_COLUMNS: readonly FixedWidthColumn[] = [
  { header: 'Operation', width: 100 },
  { header: 'IsDataAction', width: 14 },
  { header: 'Description' }
]

/**
 * Local calendar date as YYYY-MM-DD; strings pass through unchanged
 */
export function formatHistoryDate(date: Date | string): string {
  if (typeof date === 'string') return date
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}-${month}-${day}`
}

function formatNames(names: readonly string[]): string {
  return names.length > 0 ? names.join(', ') : '(none)'
}

function deltaTable(entries: readonly DeltaEntry[]): string[] {
  return formatFixedWidth(
    DELTA_COLUMNS,
    entries.map(({ record }) => [record.operation, formatBoolean(record.isDataAction), record.description])
  )
}

/**
 * Render the text block for one run. Always ends with a newline.
 */
export function renderHistoryEntry(
  date: Date | string,
  currentOperations: readonly OperationRecord[],
  serviceNameDelta: ServiceNameDelta,
  operationDelta: readonly DeltaEntry[],
  sourceWarnings: readonly string[] = []
): string {
  const total = currentOperations.filter(record => !isPlaceholder(record)).length
  const providers = distinctProviderNames(currentOperations).length
  const summary = summarizeDelta(operationDelta)

  const lines = [
    HISTORY_DIVIDER,
    `${formatHistoryDate(date)}: ${total} actions across ${providers} services. ` +
      `${summary.total} changes: ${summary.added} new; ${summary.deprecated} deprecated.`,
    ...sourceWarnings.map(warning => `WARNING: ${warning}`),
    '',
    `New services: ${formatNames(serviceNameDelta.added)}`,
    `Deprecated services: ${formatNames(serviceNameDelta.removed)}`,
    '',
    'Deprecated actions:',
    ...deltaTable(operationDelta.filter(entry => entry.status === 'Deprecated')),
    '',
    'New actions:',
    ...deltaTable(operationDelta.filter(entry => entry.status === 'New')),
    ''
  ]

  return lines.join('\n') + '\n'
}

/**
 * Append an entry to the log, writing the banner first when the log is new.
 * The log is replaced atomically, so a failure leaves prior entries intact.
 *
 * @returns true when the log was created by this call
 */
export function appendHistoryEntry(logPath: string, entry: string): boolean {
  try {
    const created = !existsSync(logPath)
    appendFileAtomic(logPath, entry, HISTORY_BANNER)
    return created
  } catch (error) {
    const cause = error instanceof StagedWriteFailure ? error.cause : error
    throw new HistoryWriteError(logPath, toError(cause))
  }
}
