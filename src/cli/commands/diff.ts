/**
 * azcatalog `diff` Command
 *
 * Compares two Operations snapshots without contacting the source.
 * The delta goes to stdout; --history also appends an entry to a log.
 *
 * Usage:
 *   azcatalog diff old.csv new.csv
 *   azcatalog diff old.csv new.csv --json
 *   azcatalog diff old.csv new.csv --history AzureHistory.txt
 */

import fs from 'node:fs'
import type { CommandContext } from '../context.js'
import { MissingSnapshotError } from '../../lib/errors.js'
import { loadOperationSnapshot } from '../../lib/snapshot.js'
import { diffAgainstSnapshot } from '../../lib/tracker.js'
import { appendHistoryEntry, formatHistoryDate, renderHistoryEntry } from '../../domain/history.js'
import { c } from '../lib/colors.js'
import { reportWarnings, serializeDeltaEntry } from './track.js'
import * as ui from '../ui.js'

export interface DiffCommandOptions {
  previous: string
  current: string
  history?: string
}

export async function runDiff(context: CommandContext, options: DiffCommandOptions): Promise<void> {
  for (const filePath of [options.previous, options.current]) {
    if (!fs.existsSync(filePath)) {
      throw new MissingSnapshotError(filePath)
    }
  }

  const current = loadOperationSnapshot(options.current)
  const { report, warnings } = diffAgainstSnapshot(current.records, current.records, options.previous)
  const allWarnings = [...new Set([...warnings, ...current.warnings])]

  reportWarnings(allWarnings)

  if (options.history) {
    const entry = renderHistoryEntry(
      formatHistoryDate(new Date()),
      current.records,
      report.serviceNameDelta,
      report.delta,
      allWarnings
    )
    const created = appendHistoryEntry(options.history, entry)
    ui.success(`${created ? 'Created' : 'Appended to'} ${options.history}`)
  }

  if (context.jsonOutput) {
    ui.output(JSON.stringify({
      previous: options.previous,
      current: options.current,
      summary: report.summary,
      services: report.serviceNameDelta,
      delta: report.delta.map(serializeDeltaEntry),
      warnings: allWarnings
    }, null, 2))
    return
  }

  for (const entry of report.delta) {
    // plain markers: stdout is data
    ui.output(`${entry.status === 'New' ? '+' : '-'} ${entry.record.operation}`)
  }

  const { summary } = report
  ui.log(
    `${c.count(summary.total)} changes: ` +
      `${c.added(`${summary.added} new`)}; ${c.removed(`${summary.deprecated} deprecated`)}`
  )
}
