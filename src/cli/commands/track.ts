/**
 * azcatalog `track` Command
 *
 * Extracts the catalog, writes the exports, diffs against the stored
 * snapshot, appends the history entry and (with --commit) replaces the
 * snapshot.
 *
 * Usage:
 *   azcatalog track                          Dry run: exports + history only
 *   azcatalog track --commit                 Also replace the snapshot
 *   azcatalog track --source file://dump.json --out-dir out
 *   azcatalog track --json                   Summary as JSON on stdout
 */

import type { CommandContext } from '../context.js'
import type { DeltaEntry } from '../../types.js'
import { resolveSettings } from '../../lib/config-loader.js'
import { runTracking, type TrackingResult } from '../../lib/tracker.js'
import { createCatalogSource } from '../../source/index.js'
import { c, labeled, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export function serializeDeltaEntry(entry: DeltaEntry): Record<string, unknown> {
  return {
    status: entry.status,
    operation: entry.record.operation,
    providerName: entry.record.providerName,
    isDataAction: entry.record.isDataAction,
    description: entry.record.description
  }
}

function toJson(result: TrackingResult): Record<string, unknown> {
  return {
    source: result.source,
    mode: result.mode,
    date: result.date,
    counts: result.counts,
    exports: result.exports,
    diff: result.diff && {
      previousPath: result.diff.previousPath,
      previousFound: result.diff.previousFound,
      summary: result.diff.summary,
      services: result.diff.serviceNameDelta,
      delta: result.diff.delta.map(serializeDeltaEntry)
    },
    history: result.historyLogPath,
    historyCreated: result.historyCreated,
    committed: result.committed,
    warnings: result.warnings,
    notices: result.notices
  }
}

export function reportWarnings(warnings: readonly string[], notices: readonly string[] = []): void {
  for (const notice of notices) {
    ui.warn(notice)
  }
  for (const warning of warnings) {
    ui.warn(warning)
  }
}

function printSummary(result: TrackingResult, verbose: boolean): void {
  const { counts } = result

  ui.header(`Catalog ${result.date}`)
  ui.log(labeled('Source', c.path(result.source)))
  ui.log(labeled('Services', c.count(counts.services)))
  ui.log(labeled('Features', c.count(counts.features)))
  if (result.mode === 'full') {
    ui.log(labeled('Operations', c.count(counts.operations)))
    if (counts.providersWithoutOperations > 0) {
      ui.log(labeled('Providers without operations', c.count(counts.providersWithoutOperations)))
    }
  }

  for (const table of result.exports) {
    ui.verbose(`Wrote ${table.csvPath} and ${table.textPath} (${table.rows} rows)`, verbose)
  }
  ui.success(`Exported ${result.exports.map(t => t.table).join(', ')}`)

  if (result.diff) {
    const { summary, serviceNameDelta, previousFound, previousPath } = result.diff
    if (!previousFound) {
      ui.log(`${symbols.arrow} No snapshot at ${c.path(previousPath)}; every operation is reported as new`)
    }
    ui.log(
      `${symbols.arrow} ${c.count(summary.total)} changes: ` +
        `${c.added(`${summary.added} new`)}; ${c.removed(`${summary.deprecated} deprecated`)}`
    )
    for (const name of serviceNameDelta.added) {
      ui.log(`  ${symbols.plus} ${c.provider(name)}`)
    }
    for (const name of serviceNameDelta.removed) {
      ui.log(`  ${symbols.minus} ${c.provider(name)}`)
    }
  }

  if (result.historyLogPath) {
    ui.success(`${result.historyCreated ? 'Created' : 'Appended to'} ${result.historyLogPath}`)
  }

  if (result.committed.length > 0) {
    ui.success(`Committed ${result.committed.join(', ')}`)
  } else if (result.mode === 'full') {
    ui.log(c.muted('Dry run: snapshot not replaced (use --commit)'))
  }
}

export async function runTrack(context: CommandContext): Promise<void> {
  const settings = resolveSettings(context.args, context.config)
  const source = createCatalogSource(settings.source)

  ui.verbose(`Config: ${context.configPath ?? '(none)'}`, context.verbose)
  ui.verbose(`Source: ${source.name}, mode: ${settings.mode}`, context.verbose)
  ui.verbose(`Snapshot: ${settings.inputSnapshotPath} -> ${settings.outputSnapshotPath}`, context.verbose)

  const result = await ui.withSpinner(
    `Reading catalog from ${source.name}`,
    spinner => runTracking(source, settings, {
      onProgress: (completed, total, label) => spinner.update(`${label} (${completed}/${total})`)
    }),
    { successText: 'Catalog extracted', failText: 'Catalog run failed' }
  )

  reportWarnings(result.warnings, result.notices)

  if (context.jsonOutput) {
    ui.output(JSON.stringify(toJson(result), null, 2))
    return
  }

  printSummary(result, context.verbose)
}
