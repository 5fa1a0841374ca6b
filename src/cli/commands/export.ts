/**
 * azcatalog `export` Command
 *
 * Writes the Services, Features and Operations tables without touching the
 * snapshot or the history log.
 *
 * Usage:
 *   azcatalog export --out-dir out --prefix Azure
 *   azcatalog export --services-only
 *   azcatalog export --features-only
 *   azcatalog export --note                  Prepend the summary row to Operations
 */

import type { CommandContext } from '../context.js'
import { resolveSettings } from '../../lib/config-loader.js'
import { extractCatalog, SCAN_DOCUMENTATION_NOTICE } from '../../lib/tracker.js'
import { writeExports } from '../../lib/exports.js'
import { createCatalogSource } from '../../source/index.js'
import { c, symbols } from '../lib/colors.js'
import { reportWarnings } from './track.js'
import * as ui from '../ui.js'

export async function runExport(context: CommandContext): Promise<void> {
  const settings = resolveSettings(context.args, context.config)
  const source = createCatalogSource(settings.source)

  ui.verbose(`Source: ${source.name}, mode: ${settings.mode}`, context.verbose)

  const extraction = await ui.withSpinner(
    `Reading catalog from ${source.name}`,
    spinner => extractCatalog(source, {
      mode: settings.mode,
      onProgress: (completed, total, label) => spinner.update(`${label} (${completed}/${total})`)
    }),
    { successText: 'Catalog extracted', failText: 'Catalog extraction failed' }
  )

  const result = writeExports(extraction, {
    dir: settings.exportDir,
    prefix: settings.exportPrefix,
    addNote: settings.addNote
  })

  reportWarnings(extraction.warnings, settings.scanDocumentation ? [SCAN_DOCUMENTATION_NOTICE] : [])

  if (context.jsonOutput) {
    ui.output(JSON.stringify({ source: source.name, mode: extraction.mode, tables: result.tables }, null, 2))
    return
  }

  for (const table of result.tables) {
    ui.log(`${symbols.success} ${table.table}: ${c.count(table.rows)} rows ${symbols.arrow} ${c.path(table.csvPath)}, ${c.path(table.textPath)}`)
  }
}
