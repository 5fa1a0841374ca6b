#!/usr/bin/env node
/**
 * azcatalog CLI
 *
 * Tracks the Azure resource provider catalog: exports, snapshot diffs and
 * a cumulative history log.
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import type { CLIArgs } from '../types.js'
import type { CommandContext } from './context.js'
import { loadConfig } from '../lib/config-loader.js'
import { isCatalogError, formatErrorForCli, toError } from '../lib/errors.js'
import { c, print } from './lib/colors.js'
import * as ui from './ui.js'
import { runTrack } from './commands/track.js'
import { runExport } from './commands/export.js'
import { runDiff } from './commands/diff.js'

// Version is injected at build time or read from package.json
const VERSION = process.env.AZCATALOG_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from dist/cli or src/cli to the package root
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

type CommandFlags = Pick<CLIArgs, keyof CLIArgs>

/**
 * Parsed flags (command + global) plus the loaded azcatalog.yaml
 */
function buildContext(command: Command): CommandContext {
  const args = command.optsWithGlobals<CommandFlags>()
  ui.setQuiet(Boolean(args.quiet))

  const { config, configPath } = loadConfig({ configPath: args.config })
  return {
    args,
    config,
    configPath,
    verbose: Boolean(args.verbose),
    jsonOutput: Boolean(args.json)
  }
}

function reportError(err: unknown, verbose: boolean): void {
  // Use structured error formatting for CatalogErrors
  if (isCatalogError(err)) {
    print.error(err.message)
    if (err.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (verbose && err.context) {
      ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
    if (verbose && err.cause) {
      ui.log(`  ${c.muted('Cause:')} ${toError(err.cause).message}`)
    }
  } else if (verbose) {
    ui.log(toError(err).stack ?? String(err))
  } else {
    print.error(toError(err).message)
  }
}

function action(handler: (context: CommandContext) => Promise<void>) {
  return async (command: Command): Promise<void> => {
    let verbose = false
    try {
      const context = buildContext(command)
      verbose = context.verbose
      await handler(context)
    } catch (err) {
      reportError(err, verbose)
      process.exit(1)
    }
  }
}

// ============================================================================
// Program
// ============================================================================

const program = new Command()

program
  .name('azcatalog')
  .description('Track Azure resource provider operations and features over time')
  .version(VERSION)
  .option('-c, --config <path>', 'path to azcatalog.yaml (default: searched upward from the cwd)')
  .option('-s, --source <url>', 'catalog source: azure://<subscription-id>, file://<path> or <dump>.json')
  .option('-v, --verbose', 'print diagnostics')
  .option('-q, --quiet', 'suppress progress and informational messages')
  .option('--json', 'print the result as JSON on stdout')

function addExportOptions(command: Command): Command {
  return command
    .option('--out-dir <dir>', 'directory for the exported tables (default: .)')
    .option('--prefix <prefix>', 'file name prefix of the exported tables (default: Azure)')
    .option('--services-only', 'extract and export the Services table only')
    .option('--features-only', 'extract and export the Features table only')
    .option('--note', 'prepend a summary row to the Operations export')
    .option('--scan-docs', 'reserved: documentation scanning is not implemented')
}

const track = program
  .command('track', { isDefault: true })
  .description('extract the catalog, diff it against the snapshot and append to the history log')
  .option('--input <path>', 'previous Operations snapshot (default: AzureServiceActions.csv)')
  .option('--output <path>', 'where --commit writes the snapshot (default: --input)')
  .option('--services-snapshot <path>', 'Services snapshot, compared for provider changes and replaced on commit')
  .option('--features-snapshot <path>', 'Features snapshot, replaced on commit')
  .option('--history <path>', 'history log (default: AzureHistory.txt)')
  .option('--commit', 'replace the stored snapshot with this run\'s output')

addExportOptions(track).action((_options: CommandFlags, command: Command) => action(runTrack)(command))

const exportCommand = program
  .command('export')
  .description('write the Services, Features and Operations tables only')

addExportOptions(exportCommand).action((_options: CommandFlags, command: Command) => action(runExport)(command))

program
  .command('diff <previous> <current>')
  .description('compare two Operations snapshots')
  .option('--history <path>', 'also append a history entry to this log')
  .action((previous: string, current: string, _options: CommandFlags, command: Command) =>
    action(context => runDiff(context, { previous, current, history: context.args.history }))(command)
  )

async function main(): Promise<void> {
  await program.parseAsync(process.argv)
}

// Run
main().catch(err => {
  // Handle uncaught errors at the top level
  const errorMessage = isCatalogError(err)
    ? formatErrorForCli(err)
    : `Fatal error: ${toError(err).message}`
  print.error(errorMessage)
  process.exit(1)
})
