/**
 * Context shared by every command handler
 */

import type { CatalogConfig, CLIArgs } from '../types.js'

export interface CommandContext {
  args: CLIArgs
  config: CatalogConfig
  /** Path of the loaded azcatalog.yaml, null when none was found */
  configPath: string | null
  verbose: boolean
  jsonOutput: boolean
}
