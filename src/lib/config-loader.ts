/**
 * Catalog Config Loader
 *
 * Finds and parses azcatalog.yaml and resolves the settings of one run.
 *
 * Precedence: CLI flag > azcatalog.yaml > environment default > built-in default
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { CatalogConfig, CLIArgs, ExtractionMode, TrackerSettings } from '../types.js'
import { ConflictingOptionsError, InvalidConfigError, toError } from './errors.js'

export const CONFIG_FILE = 'azcatalog.yaml'
const MAX_SEARCH_DEPTH = 5

export const DEFAULT_INPUT_SNAPSHOT = 'AzureServiceActions.csv'
export const DEFAULT_HISTORY_LOG = 'AzureHistory.txt'
export const DEFAULT_EXPORT_DIR = '.'
export const DEFAULT_EXPORT_PREFIX = 'Azure'

const EXTRACTION_MODES: readonly ExtractionMode[] = ['full', 'services', 'features']

type Env = Record<string, string | undefined>
type Json = Record<string, unknown>

// ============================================================================
// Environment expansion
// ============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: Env = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, name: string, fallback: string) => env[name] || fallback)
    .replace(/\$\{([^}]+)\}/g, (_, name: string) => env[name] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, name: string) => env[name] || '')
}

function expandEnvVarsInValue(value: unknown, env: Env): unknown {
  if (typeof value === 'string') return expandEnvVars(value, env)
  if (Array.isArray(value)) return value.map(item => expandEnvVarsInValue(item, env))
  if (isObject(value)) {
    const result: Json = {}
    for (const [key, entry] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(entry, env)
    }
    return result
  }
  return value
}

// ============================================================================
// Validation
// ============================================================================

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

class ConfigReader {
  constructor(private readonly configPath?: string) {}

  fail(message: string): never {
    throw new InvalidConfigError(message, this.configPath)
  }

  section(obj: Json, key: string): Json | undefined {
    const value = obj[key]
    if (value === undefined || value === null) return undefined
    if (!isObject(value)) this.fail(`"${key}" must be a mapping`)
    return value
  }

  string(obj: Json, key: string, label: string = key): string | undefined {
    const value = obj[key]
    if (value === undefined || value === null) return undefined
    if (typeof value === 'number') return String(value)
    if (typeof value !== 'string') this.fail(`"${label}" must be a string`)
    return value
  }

  boolean(obj: Json, key: string, label: string = key): boolean | undefined {
    const value = obj[key]
    if (value === undefined || value === null) return undefined
    if (typeof value === 'boolean') return value
    // env-expanded values arrive as strings
    if (value === 'true') return true
    if (value === 'false') return false
    this.fail(`"${label}" must be true or false`)
  }

  mode(obj: Json, key: string): ExtractionMode | undefined {
    const value = this.string(obj, key)
    if (value === undefined) return undefined
    const mode = EXTRACTION_MODES.find(candidate => candidate === value)
    if (!mode) this.fail(`"${key}" must be one of ${EXTRACTION_MODES.join(', ')}`)
    return mode
  }
}

/**
 * Parse and validate azcatalog.yaml content
 *
 * @throws InvalidConfigError on YAML syntax errors or wrongly typed keys
 */
export function parseConfig(content: string, configPath?: string, env: Env = process.env): CatalogConfig {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new InvalidConfigError(toError(error).message, configPath, toError(error))
  }

  if (parsed === null || parsed === undefined) return {}

  const reader: ConfigReader = new ConfigReader(configPath)
  const raw = expandEnvVarsInValue(parsed, env)
  if (!isObject(raw)) reader.fail('top level must be a mapping')

  const config: CatalogConfig = {}

  const source = reader.string(raw, 'source')
  if (source !== undefined) config.source = source

  const snapshot = reader.section(raw, 'snapshot')
  if (snapshot) {
    config.snapshot = {
      input: reader.string(snapshot, 'input', 'snapshot.input'),
      output: reader.string(snapshot, 'output', 'snapshot.output'),
      services: reader.string(snapshot, 'services', 'snapshot.services'),
      features: reader.string(snapshot, 'features', 'snapshot.features')
    }
  }

  const history = reader.string(raw, 'history')
  if (history !== undefined) config.history = history

  const exportsSection = reader.section(raw, 'exports')
  if (exportsSection) {
    config.exports = {
      dir: reader.string(exportsSection, 'dir', 'exports.dir'),
      prefix: reader.string(exportsSection, 'prefix', 'exports.prefix'),
      note: reader.boolean(exportsSection, 'note', 'exports.note')
    }
  }

  const mode = reader.mode(raw, 'mode')
  if (mode !== undefined) config.mode = mode

  const commit = reader.boolean(raw, 'commit')
  if (commit !== undefined) config.commit = commit

  const scanDocumentation = reader.boolean(raw, 'scan_documentation')
  if (scanDocumentation !== undefined) config.scan_documentation = scanDocumentation

  return config
}

// ============================================================================
// Discovery & loading
// ============================================================================

/**
 * Find azcatalog.yaml by searching up from the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
    const candidate = path.join(currentDir, CONFIG_FILE)
    if (fs.existsSync(candidate)) {
      return candidate
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }
    currentDir = parentDir
  }

  return null
}

export interface LoadedConfig {
  config: CatalogConfig
  /** null when no file was found and none was requested */
  configPath: string | null
}

/**
 * Load the config file. An explicit path must exist; a discovered one is optional.
 */
export function loadConfig(options: { configPath?: string; cwd?: string; env?: Env } = {}): LoadedConfig {
  const env = options.env ?? process.env

  if (options.configPath) {
    const configPath = path.resolve(options.cwd ?? process.cwd(), options.configPath)
    if (!fs.existsSync(configPath)) {
      throw new InvalidConfigError('file not found', configPath)
    }
    return { config: parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath, env), configPath }
  }

  const configPath = findConfigFile(options.cwd)
  if (!configPath) {
    return { config: {}, configPath: null }
  }
  return { config: parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath, env), configPath }
}

// ============================================================================
// Settings resolution
// ============================================================================

/**
 * Source URL from the environment: AZCATALOG_SOURCE, else the subscription in AZURE_SUBSCRIPTION_ID
 */
export function getDefaultSource(env: Env = process.env): string | null {
  if (env.AZCATALOG_SOURCE) return env.AZCATALOG_SOURCE
  if (env.AZURE_SUBSCRIPTION_ID) return `azure://${env.AZURE_SUBSCRIPTION_ID}`
  return null
}

function resolveMode(args: CLIArgs, config: CatalogConfig): ExtractionMode {
  if (args.servicesOnly && args.featuresOnly) {
    throw new ConflictingOptionsError(['--services-only', '--features-only'])
  }
  if (args.servicesOnly) return 'services'
  if (args.featuresOnly) return 'features'
  return config.mode ?? 'full'
}

export function resolveSettings(args: CLIArgs, config: CatalogConfig = {}, env: Env = process.env): TrackerSettings {
  const inputSnapshotPath = args.input ?? config.snapshot?.input ?? DEFAULT_INPUT_SNAPSHOT

  return {
    source: args.source ?? config.source ?? getDefaultSource(env),
    inputSnapshotPath,
    outputSnapshotPath: args.output ?? config.snapshot?.output ?? inputSnapshotPath,
    servicesSnapshotPath: args.servicesSnapshot ?? config.snapshot?.services ?? null,
    featuresSnapshotPath: args.featuresSnapshot ?? config.snapshot?.features ?? null,
    historyLogPath: args.history ?? config.history ?? DEFAULT_HISTORY_LOG,
    exportDir: args.outDir ?? config.exports?.dir ?? DEFAULT_EXPORT_DIR,
    exportPrefix: args.prefix ?? config.exports?.prefix ?? DEFAULT_EXPORT_PREFIX,
    mode: resolveMode(args, config),
    addNote: args.note ?? config.exports?.note ?? false,
    commit: args.commit ?? config.commit ?? false,
    scanDocumentation: args.scanDocs ?? config.scan_documentation ?? false
  }
}
