/**
 * Catalog Error Hierarchy
 *
 * Typed errors for the CLI and programmatic usage.
 *
 * Hierarchy:
 *   CatalogError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── InvalidConfigError
 *   │   ├── ConflictingOptionsError
 *   │   └── MissingSnapshotError
 *   ├── SourceError (catalog source)
 *   │   ├── SourceUnavailableError
 *   │   └── UnsupportedSourceError
 *   ├── RecordError (a single bad record)
 *   │   └── MalformedOperationError
 *   └── StorageError (writing artifacts)
 *       ├── HistoryWriteError
 *       ├── CommitWriteError
 *       └── ExportWriteError
 */

interface CatalogErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all catalog errors
 */
export class CatalogError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: CatalogErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'CatalogError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends CatalogError {
  constructor(message: string, code: string, options?: CatalogErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when azcatalog.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your azcatalog.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when mutually exclusive options are combined
 */
export class ConflictingOptionsError extends ConfigError {
  constructor(options: string[]) {
    super(
      `Options cannot be combined: ${options.join(', ')}`,
      'CONFLICTING_OPTIONS',
      {
        suggestion: 'Pick one extraction mode per run',
        context: { options }
      }
    )
    this.name = 'ConflictingOptionsError'
  }
}

/**
 * Thrown when a snapshot named explicitly on the command line does not exist
 */
export class MissingSnapshotError extends ConfigError {
  constructor(filePath: string) {
    super(
      `Snapshot not found: ${filePath}`,
      'SNAPSHOT_NOT_FOUND',
      {
        suggestion: 'Run "azcatalog track --commit" to create one, or check the path',
        context: { filePath }
      }
    )
    this.name = 'MissingSnapshotError'
  }
}

// =============================================================================
// Source Errors
// =============================================================================

export class SourceError extends CatalogError {
  constructor(message: string, code: string, options?: CatalogErrorOptions) {
    super(message, code, options)
    this.name = 'SourceError'
  }
}

/**
 * Thrown when the catalog cannot be reached or returns nothing.
 * Always raised before any file is written.
 */
export class SourceUnavailableError extends SourceError {
  constructor(source: string, reason: string, cause?: Error) {
    super(
      `Catalog source ${source} is unavailable: ${reason}`,
      'SOURCE_UNAVAILABLE',
      {
        suggestion: 'Check the source URL and your Azure credentials (az login or AZURE_* variables)',
        context: { source },
        cause
      }
    )
    this.name = 'SourceUnavailableError'
  }
}

/**
 * Thrown when a source URL has no matching driver
 */
export class UnsupportedSourceError extends SourceError {
  constructor(url: string) {
    super(
      `Unsupported catalog source: ${url}`,
      'UNSUPPORTED_SOURCE',
      {
        suggestion: 'Use azure://<subscription-id>, file://<path> or a path to a .json dump',
        context: { url }
      }
    )
    this.name = 'UnsupportedSourceError'
  }
}

// =============================================================================
// Record Errors
// =============================================================================

export class RecordError extends CatalogError {
  constructor(message: string, code: string, options?: CatalogErrorOptions) {
    super(message, code, options)
    this.name = 'RecordError'
  }
}

/**
 * Thrown when an operation string has no '/' separator.
 * The extractor turns it into a warning and skips the record.
 */
export class MalformedOperationError extends RecordError {
  readonly operation: string

  constructor(operation: string, namespace?: string) {
    const where = namespace ? ` (${namespace})` : ''
    super(
      `Malformed operation "${operation}"${where}: missing '/' separator`,
      'MALFORMED_OPERATION',
      {
        context: { operation, namespace }
      }
    )
    this.name = 'MalformedOperationError'
    this.operation = operation
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

export class StorageError extends CatalogError {
  constructor(message: string, code: string, options?: CatalogErrorOptions) {
    super(message, code, options)
    this.name = 'StorageError'
  }
}

export class HistoryWriteError extends StorageError {
  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to write history log ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'HISTORY_WRITE_FAILED',
      {
        suggestion: 'Check that the log directory exists and is writable; prior entries are untouched',
        context: { filePath },
        cause
      }
    )
    this.name = 'HistoryWriteError'
  }
}

export class CommitWriteError extends StorageError {
  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to commit snapshot ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'COMMIT_WRITE_FAILED',
      {
        suggestion: 'The previous snapshot was left in place; fix the path and re-run with --commit',
        context: { filePath },
        cause
      }
    )
    this.name = 'CommitWriteError'
  }
}

export class ExportWriteError extends StorageError {
  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to write export ${filePath}${cause ? `: ${cause.message}` : ''}`,
      'EXPORT_WRITE_FAILED',
      {
        suggestion: 'Check the --out-dir path',
        context: { filePath },
        cause
      }
    )
    this.name = 'ExportWriteError'
  }
}

// =============================================================================
// Type Guards & Helpers
// =============================================================================

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError
}

export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isCatalogError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a CatalogError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): CatalogError {
  if (isCatalogError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new CatalogError(error.message, defaultCode, { cause: error })
  }
  return new CatalogError(String(error), defaultCode)
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
