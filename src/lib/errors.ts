/**
 * keyring2kdbx Error Hierarchy
 *
 * Typed error classes shared by the engine, the adapters and the CLI.
 *
 * Hierarchy:
 *   ExportError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   ├── InvalidConfigError
 *   │   └── MissingPasswordError
 *   ├── SourceError (credential store)
 *   │   └── SourceUnavailableError
 *   ├── ContainerError (KDBX container)
 *   │   ├── ContainerAuthError
 *   │   ├── ContainerCorruptError
 *   │   ├── TargetExistsError
 *   │   └── SaveFailedError
 *   ├── BackupFailedError
 *   └── RecordError (single record, recoverable)
 *
 * Everything except RecordError aborts a run.
 */

import type { RecordErrorKind } from '../types.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all keyring2kdbx errors
 */
export class ExportError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'ExportError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Whether this error aborts the whole run
   */
  get fatal(): boolean {
    return true
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

  /**
   * Convert to JSON for logging/debugging
   */
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

export class ConfigError extends ExportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when an explicitly requested config file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(`Config file not found: ${searchedPath}`, 'CONFIG_NOT_FOUND', {
      suggestion: 'Check the --config path or remove the flag to use defaults',
      context: { searchedPath }
    })
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when a config value is invalid
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check keyring2kdbx.yaml and the command-line flags',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

/**
 * Thrown when no master password is available and no prompt is possible
 */
export class MissingPasswordError extends ConfigError {
  constructor() {
    super('No master password available', 'MISSING_PASSWORD', {
      suggestion: 'Set KEYRING2KDBX_PASSWORD or run the command in an interactive terminal'
    })
    this.name = 'MissingPasswordError'
  }
}

// =============================================================================
// Source Errors
// =============================================================================

export class SourceError extends ExportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'SourceError'
  }
}

/**
 * Thrown when the credential store cannot be enumerated
 */
export class SourceUnavailableError extends SourceError {
  constructor(reason: string, options?: { suggestion?: string; cause?: unknown }) {
    super(`Credential source unavailable: ${reason}`, 'SOURCE_UNAVAILABLE', {
      suggestion: options?.suggestion ?? 'Make sure the keyring is running and unlocked',
      cause: options?.cause
    })
    this.name = 'SourceUnavailableError'
  }
}

// =============================================================================
// Container Errors
// =============================================================================

export class ContainerError extends ExportError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ContainerError'
  }
}

/**
 * Thrown when the master password does not open an existing container
 */
export class ContainerAuthError extends ContainerError {
  constructor(containerPath: string, cause?: unknown) {
    super(`Incorrect password for database: ${containerPath}`, 'CONTAINER_AUTH_FAILED', {
      suggestion: 'Re-enter the master password of the existing database',
      context: { containerPath },
      cause
    })
    this.name = 'ContainerAuthError'
  }
}

/**
 * Thrown when the container bytes cannot be parsed
 */
export class ContainerCorruptError extends ContainerError {
  constructor(containerPath: string, reason: string, cause?: unknown) {
    super(`Unreadable database ${containerPath}: ${reason}`, 'CONTAINER_CORRUPT', {
      suggestion: 'Restore the database from a backup or choose another output path',
      context: { containerPath },
      cause
    })
    this.name = 'ContainerCorruptError'
  }
}

/**
 * Thrown by create-new mode when the target already exists
 */
export class TargetExistsError extends ContainerError {
  constructor(containerPath: string) {
    super(`File ${containerPath} already exists`, 'TARGET_EXISTS', {
      suggestion: 'Use --update to modify it or --backup to create a backup first',
      context: { containerPath }
    })
    this.name = 'TargetExistsError'
  }
}

/**
 * Thrown when the final save fails. The file on disk may be in any state.
 */
export class SaveFailedError extends ContainerError {
  constructor(containerPath: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super(`Failed to save database ${containerPath}${reason}`, 'SAVE_FAILED', {
      suggestion: 'Treat the run as failed; restore from the .backup file if one was made',
      context: { containerPath },
      cause
    })
    this.name = 'SaveFailedError'
  }
}

// =============================================================================
// Backup Errors
// =============================================================================

/**
 * Thrown when the pre-mutation backup could not be written or verified
 */
export class BackupFailedError extends ExportError {
  constructor(sourcePath: string, backupPath: string, reason: string, cause?: unknown) {
    super(`Backup of ${sourcePath} failed: ${reason}`, 'BACKUP_FAILED', {
      suggestion: `Check that ${backupPath} is writable`,
      context: { sourcePath, backupPath },
      cause
    })
    this.name = 'BackupFailedError'
  }
}

// =============================================================================
// Record Errors
// =============================================================================

/**
 * A single record could not be merged. Collected into ExportResult.errors.
 */
export class RecordError extends ExportError {
  readonly kind: RecordErrorKind

  constructor(kind: RecordErrorKind, message: string, cause?: unknown) {
    super(message, `RECORD_${kind.toUpperCase().replace(/-/g, '_')}`, { cause })
    this.name = 'RecordError'
    this.kind = kind
  }

  override get fatal(): boolean {
    return false
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isExportError(error: unknown): error is ExportError {
  return error instanceof ExportError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isContainerError(error: unknown): error is ContainerError {
  return error instanceof ContainerError
}

export function isRecordError(error: unknown): error is RecordError {
  return error instanceof RecordError
}

/**
 * True for every error that must abort a run
 */
export function isFatalError(error: unknown): boolean {
  return isExportError(error) ? error.fatal : true
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isExportError(error)) {
    return error.toCliOutput()
  }
  return `Error: ${errorMessage(error)}`
}

/**
 * Wrap a generic error into an ExportError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): ExportError {
  if (isExportError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new ExportError(error.message, defaultCode, { cause: error })
  }
  return new ExportError(String(error), defaultCode)
}
