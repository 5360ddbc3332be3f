/**
 * Launcher Error Hierarchy
 *
 * Typed error classes shared by the registry, the store and the CLI.
 *
 * Hierarchy:
 *   LauncherError (base)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── ValidationError (bad input to add/edit)
 *   │   ├── EmptyNameError
 *   │   ├── MissingPathError
 *   │   ├── DuplicateEntryIdError
 *   │   ├── InvalidEntryIdError
 *   │   ├── CategoryPathError
 *   │   ├── InvalidKindError
 *   │   └── AmbiguousEntryIdError
 *   ├── OperationError
 *   │   ├── EntryNotFoundError
 *   │   ├── ReorderRejectedError
 *   │   ├── MissingTargetError
 *   │   ├── NotLaunchableError
 *   │   ├── LaunchFailedError
 *   │   └── BackupNotFoundError
 *   └── PersistenceError (filesystem failures)
 */

import type { ReorderResult } from '../types.js'

export interface LauncherErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all launcher errors
 */
export class LauncherError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: LauncherErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'LauncherError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
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

export class ConfigError extends LauncherError {
  constructor(message: string, code: string, options?: LauncherErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml cannot be parsed or holds invalid values
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the syntax and values in your launcher config.yaml',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Base class for rejected add/edit input
 */
export class ValidationError extends LauncherError {
  constructor(message: string, code: string, options?: LauncherErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

export class EmptyNameError extends ValidationError {
  constructor() {
    super('Entry name must not be empty', 'EMPTY_NAME', {
      suggestion: 'Provide a name with --name'
    })
    this.name = 'EmptyNameError'
  }
}

/**
 * Thrown when an application entry has no path
 */
export class MissingPathError extends ValidationError {
  constructor(name: string) {
    super(`Application "${name}" requires a path`, 'MISSING_PATH', {
      suggestion: 'Provide a path with --path, or add it as a category instead',
      context: { name }
    })
    this.name = 'MissingPathError'
  }
}

export class DuplicateEntryIdError extends ValidationError {
  constructor(id: string) {
    super(`An entry with id "${id}" already exists`, 'DUPLICATE_ENTRY_ID', {
      suggestion: 'Omit the id to let the registry assign a fresh one',
      context: { id }
    })
    this.name = 'DuplicateEntryIdError'
  }
}

/**
 * Thrown when a caller-supplied id is empty or blank (such records do not load back)
 */
export class InvalidEntryIdError extends ValidationError {
  constructor(id: string) {
    super(`Entry id must not be empty or blank: "${id}"`, 'INVALID_ENTRY_ID', {
      suggestion: 'Omit the id to let the registry assign one',
      context: { id }
    })
    this.name = 'InvalidEntryIdError'
  }
}

/**
 * Thrown when an edit gives a path to an entry that ends up a category
 */
export class CategoryPathError extends ValidationError {
  constructor(name: string) {
    super(`Category "${name}" has no path`, 'CATEGORY_HAS_NO_PATH', {
      suggestion: 'Pass --kind application to turn it into an application',
      context: { name }
    })
    this.name = 'CategoryPathError'
  }
}

export class InvalidKindError extends ValidationError {
  constructor(kind: string, validKinds: readonly string[]) {
    super(`Invalid entry kind: "${kind}"`, 'INVALID_KIND', {
      suggestion: `Valid kinds: ${validKinds.join(', ')}`,
      context: { kind, validKinds }
    })
    this.name = 'InvalidKindError'
  }
}

/**
 * Thrown when an id prefix matches more than one entry
 */
export class AmbiguousEntryIdError extends ValidationError {
  constructor(prefix: string, matches: string[]) {
    super(`Id prefix "${prefix}" matches ${matches.length} entries`, 'AMBIGUOUS_ENTRY_ID', {
      suggestion: 'Use a longer prefix or the full id from "launcher list"',
      context: { prefix, matches }
    })
    this.name = 'AmbiguousEntryIdError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends LauncherError {
  constructor(message: string, code: string, options?: LauncherErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

export class EntryNotFoundError extends OperationError {
  constructor(id: string) {
    super(`Entry "${id}" not found`, 'ENTRY_NOT_FOUND', {
      suggestion: 'Use "launcher list" to see registered entries',
      context: { id }
    })
    this.name = 'EntryNotFoundError'
  }
}

/**
 * Thrown by callers that turn a rejected reorder into a failure
 */
export class ReorderRejectedError extends OperationError {
  readonly reason: 'incomplete' | 'duplicate'

  constructor(result: Extract<ReorderResult, { status: 'rejected' }>) {
    const message = result.reason === 'incomplete'
      ? `Reported order does not match the registry (missing: ${result.missing.length}, unknown: ${result.unknown.length})`
      : `Reported order repeats ids: ${result.duplicates.join(', ')}`
    const context: Record<string, unknown> = result.reason === 'incomplete'
      ? { reason: result.reason, missing: result.missing, unknown: result.unknown }
      : { reason: result.reason, duplicates: result.duplicates }
    super(message, result.reason === 'incomplete' ? 'REORDER_INCOMPLETE' : 'REORDER_DUPLICATE', {
      suggestion: 'Resynchronize with "launcher list" and retry with the current ids',
      context
    })
    this.name = 'ReorderRejectedError'
    this.reason = result.reason
  }
}

/**
 * Thrown when an entry's path no longer exists at launch time
 */
export class MissingTargetError extends OperationError {
  constructor(name: string, targetPath: string) {
    super(`Target of "${name}" not found: ${targetPath}`, 'MISSING_TARGET', {
      suggestion: 'Fix the path with "launcher edit <id> --path <path>"',
      context: { name, path: targetPath }
    })
    this.name = 'MissingTargetError'
  }
}

export class NotLaunchableError extends OperationError {
  constructor(name: string) {
    super(`"${name}" is a category and cannot be launched`, 'NOT_LAUNCHABLE', {
      context: { name }
    })
    this.name = 'NotLaunchableError'
  }
}

export class LaunchFailedError extends OperationError {
  constructor(name: string, cause: Error) {
    super(`Failed to launch "${name}": ${cause.message}`, 'LAUNCH_FAILED', {
      suggestion: 'Check that the program exists and is executable',
      context: { name },
      cause
    })
    this.name = 'LaunchFailedError'
  }
}

export class BackupNotFoundError extends OperationError {
  constructor(generation: number, available: number[]) {
    super(`Backup generation ${generation} not found`, 'BACKUP_NOT_FOUND', {
      suggestion: available.length > 0
        ? `Pick another backup: ${available.join(', ')}`
        : 'No backups exist yet; they are created on every save',
      context: { generation, available }
    })
    this.name = 'BackupNotFoundError'
  }
}

// =============================================================================
// Persistence Errors
// =============================================================================

export type PersistenceOperation = 'load' | 'save' | 'rotate' | 'restore' | 'list'

/**
 * Filesystem failure while reading or writing the document or its backups
 */
export class PersistenceError extends LauncherError {
  readonly operation: PersistenceOperation

  constructor(operation: PersistenceOperation, filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Failed to ${operation} ${filePath}: ${reason}`, 'PERSISTENCE_FAILURE', {
      suggestion: operation === 'restore'
        ? 'Pick another backup or check file permissions'
        : 'Check that the launcher home directory is writable',
      context: { operation, path: filePath },
      cause
    })
    this.name = 'PersistenceError'
    this.operation = operation
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

export function isPersistenceError(error: unknown): error is PersistenceError {
  return error instanceof PersistenceError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isLauncherError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a LauncherError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): LauncherError {
  if (isLauncherError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new LauncherError(error.message, defaultCode, { cause: error })
  }
  return new LauncherError(String(error), defaultCode)
}
