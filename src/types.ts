/**
 * Launcher - Type Definitions
 */

// ============================================================================
// Entry Types
// ============================================================================

export type EntryKind = 'application' | 'category'

/** Kinds accepted on input, in display order */
export const ENTRY_KINDS: readonly EntryKind[] = ['application', 'category']

/**
 * A launchable program, script or document.
 */
export interface ApplicationEntry {
  kind: 'application'
  id: string
  name: string
  /** Absolute filesystem path */
  path: string
  description: string
}

/**
 * Visual/organizational marker. Never launchable, carries no path.
 */
export interface CategoryEntry {
  kind: 'category'
  id: string
  name: string
  description: string
}

export type Entry = ApplicationEntry | CategoryEntry

/**
 * Input accepted by EntryRegistry.add
 *
 * `id` is normally omitted and assigned by the registry.
 */
export type EntryInput =
  | { kind: 'application'; id?: string; name: string; path: string; description?: string }
  | { kind: 'category'; id?: string; name: string; description?: string }

/**
 * Replaceable fields for EntryRegistry.edit (everything except id)
 */
export interface EntryPatch {
  kind?: EntryKind
  name?: string
  path?: string
  description?: string
}

/** Non-fatal conditions reported alongside a successful add/edit */
export type EntryWarning = 'path-not-found'

export interface EntryMutationResult {
  entry: Entry
  warnings: EntryWarning[]
}

// ============================================================================
// Persisted Document
// ============================================================================

/** On-disk tag values */
export type PersistedEntryType = 'app' | 'separator'

export interface PersistedEntry {
  id: string
  name: string
  path: string
  description: string
  entry_type: PersistedEntryType
}

export interface PersistedDocument {
  entries: PersistedEntry[]
}

// ============================================================================
// Store Results
// ============================================================================

/**
 * How the last load went.
 *
 * - missing:   no document on disk (fresh install)
 * - loaded:    every record parsed
 * - recovered: document readable, some records dropped
 * - corrupt:   document unreadable, started empty
 */
export type LoadStatus = 'missing' | 'loaded' | 'recovered' | 'corrupt'

export interface LoadResult {
  entries: Entry[]
  status: LoadStatus
  /** Records dropped while parsing */
  skipped: number
  /** Parse error message when status is 'corrupt' */
  error?: string
}

export interface BackupInfo {
  /** 1 = newest */
  generation: number
  path: string
  modifiedAt: Date
  size: number
}

// ============================================================================
// Reorder Reconciliation
// ============================================================================

export type ReorderRejectReason = 'incomplete' | 'duplicate'

export type ReorderResult =
  | { status: 'applied'; changed: boolean }
  | { status: 'rejected'; reason: 'incomplete'; missing: string[]; unknown: string[] }
  | { status: 'rejected'; reason: 'duplicate'; duplicates: string[] }

// ============================================================================
// Launch Plans
// ============================================================================

export type LaunchStrategy = 'script' | 'executable' | 'default-handler'

/**
 * console:         spawn inside a fresh terminal window that stays open
 * default-handler: let the OS open the file with its associated program
 */
export type DisplayMode = 'console' | 'default-handler'

export interface ExecutionPlan {
  strategy: LaunchStrategy
  program: string
  args: string[]
  cwd: string
  display: DisplayMode
  /** Window title (entry name) */
  title: string
}

export type ResolveResult =
  | { status: 'ready'; plan: ExecutionPlan }
  | { status: 'inapplicable'; reason: 'category' }
  | { status: 'missing-target'; path: string }

// ============================================================================
// Configuration Types
// ============================================================================

export interface BackupsConfig {
  /** Number of backup generations to keep (default: 10) */
  generations: number
}

export interface LaunchConfig {
  /** Extension (lower-case, with dot) → interpreter program */
  interpreters: Record<string, string>
  /** Extensions run directly inside a console */
  executable_extensions: string[]
  /** Terminal emulator used for console plans on Linux/BSD */
  terminal: string
}

export interface LauncherConfig {
  /** Document file, relative to the launcher home or absolute */
  data_file: string
  backups: BackupsConfig
  launch: LaunchConfig
}

// ============================================================================
// CLI Types
// ============================================================================

export interface CLIArgs {
  _: string[]
  // Global flags
  home?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
  help?: boolean
  version?: boolean
  // Entry fields
  name?: string
  path?: string
  description?: string
  kind?: string
}
