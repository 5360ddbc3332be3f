/**
 * Launcher - ordered application list with category headings
 *
 * Main library exports for programmatic usage
 */

// Wiring
export { openLauncher } from './launcher.js'
export type { Launcher, OpenLauncherOptions } from './launcher.js'

// Types
export type {
  EntryKind,
  ApplicationEntry,
  CategoryEntry,
  Entry,
  EntryInput,
  EntryPatch,
  EntryWarning,
  EntryMutationResult,
  PersistedEntry,
  PersistedDocument,
  LoadStatus,
  LoadResult,
  BackupInfo,
  ReorderResult,
  ReorderRejectReason,
  LaunchStrategy,
  DisplayMode,
  ExecutionPlan,
  ResolveResult,
  LauncherConfig
} from './types.js'

export { ENTRY_KINDS } from './types.js'

// Entries
export {
  entryFromFile,
  createCategory,
  isLaunchable,
  parseEntryKind,
  toPersisted,
  fromPersisted
} from './lib/entry.js'

// Registry
export { EntryRegistry } from './lib/registry.js'
export type { EntryRegistryOptions, AddFromPathOverrides } from './lib/registry.js'

// Persistence
export {
  JsonFileStore,
  serializeDocument,
  parseDocument,
  DATA_FILE_NAME,
  DEFAULT_BACKUP_GENERATIONS
} from './lib/data-store.js'
export type { EntryStore, JsonFileStoreOptions } from './lib/data-store.js'

// Launching
export { resolveLaunchPlan, resolveOptionsFromConfig } from './lib/launch-plan.js'
export type { ResolveOptions } from './lib/launch-plan.js'
export { buildSpawnCommand, launchPlan, launchEntry } from './lib/process-launcher.js'
export type {
  SpawnCommand,
  SpawnFunction,
  LaunchOptions,
  LaunchOutcome,
  LaunchEntryResult
} from './lib/process-launcher.js'

// Config
export {
  loadConfig,
  normalizeConfig,
  createDefaultConfig,
  getLauncherHome,
  getDataFilePath,
  DEFAULT_CONFIG
} from './lib/config-loader.js'

// Errors
export {
  LauncherError,
  ConfigError,
  InvalidConfigError,
  ValidationError,
  EmptyNameError,
  MissingPathError,
  DuplicateEntryIdError,
  InvalidEntryIdError,
  CategoryPathError,
  InvalidKindError,
  AmbiguousEntryIdError,
  OperationError,
  EntryNotFoundError,
  ReorderRejectedError,
  MissingTargetError,
  NotLaunchableError,
  LaunchFailedError,
  BackupNotFoundError,
  PersistenceError,
  isLauncherError,
  isValidationError,
  isOperationError,
  isPersistenceError,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'
