/**
 * Launcher wiring
 *
 * Builds the one Launcher instance a process works with: config, store and
 * registry, loaded once. Presentation layers receive this object instead of
 * reaching for shared state.
 */

import type { Entry, LauncherConfig, ResolveResult } from './types.js'
import { getDataFilePath, getLauncherHome, loadConfig } from './lib/config-loader.js'
import { JsonFileStore } from './lib/data-store.js'
import { EntryRegistry } from './lib/registry.js'
import { resolveLaunchPlan, resolveOptionsFromConfig, type ResolveOptions } from './lib/launch-plan.js'
import { launchEntry, type LaunchEntryResult, type LaunchOptions } from './lib/process-launcher.js'

export interface OpenLauncherOptions {
  /** Launcher home (default: $LAUNCHER_HOME or ~/.launcher) */
  home?: string
  /** Use this config instead of reading config.yaml */
  config?: LauncherConfig
  pathExists?: (filePath: string) => boolean
  /** Spawner/platform for launches; tests inject these */
  launch?: LaunchOptions
}

export interface Launcher {
  home: string
  config: LauncherConfig
  store: JsonFileStore
  registry: EntryRegistry
  /** Resolve an entry to an execution plan without launching */
  plan(entry: Entry): ResolveResult
  /** Resolve and start an entry (fire-and-forget) */
  run(entry: Entry): Promise<LaunchEntryResult>
}

export function openLauncher(options: OpenLauncherOptions = {}): Launcher {
  const home = getLauncherHome(options.home)
  const config = options.config ?? loadConfig(home)
  const store = new JsonFileStore(getDataFilePath(config, home), {
    generations: config.backups.generations
  })
  const registry = EntryRegistry.open(store, { pathExists: options.pathExists })

  const resolveOptions: ResolveOptions = {
    ...resolveOptionsFromConfig(config.launch),
    pathExists: options.pathExists
  }

  return {
    home,
    config,
    store,
    registry,
    plan: (entry) => resolveLaunchPlan(entry, resolveOptions),
    run: (entry) => launchEntry(entry, {
      terminal: config.launch.terminal,
      ...options.launch,
      ...resolveOptions
    })
  }
}
