/**
 * Process Launcher
 *
 * Executes execution plans. `buildSpawnCommand` is the pure translation of a
 * plan into an OS-specific command line; `launchPlan` spawns it detached and
 * returns as soon as the process has started (or failed to). Launched
 * programs are never awaited.
 */

import { spawn, type SpawnOptions } from 'node:child_process'
import type { Entry, ExecutionPlan } from '../types.js'
import { resolveLaunchPlan, type ResolveOptions } from './launch-plan.js'
import { LaunchFailedError, MissingTargetError, NotLaunchableError } from './errors.js'

export const DEFAULT_TERMINAL = 'x-terminal-emulator'

// ============================================================================
// Types
// ============================================================================

export interface SpawnCommand {
  command: string
  args: string[]
  cwd: string
  /** Pass args to cmd.exe untouched (quoting is done here) */
  windowsVerbatimArguments: boolean
}

export interface PlatformOptions {
  platform?: NodeJS.Platform
  /** Terminal emulator for console plans outside Windows/macOS */
  terminal?: string
}

/** The subset of ChildProcess the launcher touches */
export interface LaunchedProcess {
  pid?: number
  once(event: 'spawn', listener: () => void): unknown
  once(event: 'error', listener: (err: Error) => void): unknown
  unref(): void
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => LaunchedProcess

export interface LaunchOptions extends PlatformOptions {
  spawn?: SpawnFunction
}

export type LaunchOutcome =
  | { ok: true; pid?: number }
  | { ok: false; error: Error }

// ============================================================================
// Quoting
// ============================================================================

/**
 * Quote for a POSIX shell (single quotes, embedded quotes escaped)
 */
export function shQuote(value: string): string {
  if (/^[A-Za-z0-9_\-./:=@%+,]+$/.test(value)) return value
  return `'${value.replace(/'/g, `'\\''`)}'`
}

/**
 * Quote for cmd.exe. Double quotes cannot be escaped there, so they are dropped.
 */
export function winQuote(value: string): string {
  return `"${value.replace(/"/g, '')}"`
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
}

// ============================================================================
// Command Building
// ============================================================================

export function buildSpawnCommand(plan: ExecutionPlan, options: PlatformOptions = {}): SpawnCommand {
  const platform = options.platform ?? process.platform
  const { cwd } = plan

  if (plan.display === 'default-handler') {
    if (platform === 'win32') {
      return {
        command: 'cmd.exe',
        args: ['/d', '/s', '/c', `"start "" ${winQuote(plan.program)}"`],
        cwd,
        windowsVerbatimArguments: true
      }
    }
    return {
      command: platform === 'darwin' ? 'open' : 'xdg-open',
      args: [plan.program],
      cwd,
      windowsVerbatimArguments: false
    }
  }

  if (platform === 'win32') {
    const inner = [plan.program, ...plan.args].map(winQuote).join(' ')
    return {
      command: 'cmd.exe',
      args: ['/d', '/s', '/c', `"start ${winQuote(plan.title)} /D ${winQuote(cwd)} cmd /k "${inner} & pause""`],
      cwd,
      windowsVerbatimArguments: true
    }
  }

  const commandLine = [plan.program, ...plan.args].map(shQuote).join(' ')
  const script = `cd ${shQuote(cwd)} && ${commandLine}`

  if (platform === 'darwin') {
    return {
      command: 'osascript',
      args: [
        '-e', `tell application "Terminal" to do script ${appleScriptString(script)}`,
        '-e', 'tell application "Terminal" to activate'
      ],
      cwd,
      windowsVerbatimArguments: false
    }
  }

  return {
    command: options.terminal || DEFAULT_TERMINAL,
    args: ['-e', 'sh', '-c', `${script}; printf '\\n[%s exited, press Enter to close] ' ${shQuote(plan.title)}; read _`],
    cwd,
    windowsVerbatimArguments: false
  }
}

// ============================================================================
// Launching
// ============================================================================

const defaultSpawn: SpawnFunction = (command, args, options) => spawn(command, args, options)

/**
 * Start a plan detached. Resolves once the OS reports spawn or error.
 */
export function launchPlan(plan: ExecutionPlan, options: LaunchOptions = {}): Promise<LaunchOutcome> {
  const cmd = buildSpawnCommand(plan, options)
  const spawnFn = options.spawn ?? defaultSpawn

  return new Promise<LaunchOutcome>((resolve) => {
    let child: LaunchedProcess
    try {
      child = spawnFn(cmd.command, cmd.args, {
        cwd: cmd.cwd,
        detached: true,
        stdio: 'ignore',
        windowsVerbatimArguments: cmd.windowsVerbatimArguments
      })
    } catch (err) {
      resolve({ ok: false, error: err instanceof Error ? err : new Error(String(err)) })
      return
    }

    child.once('spawn', () => {
      child.unref()
      resolve({ ok: true, pid: child.pid })
    })
    child.once('error', (err) => {
      resolve({ ok: false, error: err })
    })
  })
}

export interface LaunchEntryResult {
  plan: ExecutionPlan
  pid?: number
}

/**
 * Resolve and launch an entry, turning every non-ready outcome into a typed error
 */
export async function launchEntry(
  entry: Entry,
  options: LaunchOptions & ResolveOptions = {}
): Promise<LaunchEntryResult> {
  const resolved = resolveLaunchPlan(entry, options)

  switch (resolved.status) {
    case 'inapplicable':
      throw new NotLaunchableError(entry.name)
    case 'missing-target':
      throw new MissingTargetError(entry.name, resolved.path)
    case 'ready': {
      const outcome = await launchPlan(resolved.plan, options)
      if (!outcome.ok) {
        throw new LaunchFailedError(entry.name, outcome.error)
      }
      return { plan: resolved.plan, pid: outcome.pid }
    }
  }
}
