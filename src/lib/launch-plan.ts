/**
 * Launch Strategy Resolver
 *
 * Maps an entry to a declarative execution plan. Nothing here spawns a
 * process; the only side effect is the injected `pathExists` check.
 *
 * Dispatch on the lower-cased extension:
 *   interpreter map (.py, .pyw → python)  → script in a held-open console
 *   executable list (.exe, .bat, .cmd)    → run directly in a held-open console
 *   anything else                         → OS default handler
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Entry, LaunchConfig, ResolveResult } from '../types.js'

export const DEFAULT_INTERPRETERS: Readonly<Record<string, string>> = {
  '.py': 'python',
  '.pyw': 'python'
}

export const DEFAULT_EXECUTABLE_EXTENSIONS: readonly string[] = ['.exe', '.bat', '.cmd']

export interface ResolveOptions {
  /** Extension → interpreter (keys lower-case, with leading dot) */
  interpreters?: Readonly<Record<string, string>>
  executableExtensions?: readonly string[]
  pathExists?: (filePath: string) => boolean
}

/**
 * Build resolver options from the `launch` config section
 */
export function resolveOptionsFromConfig(launch: LaunchConfig): ResolveOptions {
  return {
    interpreters: launch.interpreters,
    executableExtensions: launch.executable_extensions
  }
}

/**
 * Normalize an extension key: lower-case with a single leading dot
 */
export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase()
  return lower.startsWith('.') ? lower : `.${lower}`
}

export function resolveLaunchPlan(entry: Entry, options: ResolveOptions = {}): ResolveResult {
  if (entry.kind === 'category') {
    return { status: 'inapplicable', reason: 'category' }
  }

  const pathExists = options.pathExists ?? fs.existsSync
  if (!pathExists(entry.path)) {
    return { status: 'missing-target', path: entry.path }
  }

  const ext = path.extname(entry.path).toLowerCase()
  const cwd = path.dirname(entry.path)
  const interpreters = options.interpreters ?? DEFAULT_INTERPRETERS
  const executables = (options.executableExtensions ?? DEFAULT_EXECUTABLE_EXTENSIONS).map(normalizeExtension)

  const interpreter = ext ? findInterpreter(interpreters, ext) : undefined
  if (interpreter) {
    return {
      status: 'ready',
      plan: {
        strategy: 'script',
        program: interpreter,
        args: [entry.path],
        cwd,
        display: 'console',
        title: entry.name
      }
    }
  }

  if (ext && executables.includes(ext)) {
    return {
      status: 'ready',
      plan: {
        strategy: 'executable',
        program: entry.path,
        args: [],
        cwd,
        display: 'console',
        title: entry.name
      }
    }
  }

  return {
    status: 'ready',
    plan: {
      strategy: 'default-handler',
      program: entry.path,
      args: [],
      cwd,
      display: 'default-handler',
      title: entry.name
    }
  }
}

function findInterpreter(interpreters: Readonly<Record<string, string>>, ext: string): string | undefined {
  for (const [key, program] of Object.entries(interpreters)) {
    if (normalizeExtension(key) === ext && program.trim()) {
      return program
    }
  }
  return undefined
}
