/**
 * Launcher Config Loader
 *
 * Loads <home>/config.yaml (optional) and merges it over the defaults.
 * <home> is $LAUNCHER_HOME, or ~/.launcher.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { LauncherConfig } from '../types.js'
import { DATA_FILE_NAME, DEFAULT_BACKUP_GENERATIONS } from './data-store.js'
import { DEFAULT_EXECUTABLE_EXTENSIONS, DEFAULT_INTERPRETERS, normalizeExtension } from './launch-plan.js'
import { DEFAULT_TERMINAL } from './process-launcher.js'
import { InvalidConfigError } from './errors.js'

export const HOME_DIR_NAME = '.launcher'
export const CONFIG_FILE = 'config.yaml'
const MAX_GENERATIONS = 100

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: LauncherConfig = {
  data_file: DATA_FILE_NAME,
  backups: {
    generations: DEFAULT_BACKUP_GENERATIONS
  },
  launch: {
    interpreters: { ...DEFAULT_INTERPRETERS },
    executable_extensions: [...DEFAULT_EXECUTABLE_EXTENSIONS],
    terminal: DEFAULT_TERMINAL
  }
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return process.env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return process.env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return process.env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item))
  }
  if (isRecord(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item)
    }
    return result
  }
  return value
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Resolve the launcher home directory
 */
export function getLauncherHome(override?: string): string {
  if (override) {
    return path.resolve(override)
  }
  if (process.env.LAUNCHER_HOME) {
    return path.resolve(process.env.LAUNCHER_HOME)
  }
  return path.join(os.homedir(), HOME_DIR_NAME)
}

export function getConfigPath(home: string): string {
  return path.join(home, CONFIG_FILE)
}

/**
 * Absolute path of the data document
 */
export function getDataFilePath(config: LauncherConfig, home: string): string {
  return path.isAbsolute(config.data_file)
    ? config.data_file
    : path.join(home, config.data_file)
}

/**
 * Validate parsed YAML and merge it over the defaults
 */
export function normalizeConfig(raw: unknown, configPath?: string): LauncherConfig {
  const fail = (message: string): never => {
    throw new InvalidConfigError(message, configPath)
  }

  if (raw === null || raw === undefined) {
    return cloneDefaults()
  }
  if (!isRecord(raw)) {
    return fail('top level must be a mapping')
  }

  const config = cloneDefaults()

  if (raw.data_file !== undefined) {
    if (typeof raw.data_file !== 'string' || !raw.data_file.trim()) {
      fail('data_file must be a non-empty string')
    } else {
      config.data_file = raw.data_file.trim()
    }
  }

  if (raw.backups !== undefined) {
    if (!isRecord(raw.backups)) return fail('backups must be a mapping')
    const generations = raw.backups.generations
    if (generations !== undefined) {
      if (typeof generations !== 'number' || !Number.isInteger(generations) || generations < 1 || generations > MAX_GENERATIONS) {
        fail(`backups.generations must be an integer between 1 and ${MAX_GENERATIONS}`)
      } else {
        config.backups.generations = generations
      }
    }
  }

  if (raw.launch !== undefined) {
    if (!isRecord(raw.launch)) return fail('launch must be a mapping')
    const { interpreters, executable_extensions: executables, terminal } = raw.launch

    if (interpreters !== undefined) {
      if (!isRecord(interpreters)) return fail('launch.interpreters must be a mapping')
      const map: Record<string, string> = {}
      for (const [ext, program] of Object.entries(interpreters)) {
        if (typeof program !== 'string' || !program.trim()) {
          return fail(`launch.interpreters["${ext}"] must be a program name`)
        }
        map[normalizeExtension(ext)] = program.trim()
      }
      config.launch.interpreters = map
    }

    if (executables !== undefined) {
      if (!Array.isArray(executables)) return fail('launch.executable_extensions must be a list')
      const list: string[] = []
      for (const ext of executables) {
        if (typeof ext !== 'string' || !ext.trim()) {
          return fail('launch.executable_extensions must contain extensions like ".exe"')
        }
        list.push(normalizeExtension(ext))
      }
      config.launch.executable_extensions = list
    }

    if (terminal !== undefined) {
      if (typeof terminal !== 'string' || !terminal.trim()) {
        fail('launch.terminal must be a non-empty string')
      } else {
        config.launch.terminal = terminal.trim()
      }
    }
  }

  return config
}

function cloneDefaults(): LauncherConfig {
  return {
    data_file: DEFAULT_CONFIG.data_file,
    backups: { ...DEFAULT_CONFIG.backups },
    launch: {
      interpreters: { ...DEFAULT_CONFIG.launch.interpreters },
      executable_extensions: [...DEFAULT_CONFIG.launch.executable_extensions],
      terminal: DEFAULT_CONFIG.launch.terminal
    }
  }
}

/**
 * Load <home>/config.yaml; defaults when absent
 */
export function loadConfig(home: string = getLauncherHome()): LauncherConfig {
  const configPath = getConfigPath(home)
  if (!fs.existsSync(configPath)) {
    return cloneDefaults()
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  return normalizeConfig(expandEnvVarsInValue(parsed), configPath)
}

/**
 * Write a commented config.yaml holding the defaults (never overwrites)
 */
export function createDefaultConfig(home: string): string {
  const configPath = getConfigPath(home)
  if (fs.existsSync(configPath)) {
    return configPath
  }

  fs.mkdirSync(home, { recursive: true })

  const yamlContent = `# Launcher Configuration
# Supports: \${VAR}, \${VAR:-default}, $VAR

# Data document (relative to this directory, or absolute)
data_file: ${DEFAULT_CONFIG.data_file}

# Numbered copies kept of the document (bak1 = newest)
backups:
  generations: ${DEFAULT_CONFIG.backups.generations}

launch:
  # Scripts run through an interpreter in a console that stays open
  interpreters:
    ".py": python
    ".pyw": python
  # Run directly in a console that stays open
  executable_extensions: [".exe", ".bat", ".cmd"]
  # Terminal used for console launches on Linux
  terminal: ${DEFAULT_CONFIG.launch.terminal}
`

  fs.writeFileSync(configPath, yamlContent, 'utf-8')
  return configPath
}
