/**
 * Launcher CLI - Command Context
 */

import type { CLIArgs } from '../types.js'
import type { Launcher } from '../launcher.js'

export interface CommandContext {
  args: CLIArgs
  launcher: Launcher
  verbose: boolean
  jsonOutput: boolean
}
