/**
 * Launcher CLI - error reporting for a failed command
 */

import { isLauncherError } from '../lib/errors.js'
import * as ui from './ui.js'
import { c, print } from './lib/colors.js'

/**
 * Print a command failure to stderr. Launcher errors add their suggestion;
 * --verbose adds the error context or, for anything else, the stack.
 */
export function reportCommandError(err: unknown, verbose: boolean): void {
  if (isLauncherError(err)) {
    print.error(err.message)
    if (err.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (verbose && err.context) {
      ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
    return
  }

  print.error(err instanceof Error ? err.message : String(err))
  if (verbose && err instanceof Error && err.stack) {
    console.error(err.stack)
  }
}
