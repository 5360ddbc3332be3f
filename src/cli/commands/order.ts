/**
 * Launcher CLI - Ordering Commands
 *
 * launcher move <id> <position>   drag one entry to a 1-based position
 * launcher order <id...>          submit a complete observed order
 */

import type { ReorderResult } from '../../types.js'
import { ReorderRejectedError } from '../../lib/errors.js'
import type { EntryRegistry } from '../../lib/registry.js'
import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'
import type { CommandContext } from '../context.js'

function reportReorder(result: ReorderResult, jsonOutput: boolean): void {
  if (result.status === 'rejected') {
    throw new ReorderRejectedError(result)
  }

  if (jsonOutput) {
    ui.output(JSON.stringify(result, null, 2))
    return
  }
  if (result.changed) {
    ui.success('Order saved')
  } else {
    ui.log(c.muted('Order unchanged'))
  }
}

/**
 * Expand unique prefixes. Anything else is passed through as typed so the
 * registry reports it as unknown.
 */
function expandIds(registry: EntryRegistry, typed: string[]): string[] {
  return typed.map(value => {
    const matches = registry.matchIds(value)
    return matches.length === 1 ? matches[0] : value
  })
}

export async function runMove(context: CommandContext): Promise<void> {
  const { args, launcher, jsonOutput } = context
  const [, target, rawPosition] = args._

  const position = Number(rawPosition)
  if (!target || !Number.isInteger(position) || position < 1) {
    print.error('Entry id and a position (1 = top) are required')
    ui.log(`Usage: ${c.command('launcher move <id> <position>')}`)
    process.exit(1)
  }

  const id = launcher.registry.resolveId(target)
  reportReorder(launcher.registry.move(id, position - 1), jsonOutput)
}

export async function runOrder(context: CommandContext): Promise<void> {
  const { args, launcher, jsonOutput } = context
  const typed = args._.slice(1)

  if (typed.length === 0) {
    print.error('The full list of entry ids is required')
    ui.log(`Usage: ${c.command('launcher order <id...>')}`)
    process.exit(1)
  }

  reportReorder(launcher.registry.reorder(expandIds(launcher.registry, typed)), jsonOutput)
}
