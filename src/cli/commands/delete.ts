/**
 * Launcher CLI - Delete Command
 */

import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'
import type { CommandContext } from '../context.js'

export async function runDelete(context: CommandContext): Promise<void> {
  const { args, launcher, jsonOutput } = context
  const target = args._[1]

  if (!target) {
    print.error('Entry id is required')
    ui.log(`Usage: ${c.command('launcher delete <id>')}`)
    process.exit(1)
  }

  const removed = launcher.registry.delete(launcher.registry.resolveId(target))

  if (jsonOutput) {
    ui.output(JSON.stringify({ deleted: removed }, null, 2))
    return
  }
  ui.success(`Deleted ${c.name(removed.name)} ${c.id(removed.id)}`)
}
