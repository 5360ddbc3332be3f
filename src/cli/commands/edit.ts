/**
 * Launcher CLI - Edit Command
 *
 * launcher edit <id> [--name] [--path] [--description] [--kind]
 */

import type { EntryPatch } from '../../types.js'
import { parseEntryKind } from '../../lib/entry.js'
import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'
import type { CommandContext } from '../context.js'
import { reportWarnings } from './add.js'

export async function runEdit(context: CommandContext): Promise<void> {
  const { args, launcher, jsonOutput } = context
  const target = args._[1]

  if (!target) {
    print.error('Entry id is required')
    ui.log(`Usage: ${c.command('launcher edit <id> --name <name> --path <path> --description <text> --kind <kind>')}`)
    process.exit(1)
  }

  const patch: EntryPatch = {}
  if (args.name !== undefined) patch.name = args.name
  if (args.path !== undefined) patch.path = args.path
  if (args.description !== undefined) patch.description = args.description
  if (args.kind !== undefined) patch.kind = parseEntryKind(args.kind)

  if (Object.keys(patch).length === 0) {
    print.error('Nothing to change')
    ui.log(`Pass at least one of ${c.highlight('--name --path --description --kind')}`)
    process.exit(1)
  }

  const id = launcher.registry.resolveId(target)
  const result = launcher.registry.edit(id, patch)
  reportWarnings(result)

  if (jsonOutput) {
    ui.output(JSON.stringify(result, null, 2))
    return
  }
  ui.success(`Updated ${c.name(result.entry.name)} ${c.id(result.entry.id)}`)
}
