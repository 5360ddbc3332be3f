/**
 * Launcher CLI - Add Commands
 *
 * launcher add <path...>     register applications from file paths
 * launcher category <name>   insert a category heading
 */

import type { EntryMutationResult } from '../../types.js'
import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'
import type { CommandContext } from '../context.js'

/**
 * Print the non-blocking warnings attached to an add/edit
 */
export function reportWarnings(result: EntryMutationResult): void {
  for (const warning of result.warnings) {
    if (warning === 'path-not-found' && result.entry.kind === 'application') {
      ui.warn(`Path does not exist (saved anyway): ${result.entry.path}`)
    }
  }
}

export async function runAdd(context: CommandContext): Promise<void> {
  const { args, launcher, verbose, jsonOutput } = context
  const paths = args._.slice(1)

  if (paths.length === 0) {
    print.error('At least one path is required')
    ui.log(`Usage: ${c.command('launcher add <path...> [--name <name>] [--description <text>]')}`)
    process.exit(1)
  }
  if (paths.length > 1 && args.name !== undefined) {
    print.error('--name can only be used when adding a single path')
    process.exit(1)
  }

  const results: EntryMutationResult[] = []
  for (const filePath of paths) {
    ui.verbose(`Adding ${filePath}`, verbose)
    const result = launcher.registry.addFromPath(filePath, {
      name: args.name,
      description: args.description
    })
    results.push(result)
    reportWarnings(result)
    if (!jsonOutput) {
      ui.success(`Added ${c.name(result.entry.name)} ${c.id(result.entry.id)}`)
    }
  }

  if (jsonOutput) {
    ui.output(JSON.stringify({ added: results }, null, 2))
  }
}

export async function runCategory(context: CommandContext): Promise<void> {
  const { args, launcher, jsonOutput } = context
  const name = args._.slice(1).join(' ')

  const result = launcher.registry.add({
    kind: 'category',
    name,
    description: args.description
  })

  if (jsonOutput) {
    ui.output(JSON.stringify(result, null, 2))
    return
  }
  ui.success(`Added category ${c.category(result.entry.name)} ${c.id(result.entry.id)}`)
}
