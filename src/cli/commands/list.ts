/**
 * Launcher CLI - List Command
 *
 * Print entries in their stored order
 */

import type { Entry } from '../../types.js'
import * as ui from '../ui.js'
import { c, colorKind } from '../lib/colors.js'
import type { CommandContext } from '../context.js'

/** Characters of the id shown in tables; any unique prefix is accepted back */
export const SHORT_ID_LENGTH = 8

export function shortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH)
}

function describeTarget(entry: Entry): string {
  if (entry.kind === 'category') {
    return entry.description
  }
  return entry.path
}

export async function runList(context: CommandContext): Promise<void> {
  const { launcher, jsonOutput } = context
  const entries = launcher.registry.list()

  if (jsonOutput) {
    ui.output(JSON.stringify({ entries }, null, 2))
    return
  }

  if (entries.length === 0) {
    ui.log(c.muted('No entries yet.'))
    ui.log(`Add one: ${c.command('launcher add <path>')} or ${c.command('launcher category <name>')}`)
    return
  }

  const rows = entries.map((entry, index) => ({
    position: String(index + 1),
    id: ui.isTTY ? c.id(shortId(entry.id)) : entry.id,
    kind: ui.isTTY ? colorKind(entry.kind) : entry.kind,
    name: entry.kind === 'category' ? c.category(entry.name) : entry.name,
    target: entry.kind === 'application' ? c.path(describeTarget(entry)) : c.muted(describeTarget(entry))
  }))

  ui.output(ui.formatTable([
    { key: 'position', header: '#', align: 'right' },
    { key: 'id', header: 'ID' },
    { key: 'kind', header: 'KIND' },
    { key: 'name', header: 'NAME' },
    { key: 'target', header: 'PATH / NOTE' }
  ], rows))
}
