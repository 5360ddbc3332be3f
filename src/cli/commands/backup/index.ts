/**
 * Launcher CLI - Backup Command Group
 *
 * Inspect and restore the numbered copies written before every save.
 */

import { c, print } from '../../lib/colors.js'
import * as ui from '../../ui.js'
import type { CommandContext } from '../../context.js'

/**
 * Router for backup subcommands
 */
export async function runBackupGroup(context: CommandContext): Promise<void> {
  const subcommand = context.args._[1]

  switch (subcommand) {
    case 'list':
    case 'ls': {
      const { runBackupList } = await import('./list.js')
      await runBackupList(context)
      break
    }

    case 'restore': {
      const { runBackupRestore } = await import('./restore.js')
      await runBackupRestore(context)
      break
    }

    default:
      if (!subcommand || subcommand.startsWith('-')) {
        ui.log(`${c.label('Usage:')} ${c.command('launcher backup')} ${c.subcommand('<command>')} [options]`)
        ui.log('')
        ui.log(c.header('Commands:'))
        ui.log(`  ${c.subcommand('list')}      List backup generations (1 = newest)`)
        ui.log(`  ${c.subcommand('restore')}   Restore a generation over the data file`)
        process.exit(1)
      } else {
        print.error(`Unknown subcommand: ${c.command('backup')} ${c.subcommand(subcommand)}`)
        ui.log(`Run "${c.command('launcher backup --help')}" for usage`)
        process.exit(1)
      }
  }
}
