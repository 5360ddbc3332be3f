/**
 * launcher backup restore [generation]
 *
 * Copies a generation over the data file and reloads the registry from it.
 * When no generation is given on a terminal, shows a picker.
 */

import type { BackupInfo } from '../../../types.js'
import { c, print } from '../../lib/colors.js'
import * as ui from '../../ui.js'
import type { CommandContext } from '../../context.js'
import { describeBackup } from './list.js'

/**
 * Generation picked from a tuiuiu.js Select, or null when the user quits
 */
async function pickGeneration(backups: BackupInfo[]): Promise<number | null> {
  const { render, Box, Text, Select, useApp } = await import('tuiuiu.js')

  return new Promise<number | null>((resolve) => {
    let settle = (choice: number | null): void => {
      settle = () => undefined
      resolve(choice)
    }

    render(() => {
      const app = useApp()
      app.onExit(() => settle(null))

      return Box(
        { flexDirection: 'column', padding: 1 },
        Text({ color: 'primary', bold: true }, 'Restore which backup? (1 = newest, Ctrl+C cancels)'),
        Select({
          items: backups.map(b => ({
            value: String(b.generation),
            label: `bak${b.generation}`,
            description: describeBackup(b)
          })),
          maxVisible: 10,
          onChange: (val) => {
            settle(Number(val))
            app.exit()
          }
        })
      )
    })
  })
}

export async function runBackupRestore(context: CommandContext): Promise<void> {
  const { args, launcher, verbose, jsonOutput } = context
  const raw = args._[2]

  let generation: number
  if (raw === undefined) {
    if (!ui.isTTY || !ui.isStdinTTY || jsonOutput) {
      print.error('Backup generation is required')
      ui.log(`Usage: ${c.command('launcher backup restore <generation>')}`)
      process.exit(1)
    }

    const backups = launcher.registry.listBackups()
    if (backups.length === 0) {
      print.error('No backups found')
      process.exit(1)
    }

    const picked = await pickGeneration(backups)
    if (picked === null) {
      ui.log('Cancelled.')
      return
    }
    generation = picked
  } else {
    generation = Number(raw)
    if (!Number.isInteger(generation)) {
      print.error(`Invalid generation: ${raw}`)
      process.exit(1)
    }
  }

  ui.verbose(`Restoring ${launcher.store.backupPath(generation)}`, verbose)
  const result = launcher.registry.restore(generation)

  if (jsonOutput) {
    ui.output(JSON.stringify({
      restored: generation,
      status: result.status,
      skipped: result.skipped,
      entries: result.entries.length
    }, null, 2))
    return
  }

  if (result.status === 'corrupt') {
    ui.warn(`Backup ${generation} could not be read (${result.error ?? 'unknown error'}); the list is now empty`)
  } else if (result.status === 'recovered') {
    ui.warn(`Skipped ${result.skipped} unreadable entr${result.skipped === 1 ? 'y' : 'ies'} in backup ${generation}`)
  }
  ui.success(`Restored backup ${c.highlight(String(generation))} (${result.entries.length} entries)`)
}
