/**
 * launcher backup list
 */

import type { BackupInfo } from '../../../types.js'
import { c } from '../../lib/colors.js'
import * as ui from '../../ui.js'
import type { CommandContext } from '../../context.js'

export function formatBytes(size: number): string {
  if (size < 1024) return `${size} B`
  return `${(size / 1024).toFixed(1)} KB`
}

export function describeBackup(backup: BackupInfo): string {
  return `${backup.modifiedAt.toISOString()} | ${formatBytes(backup.size)}`
}

export async function runBackupList(context: CommandContext): Promise<void> {
  const { launcher, jsonOutput } = context
  const backups = launcher.registry.listBackups()

  if (jsonOutput) {
    ui.output(JSON.stringify(backups, null, 2))
    return
  }

  if (backups.length === 0) {
    ui.log('No backups yet. One is written before every save.')
    return
  }

  ui.output(ui.formatTable([
    { key: 'generation', header: 'GEN', align: 'right' },
    { key: 'modified', header: 'MODIFIED' },
    { key: 'size', header: 'SIZE', align: 'right' }
  ], backups.map(backup => ({
    generation: String(backup.generation),
    modified: backup.modifiedAt.toISOString(),
    size: formatBytes(backup.size)
  }))))

  ui.log('')
  ui.log(`Restore: ${c.command('launcher backup restore <generation>')}`)
}
