/**
 * Launcher CLI - Init Command
 *
 * Writes a commented config.yaml into the launcher home. Runs before the
 * data file is opened, so it also works when the current config is broken.
 */

import fs from 'node:fs'
import { createDefaultConfig, getConfigPath, getLauncherHome } from '../../lib/config-loader.js'
import * as ui from '../ui.js'
import { c } from '../lib/colors.js'

export interface InitContext {
  home?: string
  jsonOutput: boolean
}

export async function runInit(context: InitContext): Promise<void> {
  const home = getLauncherHome(context.home)
  const existed = fs.existsSync(getConfigPath(home))
  const configPath = createDefaultConfig(home)

  if (context.jsonOutput) {
    ui.output(JSON.stringify({ configPath, created: !existed }, null, 2))
    return
  }

  if (existed) {
    ui.log(`Config already exists: ${c.path(configPath)}`)
    return
  }
  ui.success(`Created ${c.path(configPath)}`)
}
