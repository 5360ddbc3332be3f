/**
 * Launcher CLI - Run / Plan Commands
 *
 * `plan` shows how an entry would start; `run` starts it detached and
 * returns right away.
 */

import type { ExecutionPlan } from '../../types.js'
import { MissingTargetError, NotLaunchableError } from '../../lib/errors.js'
import { buildSpawnCommand } from '../../lib/process-launcher.js'
import * as ui from '../ui.js'
import { c, print } from '../lib/colors.js'
import type { CommandContext } from '../context.js'

function requireTarget(context: CommandContext, usage: string): string {
  const target = context.args._[1]
  if (!target) {
    print.error('Entry id is required')
    ui.log(`Usage: ${c.command(usage)}`)
    process.exit(1)
  }
  return target
}

function formatPlan(plan: ExecutionPlan, terminal: string): string {
  const command = buildSpawnCommand(plan, { terminal })
  return ui.formatKeyValue([
    ['strategy', plan.strategy],
    ['program', plan.program],
    ['args', plan.args.join(' ')],
    ['cwd', plan.cwd],
    ['display', plan.display],
    ['command', [command.command, ...command.args].join(' ')]
  ])
}

export async function runPlan(context: CommandContext): Promise<void> {
  const { launcher, jsonOutput } = context
  const id = launcher.registry.resolveId(requireTarget(context, 'launcher plan <id>'))
  const entry = launcher.registry.require(id)
  const resolved = launcher.plan(entry)

  if (jsonOutput) {
    ui.output(JSON.stringify(resolved, null, 2))
  }

  switch (resolved.status) {
    case 'inapplicable':
      throw new NotLaunchableError(entry.name)
    case 'missing-target':
      throw new MissingTargetError(entry.name, resolved.path)
    case 'ready':
      if (!jsonOutput) {
        ui.output(formatPlan(resolved.plan, launcher.config.launch.terminal))
      }
  }
}

export async function runRun(context: CommandContext): Promise<void> {
  const { launcher, verbose, jsonOutput } = context
  const id = launcher.registry.resolveId(requireTarget(context, 'launcher run <id>'))
  const entry = launcher.registry.require(id)

  ui.verbose(`Launching ${entry.name}`, verbose)
  const result = await launcher.run(entry)

  if (jsonOutput) {
    ui.output(JSON.stringify({ launched: entry.id, pid: result.pid ?? null, plan: result.plan }, null, 2))
    return
  }
  const pid = result.pid === undefined ? '' : c.muted(` (pid ${result.pid})`)
  ui.success(`Launched ${c.name(entry.name)}${pid}`)
}
