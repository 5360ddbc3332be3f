#!/usr/bin/env node
/**
 * Launcher CLI
 *
 * Keep an ordered list of applications and category headings, and start them
 */

import { createCLI, type CommandParseResult, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { CLIArgs, LoadResult } from '../types.js'
import { openLauncher } from '../launcher.js'
import { c, print, launcherFormatter } from './lib/colors.js'
import * as ui from './ui.js'
import { formatErrorForCli } from '../lib/errors.js'
import type { CommandContext } from './context.js'

// CLI commands
import { runInit } from './commands/init.js'
import { reportCommandError } from './report.js'
import { runList } from './commands/list.js'
import { runAdd, runCategory } from './commands/add.js'
import { runEdit } from './commands/edit.js'
import { runDelete } from './commands/delete.js'
import { runMove, runOrder } from './commands/order.js'
import { runPlan, runRun } from './commands/run.js'
import { runBackupGroup } from './commands/backup/index.js'

const VERSION = process.env.LAUNCHER_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  // Walk up from this file to the package root (src/cli or dist/cli)
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

const entryFieldOptions = {
  name: {
    short: 'n',
    type: 'string',
    description: 'Display name'
  },
  description: {
    short: 'd',
    type: 'string',
    description: 'Free-text note'
  }
} as const

/**
 * CLI Schema definition
 */
const cliSchema: CLISchema = {
  name: 'launcher',
  version: VERSION,
  description: 'Ordered application launcher with category headings and rolling backups',
  autoShort: false,
  strict: true,
  formatter: launcherFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  // Global options available to all commands
  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    home: {
      type: 'string',
      description: 'Launcher directory (default: $LAUNCHER_HOME or ~/.launcher)'
    },
    json: {
      type: 'boolean',
      default: false,
      description: 'Output as JSON'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Verbose output'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Only print data and errors'
    }
  },

  commands: {
    init: {
      description: 'Write a default config.yaml into the launcher home'
    },

    list: {
      description: 'List entries in their stored order',
      aliases: ['ls']
    },

    add: {
      description: 'Add applications from file paths (launcher add <path...>)',
      options: entryFieldOptions
    },

    category: {
      description: 'Add a category heading (launcher category <name>)',
      aliases: ['cat'],
      options: {
        description: entryFieldOptions.description
      }
    },

    edit: {
      description: 'Change an entry in place',
      positional: [
        { name: 'id', required: true, description: 'Entry id or unique prefix' }
      ],
      options: {
        ...entryFieldOptions,
        path: {
          type: 'string',
          description: 'Target file'
        },
        kind: {
          type: 'string',
          description: 'application | category'
        }
      }
    },

    delete: {
      description: 'Remove an entry',
      aliases: ['rm'],
      positional: [
        { name: 'id', required: true, description: 'Entry id or unique prefix' }
      ]
    },

    move: {
      description: 'Move an entry to a position (1 = top)',
      aliases: ['mv'],
      positional: [
        { name: 'id', required: true, description: 'Entry id or unique prefix' },
        { name: 'position', required: true, description: 'New 1-based position' }
      ]
    },

    order: {
      description: 'Set the complete order (launcher order <id...>)'
    },

    plan: {
      description: 'Show how an entry would be started',
      positional: [
        { name: 'id', required: true, description: 'Entry id or unique prefix' }
      ]
    },

    run: {
      description: 'Start an application entry',
      aliases: ['open'],
      positional: [
        { name: 'id', required: true, description: 'Entry id or unique prefix' }
      ]
    },

    backup: {
      description: 'List and restore data file backups',
      commands: {
        list: {
          description: 'List backup generations (1 = newest)',
          aliases: ['ls']
        },
        restore: {
          description: 'Restore a generation (picker when omitted)',
          positional: [
            { name: 'generation', required: false, description: 'Backup generation' }
          ]
        }
      }
    }
  }
}

function stringOption(opts: Record<string, unknown>, key: string): string | undefined {
  const value = opts[key]
  return typeof value === 'string' ? value : undefined
}

function booleanOption(opts: Record<string, unknown>, key: string): boolean | undefined {
  const value = opts[key]
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Convert CommandParseResult to CLIArgs
 */
function toCliArgs(result: CommandParseResult): CLIArgs {
  const opts: Record<string, unknown> = Object.fromEntries(Object.entries(result.options))
  const pos: Record<string, unknown> = Object.fromEntries(Object.entries(result.positional))

  // Build the _ array: command + positional args + rest
  const args: string[] = [...result.command]
  for (const value of Object.values(pos)) {
    if (value !== undefined && value !== null) {
      args.push(String(value))
    }
  }
  for (const value of result.rest) {
    args.push(String(value))
  }

  return {
    _: args,
    // Global options
    home: stringOption(opts, 'home'),
    verbose: booleanOption(opts, 'verbose'),
    quiet: booleanOption(opts, 'quiet'),
    json: booleanOption(opts, 'json'),
    help: booleanOption(opts, 'help'),
    version: booleanOption(opts, 'version'),
    // Entry fields
    name: stringOption(opts, 'name'),
    path: stringOption(opts, 'path'),
    description: stringOption(opts, 'description'),
    kind: stringOption(opts, 'kind')
  }
}

/**
 * Tell the user when the data file did not load cleanly
 */
function reportLoad(load: LoadResult, dataFile: string): void {
  if (load.status === 'corrupt') {
    print.warning(`Could not read ${dataFile}: ${load.error ?? 'unknown error'}`)
    ui.warn('Starting with an empty list. The file is kept as backup 1 on the next save.')
    ui.log(`Recover: ${c.command('launcher backup list')} then ${c.command('launcher backup restore <generation>')}`)
  } else if (load.status === 'recovered') {
    print.warning(`Skipped ${load.skipped} unreadable entr${load.skipped === 1 ? 'y' : 'ies'} in ${dataFile}`)
  }
}

const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const args = toCliArgs(result)

  // Handle help first (before error check, so `edit --help` works)
  if (args.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (args.version) {
    ui.output(`launcher v${VERSION}`)
    return
  }

  // Handle errors from parser (after help/version checks)
  if (result.errors.length > 0) {
    for (const error of result.errors) {
      print.error(error)
    }
    process.exit(1)
  }

  ui.setQuiet(args.quiet ?? false)
  const verbose = args.verbose ?? false
  const command = result.command[0]

  try {
    if (command === 'init') {
      await runInit({ home: args.home, jsonOutput: args.json ?? false })
      return
    }

    const launcher = openLauncher({ home: args.home })
    ui.verbose(`home: ${launcher.home}`, verbose)
    ui.verbose(`data: ${launcher.store.filePath} (${launcher.registry.loadResult.status})`, verbose)
    reportLoad(launcher.registry.loadResult, launcher.store.filePath)

    const context: CommandContext = {
      args,
      launcher,
      verbose,
      jsonOutput: args.json ?? false
    }

    switch (command) {
      case 'list':
      case 'ls':
        await runList(context)
        break

      case 'add':
        await runAdd(context)
        break

      case 'category':
      case 'cat':
        await runCategory(context)
        break

      case 'edit':
        await runEdit(context)
        break

      case 'delete':
      case 'rm':
        await runDelete(context)
        break

      case 'move':
      case 'mv':
        await runMove(context)
        break

      case 'order':
        await runOrder(context)
        break

      case 'plan':
        await runPlan(context)
        break

      case 'run':
      case 'open':
        await runRun(context)
        break

      case 'backup':
        await runBackupGroup(context)
        break

      default:
        print.error(`Unknown command: ${c.command(command)}`)
        ui.log(`Run "${c.command('launcher --help')}" for usage information`)
        process.exit(1)
    }
  } catch (err) {
    reportCommandError(err, verbose)
    process.exit(1)
  }
}

// Run
main().catch((err: unknown) => {
  print.error(formatErrorForCli(err))
  process.exit(1)
})
