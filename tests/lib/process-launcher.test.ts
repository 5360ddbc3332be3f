/**
 * Tests for process-launcher.ts
 */

import { describe, it, expect } from 'vitest'
import { EventEmitter } from 'node:events'
import type { SpawnOptions } from 'node:child_process'
import type { Entry, ExecutionPlan } from '../../src/types.js'
import {
  buildSpawnCommand,
  launchEntry,
  launchPlan,
  shQuote,
  winQuote,
  DEFAULT_TERMINAL,
  type SpawnFunction
} from '../../src/lib/process-launcher.js'
import { LaunchFailedError, MissingTargetError, NotLaunchableError } from '../../src/lib/errors.js'

class FakeChild extends EventEmitter {
  pid: number | undefined = 4321
  unrefCalls = 0

  unref(): void {
    this.unrefCalls++
  }
}

interface SpawnCall {
  command: string
  args: readonly string[]
  options: SpawnOptions
}

/**
 * Spawn stand-in that emits 'spawn' (or the given error) on the next tick
 */
function fakeSpawn(outcome: Error | 'spawn' = 'spawn'): { spawn: SpawnFunction; calls: SpawnCall[]; children: FakeChild[] } {
  const calls: SpawnCall[] = []
  const children: FakeChild[] = []
  const spawn: SpawnFunction = (command, args, options) => {
    calls.push({ command, args, options })
    const child = new FakeChild()
    children.push(child)
    queueMicrotask(() => {
      if (outcome === 'spawn') {
        child.emit('spawn')
      } else {
        child.emit('error', outcome)
      }
    })
    return child
  }
  return { spawn, calls, children }
}

const scriptPlan: ExecutionPlan = {
  strategy: 'script',
  program: 'python',
  args: ['/work/scripts/report.py'],
  cwd: '/work/scripts',
  display: 'console',
  title: 'Report'
}

const documentPlan: ExecutionPlan = {
  strategy: 'default-handler',
  program: '/docs/manual.pdf',
  args: [],
  cwd: '/docs',
  display: 'default-handler',
  title: 'Manual'
}

describe('quoting', () => {
  it('shQuote should leave plain words alone', () => {
    expect(shQuote('/usr/bin/python3')).toBe('/usr/bin/python3')
  })

  it('shQuote should single-quote anything else', () => {
    expect(shQuote('My Report')).toBe(`'My Report'`)
    expect(shQuote(`it's`)).toBe(`'it'\\''s'`)
    expect(shQuote('')).toBe(`''`)
  })

  it('winQuote should wrap and drop embedded quotes', () => {
    expect(winQuote('C:\\Program Files\\a.exe')).toBe('"C:\\Program Files\\a.exe"')
    expect(winQuote('say "hi"')).toBe('"say hi"')
  })
})

describe('buildSpawnCommand', () => {
  it('should open documents with start on Windows', () => {
    const cmd = buildSpawnCommand({ ...documentPlan, program: 'C:\\Docs\\manual.pdf' }, { platform: 'win32' })
    expect(cmd).toEqual({
      command: 'cmd.exe',
      args: ['/d', '/s', '/c', '"start "" "C:\\Docs\\manual.pdf""'],
      cwd: '/docs',
      windowsVerbatimArguments: true
    })
  })

  it('should open documents with open on macOS and xdg-open elsewhere', () => {
    expect(buildSpawnCommand(documentPlan, { platform: 'darwin' }).command).toBe('open')
    const linux = buildSpawnCommand(documentPlan, { platform: 'linux' })
    expect(linux.command).toBe('xdg-open')
    expect(linux.args).toEqual(['/docs/manual.pdf'])
    expect(linux.windowsVerbatimArguments).toBe(false)
  })

  it('should start a held-open cmd window on Windows', () => {
    const cmd = buildSpawnCommand({
      ...scriptPlan,
      args: ['C:\\s\\report.py'],
      cwd: 'C:\\s'
    }, { platform: 'win32' })

    expect(cmd.command).toBe('cmd.exe')
    expect(cmd.windowsVerbatimArguments).toBe(true)
    expect(cmd.args).toEqual([
      '/d', '/s', '/c',
      '"start "Report" /D "C:\\s" cmd /k ""python" "C:\\s\\report.py" & pause""'
    ])
  })

  it('should use Terminal.app on macOS', () => {
    const cmd = buildSpawnCommand(scriptPlan, { platform: 'darwin' })
    expect(cmd.command).toBe('osascript')
    expect(cmd.args).toEqual([
      '-e', 'tell application "Terminal" to do script "cd /work/scripts && python /work/scripts/report.py"',
      '-e', 'tell application "Terminal" to activate'
    ])
  })

  it('should hold a terminal emulator open on Linux', () => {
    const cmd = buildSpawnCommand({ ...scriptPlan, title: 'My Report' }, { platform: 'linux', terminal: 'xterm' })
    expect(cmd.command).toBe('xterm')
    expect(cmd.cwd).toBe('/work/scripts')
    expect(cmd.args).toEqual([
      '-e', 'sh', '-c',
      "cd /work/scripts && python /work/scripts/report.py; printf '\\n[%s exited, press Enter to close] ' 'My Report'; read _"
    ])
  })

  it('should fall back to the default terminal', () => {
    expect(buildSpawnCommand(scriptPlan, { platform: 'linux' }).command).toBe(DEFAULT_TERMINAL)
  })
})

describe('launchPlan', () => {
  it('should spawn detached and resolve with the pid', async () => {
    const { spawn, calls, children } = fakeSpawn()
    const outcome = await launchPlan(documentPlan, { platform: 'linux', spawn })

    expect(outcome).toEqual({ ok: true, pid: 4321 })
    expect(calls).toHaveLength(1)
    expect(calls[0].command).toBe('xdg-open')
    expect(calls[0].options).toEqual({
      cwd: '/docs',
      detached: true,
      stdio: 'ignore',
      windowsVerbatimArguments: false
    })
    expect(children[0].unrefCalls).toBe(1)
  })

  it('should resolve with the spawn error', async () => {
    const failure = new Error('spawn xdg-open ENOENT')
    const { spawn, children } = fakeSpawn(failure)
    const outcome = await launchPlan(documentPlan, { platform: 'linux', spawn })

    expect(outcome).toEqual({ ok: false, error: failure })
    expect(children[0].unrefCalls).toBe(0)
  })

  it('should resolve when spawn throws synchronously', async () => {
    const spawn: SpawnFunction = () => {
      throw new Error('bad options')
    }
    const outcome = await launchPlan(documentPlan, { spawn })
    expect(outcome.ok).toBe(false)
    expect(!outcome.ok && outcome.error.message).toBe('bad options')
  })
})

describe('launchEntry', () => {
  const tool: Entry = { kind: 'application', id: 't', name: 'Report', path: '/work/scripts/report.py', description: '' }

  it('should resolve and launch an application', async () => {
    const { spawn, calls } = fakeSpawn()
    const result = await launchEntry(tool, { platform: 'linux', terminal: 'xterm', spawn, pathExists: () => true })

    expect(result).toEqual({ plan: scriptPlan, pid: 4321 })
    expect(calls[0].command).toBe('xterm')
  })

  it('should refuse categories', async () => {
    const { spawn, calls } = fakeSpawn()
    await expect(launchEntry({ kind: 'category', id: 'c', name: 'Games', description: '' }, { spawn }))
      .rejects.toThrow(NotLaunchableError)
    expect(calls).toHaveLength(0)
  })

  it('should refuse missing targets', async () => {
    const { spawn, calls } = fakeSpawn()
    await expect(launchEntry(tool, { spawn, pathExists: () => false })).rejects.toThrow(MissingTargetError)
    expect(calls).toHaveLength(0)
  })

  it('should wrap spawn failures', async () => {
    const { spawn } = fakeSpawn(new Error('ENOENT'))
    await expect(launchEntry(tool, { platform: 'linux', spawn, pathExists: () => true }))
      .rejects.toThrow(LaunchFailedError)
  })
})
