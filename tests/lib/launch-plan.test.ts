/**
 * Tests for launch-plan.ts
 */

import { describe, it, expect } from 'vitest'
import path from 'node:path'
import type { Entry } from '../../src/types.js'
import {
  normalizeExtension,
  resolveLaunchPlan,
  resolveOptionsFromConfig,
  DEFAULT_INTERPRETERS
} from '../../src/lib/launch-plan.js'

const always = () => true

function app(filePath: string, name = 'Tool'): Entry {
  return { kind: 'application', id: 'id-1', name, path: filePath, description: '' }
}

describe('normalizeExtension', () => {
  it('should lower-case and add a leading dot', () => {
    expect(normalizeExtension('PY')).toBe('.py')
    expect(normalizeExtension('.Exe')).toBe('.exe')
    expect(normalizeExtension(' cmd ')).toBe('.cmd')
  })
})

describe('resolveLaunchPlan', () => {
  it('should mark categories inapplicable', () => {
    expect(resolveLaunchPlan({ kind: 'category', id: 'c', name: 'Games', description: '' }))
      .toEqual({ status: 'inapplicable', reason: 'category' })
  })

  it('should report a missing target without planning', () => {
    const result = resolveLaunchPlan(app('/gone/tool.exe'), { pathExists: () => false })
    expect(result).toEqual({ status: 'missing-target', path: '/gone/tool.exe' })
  })

  it('should run scripts through their interpreter from the script directory', () => {
    const result = resolveLaunchPlan(app('/work/scripts/report.py', 'Report'), { pathExists: always })
    expect(result).toEqual({
      status: 'ready',
      plan: {
        strategy: 'script',
        program: 'python',
        args: ['/work/scripts/report.py'],
        cwd: '/work/scripts',
        display: 'console',
        title: 'Report'
      }
    })
  })

  it('should match extensions case-insensitively', () => {
    const result = resolveLaunchPlan(app('/work/REPORT.PYW'), { pathExists: always })
    expect(result.status === 'ready' && result.plan.strategy).toBe('script')
  })

  it('should run executables directly in a console', () => {
    const result = resolveLaunchPlan(app('/apps/setup.BAT'), { pathExists: always })
    expect(result).toEqual({
      status: 'ready',
      plan: {
        strategy: 'executable',
        program: '/apps/setup.BAT',
        args: [],
        cwd: '/apps',
        display: 'console',
        title: 'Tool'
      }
    })
  })

  it('should hand everything else to the default handler', () => {
    const result = resolveLaunchPlan(app('/docs/manual.pdf'), { pathExists: always })
    expect(result).toEqual({
      status: 'ready',
      plan: {
        strategy: 'default-handler',
        program: '/docs/manual.pdf',
        args: [],
        cwd: '/docs',
        display: 'default-handler',
        title: 'Tool'
      }
    })
  })

  it('should treat files without an extension as documents', () => {
    const result = resolveLaunchPlan(app('/usr/local/bin/tool'), { pathExists: always })
    expect(result.status === 'ready' && result.plan.strategy).toBe('default-handler')
  })

  it('should accept custom interpreters and executable lists', () => {
    const options = {
      pathExists: always,
      interpreters: { rb: 'ruby' },
      executableExtensions: ['SH']
    }

    const script = resolveLaunchPlan(app('/x/task.rb'), options)
    expect(script.status === 'ready' && script.plan.program).toBe('ruby')

    const exe = resolveLaunchPlan(app('/x/run.sh'), options)
    expect(exe.status === 'ready' && exe.plan.strategy).toBe('executable')

    // .py is no longer configured
    const py = resolveLaunchPlan(app('/x/old.py'), options)
    expect(py.status === 'ready' && py.plan.strategy).toBe('default-handler')
  })

  it('should check the stored path', () => {
    const checked: string[] = []
    const target = path.resolve('/apps/tool.exe')
    resolveLaunchPlan(app(target), {
      pathExists: (p) => {
        checked.push(p)
        return true
      }
    })
    expect(checked).toEqual([target])
  })
})

describe('resolveOptionsFromConfig', () => {
  it('should map the launch config section', () => {
    expect(resolveOptionsFromConfig({
      interpreters: { ...DEFAULT_INTERPRETERS },
      executable_extensions: ['.exe'],
      terminal: 'xterm'
    })).toEqual({
      interpreters: { '.py': 'python', '.pyw': 'python' },
      executableExtensions: ['.exe']
    })
  })
})
