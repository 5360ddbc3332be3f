/**
 * Tests for config-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { homedir, tmpdir } from 'node:os'
import {
  createDefaultConfig,
  expandEnvVars,
  getConfigPath,
  getDataFilePath,
  getLauncherHome,
  loadConfig,
  normalizeConfig,
  DEFAULT_CONFIG,
  HOME_DIR_NAME
} from '../../src/lib/config-loader.js'
import { InvalidConfigError } from '../../src/lib/errors.js'

describe('config-loader', () => {
  let root: string
  const savedEnv = { ...process.env }

  beforeEach(() => {
    root = join(tmpdir(), `launcher-config-${Date.now()}-${Math.random().toString(16).slice(2)}`)
    mkdirSync(root, { recursive: true })
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
    process.env = { ...savedEnv }
  })

  describe('expandEnvVars', () => {
    it('should expand ${VAR}, ${VAR:-default} and $VAR', () => {
      process.env.LAUNCHER_TEST_DIR = '/srv/tools'
      delete process.env.LAUNCHER_TEST_UNSET

      expect(expandEnvVars('${LAUNCHER_TEST_DIR}/data.json')).toBe('/srv/tools/data.json')
      expect(expandEnvVars('${LAUNCHER_TEST_UNSET:-fallback}')).toBe('fallback')
      expect(expandEnvVars('$LAUNCHER_TEST_DIR/x')).toBe('/srv/tools/x')
      expect(expandEnvVars('${LAUNCHER_TEST_UNSET}')).toBe('')
    })
  })

  describe('getLauncherHome', () => {
    it('should prefer the override, then LAUNCHER_HOME, then ~/.launcher', () => {
      process.env.LAUNCHER_HOME = '/env/home'
      expect(getLauncherHome('/explicit')).toBe('/explicit')
      expect(getLauncherHome()).toBe('/env/home')

      delete process.env.LAUNCHER_HOME
      expect(getLauncherHome()).toBe(join(homedir(), HOME_DIR_NAME))
    })
  })

  describe('getDataFilePath', () => {
    it('should join relative data files to the home', () => {
      expect(getDataFilePath(DEFAULT_CONFIG, '/home/u/.launcher')).toBe('/home/u/.launcher/launcher_data.json')
    })

    it('should keep absolute data files', () => {
      expect(getDataFilePath({ ...DEFAULT_CONFIG, data_file: '/data/list.json' }, '/h')).toBe('/data/list.json')
    })
  })

  describe('normalizeConfig', () => {
    it('should return defaults for empty input', () => {
      expect(normalizeConfig(null)).toEqual(DEFAULT_CONFIG)
      expect(normalizeConfig(undefined)).toEqual(DEFAULT_CONFIG)
    })

    it('should not share arrays or maps with the defaults', () => {
      const config = normalizeConfig({})
      config.launch.executable_extensions.push('.sh')
      config.launch.interpreters['.rb'] = 'ruby'
      expect(DEFAULT_CONFIG.launch.executable_extensions).toEqual(['.exe', '.bat', '.cmd'])
      expect(DEFAULT_CONFIG.launch.interpreters).toEqual({ '.py': 'python', '.pyw': 'python' })
    })

    it('should merge provided sections over defaults', () => {
      const config = normalizeConfig({
        data_file: ' entries.json ',
        backups: { generations: 3 },
        launch: {
          interpreters: { RB: 'ruby', '.py': 'python3' },
          executable_extensions: ['EXE', '.sh'],
          terminal: 'xterm'
        }
      })

      expect(config).toEqual({
        data_file: 'entries.json',
        backups: { generations: 3 },
        launch: {
          interpreters: { '.rb': 'ruby', '.py': 'python3' },
          executable_extensions: ['.exe', '.sh'],
          terminal: 'xterm'
        }
      })
    })

    it('should keep defaults for omitted keys', () => {
      const config = normalizeConfig({ launch: { terminal: 'konsole' } })
      expect(config.launch.terminal).toBe('konsole')
      expect(config.launch.interpreters).toEqual({ '.py': 'python', '.pyw': 'python' })
      expect(config.backups.generations).toBe(10)
    })

    it.each([
      ['a list at the top level', ['x'], 'top level must be a mapping'],
      ['an empty data_file', { data_file: '  ' }, 'data_file must be a non-empty string'],
      ['a zero generation count', { backups: { generations: 0 } }, 'backups.generations must be an integer between 1 and 100'],
      ['a fractional generation count', { backups: { generations: 1.5 } }, 'backups.generations must be an integer between 1 and 100'],
      ['a scalar backups section', { backups: 5 }, 'backups must be a mapping'],
      ['a list of interpreters', { launch: { interpreters: ['python'] } }, 'launch.interpreters must be a mapping'],
      ['a scalar extension list', { launch: { executable_extensions: '.exe' } }, 'launch.executable_extensions must be a list'],
      ['an empty terminal', { launch: { terminal: '' } }, 'launch.terminal must be a non-empty string']
    ])('should reject %s', (_label, raw, message) => {
      expect(() => normalizeConfig(raw, '/h/config.yaml')).toThrow(InvalidConfigError)
      expect(() => normalizeConfig(raw, '/h/config.yaml')).toThrow(`Invalid config in /h/config.yaml: ${message}`)
    })
  })

  describe('loadConfig', () => {
    it('should return defaults when config.yaml is absent', () => {
      expect(loadConfig(root)).toEqual(DEFAULT_CONFIG)
    })

    it('should read YAML and expand environment variables', () => {
      process.env.LAUNCHER_TEST_DATA = '/srv/launcher'
      writeFileSync(getConfigPath(root), [
        'data_file: ${LAUNCHER_TEST_DATA}/list.json',
        'backups:',
        '  generations: 5',
        ''
      ].join('\n'))

      const config = loadConfig(root)
      expect(config.data_file).toBe('/srv/launcher/list.json')
      expect(config.backups.generations).toBe(5)
    })

    it('should treat an empty file as defaults', () => {
      writeFileSync(getConfigPath(root), '')
      expect(loadConfig(root)).toEqual(DEFAULT_CONFIG)
    })

    it('should raise InvalidConfigError on YAML syntax errors', () => {
      writeFileSync(getConfigPath(root), 'backups: [unclosed\n')
      expect(() => loadConfig(root)).toThrow(InvalidConfigError)
    })
  })

  describe('createDefaultConfig', () => {
    it('should write a config that loads back as the defaults', () => {
      const configPath = createDefaultConfig(join(root, 'fresh'))
      expect(configPath).toBe(join(root, 'fresh', 'config.yaml'))
      expect(loadConfig(join(root, 'fresh'))).toEqual(DEFAULT_CONFIG)
    })

    it('should never overwrite an existing file', () => {
      writeFileSync(getConfigPath(root), 'data_file: mine.json\n')
      createDefaultConfig(root)
      expect(readFileSync(getConfigPath(root), 'utf-8')).toBe('data_file: mine.json\n')
    })
  })
})
