/**
 * Launcher CLI - Colors
 *
 * Terminal colors: tuiuiu.js text styles plus ANSI 256 for the accent palette.
 * Supports NO_COLOR / FORCE_COLOR.
 */

import { style, styles as tuiStyles } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { EntryKind } from '../../types.js'

// NO_COLOR wins over FORCE_COLOR; otherwise color only on a terminal
function colorsWanted(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined) return false
  if (env.FORCE_COLOR !== undefined) return true
  return process.stdout.isTTY ?? false
}

const enabled = colorsWanted()

const styled = (text: string, ...styleNames: (keyof typeof tuiStyles)[]): string => {
  if (!enabled) return text
  return style(text, ...styleNames)
}

const wrap = (open: string, close: string) => (s: string): string =>
  enabled ? `\x1b[${open}m${s}\x1b[${close}m` : s

const fg256 = (code: number) => wrap(`38;5;${code}`, '39')

/**
 * Amber palette (ANSI 256): 214 commands, 220 highlights, 180 paths,
 * 252/245 text and muted
 */
const ansi = {
  bold: wrap('1', '22'),
  dim: wrap('2', '22'),

  amber: fg256(214),
  gold: fg256(220),
  tan: fg256(180),

  white: wrap('97', '39'),
  gray: fg256(245),
  lightGray: fg256(252),

  red: wrap('91', '39'),
  green: wrap('92', '39'),
  yellow: wrap('93', '39'),
}

/**
 * Help/version formatter for cli-args-parser
 */
export const launcherFormatter: Formatter = {
  'section-header': s => ansi.bold(ansi.white(s)),

  'program-name': s => ansi.bold(ansi.amber(s)),
  'version': s => ansi.gold(s),
  'description': s => ansi.lightGray(s),

  'command-name': s => ansi.amber(s),
  'command-alias': s => ansi.gray(s),
  'command-description': s => ansi.lightGray(s),

  'option-flag': s => ansi.gold(s),
  'option-type': s => ansi.tan(s),
  'option-default': s => ansi.dim(ansi.tan(s)),
  'option-description': s => ansi.lightGray(s),

  'positional-name': s => ansi.tan(s),

  'error-header': s => ansi.bold(ansi.red(s)),
  'error-message': s => ansi.red(s),
  'error-option': s => ansi.amber(s),
}

const bold = (text: string) => styled(text, 'bold')
const dim = (text: string) => styled(text, 'dim')

// Semantic colors
export const c = {
  command: (text: string) => ansi.bold(ansi.amber(text)),
  subcommand: (text: string) => ansi.amber(text),

  id: (text: string) => ansi.gray(text),
  name: (text: string) => ansi.bold(ansi.white(text)),
  path: (text: string) => ansi.tan(text),
  category: (text: string) => ansi.bold(ansi.gold(text)),

  success: (text: string) => ansi.green(text),
  error: (text: string) => ansi.red(text),
  warning: (text: string) => ansi.yellow(text),

  header: (text: string) => bold(ansi.white(text)),
  label: (text: string) => ansi.gray(text),
  highlight: (text: string) => ansi.bold(ansi.gold(text)),
  muted: (text: string) => dim(text),
}

export function colorKind(kind: EntryKind): string {
  return kind === 'category' ? c.category('category') : c.label('app')
}

const symbols = {
  success: enabled ? ansi.green('✓') : '[OK]',
  error: enabled ? ansi.red('✗') : '[ERROR]',
  warning: enabled ? ansi.yellow('⚠') : '[WARN]',
}

// Print utilities
export const print = {
  success: (msg: string) => console.error(`${symbols.success} ${c.success(msg)}`),
  error: (msg: string) => console.error(`${symbols.error} ${c.error(msg)}`),
  warning: (msg: string) => console.error(`${symbols.warning} ${c.warning(msg)}`),
}
