/**
 * Launcher CLI - terminal output
 *
 * Data goes to stdout; everything addressed to the user goes to stderr, so
 * `launcher list --json | jq` keeps working. Chatter (log, success) is only
 * printed on a terminal and can be silenced with --quiet.
 */

import { Table, renderToString, stripAnsi } from 'tuiuiu.js'

export const isTTY = process.stdout.isTTY ?? false
export const isStdinTTY = process.stdin.isTTY ?? false

let quiet = false

export function setQuiet(value: boolean): void {
  quiet = value
}

const chatty = (): boolean => isTTY && !quiet

/**
 * Write data to stdout. Nothing else in the CLI writes there.
 */
export function output(data: string): void {
  process.stdout.write(`${data}\n`)
}

export function log(message: string): void {
  if (chatty()) console.error(message)
}

export function success(message: string): void {
  if (chatty()) console.error(`✓ ${message}`)
}

/**
 * Warnings bypass --quiet and pipes
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

export function verbose(message: string, enabled: boolean): void {
  if (!enabled) return
  console.error(`[launcher] ${message}`)
}

export interface TableColumn {
  key: string
  header: string
  align?: 'left' | 'center' | 'right'
}

type Row = Record<string, string>

/**
 * Bordered table on a terminal; plain tab-separated lines otherwise
 */
export function formatTable(columns: TableColumn[], rows: Row[]): string {
  if (!isTTY) {
    const lines = [columns.map(col => col.header)]
    for (const row of rows) {
      lines.push(columns.map(col => stripAnsi(row[col.key] ?? '')))
    }
    return lines.map(cells => cells.join('\t')).join('\n')
  }

  return renderToString(Table({
    columns: columns.map(({ key, header, align }) => ({ key, header, align: align ?? 'left' })),
    data: rows,
    borderStyle: 'round',
    showHeader: true
  }))
}

/**
 * Aligned `key : value` lines (`key:value` when piped)
 */
export function formatKeyValue(pairs: Array<[string, string]>): string {
  if (!isTTY) {
    return pairs.map(([key, value]) => `${key}:${value}`).join('\n')
  }

  const width = pairs.reduce((max, [key]) => Math.max(max, key.length), 0)
  return pairs.map(([key, value]) => `${key.padEnd(width)} : ${value}`).join('\n')
}
