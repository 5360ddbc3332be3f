/**
 * Entry construction and (de)serialization
 *
 * The in-memory model is a tagged union on `kind`; the on-disk record keeps
 * the flat shape `{ id, name, path, description, entry_type }` with
 * `entry_type` 'app' | 'separator'.
 */

import { randomUUID } from 'node:crypto'
import path from 'node:path'
import type {
  ApplicationEntry,
  CategoryEntry,
  Entry,
  EntryKind,
  PersistedEntry
} from '../types.js'
import { ENTRY_KINDS } from '../types.js'
import { InvalidKindError } from './errors.js'

export function generateEntryId(): string {
  return randomUUID()
}

/**
 * Build an application entry from a dropped file path.
 * Name defaults to the base name without its extension.
 */
export function entryFromFile(filePath: string, id: string = generateEntryId()): ApplicationEntry {
  const absolute = path.resolve(filePath)
  return {
    kind: 'application',
    id,
    name: path.parse(absolute).name,
    path: absolute,
    description: ''
  }
}

export function createCategory(name: string, description = '', id: string = generateEntryId()): CategoryEntry {
  return { kind: 'category', id, name, description }
}

export function isLaunchable(entry: Entry): entry is ApplicationEntry {
  return entry.kind === 'application'
}

const KIND_ALIASES: Record<string, EntryKind> = {
  application: 'application',
  app: 'application',
  category: 'category',
  separator: 'category'
}

/**
 * Parse user-typed kind names ('app' and 'separator' are accepted too)
 */
export function parseEntryKind(value: string): EntryKind {
  const kind = KIND_ALIASES[value.trim().toLowerCase()]
  if (!kind) {
    throw new InvalidKindError(value, ENTRY_KINDS)
  }
  return kind
}

export function cloneEntry(entry: Entry): Entry {
  return { ...entry }
}

// =============================================================================
// Serialization
// =============================================================================

export function toPersisted(entry: Entry): PersistedEntry {
  return {
    id: entry.id,
    name: entry.name,
    path: entry.kind === 'application' ? entry.path : '',
    description: entry.description,
    entry_type: entry.kind === 'application' ? 'app' : 'separator'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse one stored record.
 *
 * Missing `id`, `description` or `entry_type` fall back to defaults; a
 * record without a string `name`, an 'app' record without a string `path`,
 * or an unknown `entry_type` yields null.
 */
export function fromPersisted(raw: unknown): Entry | null {
  if (!isRecord(raw)) return null

  const { id, name, path: filePath, description, entry_type: entryType } = raw

  if (typeof name !== 'string') return null

  let resolvedId: string
  if (id === undefined) {
    resolvedId = generateEntryId()
  } else if (typeof id === 'string' && id !== '') {
    resolvedId = id
  } else {
    return null
  }

  let resolvedDescription = ''
  if (typeof description === 'string') {
    resolvedDescription = description
  } else if (description !== undefined) {
    return null
  }

  switch (entryType ?? 'app') {
    case 'app':
      if (typeof filePath !== 'string') return null
      return {
        kind: 'application',
        id: resolvedId,
        name,
        path: filePath,
        description: resolvedDescription
      }
    case 'separator':
      return {
        kind: 'category',
        id: resolvedId,
        name,
        description: resolvedDescription
      }
    default:
      return null
  }
}
