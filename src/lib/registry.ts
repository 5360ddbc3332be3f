/**
 * Launcher - Entry Registry
 *
 * The in-memory ordered collection of entries. Every mutation is validated,
 * written through the store, and only then becomes visible: if the save
 * throws, the registry keeps the sequence it had before the call, so the
 * in-memory order always matches the last successful write.
 *
 * Callers only ever receive copies of entries.
 */

import fs from 'node:fs'
import path from 'node:path'
import type {
  BackupInfo,
  Entry,
  EntryInput,
  EntryMutationResult,
  EntryPatch,
  EntryWarning,
  LoadResult,
  ReorderResult
} from '../types.js'
import type { EntryStore } from './data-store.js'
import { cloneEntry, entryFromFile, generateEntryId } from './entry.js'
import {
  AmbiguousEntryIdError,
  CategoryPathError,
  DuplicateEntryIdError,
  EmptyNameError,
  EntryNotFoundError,
  InvalidEntryIdError,
  MissingPathError
} from './errors.js'

export interface EntryRegistryOptions {
  /** Filesystem check used for path warnings (default: fs.existsSync) */
  pathExists?: (filePath: string) => boolean
}

export interface AddFromPathOverrides {
  name?: string
  description?: string
}

export class EntryRegistry {
  private entries: Entry[]
  private lastLoad: LoadResult
  private readonly pathExists: (filePath: string) => boolean

  constructor(
    private readonly store: EntryStore,
    initial: LoadResult,
    options: EntryRegistryOptions = {}
  ) {
    this.entries = initial.entries.map(cloneEntry)
    this.lastLoad = initial
    this.pathExists = options.pathExists ?? fs.existsSync
  }

  /**
   * Load the store once and build the registry from it
   */
  static open(store: EntryStore, options?: EntryRegistryOptions): EntryRegistry {
    return new EntryRegistry(store, store.load(), options)
  }

  /** Outcome of the most recent load (startup or restore) */
  get loadResult(): LoadResult {
    return this.lastLoad
  }

  get size(): number {
    return this.entries.length
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /**
   * Snapshot of the current order
   */
  list(): Entry[] {
    return this.entries.map(cloneEntry)
  }

  get(id: string): Entry | undefined {
    const entry = this.entries.find(e => e.id === id)
    return entry ? cloneEntry(entry) : undefined
  }

  /**
   * Like get(), but a missing id is an error
   */
  require(id: string): Entry {
    return cloneEntry(this.entries[this.indexOf(id)])
  }

  has(id: string): boolean {
    return this.entries.some(e => e.id === id)
  }

  ids(): string[] {
    return this.entries.map(e => e.id)
  }

  /**
   * Resolve a full id or a unique id prefix
   */
  resolveId(idOrPrefix: string): string {
    const matches = this.matchIds(idOrPrefix)
    if (matches.length === 1) return matches[0]
    if (matches.length > 1) throw new AmbiguousEntryIdError(idOrPrefix, matches)
    throw new EntryNotFoundError(idOrPrefix)
  }

  /**
   * Ids equal to, or starting with, the given text (an exact match wins)
   */
  matchIds(idOrPrefix: string): string[] {
    if (this.has(idOrPrefix)) return [idOrPrefix]
    if (!idOrPrefix) return []
    return this.entries.filter(e => e.id.startsWith(idOrPrefix)).map(e => e.id)
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  /**
   * Append a new entry
   */
  add(input: EntryInput): EntryMutationResult {
    const name = input.name.trim()
    if (!name) {
      throw new EmptyNameError()
    }

    if (input.id !== undefined && !input.id.trim()) {
      throw new InvalidEntryIdError(input.id)
    }
    if (input.id !== undefined && this.has(input.id)) {
      throw new DuplicateEntryIdError(input.id)
    }
    const id = input.id ?? this.freshId()
    const description = input.description ?? ''

    const warnings: EntryWarning[] = []
    let entry: Entry
    if (input.kind === 'category') {
      entry = { kind: 'category', id, name, description }
    } else {
      const filePath = this.normalizePath(name, input.path, warnings)
      entry = { kind: 'application', id, name, path: filePath, description }
    }

    this.commit([...this.entries, entry])
    return { entry: cloneEntry(entry), warnings }
  }

  /**
   * Append an application derived from a dropped file path
   */
  addFromPath(filePath: string, overrides: AddFromPathOverrides = {}): EntryMutationResult {
    const derived = entryFromFile(filePath, this.freshId())
    return this.add({
      kind: 'application',
      id: derived.id,
      name: overrides.name ?? derived.name,
      path: derived.path,
      description: overrides.description ?? derived.description
    })
  }

  /**
   * Replace mutable fields in place, keeping the entry's position
   */
  edit(id: string, patch: EntryPatch): EntryMutationResult {
    const index = this.indexOf(id)
    const current = this.entries[index]

    const name = (patch.name ?? current.name).trim()
    if (!name) {
      throw new EmptyNameError()
    }
    const description = patch.description ?? current.description
    const kind = patch.kind ?? current.kind

    const warnings: EntryWarning[] = []
    let entry: Entry
    if (kind === 'category') {
      if (patch.path !== undefined) {
        throw new CategoryPathError(name)
      }
      entry = { kind: 'category', id, name, description }
    } else {
      const previousPath = current.kind === 'application' ? current.path : ''
      const filePath = this.normalizePath(name, patch.path ?? previousPath, warnings)
      entry = { kind: 'application', id, name, path: filePath, description }
    }

    const next = [...this.entries]
    next[index] = entry
    this.commit(next)
    return { entry: cloneEntry(entry), warnings }
  }

  /**
   * Remove an entry; the rest keep their relative order
   */
  delete(id: string): Entry {
    const index = this.indexOf(id)
    const removed = this.entries[index]
    this.commit(this.entries.filter((_, i) => i !== index))
    return cloneEntry(removed)
  }

  /**
   * Apply an externally observed order.
   *
   * The observed sequence must hold exactly the current ids, each once.
   * Anything else is rejected and the registry stays untouched; the caller
   * is expected to re-fetch the canonical order with list().
   */
  reorder(observedOrder: readonly string[]): ReorderResult {
    const currentIds = new Set(this.entries.map(e => e.id))
    const observedIds = new Set(observedOrder)

    const missing = this.entries.map(e => e.id).filter(id => !observedIds.has(id))
    const unknown = [...observedIds].filter(id => !currentIds.has(id))
    if (missing.length > 0 || unknown.length > 0) {
      return { status: 'rejected', reason: 'incomplete', missing, unknown }
    }

    const duplicates = findDuplicates(observedOrder)
    if (duplicates.length > 0) {
      return { status: 'rejected', reason: 'duplicate', duplicates }
    }

    const byId = new Map(this.entries.map(e => [e.id, e]))
    const next: Entry[] = []
    for (const id of observedOrder) {
      const entry = byId.get(id)
      if (entry) next.push(entry)
    }

    const changed = next.some((entry, i) => entry.id !== this.entries[i].id)
    if (changed) {
      this.commit(next)
    }
    return { status: 'applied', changed }
  }

  /**
   * Move one entry to a 0-based position (clamped), as a single drag would
   */
  move(id: string, toIndex: number): ReorderResult {
    if (!Number.isFinite(toIndex)) {
      throw new RangeError(`Target position must be a finite number, got ${toIndex}`)
    }
    const ids = this.ids()
    const from = this.indexOf(id)
    const target = Math.max(0, Math.min(ids.length - 1, Math.trunc(toIndex)))

    ids.splice(from, 1)
    ids.splice(target, 0, id)
    return this.reorder(ids)
  }

  // ===========================================================================
  // Backups
  // ===========================================================================

  listBackups(): BackupInfo[] {
    return this.store.listBackups()
  }

  /**
   * Restore a backup generation on disk and reload it in place
   */
  restore(generation: number): LoadResult {
    this.store.restore(generation)
    const result = this.store.load()
    this.entries = result.entries.map(cloneEntry)
    this.lastLoad = result
    return result
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private commit(next: Entry[]): void {
    this.store.save(next)
    this.entries = next
  }

  private indexOf(id: string): number {
    const index = this.entries.findIndex(e => e.id === id)
    if (index === -1) {
      throw new EntryNotFoundError(id)
    }
    return index
  }

  private freshId(): string {
    let id = generateEntryId()
    while (this.has(id)) {
      id = generateEntryId()
    }
    return id
  }

  private normalizePath(name: string, rawPath: string, warnings: EntryWarning[]): string {
    const trimmed = rawPath.trim()
    if (!trimmed) {
      throw new MissingPathError(name)
    }
    const absolute = path.resolve(trimmed)
    if (!this.pathExists(absolute)) {
      warnings.push('path-not-found')
    }
    return absolute
  }
}

function findDuplicates(ids: readonly string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id)
    }
    seen.add(id)
  }
  return [...duplicates]
}
