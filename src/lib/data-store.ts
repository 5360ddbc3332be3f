/**
 * Launcher - Persistence Store
 *
 * Owns the JSON document and its numbered backup generations:
 *
 * ~/.launcher/
 * ├── launcher_data.json        # current document
 * ├── launcher_data.json.bak1   # state before the latest save (newest)
 * ├── ...
 * └── launcher_data.json.bak10  # oldest kept state
 *
 * Every save that finds an existing document shifts bak{i} → bak{i+1}
 * (dropping the oldest) and copies the current document to bak1 before
 * overwriting it. Durability is "best effort with history": a failed write
 * does not undo the rotation.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { BackupInfo, Entry, LoadResult, PersistedDocument } from '../types.js'
import { fromPersisted, toPersisted } from './entry.js'
import { BackupNotFoundError, PersistenceError } from './errors.js'

export const DATA_FILE_NAME = 'launcher_data.json'
export const DEFAULT_BACKUP_GENERATIONS = 10

// ============================================================================
// Types
// ============================================================================

/**
 * Storage backend consumed by the registry.
 */
export interface EntryStore {
  load(): LoadResult
  /** Rotate backups, then write entries in the given order */
  save(entries: readonly Entry[]): void
  listBackups(): BackupInfo[]
  /** Copy a backup generation over the current document */
  restore(generation: number): void
}

export interface JsonFileStoreOptions {
  /** Backup generations to keep (default: 10) */
  generations?: number
}

// ============================================================================
// Document Encoding
// ============================================================================

/**
 * Serialize entries as the pretty-printed document (2-space indent).
 */
export function serializeDocument(entries: readonly Entry[]): string {
  const doc: PersistedDocument = { entries: entries.map(toPersisted) }
  return JSON.stringify(doc, null, 2) + '\n'
}

/**
 * Parse document text. Never throws: unreadable JSON or a wrong top-level
 * shape comes back as status 'corrupt' with no entries.
 */
export function parseDocument(content: string): LoadResult {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (err) {
    return {
      entries: [],
      status: 'corrupt',
      skipped: 0,
      error: err instanceof Error ? err.message : String(err)
    }
  }

  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return { entries: [], status: 'corrupt', skipped: 0, error: 'Document root is not an object' }
  }

  const items: unknown = 'entries' in data ? data.entries : []
  if (!Array.isArray(items)) {
    return { entries: [], status: 'corrupt', skipped: 0, error: '"entries" is not an array' }
  }

  const entries: Entry[] = []
  const seen = new Set<string>()
  let skipped = 0

  for (const item of items) {
    const entry = fromPersisted(item)
    if (!entry || seen.has(entry.id)) {
      skipped++
      continue
    }
    seen.add(entry.id)
    entries.push(entry)
  }

  return {
    entries,
    status: skipped > 0 ? 'recovered' : 'loaded',
    skipped
  }
}

// ============================================================================
// JSON File Store
// ============================================================================

export class JsonFileStore implements EntryStore {
  readonly generations: number

  constructor(readonly filePath: string, options: JsonFileStoreOptions = {}) {
    const generations = options.generations ?? DEFAULT_BACKUP_GENERATIONS
    if (!Number.isInteger(generations) || generations < 1) {
      throw new RangeError(`Backup generations must be a positive integer, got ${generations}`)
    }
    this.generations = generations
  }

  /**
   * Path of backup generation n (1 = newest)
   */
  backupPath(generation: number): string {
    return `${this.filePath}.bak${generation}`
  }

  exists(): boolean {
    return fs.existsSync(this.filePath)
  }

  load(): LoadResult {
    if (!this.exists()) {
      return { entries: [], status: 'missing', skipped: 0 }
    }

    let content: string
    try {
      content = fs.readFileSync(this.filePath, 'utf-8')
    } catch (err) {
      throw new PersistenceError('load', this.filePath, err)
    }

    return parseDocument(content)
  }

  save(entries: readonly Entry[]): void {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
    } catch (err) {
      throw new PersistenceError('save', this.filePath, err)
    }

    if (this.exists()) {
      this.rotateBackups()
    }

    try {
      fs.writeFileSync(this.filePath, serializeDocument(entries), 'utf-8')
    } catch (err) {
      throw new PersistenceError('save', this.filePath, err)
    }
  }

  /**
   * Shift bak{i} → bak{i+1} from the oldest down, then copy the current
   * document into bak1.
   */
  rotateBackups(): void {
    try {
      for (let i = this.generations - 1; i >= 1; i--) {
        const older = this.backupPath(i)
        const newer = this.backupPath(i + 1)
        if (fs.existsSync(older)) {
          if (fs.existsSync(newer)) {
            fs.rmSync(newer)
          }
          fs.renameSync(older, newer)
        }
      }

      const newest = this.backupPath(1)
      if (fs.existsSync(newest)) {
        fs.rmSync(newest)
      }
      fs.copyFileSync(this.filePath, newest)
    } catch (err) {
      throw new PersistenceError('rotate', this.filePath, err)
    }
  }

  listBackups(): BackupInfo[] {
    const backups: BackupInfo[] = []

    for (let generation = 1; generation <= this.generations; generation++) {
      const backupFile = this.backupPath(generation)
      if (!fs.existsSync(backupFile)) continue

      try {
        const stat = fs.statSync(backupFile)
        backups.push({
          generation,
          path: backupFile,
          modifiedAt: stat.mtime,
          size: stat.size
        })
      } catch (err) {
        throw new PersistenceError('list', backupFile, err)
      }
    }

    return backups
  }

  restore(generation: number): void {
    const backupFile = this.backupPath(generation)
    const inRange = Number.isInteger(generation) && generation >= 1 && generation <= this.generations

    if (!inRange || !fs.existsSync(backupFile)) {
      const available = this.listBackups().map(b => b.generation)
      throw new BackupNotFoundError(generation, available)
    }

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true })
      fs.copyFileSync(backupFile, this.filePath)
    } catch (err) {
      throw new PersistenceError('restore', backupFile, err)
    }
  }
}
