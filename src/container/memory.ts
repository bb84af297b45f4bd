/**
 * In-memory Container Adapter
 *
 * Databases live in a MemoryContainerStore keyed by path. Working copies are
 * cloned on open and only written back on save(), so an unsaved run leaves
 * the stored database untouched, like a file that was never rewritten.
 */

import type { ContainerMode, EntryUpdate, GroupPath, TargetEntry } from '../types.js'
import type { ContainerAdapter, EntryQuery, GroupRef } from './types.js'
import { ContainerAuthError, TargetExistsError } from '../lib/errors.js'

export interface MemoryEntry {
  id: number
  title: string
  username: string | undefined
  password: string
  properties: Map<string, string>
  notes: string
  /** Previous versions, oldest first */
  history: Array<Omit<MemoryEntry, 'history' | 'id'>>
}

export interface MemoryGroup {
  name: string
  groups: MemoryGroup[]
  entries: MemoryEntry[]
}

export interface MemoryDatabase {
  password: string
  root: MemoryGroup
  nextId: number
}

export interface MemoryHandle {
  path: string
  db: MemoryDatabase
}

function cloneEntry(entry: MemoryEntry): MemoryEntry {
  return {
    ...entry,
    properties: new Map(entry.properties),
    history: entry.history.map(item => ({ ...item, properties: new Map(item.properties) }))
  }
}

function cloneGroup(group: MemoryGroup): MemoryGroup {
  return {
    name: group.name,
    groups: group.groups.map(cloneGroup),
    entries: group.entries.map(cloneEntry)
  }
}

function cloneDatabase(db: MemoryDatabase): MemoryDatabase {
  return { password: db.password, root: cloneGroup(db.root), nextId: db.nextId }
}

/**
 * Saved databases by path
 */
export class MemoryContainerStore {
  private readonly databases = new Map<string, MemoryDatabase>()

  has(path: string): boolean {
    return this.databases.has(path)
  }

  /** Saved copy of a database (mutating it does not affect the store) */
  get(path: string): MemoryDatabase | undefined {
    const db = this.databases.get(path)
    return db ? cloneDatabase(db) : undefined
  }

  set(path: string, db: MemoryDatabase): void {
    this.databases.set(path, cloneDatabase(db))
  }

  /** Create an empty database, mainly for test setup */
  create(path: string, password: string): MemoryDatabase {
    const db: MemoryDatabase = { password, root: { name: 'Root', groups: [], entries: [] }, nextId: 1 }
    this.set(path, db)
    return db
  }
}

/**
 * Find a group by path
 */
export function findGroup(root: MemoryGroup, path: GroupPath): MemoryGroup | undefined {
  let current = root
  for (const name of path) {
    const next = current.groups.find(group => group.name === name)
    if (!next) return undefined
    current = next
  }
  return current
}

/**
 * Every entry in the tree, depth first
 */
export function allEntries(group: MemoryGroup): MemoryEntry[] {
  return [...group.entries, ...group.groups.flatMap(allEntries)]
}

/**
 * Number of groups below `group`
 */
export function countGroups(group: MemoryGroup): number {
  return group.groups.reduce((sum, child) => sum + 1 + countGroups(child), 0)
}

export class MemoryContainer implements ContainerAdapter<MemoryHandle, MemoryEntry> {
  /** Number of groups created through ensureGroup() */
  groupsCreated = 0

  constructor(readonly store: MemoryContainerStore = new MemoryContainerStore()) {}

  async openOrCreate(path: string, password: string, mode: ContainerMode): Promise<MemoryHandle> {
    const saved = this.store.get(path)

    if (saved) {
      if (mode === 'create-new') {
        throw new TargetExistsError(path)
      }
      if (saved.password !== password) {
        throw new ContainerAuthError(path)
      }
      return { path, db: saved }
    }

    return {
      path,
      db: { password, root: { name: 'Root', groups: [], entries: [] }, nextId: 1 }
    }
  }

  async findEntry(handle: MemoryHandle, query: EntryQuery): Promise<MemoryEntry | undefined> {
    const group = findGroup(handle.db.root, query.groupPath)
    if (!group) return undefined

    return group.entries.find(entry =>
      entry.title === query.title &&
      (query.by === 'title' || entry.username === query.username)
    )
  }

  async addEntry(handle: MemoryHandle, entry: TargetEntry): Promise<MemoryEntry> {
    const group = findGroup(handle.db.root, entry.groupPath)
    if (!group) {
      throw new Error(`Group ${entry.groupPath.join('/')} does not exist`)
    }

    const created: MemoryEntry = {
      id: handle.db.nextId++,
      title: entry.title,
      username: entry.username,
      password: entry.password,
      properties: new Map(entry.properties),
      notes: entry.notes,
      history: []
    }
    group.entries.push(created)
    return created
  }

  async updateEntry(_handle: MemoryHandle, ref: MemoryEntry, update: EntryUpdate): Promise<void> {
    const { id: _id, history, ...previous } = ref
    history.push({ ...previous, properties: new Map(previous.properties) })

    ref.username = update.username
    ref.password = update.password
    ref.properties = new Map(update.properties)
    ref.notes = update.notes
  }

  async ensureGroup(handle: MemoryHandle, path: GroupPath): Promise<GroupRef> {
    let current = handle.db.root
    let created = false

    for (const name of path) {
      let next = current.groups.find(group => group.name === name)
      if (!next) {
        next = { name, groups: [], entries: [] }
        current.groups.push(next)
        this.groupsCreated++
        created = true
      }
      current = next
    }

    return { path, created }
  }

  async save(handle: MemoryHandle): Promise<void> {
    this.store.set(handle.path, handle.db)
  }
}
