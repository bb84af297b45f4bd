/**
 * KDBX Container Adapter (kdbxweb)
 *
 * Keyring attributes are stored as custom string fields. A property named like
 * one of KeePass' standard fields (Title, UserName, Password, URL, Notes) would
 * replace that field, so those go to a single custom data item instead, as
 * JSON [key, value] pairs (kdbxweb drops custom data items with empty values).
 *
 * Saving writes to a temporary sibling file and renames it over the target,
 * with owner-only permissions.
 */

import fs from 'node:fs/promises'
import path from 'node:path'
import kdbxweb from 'kdbxweb'
import type { Kdbx, KdbxEntry, KdbxGroup } from 'kdbxweb'
import type { AttributeMap, ContainerMode, EntryUpdate, GroupPath, TargetEntry } from '../types.js'
import type { ContainerAdapter, EntryQuery, GroupRef } from './types.js'
import {
  ContainerAuthError,
  ContainerCorruptError,
  SaveFailedError,
  TargetExistsError,
  errorMessage
} from '../lib/errors.js'
import { silentLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'
import { registerArgon2, toArrayBuffer } from './argon2.js'

export const STANDARD_FIELDS: readonly string[] = ['Title', 'UserName', 'Password', 'URL', 'Notes']

/** Custom data key of properties named like standard fields */
const SHADOWED_PROPERTIES_KEY = 'keyring2kdbx:shadowed-properties'

export const DEFAULT_DATABASE_NAME = 'Keyring Export'

/** File mode of saved databases */
export const DATABASE_FILE_MODE = 0o600

export interface KdbxHandle {
  path: string
  db: Kdbx
}

export interface KdbxContainerOptions {
  logger?: Logger
  /** Name of new databases (root group name) */
  databaseName?: string
}

// ============================================================================
// Field helpers
// ============================================================================

/**
 * Plain text of a field, undefined when the field is not set
 */
export function fieldText(entry: KdbxEntry, name: string): string | undefined {
  const value = entry.fields.get(name)
  if (value === undefined) return undefined
  return typeof value === 'string' ? value : value.getText()
}

/**
 * Custom properties of an entry: non-standard fields plus the properties
 * named like standard fields
 */
export function readProperties(entry: KdbxEntry): Map<string, string> {
  const properties = new Map<string, string>()
  for (const name of entry.fields.keys()) {
    if (STANDARD_FIELDS.includes(name)) continue
    const text = fieldText(entry, name)
    if (text !== undefined) properties.set(name, text)
  }
  const shadowed = entry.customData?.get(SHADOWED_PROPERTIES_KEY)?.value
  if (shadowed) {
    const pairs: unknown = JSON.parse(shadowed)
    if (Array.isArray(pairs)) {
      for (const pair of pairs) {
        if (Array.isArray(pair) && typeof pair[0] === 'string' && typeof pair[1] === 'string') {
          properties.set(pair[0], pair[1])
        }
      }
    }
  }
  return properties
}

function writeProperties(entry: KdbxEntry, properties: AttributeMap): void {
  for (const name of [...entry.fields.keys()]) {
    if (!STANDARD_FIELDS.includes(name)) entry.fields.delete(name)
  }
  entry.customData?.delete(SHADOWED_PROPERTIES_KEY)

  const shadowed: Array<[string, string]> = []
  for (const [key, value] of properties) {
    if (STANDARD_FIELDS.includes(key)) {
      shadowed.push([key, value])
    } else {
      entry.fields.set(key, value)
    }
  }

  if (shadowed.length > 0) {
    const customData = entry.customData ?? new Map()
    customData.set(SHADOWED_PROPERTIES_KEY, { value: JSON.stringify(shadowed) })
    entry.customData = customData
  }
}

// The recycle bin never matches a group path, whatever its name
function childGroup(db: Kdbx, parent: KdbxGroup, name: string): KdbxGroup | undefined {
  const recycleBin = db.meta.recycleBinUuid
  return parent.groups.find(group => group.name === name && !(recycleBin && group.uuid.equals(recycleBin)))
}

function writeCredential(entry: KdbxEntry, username: string | undefined, password: string, notes: string): void {
  if (username === undefined) {
    entry.fields.delete('UserName')
  } else {
    entry.fields.set('UserName', username)
  }
  entry.fields.set('Password', kdbxweb.ProtectedValue.fromString(password))
  entry.fields.set('Notes', notes)
}

// ============================================================================
// Adapter
// ============================================================================

export class KdbxContainer implements ContainerAdapter<KdbxHandle, KdbxEntry> {
  private readonly logger: Logger
  private readonly databaseName: string

  constructor(options: KdbxContainerOptions = {}) {
    this.logger = options.logger ?? silentLogger
    this.databaseName = options.databaseName ?? DEFAULT_DATABASE_NAME
    registerArgon2()
  }

  async openOrCreate(filePath: string, password: string, mode: ContainerMode): Promise<KdbxHandle> {
    const credentials = new kdbxweb.KdbxCredentials(kdbxweb.ProtectedValue.fromString(password))

    let data: Buffer | null = null
    try {
      data = await fs.readFile(filePath)
    } catch (err) {
      if (!isNotFound(err)) {
        throw new ContainerCorruptError(filePath, errorMessage(err), err)
      }
    }

    if (data === null) {
      if (mode === 'update-existing') {
        this.logger.warn(`Database not found at ${filePath}, creating a new one`)
      }
      this.logger.info(`Creating new database at ${filePath}`)
      return { path: filePath, db: kdbxweb.Kdbx.create(credentials, this.databaseName) }
    }

    if (mode === 'create-new') {
      throw new TargetExistsError(filePath)
    }

    try {
      const db = await kdbxweb.Kdbx.load(toArrayBuffer(data), credentials)
      this.logger.debug(`Database opened: ${filePath}`)
      return { path: filePath, db }
    } catch (err) {
      if (err instanceof kdbxweb.KdbxError && err.code === kdbxweb.Consts.ErrorCodes.InvalidKey) {
        throw new ContainerAuthError(filePath, err)
      }
      throw new ContainerCorruptError(filePath, errorMessage(err), err)
    }
  }

  async findEntry(handle: KdbxHandle, query: EntryQuery): Promise<KdbxEntry | undefined> {
    const group = this.findGroup(handle, query.groupPath)
    if (!group) return undefined

    return group.entries.find(entry =>
      fieldText(entry, 'Title') === query.title &&
      (query.by === 'title' || fieldText(entry, 'UserName') === query.username)
    )
  }

  async addEntry(handle: KdbxHandle, target: TargetEntry): Promise<KdbxEntry> {
    const group = this.findGroup(handle, target.groupPath)
    if (!group) {
      throw new Error(`Group ${target.groupPath.join('/')} does not exist`)
    }

    const entry = handle.db.createEntry(group)
    entry.fields.set('Title', target.title)
    writeCredential(entry, target.username, target.password, target.notes)
    writeProperties(entry, target.properties)
    return entry
  }

  async updateEntry(_handle: KdbxHandle, entry: KdbxEntry, update: EntryUpdate): Promise<void> {
    entry.pushHistory()
    writeCredential(entry, update.username, update.password, update.notes)
    writeProperties(entry, update.properties)
    entry.times.update()
  }

  async ensureGroup(handle: KdbxHandle, groupPath: GroupPath): Promise<GroupRef> {
    let current = handle.db.getDefaultGroup()
    let created = false

    for (const name of groupPath) {
      let next = childGroup(handle.db, current, name)
      if (!next) {
        next = handle.db.createGroup(current, name)
        created = true
      }
      current = next
    }

    return { path: groupPath, created }
  }

  async save(handle: KdbxHandle): Promise<void> {
    const tmpPath = `${handle.path}.tmp-${process.pid}`
    try {
      const data = await handle.db.save()
      await fs.mkdir(path.dirname(handle.path), { recursive: true })
      await fs.writeFile(tmpPath, Buffer.from(data), { mode: DATABASE_FILE_MODE })
      await fs.rename(tmpPath, handle.path)
      await fs.chmod(handle.path, DATABASE_FILE_MODE)
    } catch (err) {
      await fs.rm(tmpPath, { force: true })
      throw new SaveFailedError(handle.path, err)
    }
    this.logger.debug(`Database saved: ${handle.path}`)
  }

  private findGroup(handle: KdbxHandle, groupPath: GroupPath): KdbxGroup | undefined {
    let current: KdbxGroup | undefined = handle.db.getDefaultGroup()
    for (const name of groupPath) {
      current = childGroup(handle.db, current, name)
      if (!current) return undefined
    }
    return current
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
