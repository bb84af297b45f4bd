/**
 * Container Adapter contract
 *
 * The engine never touches the database format directly. Adapters expose the
 * primitives below and map their own failures onto the error hierarchy
 * (ContainerAuthError, ContainerCorruptError, TargetExistsError, ...).
 */

import type { ContainerMode, EntryUpdate, GroupPath, TargetEntry } from '../types.js'

/**
 * Entry lookup inside one group (direct children only)
 *
 * - credential: title and username must both match exactly;
 *   `username: undefined` only matches entries without a username
 * - title: any entry with that title, whatever its username
 */
export type EntryQuery =
  | { by: 'credential'; title: string; groupPath: GroupPath; username: string | undefined }
  | { by: 'title'; title: string; groupPath: GroupPath }

export interface GroupRef {
  readonly path: GroupPath
  /** True when ensureGroup() had to create at least one level */
  readonly created: boolean
}

export interface ContainerAdapter<Handle, EntryRef> {
  /**
   * Open the container at `path`, or create it.
   * create-new must fail with TargetExistsError when `path` exists.
   */
  openOrCreate(path: string, password: string, mode: ContainerMode): Promise<Handle>

  /** Undefined when the group or the entry does not exist */
  findEntry(handle: Handle, query: EntryQuery): Promise<EntryRef | undefined>

  /** The entry's group must already exist (see ensureGroup) */
  addEntry(handle: Handle, entry: TargetEntry): Promise<EntryRef>

  updateEntry(handle: Handle, ref: EntryRef, update: EntryUpdate): Promise<void>

  /** Idempotent: an existing group with the same name is reused at every level */
  ensureGroup(handle: Handle, path: GroupPath): Promise<GroupRef>

  /** Persist all changes at once */
  save(handle: Handle): Promise<void>
}
