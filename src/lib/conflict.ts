/**
 * Conflict Resolver
 *
 * Decides what happens to a record whose (service, username) may already
 * exist in the target group. Lookup is exact: no case folding, no trimming,
 * and an empty username is not an absent one.
 */

import type { ConflictStrategy, GroupPath, SourceRecord } from '../types.js'
import type { ContainerAdapter } from '../container/types.js'
import { RecordError, errorMessage } from './errors.js'

/** Highest " (n)" suffix probed before giving up on a rename */
export const MAX_RENAME_SUFFIX = 10_000

export type ConflictAction<EntryRef> =
  | { action: 'add'; title: string; renamedFrom?: string }
  | { action: 'skip'; existing: EntryRef }
  | { action: 'overwrite'; existing: EntryRef }

/**
 * Title of an entry created for a record (before any rename)
 */
export function entryTitle(record: SourceRecord): string {
  return record.service
}

/**
 * Title carrying a rename suffix
 *
 * @example
 * suffixedTitle('github.com', 2) // 'github.com (2)'
 */
export function suffixedTitle(title: string, suffix: number): string {
  return `${title} (${suffix})`
}

/**
 * Resolve the merge action for a record
 *
 * @throws RecordError (kind lookup-failed) when the adapter lookup fails
 */
export async function resolveConflict<Handle, EntryRef>(
  container: ContainerAdapter<Handle, EntryRef>,
  handle: Handle,
  record: SourceRecord,
  groupPath: GroupPath,
  strategy: ConflictStrategy
): Promise<ConflictAction<EntryRef>> {
  const title = entryTitle(record)

  const existing = await lookup(() =>
    container.findEntry(handle, {
      by: 'credential',
      title,
      groupPath,
      username: record.username
    })
  )

  if (existing === undefined) {
    return { action: 'add', title }
  }

  switch (strategy) {
    case 'skip':
      return { action: 'skip', existing }
    case 'overwrite':
      return { action: 'overwrite', existing }
    case 'rename':
      return {
        action: 'add',
        title: await nextFreeTitle(container, handle, title, groupPath),
        renamedFrom: title
      }
    default: {
      const unknown: never = strategy
      throw new Error(`Unknown conflict strategy: ${String(unknown)}`)
    }
  }
}

/**
 * Smallest "<title> (n)", n >= 1, that no entry in the group uses.
 * Entries of other users count as collisions too.
 */
async function nextFreeTitle<Handle, EntryRef>(
  container: ContainerAdapter<Handle, EntryRef>,
  handle: Handle,
  title: string,
  groupPath: GroupPath
): Promise<string> {
  for (let suffix = 1; suffix <= MAX_RENAME_SUFFIX; suffix++) {
    const candidate = suffixedTitle(title, suffix)
    const taken = await lookup(() =>
      container.findEntry(handle, { by: 'title', title: candidate, groupPath })
    )
    if (taken === undefined) {
      return candidate
    }
  }
  throw new RecordError('write-failed', `No free title suffix for "${title}" up to ${MAX_RENAME_SUFFIX}`)
}

async function lookup<T>(find: () => Promise<T>): Promise<T> {
  try {
    return await find()
  } catch (err) {
    throw new RecordError('lookup-failed', `Entry lookup failed: ${errorMessage(err)}`, err)
  }
}
