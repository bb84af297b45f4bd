/**
 * Merge Engine
 *
 * Drives one reconciliation pass:
 *
 *   INIT → BACKUP (optional) → OPEN_CONTAINER → PROCESS_RECORDS → SAVE → DONE
 *
 * Per record: validate → group → resolve conflict → materialize.
 * A failing record is counted and the loop goes on. Nothing is written until
 * the single save at the end, so an aborted run leaves the container file as
 * it was (given an atomic adapter save).
 */

import type {
  ExportConfig,
  ExportResult,
  GroupPath,
  SourceRecord,
  TargetEntry
} from '../types.js'
import type { ContainerAdapter, GroupRef } from '../container/types.js'
import { backupContainer } from './backup.js'
import { mapAttributes } from './attributes.js'
import { resolveConflict } from './conflict.js'
import type { ConflictAction } from './conflict.js'
import { formatGroupPath, groupPathKey, resolveGroupPath } from './grouping.js'
import { createSourceRecord, recordLabel } from './record.js'
import { ExportResultBuilder, summarizeExportResult } from './export-result.js'
import { resolveExportConfig } from './config-loader.js'
import type { ExportOptions } from './config-loader.js'
import {
  ContainerError,
  RecordError,
  SaveFailedError,
  SourceUnavailableError,
  errorMessage,
  isExportError
} from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './logger.js'

export type RunState = 'init' | 'backup' | 'open-container' | 'process-records' | 'save' | 'done'

export const NOTE_ADDED = 'Exported from system keyring'
export const NOTE_UPDATED = 'Exported from system keyring (updated)'
export const NOTE_RENAMED = 'Exported from system keyring (renamed to avoid conflict)'

// Items are validated one by one, so anything may come through
export type RecordSource = Iterable<unknown> | AsyncIterable<unknown>

export interface MergeDependencies<Handle, EntryRef> {
  container: ContainerAdapter<Handle, EntryRef>
  logger?: Logger
  /** Called on every state transition */
  onStateChange?: (state: RunState) => void
}

/**
 * Everything one run needs, passed explicitly instead of living in globals
 */
interface RunContext<Handle, EntryRef> {
  readonly config: ExportConfig
  readonly container: ContainerAdapter<Handle, EntryRef>
  readonly handle: Handle
  readonly logger: Logger
  readonly result: ExportResultBuilder
  /** Groups already ensured this run, keyed by groupPathKey() */
  readonly groups: Map<string, GroupRef>
}

/**
 * Export all records into the container described by `options`
 *
 * @returns the run summary, also when some records failed
 * @throws a fatal ExportError (nothing is saved in that case, except for
 *         SaveFailedError where the file state is unknown)
 */
export async function runExport<Handle, EntryRef>(
  records: RecordSource,
  options: ExportOptions,
  deps: MergeDependencies<Handle, EntryRef>
): Promise<ExportResult> {
  const logger = deps.logger ?? silentLogger
  const transition = (state: RunState): void => {
    deps.onStateChange?.(state)
  }

  transition('init')
  const config = resolveExportConfig(options)

  if (config.backup) {
    transition('backup')
    const backup = await backupContainer(config.target)
    if (backup) {
      logger.info(`Backup created: ${backup.backupPath}`)
    } else {
      logger.debug(`Nothing to back up at ${config.target}`)
    }
  }

  transition('open-container')
  const handle = await openContainer(deps.container, config, logger)

  const ctx: RunContext<Handle, EntryRef> = {
    config,
    container: deps.container,
    handle,
    logger,
    result: new ExportResultBuilder(),
    groups: new Map()
  }

  transition('process-records')
  logger.info('Reading keyring credentials...')
  await processRecords(ctx, records)

  transition('save')
  logger.info(`Saving database to ${config.target}`)
  try {
    await deps.container.save(handle)
  } catch (err) {
    throw err instanceof SaveFailedError ? err : new SaveFailedError(config.target, err)
  }

  const result = ctx.result.toResult()
  transition('done')
  logger.info(summarizeExportResult(result))
  return result
}

async function openContainer<Handle, EntryRef>(
  container: ContainerAdapter<Handle, EntryRef>,
  config: ExportConfig,
  logger: Logger
): Promise<Handle> {
  logger.info(`Opening database at ${config.target} (${config.mode})`)
  try {
    return await container.openOrCreate(config.target, config.password, config.mode)
  } catch (err) {
    if (isExportError(err)) throw err
    throw new ContainerError(`Failed to open database ${config.target}: ${errorMessage(err)}`, 'CONTAINER_OPEN_FAILED', {
      context: { containerPath: config.target },
      cause: err
    })
  }
}

/**
 * Pull every record from the source. Record failures are contained here;
 * anything escaping the loop comes from the source itself.
 */
async function processRecords<Handle, EntryRef>(
  ctx: RunContext<Handle, EntryRef>,
  records: RecordSource
): Promise<void> {
  try {
    for await (const input of records) {
      const index = ctx.result.begin()
      await processRecord(ctx, input, index)
    }
  } catch (err) {
    if (err instanceof SourceUnavailableError) throw err
    throw new SourceUnavailableError(errorMessage(err), { cause: err })
  }
}

async function processRecord<Handle, EntryRef>(
  ctx: RunContext<Handle, EntryRef>,
  input: unknown,
  index: number
): Promise<void> {
  const label = recordLabel(input, index)
  try {
    const record = createSourceRecord(input)
    const groupPath = resolveGroupPath(record.service, ctx.config.grouping)
    const decision = await resolveConflict(ctx.container, ctx.handle, record, groupPath, ctx.config.conflict)
    await materialize(ctx, record, groupPath, decision, label)
  } catch (err) {
    const error = err instanceof RecordError
      ? err
      : new RecordError('write-failed', errorMessage(err), err)
    ctx.logger.error(`Failed to export ${label}: ${error.message}`)
    ctx.result.recordFailed(index, label, error)
  }
}

async function materialize<Handle, EntryRef>(
  ctx: RunContext<Handle, EntryRef>,
  record: SourceRecord,
  groupPath: GroupPath,
  decision: ConflictAction<EntryRef>,
  label: string
): Promise<void> {
  switch (decision.action) {
    case 'skip':
      ctx.logger.debug(`Skipping existing entry: ${label}`)
      ctx.result.recordSkipped()
      return

    case 'overwrite':
      ctx.logger.debug(`Overwriting entry: ${label}`)
      await ctx.container.updateEntry(ctx.handle, decision.existing, {
        username: record.username,
        password: record.password,
        properties: mapAttributes(record),
        notes: NOTE_UPDATED
      })
      ctx.result.recordUpdated()
      return

    case 'add': {
      await ensureGroup(ctx, groupPath)
      const entry: TargetEntry = {
        title: decision.title,
        username: record.username,
        password: record.password,
        groupPath,
        properties: mapAttributes(record),
        notes: decision.renamedFrom === undefined ? NOTE_ADDED : NOTE_RENAMED
      }
      await ctx.container.addEntry(ctx.handle, entry)
      if (decision.renamedFrom !== undefined) {
        ctx.logger.debug(`Renaming entry: ${decision.renamedFrom} -> ${decision.title}`)
      }
      ctx.logger.debug(`Added entry: ${label} in ${formatGroupPath(groupPath)}`)
      ctx.result.recordAdded()
      return
    }

    default: {
      const unknown: never = decision
      throw new Error(`Unknown merge action: ${JSON.stringify(unknown)}`)
    }
  }
}

/**
 * Ask the adapter for each distinct path once per run
 */
async function ensureGroup<Handle, EntryRef>(
  ctx: RunContext<Handle, EntryRef>,
  groupPath: GroupPath
): Promise<GroupRef> {
  const key = groupPathKey(groupPath)
  const known = ctx.groups.get(key)
  if (known) return known

  const group = await ctx.container.ensureGroup(ctx.handle, groupPath)
  ctx.logger.debug(`${group.created ? 'Creating' : 'Using existing'} group: ${formatGroupPath(groupPath)}`)
  ctx.groups.set(key, group)
  return group
}
