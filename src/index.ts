/**
 * keyring2kdbx - Keyring to KeePass migration
 *
 * Main library exports for programmatic usage
 */

// Engine
export { runExport, NOTE_ADDED, NOTE_UPDATED, NOTE_RENAMED } from './lib/merge-engine.js'
export type { RunState, RecordSource, MergeDependencies } from './lib/merge-engine.js'

// Types
export type {
  AttributeMap,
  ConflictStrategy,
  ContainerMode,
  EntryUpdate,
  ExportConfig,
  ExportResult,
  GroupingStrategy,
  GroupPath,
  RecordErrorKind,
  RecordFailure,
  RecordInput,
  SourceRecord,
  TargetEntry
} from './types.js'

export { CONFLICT_STRATEGIES, GROUPING_STRATEGIES, CONTAINER_MODES } from './types.js'

// Building blocks
export { resolveConflict, entryTitle, suffixedTitle, MAX_RENAME_SUFFIX } from './lib/conflict.js'
export type { ConflictAction } from './lib/conflict.js'
export { resolveGroupPath, domainGroupName, extractHost, formatGroupPath } from './lib/grouping.js'
export { mapAttributes } from './lib/attributes.js'
export { createSourceRecord } from './lib/record.js'
export { backupContainer, getBackupPath, calculateChecksum, BACKUP_SUFFIX } from './lib/backup.js'
export type { BackupInfo } from './lib/backup.js'
export { summarizeExportResult, formatExportResult, formatExportResultJson } from './lib/export-result.js'

// Config
export { resolveExportConfig, resolveSettings, loadConfigFile, findConfigFile } from './lib/config-loader.js'
export type { ExportOptions } from './lib/config-loader.js'

// Logging
export { createStderrLogger, silentLogger } from './lib/logger.js'
export type { Logger, LogLevel } from './lib/logger.js'

// Containers
export type { ContainerAdapter, EntryQuery, GroupRef } from './container/types.js'
export { KdbxContainer, readProperties, fieldText } from './container/kdbx.js'
export type { KdbxHandle } from './container/kdbx.js'
export { MemoryContainer, MemoryContainerStore } from './container/memory.js'

// Sources
export { SecretToolSource, parseSecretToolOutput } from './sources/secret-tool.js'
export { JsonFileSource } from './sources/json-file.js'

// Errors
export * from './lib/errors.js'
