/**
 * keyring2kdbx - Type Definitions
 */

// ============================================================================
// Strategy Types
// ============================================================================

/**
 * How a record that matches an existing (service, username) entry is handled
 *
 * - skip: keep the existing entry untouched
 * - overwrite: replace password, username and attributes of the existing entry
 * - rename: add a new entry whose title carries the smallest free " (n)" suffix
 */
export type ConflictStrategy = 'skip' | 'overwrite' | 'rename'

/**
 * How entries are placed in the container's group hierarchy
 *
 * - flat: everything in the root group
 * - service: one group per raw service string
 * - domain: one group per registrable-looking domain (api.example.com → example.com)
 */
export type GroupingStrategy = 'flat' | 'service' | 'domain'

/**
 * create-new refuses to touch an existing container,
 * update-existing opens it (or creates it when missing)
 */
export type ContainerMode = 'create-new' | 'update-existing'

export const CONFLICT_STRATEGIES: readonly ConflictStrategy[] = ['skip', 'overwrite', 'rename']
export const GROUPING_STRATEGIES: readonly GroupingStrategy[] = ['flat', 'service', 'domain']
export const CONTAINER_MODES: readonly ContainerMode[] = ['create-new', 'update-existing']

// ============================================================================
// Records
// ============================================================================

/** Ordered string-to-string mapping, iteration order is insertion order */
export type AttributeMap = ReadonlyMap<string, string>

/**
 * Unvalidated record as produced by a source.
 * Every field is checked by createSourceRecord() before the engine uses it.
 */
export interface RecordInput {
  readonly service?: unknown
  readonly username?: unknown
  readonly password?: unknown
  readonly attributes?: unknown
}

/**
 * One credential read from the external store.
 * Instances are frozen; `username: undefined` means the store had no username,
 * which is not the same as an empty one.
 */
export interface SourceRecord {
  readonly service: string
  readonly username: string | undefined
  readonly password: string
  readonly attributes: AttributeMap
}

/** Ordered group names from the root, empty for root placement */
export type GroupPath = readonly string[]

/**
 * Entry as it will be materialized in the container
 */
export interface TargetEntry {
  readonly title: string
  readonly username: string | undefined
  readonly password: string
  readonly groupPath: GroupPath
  readonly properties: AttributeMap
  readonly notes: string
}

/** Fields replaced on an existing entry by the overwrite strategy */
export type EntryUpdate = Pick<TargetEntry, 'username' | 'password' | 'properties' | 'notes'>

// ============================================================================
// Results
// ============================================================================

export type RecordErrorKind = 'invalid-record' | 'lookup-failed' | 'write-failed'

export interface RecordFailure {
  /** 1-based position of the record in the source sequence */
  readonly index: number
  /** "service/username" label, or "#index" when the record has no usable service */
  readonly record: string
  readonly kind: RecordErrorKind
  readonly message: string
}

export interface ExportResult {
  readonly total: number
  readonly added: number
  readonly updated: number
  readonly skipped: number
  readonly errored: number
  readonly errors: readonly RecordFailure[]
}

// ============================================================================
// Configuration
// ============================================================================

export interface ExportConfig {
  /** Path of the KDBX file to create or update */
  target: string
  /** Master password of the container (never logged) */
  password: string
  conflict: ConflictStrategy
  grouping: GroupingStrategy
  backup: boolean
  mode: ContainerMode
}

export type SourceType = 'secret-tool' | 'json'

export const SOURCE_TYPES: readonly SourceType[] = ['secret-tool', 'json']

/**
 * Shape of keyring2kdbx.yaml (all fields optional, snake_case like the file)
 */
export interface FileConfig {
  output?: string
  conflict?: string
  grouping?: string
  backup?: boolean
  mode?: string
  source?: {
    type?: string
    path?: string
    command?: string
    attributes?: Record<string, string>
  }
}

/**
 * Fully resolved settings used by the CLI (file config + defaults + flags)
 */
export interface ResolvedSettings {
  output: string
  conflict: ConflictStrategy
  grouping: GroupingStrategy
  backup: boolean
  mode: ContainerMode
  source: {
    type: SourceType
    path?: string
    command: string
    attributes: Record<string, string>
  }
  /** Config file the settings were read from, if any */
  configPath: string | null
}
