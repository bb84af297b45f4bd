/**
 * keyring2kdbx Config Loader
 *
 * Settings come from three layers, later ones winning:
 *   defaults → keyring2kdbx.yaml (nearest one up from the cwd) → CLI flags
 *
 * String values in the YAML file may reference environment variables.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type {
  ConflictStrategy,
  ContainerMode,
  ExportConfig,
  FileConfig,
  GroupingStrategy,
  ResolvedSettings,
  SourceType
} from '../types.js'
import { CONFLICT_STRATEGIES, CONTAINER_MODES, GROUPING_STRATEGIES, SOURCE_TYPES } from '../types.js'
import { ConfigNotFoundError, InvalidConfigError, errorMessage } from './errors.js'

export const CONFIG_FILE = 'keyring2kdbx.yaml'
export const PASSWORD_ENV = 'KEYRING2KDBX_PASSWORD'
const MAX_SEARCH_DEPTH = 5

export const DEFAULT_OUTPUT = 'keyring-export.kdbx'
export const DEFAULT_SECRET_TOOL = 'secret-tool'
export const DEFAULT_SEARCH_ATTRIBUTES: Readonly<Record<string, string>> = {
  'xdg:schema': 'org.freedesktop.Secret.Generic'
}

// =============================================================================
// Export options (engine input)
// =============================================================================

/**
 * Engine options, strategies fall back to their defaults
 */
export interface ExportOptions {
  target: string
  password: string
  conflict?: string
  grouping?: string
  backup?: boolean
  mode?: string
}

function pick<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
  name: string,
  configPath?: string
): T {
  if (value === undefined) return fallback
  const match = allowed.find(item => item === value.toLowerCase())
  if (match === undefined) {
    throw new InvalidConfigError(
      `${name} must be one of ${allowed.join(', ')} (got "${value}")`,
      configPath
    )
  }
  return match
}

/**
 * Validate options and apply defaults: conflict=skip, grouping=service,
 * backup=false, mode=create-new
 */
export function resolveExportConfig(options: ExportOptions): ExportConfig {
  if (typeof options.target !== 'string' || options.target.trim() === '') {
    throw new InvalidConfigError('target path is required')
  }
  if (typeof options.password !== 'string') {
    throw new InvalidConfigError('password is required')
  }

  return {
    target: options.target,
    password: options.password,
    conflict: pick<ConflictStrategy>(options.conflict, CONFLICT_STRATEGIES, 'skip', 'conflict'),
    grouping: pick<GroupingStrategy>(options.grouping, GROUPING_STRATEGIES, 'service', 'grouping'),
    backup: options.backup ?? false,
    mode: pick<ContainerMode>(options.mode, CONTAINER_MODES, 'create-new', 'mode')
  }
}

// =============================================================================
// Config file
// =============================================================================

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str
    .replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => env[varName] || defaultValue)
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] || '')
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => env[varName] || '')
}

function expandEnvVarsInValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }
  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }
  return value
}

/**
 * Find keyring2kdbx.yaml by searching up from `startDir`
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)

  for (let depth = 0; depth < MAX_SEARCH_DEPTH; depth++) {
    const candidate = path.join(currentDir, CONFIG_FILE)
    if (fs.existsSync(candidate)) {
      return candidate
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }
    currentDir = parentDir
  }

  return null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function optionalString(raw: Record<string, unknown>, key: string, configPath: string): string | undefined {
  const value = raw[key]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`"${key}" must be a string`, configPath)
  }
  return value
}

/**
 * Check the parsed YAML document against FileConfig
 */
function toFileConfig(raw: unknown, configPath: string): FileConfig {
  if (raw === null || raw === undefined) return {}
  if (!isRecord(raw)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  const config: FileConfig = {
    output: optionalString(raw, 'output', configPath),
    conflict: optionalString(raw, 'conflict', configPath),
    grouping: optionalString(raw, 'grouping', configPath),
    mode: optionalString(raw, 'mode', configPath)
  }

  if (raw.backup !== undefined && raw.backup !== null) {
    if (typeof raw.backup !== 'boolean') {
      throw new InvalidConfigError('"backup" must be true or false', configPath)
    }
    config.backup = raw.backup
  }

  if (raw.source !== undefined && raw.source !== null) {
    if (!isRecord(raw.source)) {
      throw new InvalidConfigError('"source" must be a mapping', configPath)
    }
    const source = raw.source
    let attributes: Record<string, string> | undefined
    if (source.attributes !== undefined && source.attributes !== null) {
      if (!isRecord(source.attributes)) {
        throw new InvalidConfigError('"source.attributes" must be a mapping', configPath)
      }
      attributes = {}
      for (const [key, value] of Object.entries(source.attributes)) {
        if (typeof value !== 'string') {
          throw new InvalidConfigError(`"source.attributes.${key}" must be a string`, configPath)
        }
        attributes[key] = value
      }
    }
    config.source = {
      type: optionalString(source, 'type', configPath),
      path: optionalString(source, 'path', configPath),
      command: optionalString(source, 'command', configPath),
      attributes
    }
  }

  return config
}

/**
 * Load and validate a config file
 */
export function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv = process.env): FileConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath)
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(errorMessage(err), configPath, err)
  }

  return toFileConfig(expandEnvVarsInValue(parsed, env), configPath)
}

// =============================================================================
// Settings resolution (file + flags)
// =============================================================================

/**
 * Flag values from the CLI, undefined when not given
 */
export interface SettingsOverrides {
  config?: string
  output?: string
  conflict?: string
  grouping?: string
  backup?: boolean
  mode?: string
  source?: string
  input?: string
}

/**
 * Merge defaults, the config file and CLI flags into final settings
 */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): ResolvedSettings {
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env

  const configPath = overrides.config
    ? path.resolve(cwd, overrides.config)
    : findConfigFile(cwd)
  const file = configPath ? loadConfigFile(configPath, env) : {}
  const where = configPath ?? undefined

  const sourceType = pick<SourceType>(
    overrides.source ?? file.source?.type,
    SOURCE_TYPES,
    'secret-tool',
    'source',
    where
  )
  const sourcePath = overrides.input ?? file.source?.path
  if (sourceType === 'json' && !sourcePath) {
    throw new InvalidConfigError('the json source needs an input file (--input or source.path)', where)
  }

  // --backup implies update-existing unless a mode is set
  const backup = overrides.backup ?? file.backup ?? false
  const defaultMode: ContainerMode = backup ? 'update-existing' : 'create-new'

  return {
    output: overrides.output ?? file.output ?? DEFAULT_OUTPUT,
    conflict: pick<ConflictStrategy>(overrides.conflict ?? file.conflict, CONFLICT_STRATEGIES, 'skip', 'conflict', where),
    grouping: pick<GroupingStrategy>(overrides.grouping ?? file.grouping, GROUPING_STRATEGIES, 'service', 'grouping', where),
    backup,
    mode: pick<ContainerMode>(overrides.mode ?? file.mode, CONTAINER_MODES, defaultMode, 'mode', where),
    source: {
      type: sourceType,
      path: sourcePath,
      command: file.source?.command ?? DEFAULT_SECRET_TOOL,
      attributes: file.source?.attributes ?? { ...DEFAULT_SEARCH_ATTRIBUTES }
    },
    configPath
  }
}
