/**
 * keyring2kdbx CLI - Export Command
 *
 * Reads every credential from the configured source and merges it into the
 * KDBX database.
 *
 * Usage:
 *   keyring2kdbx export [options]
 *
 * Options:
 *   -o, --output <path>        Database to create or update (default: keyring-export.kdbx)
 *   --update                   Update an existing database instead of creating one
 *   --backup                   Back the database up first (implies --update)
 *   --on-conflict <strategy>   skip | overwrite | rename (default: skip)
 *   --group-by <strategy>      flat | service | domain (default: service)
 *   --source <type>            secret-tool | json (default: secret-tool)
 *   --input <file>             Records file for the json source
 *   --config <file>            Config file (default: nearest keyring2kdbx.yaml)
 *   -v, --verbose              Debug output
 *   -q, --quiet                Warnings and errors only
 *   --json                     Print the result as JSON
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Command } from 'commander'
import type { ExportResult } from '../../types.js'
import type { ContainerAdapter } from '../../container/types.js'
import { KdbxContainer } from '../../container/kdbx.js'
import { runExport } from '../../lib/merge-engine.js'
import { resolveSettings } from '../../lib/config-loader.js'
import type { SettingsOverrides } from '../../lib/config-loader.js'
import { formatExportResult, formatExportResultJson } from '../../lib/export-result.js'
import { wrapError } from '../../lib/errors.js'
import { createStderrLogger } from '../../lib/logger.js'
import type { Logger } from '../../lib/logger.js'
import { resolvePassword } from '../lib/prompt.js'
import type { HiddenPrompt } from '../lib/prompt.js'
import { createRecordSource } from '../lib/source.js'
import type { SourceFactory } from '../lib/source.js'
import { CONFLICT_STRATEGIES, GROUPING_STRATEGIES, SOURCE_TYPES } from '../../types.js'
import * as ui from '../ui.js'

/**
 * Command options as parsed by commander
 */
export interface ExportCommandOptions {
  readonly output?: string
  readonly update?: boolean
  readonly backup?: boolean
  readonly onConflict?: string
  readonly groupBy?: string
  readonly source?: string
  readonly input?: string
  readonly config?: string
  readonly verbose?: boolean
  readonly quiet?: boolean
  readonly json?: boolean
}

/**
 * Collaborators, replaced in tests
 */
export interface ExportCommandDeps {
  cwd?: string
  env?: NodeJS.ProcessEnv
  /** stdin is a terminal (password prompt allowed) */
  interactive?: boolean
  prompt?: HiddenPrompt
  logger?: Logger
  container?: ContainerAdapter<unknown, unknown>
  createSource?: SourceFactory
  /** Sink for the result, defaults to stdout */
  output?: (text: string) => void
}

/**
 * Map flags onto config overrides (unset flags leave the config file in charge)
 */
export function toSettingsOverrides(options: ExportCommandOptions): SettingsOverrides {
  return {
    config: options.config,
    output: options.output,
    conflict: options.onConflict,
    grouping: options.groupBy,
    backup: options.backup ? true : undefined,
    mode: options.update || options.backup ? 'update-existing' : undefined,
    source: options.source,
    input: options.input
  }
}

/**
 * Run the export and return the process exit code:
 * 0 when every record made it, 1 on a fatal error or failed records
 */
export async function runExportCommand(options: ExportCommandOptions, deps: ExportCommandDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd()
  const env = deps.env ?? process.env
  const logger = deps.logger ?? createStderrLogger({ verbose: options.verbose, quiet: options.quiet })
  const write = deps.output ?? ui.output

  let result: ExportResult
  try {
    const settings = resolveSettings(toSettingsOverrides(options), { cwd, env })
    if (settings.configPath) {
      logger.debug(`Using config file ${settings.configPath}`)
    }

    const target = path.resolve(cwd, settings.output)
    const password = await resolvePassword({
      env,
      interactive: deps.interactive ?? ui.isStdinTTY,
      creating: settings.mode === 'create-new' || !fs.existsSync(target),
      logger,
      prompt: deps.prompt
    })

    const records = (deps.createSource ?? createRecordSource)(settings, logger, cwd)
    const container: ContainerAdapter<unknown, unknown> = deps.container ?? new KdbxContainer({ logger })

    result = await runExport(records, {
      target,
      password,
      conflict: settings.conflict,
      grouping: settings.grouping,
      backup: settings.backup,
      mode: settings.mode
    }, { container, logger })
  } catch (err) {
    const error = wrapError(err, 'EXPORT_FAILED')
    if (options.json) {
      write(JSON.stringify({ error: { code: error.code, message: error.message, suggestion: error.suggestion } }, null, 2))
    } else {
      ui.reportError(error, options.verbose ?? false)
    }
    return 1
  }

  write(options.json ? JSON.stringify(formatExportResultJson(result), null, 2) : formatExportResult(result))
  return result.errored > 0 ? 1 : 0
}

/**
 * Register the export command
 */
export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export keyring credentials into a KDBX database')
    .option('-o, --output <path>', 'Database to create or update')
    .option('--update', 'Update an existing database instead of creating one')
    .option('--backup', 'Back the database up before changing it (implies --update)')
    .option('--on-conflict <strategy>', `Existing entries: ${CONFLICT_STRATEGIES.join('|')}`)
    .option('--group-by <strategy>', `Group layout: ${GROUPING_STRATEGIES.join('|')}`)
    .option('--source <type>', `Credential source: ${SOURCE_TYPES.join('|')}`)
    .option('--input <file>', 'Records file for the json source')
    .option('--config <file>', 'Config file (default: nearest keyring2kdbx.yaml)')
    .option('-v, --verbose', 'Show debug output')
    .option('-q, --quiet', 'Only show warnings and errors')
    .option('--json', 'Print the result as JSON')
    .action(async (options: ExportCommandOptions) => {
      process.exitCode = await runExportCommand(options)
    })
}
