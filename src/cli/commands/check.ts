/**
 * keyring2kdbx CLI - Check Command
 *
 * Reads the source without touching any database and shows what an export
 * would pick up. Passwords are never printed.
 *
 * Usage:
 *   keyring2kdbx check [--source <type>] [--input <file>] [--config <file>]
 */

import type { Command } from 'commander'
import type { RecordInput } from '../../types.js'
import { resolveSettings } from '../../lib/config-loader.js'
import { wrapError } from '../../lib/errors.js'
import { createStderrLogger } from '../../lib/logger.js'
import type { Logger } from '../../lib/logger.js'
import { createRecordSource } from '../lib/source.js'
import type { SourceFactory } from '../lib/source.js'
import { SOURCE_TYPES } from '../../types.js'
import * as ui from '../ui.js'

export const PREVIEW_COUNT = 5

export interface CheckCommandOptions {
  readonly source?: string
  readonly input?: string
  readonly config?: string
  readonly verbose?: boolean
}

export interface CheckCommandDeps {
  cwd?: string
  env?: NodeJS.ProcessEnv
  logger?: Logger
  createSource?: SourceFactory
  output?: (text: string) => void
}

function describeRecord(record: RecordInput): string {
  const service = typeof record.service === 'string' ? record.service : '<no service>'
  const username = typeof record.username === 'string' ? record.username : '<no username>'
  return `${service} / ${username}`
}

/**
 * Format the check report
 *
 * @example
 * formatCheckReport([{ service: 'github.com', username: 'octo' }])
 * // Found 1 credentials
 * //   github.com / octo
 */
export function formatCheckReport(records: readonly RecordInput[]): string {
  const lines = [`Found ${records.length} credentials`]
  for (const record of records.slice(0, PREVIEW_COUNT)) {
    lines.push(`  ${describeRecord(record)}`)
  }
  if (records.length > PREVIEW_COUNT) {
    lines.push(`  ... and ${records.length - PREVIEW_COUNT} more`)
  }
  return lines.join('\n')
}

/**
 * Run the check and return the process exit code
 */
export async function runCheckCommand(options: CheckCommandOptions, deps: CheckCommandDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd()
  const logger = deps.logger ?? createStderrLogger({ verbose: options.verbose })
  const write = deps.output ?? ui.output

  try {
    const settings = resolveSettings(
      { config: options.config, source: options.source, input: options.input },
      { cwd, env: deps.env ?? process.env }
    )
    const records: RecordInput[] = []
    for await (const record of (deps.createSource ?? createRecordSource)(settings, logger, cwd)) {
      records.push(record)
    }
    write(formatCheckReport(records))
    return 0
  } catch (err) {
    ui.reportError(wrapError(err, 'CHECK_FAILED'), options.verbose ?? false)
    return 1
  }
}

/**
 * Register the check command
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('List the credentials an export would read')
    .option('--source <type>', `Credential source: ${SOURCE_TYPES.join('|')}`)
    .option('--input <file>', 'Records file for the json source')
    .option('--config <file>', 'Config file (default: nearest keyring2kdbx.yaml)')
    .option('-v, --verbose', 'Show debug output')
    .action(async (options: CheckCommandOptions) => {
      process.exitCode = await runCheckCommand(options)
    })
}
