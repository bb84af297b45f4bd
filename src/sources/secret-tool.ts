/**
 * Secret Service source (Linux: GNOME Keyring, KWallet via ksecretd, KeePassXC)
 *
 * Enumerates items with `secret-tool search --all --unlock <attr> <value>...`
 * and parses the item blocks it prints:
 *
 *   [/org/freedesktop/secrets/collection/login/12]
 *   label = Password for 'octo' on 'github.com'
 *   secret = hunter2
 *   created = 2024-01-01 10:00:00
 *   modified = 2024-01-01 10:00:00
 *   schema = org.freedesktop.Secret.Generic
 *   attribute.service = github.com
 *   attribute.username = octo
 *
 * Secrets spanning several lines cannot be told apart from the next field
 * and are cut at the first line break.
 */

import { execFile } from 'node:child_process'
import type { RecordInput } from '../types.js'
import { SourceUnavailableError } from '../lib/errors.js'
import { silentLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'

export interface SecretItem {
  path: string
  label?: string
  secret?: string
  /** attribute.* lines, in output order */
  attributes: Map<string, string>
}

export interface CommandOutput {
  stdout: string
  stderr: string
  exitCode: number
}

/** Runs a command without a shell */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandOutput>

export interface SecretToolSourceOptions {
  /** Binary to run (default: secret-tool) */
  command?: string
  /** Search filter, secret-tool needs at least one pair */
  attributes: Record<string, string>
  logger?: Logger
  run?: CommandRunner
}

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024

/**
 * Default runner on top of execFile
 */
export const execFileRunner: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error && typeof error.code !== 'number') {
        reject(error)
        return
      }
      resolve({ stdout, stderr, exitCode: typeof error?.code === 'number' ? error.code : 0 })
    })
  })

/**
 * Parse `secret-tool search --all` output into items
 */
export function parseSecretToolOutput(output: string): SecretItem[] {
  const items: SecretItem[] = []
  let current: SecretItem | null = null

  for (const line of output.split(/\r?\n/)) {
    const header = /^\[(.+)\]$/.exec(line)
    if (header) {
      current = { path: header[1], attributes: new Map() }
      items.push(current)
      continue
    }
    if (!current) continue

    const separator = line.indexOf(' = ')
    if (separator === -1) continue

    const key = line.slice(0, separator)
    const value = line.slice(separator + 3)

    if (key.startsWith('attribute.')) {
      current.attributes.set(key.slice('attribute.'.length), value)
    } else if (key === 'secret') {
      current.secret = value
    } else if (key === 'label') {
      current.label = value
    }
  }

  return items
}

/**
 * Map a Secret Service item to a record, null when it has no service or secret.
 * Falls back to the attribute names used by other libsecret clients
 * (application, user).
 */
export function secretItemToRecord(item: SecretItem): RecordInput | null {
  const service = item.attributes.get('service') ?? item.attributes.get('application')
  if (!service || item.secret === undefined) {
    return null
  }

  return {
    service,
    username: item.attributes.get('username') ?? item.attributes.get('user'),
    password: item.secret,
    attributes: new Map(item.attributes)
  }
}

/**
 * Single-pass record source backed by secret-tool
 */
export class SecretToolSource implements AsyncIterable<RecordInput> {
  private readonly command: string
  private readonly attributes: Record<string, string>
  private readonly logger: Logger
  private readonly run: CommandRunner
  private consumed = false

  constructor(options: SecretToolSourceOptions) {
    this.command = options.command ?? 'secret-tool'
    this.attributes = options.attributes
    this.logger = options.logger ?? silentLogger
    this.run = options.run ?? execFileRunner

    if (Object.keys(this.attributes).length === 0) {
      throw new SourceUnavailableError('secret-tool search needs at least one attribute filter', {
        suggestion: 'Set source.attributes in keyring2kdbx.yaml'
      })
    }
  }

  /** Arguments passed to secret-tool */
  searchArgs(): string[] {
    return ['search', '--all', '--unlock', ...Object.entries(this.attributes).flat()]
  }

  /**
   * Read every matching item
   */
  async readItems(): Promise<SecretItem[]> {
    let output: CommandOutput
    try {
      output = await this.run(this.command, this.searchArgs())
    } catch (err) {
      const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT'
      throw new SourceUnavailableError(
        missing ? `${this.command} not found` : `failed to run ${this.command}`,
        {
          suggestion: missing
            ? 'Install libsecret-tools (Debian/Ubuntu) or libsecret (Fedora/Arch)'
            : undefined,
          cause: err
        }
      )
    }

    // secret-tool exits 1 without output when nothing matches
    if (output.exitCode !== 0) {
      if (output.stdout.trim() === '' && output.stderr.trim() === '') {
        return []
      }
      throw new SourceUnavailableError(
        `${this.command} exited with code ${output.exitCode}: ${output.stderr.trim() || 'no details'}`
      )
    }

    return parseSecretToolOutput(output.stdout)
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RecordInput> {
    if (this.consumed) {
      throw new SourceUnavailableError('secret-tool source can only be read once')
    }
    this.consumed = true

    const items = await this.readItems()
    this.logger.info(`Found ${items.length} keyring entries`)

    for (const item of items) {
      const record = secretItemToRecord(item)
      if (!record) {
        this.logger.debug(`Ignoring item without service or secret: ${item.path}`)
        continue
      }
      yield record
    }
  }
}
