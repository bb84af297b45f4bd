/**
 * Master password input
 *
 * KEYRING2KDBX_PASSWORD wins. Otherwise the password is read from the
 * terminal without echo; a database about to be created asks twice.
 */

import * as readline from 'node:readline'
import { Writable } from 'node:stream'
import { PASSWORD_ENV } from '../../lib/config-loader.js'
import { ConfigError, MissingPasswordError } from '../../lib/errors.js'
import type { Logger } from '../../lib/logger.js'

export const MIN_PASSWORD_LENGTH = 8

/** Reads one line without echoing it */
export type HiddenPrompt = (question: string) => Promise<string>

/**
 * Prompt on stderr with the typed characters muted
 */
export const promptHidden: HiddenPrompt = (question) => {
  let muted = false
  const output = new Writable({
    write(chunk: Buffer | string, encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!muted) process.stderr.write(chunk, encoding)
      callback()
    }
  })

  const rl = readline.createInterface({ input: process.stdin, output, terminal: true })

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close()
      process.stderr.write('\n')
      resolve(answer)
    })
    muted = true
  })
}

export interface PasswordOptions {
  env: NodeJS.ProcessEnv
  /** Whether stdin is a terminal */
  interactive: boolean
  /** A new database will be created, so the password is confirmed */
  creating: boolean
  logger: Logger
  prompt?: HiddenPrompt
}

/**
 * Resolve the master password
 *
 * @throws MissingPasswordError without env var and terminal
 * @throws ConfigError on an empty password or a mismatching confirmation
 */
export async function resolvePassword(options: PasswordOptions): Promise<string> {
  const fromEnv = options.env[PASSWORD_ENV]
  if (fromEnv) {
    options.logger.debug(`Using master password from ${PASSWORD_ENV}`)
    return fromEnv
  }

  if (!options.interactive) {
    throw new MissingPasswordError()
  }

  const prompt = options.prompt ?? promptHidden
  const password = await prompt('Master password: ')

  if (password === '') {
    throw new ConfigError('Master password must not be empty', 'EMPTY_PASSWORD', {
      suggestion: `Enter a password or set ${PASSWORD_ENV}`
    })
  }

  if (options.creating) {
    const confirmation = await prompt('Confirm master password: ')
    if (confirmation !== password) {
      throw new ConfigError('Passwords do not match', 'PASSWORD_MISMATCH', {
        suggestion: 'Run the command again and enter the same password twice'
      })
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      options.logger.warn(`Master password is shorter than ${MIN_PASSWORD_LENGTH} characters`)
    }
  }

  return password
}
