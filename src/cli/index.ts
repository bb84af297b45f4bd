#!/usr/bin/env node
/**
 * keyring2kdbx CLI
 *
 * Exports system keyring credentials into a KeePass (KDBX) database
 */

import { createProgram } from './program.js'
import { formatErrorForCli } from '../lib/errors.js'
import { print } from './lib/colors.js'

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv)
}

main().catch((err: unknown) => {
  // Commands report their own errors, this only sees unexpected ones
  print.error(formatErrorForCli(err))
  process.exit(1)
})
