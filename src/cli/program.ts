/**
 * keyring2kdbx CLI - Program definition
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { registerExportCommand } from './commands/export.js'
import { registerCheckCommand } from './commands/check.js'

export const CLI_NAME = 'keyring2kdbx'

/**
 * Version from the nearest package.json above this file
 */
export function getPackageVersion(): string | undefined {
  let dir = path.dirname(fileURLToPath(import.meta.url))
  for (let i = 0; i < 5; i++) {
    const pkgPath = path.join(dir, 'package.json')
    if (fs.existsSync(pkgPath)) {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
      if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
      return undefined
    }
    dir = path.dirname(dir)
  }
  return undefined
}

export function createProgram(): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description('Export system keyring credentials into a KeePass (KDBX) database')
    .version(getPackageVersion() ?? '0.0.0')

  registerExportCommand(program)
  registerCheckCommand(program)

  return program
}
