/**
 * CLI UI utilities
 *
 * Results go to stdout, everything else to stderr, so the summary (or the
 * --json document) can be piped.
 */

import type { ExportError } from '../lib/errors.js'
import { c, print } from './lib/colors.js'

export const isStdinTTY = process.stdin.isTTY ?? false

/**
 * Output data to stdout
 * This is the ONLY function that should write to stdout
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr
 */
export function log(message: string): void {
  console.error(message)
}

/**
 * Print a fatal error with its suggestion (and context when verbose)
 */
export function reportError(err: ExportError, verbose: boolean): void {
  print.error(err.message)
  if (err.suggestion) {
    log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
  }
  if (verbose && err.context) {
    log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
  }
}
