/**
 * Export result accumulator and formatting
 */

import type { ExportResult, RecordFailure } from '../types.js'
import type { RecordError } from './errors.js'

/**
 * Mutable counters owned by one run; toResult() hands out a frozen copy
 */
export class ExportResultBuilder {
  private total = 0
  private added = 0
  private updated = 0
  private skipped = 0
  private readonly errors: RecordFailure[] = []

  /** Count a record pulled from the source, returns its 1-based index */
  begin(): number {
    this.total++
    return this.total
  }

  recordAdded(): void {
    this.added++
  }

  recordUpdated(): void {
    this.updated++
  }

  recordSkipped(): void {
    this.skipped++
  }

  recordFailed(index: number, record: string, error: RecordError): void {
    this.errors.push(Object.freeze({
      index,
      record,
      kind: error.kind,
      message: error.message
    }))
  }

  toResult(): ExportResult {
    return Object.freeze({
      total: this.total,
      added: this.added,
      updated: this.updated,
      skipped: this.skipped,
      errored: this.errors.length,
      errors: Object.freeze([...this.errors])
    })
  }
}

/**
 * One-line summary
 *
 * @example
 * 'Export complete: 10 entries processed, 8 added, 0 updated, 1 skipped, 1 errors'
 */
export function summarizeExportResult(result: ExportResult): string {
  return (
    `Export complete: ${result.total} entries processed, ` +
    `${result.added} added, ${result.updated} updated, ` +
    `${result.skipped} skipped, ${result.errored} errors`
  )
}

/**
 * Format result for display
 */
export function formatExportResult(result: ExportResult): string {
  const rule = '='.repeat(60)
  const lines: string[] = []

  lines.push(rule)
  lines.push('Export Results:')
  lines.push(rule)
  lines.push(`Total entries processed: ${result.total}`)
  lines.push(`Added:                   ${result.added}`)
  lines.push(`Updated:                 ${result.updated}`)
  lines.push(`Skipped:                 ${result.skipped}`)
  lines.push(`Errors:                  ${result.errored}`)
  lines.push(rule)

  if (result.errors.length > 0) {
    lines.push('')
    lines.push('Failures:')
    for (const failure of result.errors) {
      lines.push(`  ✗ #${failure.index} ${failure.record} [${failure.kind}]: ${failure.message}`)
    }
  }

  return lines.join('\n')
}

/**
 * Format result as JSON
 */
export function formatExportResultJson(result: ExportResult): object {
  return {
    total: result.total,
    added: result.added,
    updated: result.updated,
    skipped: result.skipped,
    errored: result.errored,
    errors: result.errors.map(failure => ({ ...failure }))
  }
}
