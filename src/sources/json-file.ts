/**
 * JSON file source
 *
 * For keyrings that cannot be enumerated (macOS Keychain, Windows Credential
 * Manager) or scripted migrations. Accepts either an array of records or
 * `{ "records": [...] }`:
 *
 *   [
 *     { "service": "github.com", "username": "octo", "password": "...",
 *       "attributes": { "service": "github.com", "username": "octo" } }
 *   ]
 *
 * Records are passed on unvalidated; the engine reports malformed ones.
 */

import fs from 'node:fs/promises'
import type { RecordInput } from '../types.js'
import { SourceUnavailableError, errorMessage } from '../lib/errors.js'
import { silentLogger } from '../lib/logger.js'
import type { Logger } from '../lib/logger.js'

function isRecordInput(value: unknown): value is RecordInput {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Extract the record list from a parsed document
 */
export function parseRecordDocument(document: unknown): RecordInput[] {
  const list = Array.isArray(document)
    ? document
    : isRecordInput(document) && 'records' in document && Array.isArray(document.records)
      ? document.records
      : null

  if (list === null) {
    throw new SourceUnavailableError('expected an array of records or an object with a "records" array', {
      suggestion: 'Check the input file format'
    })
  }

  // Non-object items become empty inputs so they are counted and reported as invalid
  return list.map((item: unknown) => (isRecordInput(item) ? item : {}))
}

export class JsonFileSource implements AsyncIterable<RecordInput> {
  private consumed = false
  private readonly logger: Logger

  constructor(readonly filePath: string, options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? silentLogger
  }

  async readRecords(): Promise<RecordInput[]> {
    let content: string
    try {
      content = await fs.readFile(this.filePath, 'utf-8')
    } catch (err) {
      throw new SourceUnavailableError(`cannot read ${this.filePath}: ${errorMessage(err)}`, {
        suggestion: 'Check the --input path',
        cause: err
      })
    }

    let document: unknown
    try {
      document = JSON.parse(content)
    } catch (err) {
      throw new SourceUnavailableError(`invalid JSON in ${this.filePath}: ${errorMessage(err)}`, {
        suggestion: 'Check the input file format',
        cause: err
      })
    }

    return parseRecordDocument(document)
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<RecordInput> {
    if (this.consumed) {
      throw new SourceUnavailableError(`${this.filePath} can only be read once`)
    }
    this.consumed = true

    const records = await this.readRecords()
    this.logger.info(`Found ${records.length} entries in ${this.filePath}`)
    yield* records
  }
}
