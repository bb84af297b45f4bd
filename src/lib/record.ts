/**
 * Source record validation
 *
 * Sources yield loosely typed data (parsed command output, JSON files).
 * Everything goes through createSourceRecord() before the engine touches it.
 */

import type { AttributeMap, RecordInput, SourceRecord } from '../types.js'
import { RecordError } from './errors.js'

function invalid(message: string): RecordError {
  return new RecordError('invalid-record', message)
}

/**
 * Normalize the attributes field into an ordered map.
 * Accepts a Map or a plain object; every key and value must be a string.
 */
export function toAttributeMap(value: unknown): AttributeMap {
  if (value === undefined || value === null) {
    return new Map()
  }

  let pairs: Iterable<[unknown, unknown]>
  if (value instanceof Map) {
    pairs = value.entries()
  } else if (typeof value === 'object' && !Array.isArray(value)) {
    pairs = Object.entries(value)
  } else {
    throw invalid(`attributes must be a mapping, got ${Array.isArray(value) ? 'array' : typeof value}`)
  }

  const attributes = new Map<string, string>()
  for (const [key, attrValue] of pairs) {
    if (typeof key !== 'string' || key === '') {
      throw invalid('attribute keys must be non-empty strings')
    }
    if (typeof attrValue !== 'string') {
      throw invalid(`attribute "${key}" must be a string, got ${attrValue === null ? 'null' : typeof attrValue}`)
    }
    attributes.set(key, attrValue)
  }
  return attributes
}

function isRecordInput(value: unknown): value is RecordInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validate raw source output and build a frozen SourceRecord
 *
 * @throws RecordError (kind invalid-record)
 */
export function createSourceRecord(input: unknown): SourceRecord {
  if (!isRecordInput(input)) {
    throw invalid(`record must be an object, got ${input === null ? 'null' : Array.isArray(input) ? 'array' : typeof input}`)
  }
  const { service, username, password } = input

  if (typeof service !== 'string' || service.trim() === '') {
    throw invalid('service must be a non-empty string')
  }
  if (username !== undefined && username !== null && typeof username !== 'string') {
    throw invalid(`username must be a string, got ${typeof username}`)
  }
  if (typeof password !== 'string') {
    throw invalid('password must be a string')
  }

  return Object.freeze({
    service,
    username: typeof username === 'string' ? username : undefined,
    password,
    attributes: toAttributeMap(input.attributes)
  })
}

/**
 * Human-readable identifier for results and logs (never includes the password)
 *
 * @example
 * recordLabel({ service: 'github.com', username: 'octo' }, 3) // 'github.com/octo'
 * recordLabel({ service: 42 }, 3)                              // '#3'
 */
export function recordLabel(input: unknown, index: number): string {
  if (!isRecordInput(input) || typeof input.service !== 'string' || input.service === '') {
    return `#${index}`
  }
  const username = typeof input.username === 'string' ? input.username : ''
  return `${input.service}/${username}`
}
