/**
 * Attribute Mapper
 *
 * Keyring attributes become custom properties of the target entry, unchanged.
 * Secret Service clients (KeePassXC's integration among them) look entries up
 * by these exact keys, so nothing is renamed, trimmed or coerced here.
 */

import type { AttributeMap, SourceRecord } from '../types.js'

/**
 * Copy every attribute of the record into a new property map, in source order.
 * Keys equal to first-class field names (title, username, password) are copied
 * like any other key; they never replace the first-class values.
 */
export function mapAttributes(record: SourceRecord): AttributeMap {
  const properties = new Map<string, string>()
  for (const [key, value] of record.attributes) {
    properties.set(key, value)
  }
  return properties
}
