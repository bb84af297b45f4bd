/**
 * Build the record source selected by the settings
 */

import path from 'node:path'
import type { RecordInput, ResolvedSettings } from '../../types.js'
import type { Logger } from '../../lib/logger.js'
import { JsonFileSource } from '../../sources/json-file.js'
import { SecretToolSource } from '../../sources/secret-tool.js'
import { InvalidConfigError } from '../../lib/errors.js'

export type SourceFactory = (settings: ResolvedSettings, logger: Logger, cwd: string) => AsyncIterable<RecordInput>

export const createRecordSource: SourceFactory = (settings, logger, cwd) => {
  const { source } = settings
  switch (source.type) {
    case 'secret-tool':
      return new SecretToolSource({ command: source.command, attributes: source.attributes, logger })

    case 'json':
      if (!source.path) {
        throw new InvalidConfigError('the json source needs an input file (--input or source.path)')
      }
      return new JsonFileSource(path.resolve(cwd, source.path), { logger })

    default: {
      const unknown: never = source.type
      throw new InvalidConfigError(`Unknown source type: ${String(unknown)}`)
    }
  }
}
