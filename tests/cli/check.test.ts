/**
 * Tests for the check command
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { formatCheckReport, runCheckCommand } from '../../src/cli/commands/check.js'
import { silentLogger } from '../../src/lib/logger.js'
import { SourceUnavailableError } from '../../src/lib/errors.js'
import type { RecordInput } from '../../src/types.js'

describe('formatCheckReport', () => {
  it('lists up to five credentials without passwords', () => {
    const records: RecordInput[] = Array.from({ length: 7 }, (_, i) => ({
      service: `service-${i + 1}`,
      username: 'user',
      password: `pw-${i + 1}`
    }))

    expect(formatCheckReport(records)).toBe([
      'Found 7 credentials',
      '  service-1 / user',
      '  service-2 / user',
      '  service-3 / user',
      '  service-4 / user',
      '  service-5 / user',
      '  ... and 2 more'
    ].join('\n'))
  })

  it('marks missing fields', () => {
    expect(formatCheckReport([{ password: 'pw' }])).toBe('Found 1 credentials\n  <no service> / <no username>')
  })
})

describe('runCheckCommand', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prints the report', async () => {
    const printed: string[] = []
    const code = await runCheckCommand({}, {
      cwd: '/',
      env: {},
      logger: silentLogger,
      createSource: () => (async function* () { yield { service: 'github.com', username: 'octo', password: 'pw' } })(),
      output: (text) => { printed.push(text) }
    })

    expect(code).toBe(0)
    expect(printed).toEqual(['Found 1 credentials\n  github.com / octo'])
  })

  it('exits with 1 when the source is unavailable', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})
    const code = await runCheckCommand({}, {
      cwd: '/',
      env: {},
      logger: silentLogger,
      createSource: () => (async function* (): AsyncGenerator<RecordInput> { throw new SourceUnavailableError('locked') })(),
      output: () => {}
    })

    expect(code).toBe(1)
    expect(console.error).toHaveBeenCalled()
  })
})
