/**
 * Tests for the export command
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { runExportCommand, toSettingsOverrides } from '../../src/cli/commands/export.js'
import type { ExportCommandDeps } from '../../src/cli/commands/export.js'
import { MemoryContainer, MemoryContainerStore, allEntries } from '../../src/container/memory.js'
import { silentLogger } from '../../src/lib/logger.js'
import { formatExportResult } from '../../src/lib/export-result.js'
import type { RecordInput } from '../../src/types.js'

describe('toSettingsOverrides', () => {
  it('leaves unset flags undefined', () => {
    expect(toSettingsOverrides({})).toEqual({
      config: undefined,
      output: undefined,
      conflict: undefined,
      grouping: undefined,
      backup: undefined,
      mode: undefined,
      source: undefined,
      input: undefined
    })
  })

  it('maps --update to update-existing', () => {
    expect(toSettingsOverrides({ update: true })).toMatchObject({ mode: 'update-existing', backup: undefined })
  })

  it('maps --backup to a backup in update-existing mode', () => {
    expect(toSettingsOverrides({ backup: true })).toMatchObject({ mode: 'update-existing', backup: true })
  })

  it('renames strategy flags', () => {
    expect(toSettingsOverrides({ onConflict: 'rename', groupBy: 'domain', output: 'x.kdbx' })).toMatchObject({
      conflict: 'rename',
      grouping: 'domain',
      output: 'x.kdbx'
    })
  })
})

describe('runExportCommand', () => {
  let tempDir: string
  let store: MemoryContainerStore
  let printed: string[]

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyring2kdbx-cli-'))
    store = new MemoryContainerStore()
    printed = []
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function deps(records: RecordInput[], overrides: Partial<ExportCommandDeps> = {}): ExportCommandDeps {
    return {
      cwd: tempDir,
      env: { KEYRING2KDBX_PASSWORD: 'test-secret' },
      interactive: false,
      logger: silentLogger,
      container: new MemoryContainer(store),
      createSource: () => (async function* () { yield* records })(),
      output: (text) => { printed.push(text) },
      ...overrides
    }
  }

  it('exports into the default output path and prints the table', async () => {
    const code = await runExportCommand({}, deps([{ service: 'github.com', username: 'octo', password: 'pw' }]))

    expect(code).toBe(0)
    const target = path.join(tempDir, 'keyring-export.kdbx')
    const db = store.get(target)
    expect(db ? allEntries(db.root).map(entry => entry.title) : []).toEqual(['github.com'])
    expect(printed).toEqual([
      formatExportResult({ total: 1, added: 1, updated: 0, skipped: 0, errored: 0, errors: [] })
    ])
  })

  it('prints JSON with --json', async () => {
    const code = await runExportCommand({ json: true, output: 'out.kdbx' }, deps([{ service: 'github.com', password: 'pw' }]))

    expect(code).toBe(0)
    expect(JSON.parse(printed[0])).toEqual({ total: 1, added: 1, updated: 0, skipped: 0, errored: 0, errors: [] })
  })

  it('exits with 1 when a record failed', async () => {
    const code = await runExportCommand({ json: true }, deps([
      { service: 'github.com', password: 'pw' },
      { service: '', password: 'pw' }
    ]))

    expect(code).toBe(1)
    expect(JSON.parse(printed[0])).toMatchObject({ total: 2, added: 1, errored: 1 })
  })

  it('reports a fatal error as JSON', async () => {
    store.create(path.join(tempDir, 'keyring-export.kdbx'), 'test-secret')

    const code = await runExportCommand({ json: true }, deps([]))

    expect(code).toBe(1)
    expect(JSON.parse(printed[0])).toEqual({
      error: {
        code: 'TARGET_EXISTS',
        message: `File ${path.join(tempDir, 'keyring-export.kdbx')} already exists`,
        suggestion: 'Use --update to modify it or --backup to create a backup first'
      }
    })
  })

  it('updates an existing database with --update', async () => {
    const target = path.join(tempDir, 'keyring-export.kdbx')
    store.create(target, 'test-secret')

    const code = await runExportCommand({ update: true, onConflict: 'overwrite' }, deps([
      { service: 'github.com', username: 'octo', password: 'pw' }
    ]))

    expect(code).toBe(0)
    expect(store.get(target)?.root.groups.map(group => group.name)).toEqual(['github.com'])
  })

  it('fails without a password outside a terminal', async () => {
    const code = await runExportCommand({ json: true }, deps([], { env: {} }))

    expect(code).toBe(1)
    expect(JSON.parse(printed[0]).error.code).toBe('MISSING_PASSWORD')
  })

  it('asks for the password on a terminal', async () => {
    const prompt = vi.fn(async () => 'prompted-secret')

    const code = await runExportCommand({}, deps([], { env: {}, interactive: true, prompt }))

    expect(code).toBe(0)
    expect(prompt).toHaveBeenCalledTimes(2)
    expect(store.get(path.join(tempDir, 'keyring-export.kdbx'))?.password).toBe('prompted-secret')
  })

  it('prints fatal errors to stderr without --json', async () => {
    const code = await runExportCommand({ onConflict: 'merge' }, deps([]))

    expect(code).toBe(1)
    expect(printed).toEqual([])
    expect(console.error).toHaveBeenCalled()
  })
})
