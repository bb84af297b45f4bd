/**
 * Tests for the secret-tool source
 */

import { describe, it, expect, vi } from 'vitest'
import {
  SecretToolSource,
  parseSecretToolOutput,
  secretItemToRecord
} from '../../src/sources/secret-tool.js'
import type { CommandRunner } from '../../src/sources/secret-tool.js'
import type { RecordInput } from '../../src/types.js'
import { SourceUnavailableError } from '../../src/lib/errors.js'

const OUTPUT = [
  '[/org/freedesktop/secrets/collection/login/12]',
  "label = Password for 'octo' on 'github.com'",
  'secret = test-secret = with equals',
  'created = 2024-01-01 10:00:00',
  'modified = 2024-01-01 10:00:00',
  'schema = org.freedesktop.Secret.Generic',
  'attribute.service = github.com',
  'attribute.username = octo',
  'attribute.xdg:schema = org.freedesktop.Secret.Generic',
  '[/org/freedesktop/secrets/collection/login/13]',
  'label = Wi-Fi',
  'secret = wifi-secret',
  'attribute.ssid = home',
  '[/org/freedesktop/secrets/collection/login/14]',
  'label = app token',
  'secret = app-secret',
  'attribute.application = my-app',
  'attribute.user = me',
  ''
].join('\n')

function runner(stdout: string, exitCode = 0, stderr = ''): CommandRunner {
  return vi.fn(async () => ({ stdout, stderr, exitCode }))
}

async function collect(source: AsyncIterable<RecordInput>): Promise<RecordInput[]> {
  const records: RecordInput[] = []
  for await (const record of source) {
    records.push(record)
  }
  return records
}

describe('parseSecretToolOutput', () => {
  it('splits items and keeps attributes in order', () => {
    const items = parseSecretToolOutput(OUTPUT)
    expect(items).toHaveLength(3)
    expect(items[0].path).toBe('/org/freedesktop/secrets/collection/login/12')
    expect(items[0].label).toBe("Password for 'octo' on 'github.com'")
    expect(items[0].secret).toBe('test-secret = with equals')
    expect([...items[0].attributes]).toEqual([
      ['service', 'github.com'],
      ['username', 'octo'],
      ['xdg:schema', 'org.freedesktop.Secret.Generic']
    ])
  })

  it('ignores lines before the first item', () => {
    expect(parseSecretToolOutput('garbage = 1\n')).toEqual([])
  })

  it('handles empty output', () => {
    expect(parseSecretToolOutput('')).toEqual([])
  })
})

describe('secretItemToRecord', () => {
  it('maps service, username and secret', () => {
    const [item] = parseSecretToolOutput(OUTPUT)
    const record = secretItemToRecord(item)
    expect(record).toMatchObject({ service: 'github.com', username: 'octo', password: 'test-secret = with equals' })
  })

  it('falls back to application and user', () => {
    const item = parseSecretToolOutput(OUTPUT)[2]
    expect(secretItemToRecord(item)).toMatchObject({ service: 'my-app', username: 'me', password: 'app-secret' })
  })

  it('returns null without a service', () => {
    expect(secretItemToRecord(parseSecretToolOutput(OUTPUT)[1])).toBeNull()
  })

  it('returns null without a secret', () => {
    expect(secretItemToRecord({ path: '/x', attributes: new Map([['service', 's']]) })).toBeNull()
  })
})

describe('SecretToolSource', () => {
  it('runs a search with the configured attributes', async () => {
    const run = runner(OUTPUT)
    const source = new SecretToolSource({ attributes: { 'xdg:schema': 'org.freedesktop.Secret.Generic' }, run })

    const records = await collect(source)

    expect(run).toHaveBeenCalledWith('secret-tool', [
      'search', '--all', '--unlock', 'xdg:schema', 'org.freedesktop.Secret.Generic'
    ])
    expect(records.map(record => record.service)).toEqual(['github.com', 'my-app'])
  })

  it('uses a custom command', async () => {
    const run = runner('')
    await collect(new SecretToolSource({ command: '/opt/bin/secret-tool', attributes: { a: 'b' }, run }))
    expect(run).toHaveBeenCalledWith('/opt/bin/secret-tool', ['search', '--all', '--unlock', 'a', 'b'])
  })

  it('treats a silent non-zero exit as no matches', async () => {
    const records = await collect(new SecretToolSource({ attributes: { a: 'b' }, run: runner('', 1) }))
    expect(records).toEqual([])
  })

  it('fails on a non-zero exit with output', async () => {
    const source = new SecretToolSource({ attributes: { a: 'b' }, run: runner('', 1, 'Cannot autolaunch D-Bus\n') })
    await expect(collect(source)).rejects.toThrow('Credential source unavailable: secret-tool exited with code 1: Cannot autolaunch D-Bus')
  })

  it('explains a missing binary', async () => {
    const missing = Object.assign(new Error('spawn secret-tool ENOENT'), { code: 'ENOENT' })
    const source = new SecretToolSource({ attributes: { a: 'b' }, run: vi.fn(async () => { throw missing }) })
    await expect(collect(source)).rejects.toMatchObject({
      message: 'Credential source unavailable: secret-tool not found',
      suggestion: 'Install libsecret-tools (Debian/Ubuntu) or libsecret (Fedora/Arch)'
    })
  })

  it('requires an attribute filter', () => {
    expect(() => new SecretToolSource({ attributes: {}, run: runner('') })).toThrow(SourceUnavailableError)
  })

  it('can only be iterated once', async () => {
    const source = new SecretToolSource({ attributes: { a: 'b' }, run: runner(OUTPUT) })
    await collect(source)
    await expect(collect(source)).rejects.toThrow('secret-tool source can only be read once')
  })
})
