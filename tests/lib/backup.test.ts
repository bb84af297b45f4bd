/**
 * Tests for the backup guard
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { createHash } from 'node:crypto'
import { backupContainer, calculateChecksum, getBackupPath, BACKUP_SUFFIX } from '../../src/lib/backup.js'
import { BackupFailedError } from '../../src/lib/errors.js'

describe('backup', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keyring2kdbx-backup-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  describe('getBackupPath', () => {
    it('appends the backup suffix', () => {
      expect(BACKUP_SUFFIX).toBe('.backup')
      expect(getBackupPath('/home/me/keyring.kdbx')).toBe('/home/me/keyring.kdbx.backup')
    })
  })

  describe('calculateChecksum', () => {
    it('prefixes the sha256 hex digest', () => {
      const data = Buffer.from('hello')
      const hex = createHash('sha256').update(data).digest('hex')
      expect(calculateChecksum(data)).toBe(`sha256:${hex}`)
    })
  })

  describe('backupContainer', () => {
    it('returns null when the container does not exist', async () => {
      const target = path.join(tempDir, 'missing.kdbx')
      expect(await backupContainer(target)).toBeNull()
      expect(fs.existsSync(getBackupPath(target))).toBe(false)
    })

    it('writes a byte-identical copy', async () => {
      const target = path.join(tempDir, 'db.kdbx')
      const bytes = Buffer.from([0x03, 0xd9, 0xa2, 0x9a, 0x67, 0xfb, 0x4b, 0xb5, 0x00, 0xff])
      fs.writeFileSync(target, bytes)

      const info = await backupContainer(target)

      expect(info).toEqual({
        sourcePath: target,
        backupPath: `${target}.backup`,
        bytes: 10,
        checksum: calculateChecksum(bytes)
      })
      expect(fs.readFileSync(`${target}.backup`).equals(bytes)).toBe(true)
    })

    it('overwrites a previous backup', async () => {
      const target = path.join(tempDir, 'db.kdbx')
      fs.writeFileSync(`${target}.backup`, 'stale')
      fs.writeFileSync(target, 'fresh')

      await backupContainer(target)

      expect(fs.readFileSync(`${target}.backup`, 'utf-8')).toBe('fresh')
    })

    it('fails closed when the copy cannot be written', async () => {
      const target = path.join(tempDir, 'db.kdbx')
      fs.writeFileSync(target, 'data')
      // A directory in the way of the backup file
      fs.mkdirSync(`${target}.backup`)

      await expect(backupContainer(target)).rejects.toBeInstanceOf(BackupFailedError)
      await expect(backupContainer(target)).rejects.toMatchObject({ code: 'BACKUP_FAILED' })
    })
  })
})
