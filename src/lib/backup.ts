/**
 * Backup Guard
 *
 * Copies the target container to a fixed sibling path before it is opened
 * for mutation, and verifies the copy by SHA256. A previous backup at the
 * same path is overwritten (no rotation).
 */

import fs from 'node:fs/promises'
import { createHash } from 'node:crypto'
import { BackupFailedError, errorMessage } from './errors.js'

export const BACKUP_SUFFIX = '.backup'

export interface BackupInfo {
  sourcePath: string
  backupPath: string
  bytes: number
  checksum: string
}

/**
 * Fixed backup location for a container path
 *
 * @example
 * getBackupPath('/home/me/keyring.kdbx') // '/home/me/keyring.kdbx.backup'
 */
export function getBackupPath(containerPath: string): string {
  return `${containerPath}${BACKUP_SUFFIX}`
}

/**
 * Calculate SHA256 checksum of data
 */
export function calculateChecksum(data: Buffer): string {
  return `sha256:${createHash('sha256').update(data).digest('hex')}`
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/**
 * Back up `containerPath` if it exists.
 *
 * @returns null when there is nothing to back up
 * @throws BackupFailedError when the copy cannot be written or does not match
 */
export async function backupContainer(containerPath: string): Promise<BackupInfo | null> {
  if (!(await pathExists(containerPath))) {
    return null
  }

  const backupPath = getBackupPath(containerPath)

  let original: Buffer
  try {
    original = await fs.readFile(containerPath)
    await fs.copyFile(containerPath, backupPath)
  } catch (err) {
    throw new BackupFailedError(containerPath, backupPath, errorMessage(err), err)
  }

  let copy: Buffer
  try {
    copy = await fs.readFile(backupPath)
  } catch (err) {
    throw new BackupFailedError(containerPath, backupPath, `cannot read back copy: ${errorMessage(err)}`, err)
  }

  const expected = calculateChecksum(original)
  const actual = calculateChecksum(copy)
  if (expected !== actual) {
    throw new BackupFailedError(containerPath, backupPath, `checksum mismatch (expected ${expected}, got ${actual})`)
  }

  return {
    sourcePath: containerPath,
    backupPath,
    bytes: copy.length,
    checksum: actual
  }
}
