/**
 * Tests for run logging
 */

import { describe, it, expect } from 'vitest'
import { createStderrLogger, resolveLogLevel, silentLogger } from '../../src/lib/logger.js'

function capture(options: { verbose?: boolean; quiet?: boolean } = {}) {
  const lines: string[] = []
  const logger = createStderrLogger({ ...options, write: line => { lines.push(line) } })
  logger.debug('debug line')
  logger.info('info line')
  logger.warn('warn line')
  logger.error('error line')
  return lines
}

describe('resolveLogLevel', () => {
  it('defaults to info', () => {
    expect(resolveLogLevel({})).toBe('info')
  })

  it('verbose shows debug', () => {
    expect(resolveLogLevel({ verbose: true })).toBe('debug')
  })

  it('quiet wins over verbose', () => {
    expect(resolveLogLevel({ verbose: true, quiet: true })).toBe('warn')
  })
})

describe('createStderrLogger', () => {
  it('prefixes lines and labels non-info levels', () => {
    expect(capture()).toEqual([
      '[keyring2kdbx] info line',
      '[keyring2kdbx] warn: warn line',
      '[keyring2kdbx] error: error line'
    ])
  })

  it('includes debug when verbose', () => {
    expect(capture({ verbose: true })[0]).toBe('[keyring2kdbx] debug: debug line')
  })

  it('only shows warnings and errors when quiet', () => {
    expect(capture({ quiet: true })).toEqual([
      '[keyring2kdbx] warn: warn line',
      '[keyring2kdbx] error: error line'
    ])
  })
})

describe('silentLogger', () => {
  it('accepts every level', () => {
    expect(() => {
      silentLogger.debug('x')
      silentLogger.info('x')
      silentLogger.warn('x')
      silentLogger.error('x')
    }).not.toThrow()
  })
})
