/**
 * Tests for color detection
 */

import { describe, it, expect } from 'vitest'
import { isColorEnabled } from '../../src/cli/lib/colors.js'

describe('isColorEnabled', () => {
  it('follows the terminal by default', () => {
    expect(isColorEnabled({}, true)).toBe(true)
    expect(isColorEnabled({}, false)).toBe(false)
  })

  it('respects NO_COLOR even on a terminal', () => {
    expect(isColorEnabled({ NO_COLOR: '' }, true)).toBe(false)
  })

  it('forces color with FORCE_COLOR', () => {
    expect(isColorEnabled({ FORCE_COLOR: '1' }, false)).toBe(true)
  })

  it('lets NO_COLOR win over FORCE_COLOR', () => {
    expect(isColorEnabled({ NO_COLOR: '1', FORCE_COLOR: '1' }, true)).toBe(false)
  })
})
