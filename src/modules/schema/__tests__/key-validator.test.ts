/**
 * Unit tests for key-validator.ts
 */

import { describe, it, expect } from 'vitest'
import { isValidKey } from '../key-validator.js'

describe('isValidKey', () => {
  it.each(['one', 'ONE', 'database_url', '_private', 'v2', '42'])('accepts %s', (key) => {
    expect(isValidKey(key)).toBe(true)
  })

  it.each(['', 'two.three', 'with space', 'dash-ed', 'ümlaut', '$$typeof'])('rejects %j', (key) => {
    expect(isValidKey(key)).toBe(false)
  })
})
