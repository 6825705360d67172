/**
 * Tests for terminal UI formatting.
 */

import { describe, expect, test } from 'vitest'

import { formatDuration, formatPath } from './ui.js'

describe('formatPath', () => {
  test('shortens a leading home directory', () => {
    expect(formatPath('/home/dev/pipelines/train', '/home/dev')).toBe('~/pipelines/train')
    expect(formatPath('/home/dev', '/home/dev')).toBe('~')
  })

  test('leaves the home path alone anywhere but the start', () => {
    expect(formatPath('/mnt/home/dev/data', '/home/dev')).toBe('/mnt/home/dev/data')
    expect(formatPath('/home/developer/x', '/home/dev')).toBe('/home/developer/x')
  })

  test('returns the path unchanged without a home directory', () => {
    expect(formatPath('/srv/p', '')).toBe('/srv/p')
  })
})

describe('formatDuration', () => {
  test('milliseconds below one second, seconds above', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(1500)).toBe('1.5s')
  })
})
