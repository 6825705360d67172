/**
 * Tests for the console reporter.
 */

import { stripVTControlCharacters as strip } from 'node:util'
import { afterEach, describe, expect, test, vi } from 'vitest'

import type { TandemEventInput } from '@tandem/core'

import { ConsoleReporter } from './reporter.js'
import { symbols } from './ui.js'

function captureConsole() {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {})
  const error = vi.spyOn(console, 'error').mockImplementation(() => {})
  return {
    out: () => log.mock.calls.map((args) => strip(args.map(String).join(' '))),
    err: () => error.mock.calls.map((args) => strip(args.map(String).join(' '))),
  }
}

const project = { project: 'a', path: '/p/a', environment: 'a-env' }

describe('ConsoleReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  test('prints install events with the info symbol', () => {
    const output = captureConsole()
    new ConsoleReporter().emit({ event: 'install_started', ...project })

    expect(output.out()).toEqual([
      `${strip(symbols.info)} Installing project 'a' from '/p/a' into virtual environment 'a-env'`,
    ])
  })

  test('prints skipped installs muted with a bullet', () => {
    const output = captureConsole()
    new ConsoleReporter().emit({ event: 'install_skipped', ...project })

    expect(output.out()).toEqual([
      `${strip(symbols.bullet)} Project 'a' at '/p/a' already installed in virtual environment 'a-env'`,
    ])
  })

  test('hides debug events unless verbose', () => {
    const event: TandemEventInput = {
      event: 'command_started',
      argv: ['train', '--typeo', '/p'],
      ...project,
    }

    const quiet = captureConsole()
    new ConsoleReporter().emit(event)
    expect(quiet.out()).toEqual([])

    new ConsoleReporter({ verbose: true }).emit(event)
    expect(quiet.out()).toEqual(["Running 'train --typeo /p' in virtual environment 'a-env'"])
  })

  test('prints step output without trailing newlines', () => {
    const output = captureConsole()
    const reporter = new ConsoleReporter()
    const step = { pipeline: '/p', step: 'a:train', index: 0, durationMs: 5 }

    reporter.emit({ event: 'step_completed', stdout: 'epoch 1\nepoch 2\n', ...step })
    reporter.emit({ event: 'step_completed', stdout: '', ...step })

    expect(output.out()).toEqual(['epoch 1\nepoch 2'])
  })

  test('prints step failures to stderr', () => {
    const output = captureConsole()
    new ConsoleReporter().emit({
      event: 'step_failed',
      pipeline: '/p',
      step: 'a:build',
      index: 0,
      error: 'boom',
    })

    expect(output.out()).toEqual([])
    expect(output.err()).toEqual([`${strip(symbols.error)} Step 'a:build' failed: boom`])
  })

  test('shows step headers when verbose', () => {
    const output = captureConsole()
    new ConsoleReporter({ verbose: true }).emit({
      event: 'step_started',
      pipeline: '/p',
      step: 'b:test:unit',
      index: 1,
      total: 3,
    })

    expect(output.out()).toEqual([`${strip(symbols.pointer)} Step 2/3: b:test:unit`])
  })
})
