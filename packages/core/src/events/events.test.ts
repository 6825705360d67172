/**
 * Tests for lifecycle events and sinks.
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'

import {
  JsonlEventSink,
  MemoryEventSink,
  type TandemEventInput,
  fanOut,
  formatEvent,
  stampEvent,
} from './index.js'

const installStarted = {
  event: 'install_started',
  project: 'a',
  path: '/p/a',
  environment: 'a-env',
} satisfies TandemEventInput

describe('stampEvent', () => {
  test('adds timestamp and level', () => {
    const event = stampEvent(installStarted)
    expect(event.level).toBe('info')
    expect(Number.isNaN(Date.parse(event.timestamp))).toBe(false)
  })

  test('command events are debug level', () => {
    const event = stampEvent({
      event: 'command_started',
      project: 'a',
      path: '/p/a',
      environment: 'a-env',
      argv: ['train'],
    })
    expect(event.level).toBe('debug')
  })
})

describe('MemoryEventSink', () => {
  test('collects events in order', () => {
    const sink = new MemoryEventSink()
    sink.emit(installStarted)
    sink.emit({ ...installStarted, event: 'install_skipped' })
    expect(sink.names()).toEqual(['install_started', 'install_skipped'])
  })
})

describe('fanOut', () => {
  test('forwards to every sink', () => {
    const first = new MemoryEventSink()
    const second = new MemoryEventSink()
    fanOut(first, second).emit(installStarted)
    expect(first.names()).toEqual(['install_started'])
    expect(second.names()).toEqual(['install_started'])
  })
})

describe('JsonlEventSink', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tandem-events-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  test('writes one JSON object per line', async () => {
    const outputPath = join(tempDir, 'logs', 'run.jsonl')
    const sink = new JsonlEventSink({ outputPath })
    await sink.init()
    sink.emit(installStarted)
    sink.emit({ event: 'pipeline_completed', pipeline: '/p', steps: 2, totalDurationMs: 5 })
    await sink.close()

    const lines = (await readFile(outputPath, 'utf8')).trim().split('\n')
    expect(lines).toHaveLength(2)
    const first: unknown = JSON.parse(lines[0] ?? '')
    expect(first).toMatchObject({ event: 'install_started', project: 'a', level: 'info' })
    const second: unknown = JSON.parse(lines[1] ?? '')
    expect(second).toMatchObject({ event: 'pipeline_completed', steps: 2, level: 'debug' })
  })

  test('ignores events after close', async () => {
    const outputPath = join(tempDir, 'run.jsonl')
    const sink = new JsonlEventSink({ outputPath })
    await sink.init()
    await sink.close()
    sink.emit(installStarted)
    expect(await readFile(outputPath, 'utf8')).toBe('')
  })

  test('init rejects when the path cannot be opened', async () => {
    const sink = new JsonlEventSink({ outputPath: tempDir })
    await expect(sink.init()).rejects.toMatchObject({ code: 'EISDIR' })

    sink.emit(installStarted)
    await expect(sink.close()).rejects.toMatchObject({ code: 'EISDIR' })
  })
})

describe('formatEvent', () => {
  test('install messages', () => {
    expect(formatEvent(installStarted)).toBe(
      "Installing project 'a' from '/p/a' into virtual environment 'a-env'"
    )
    expect(formatEvent({ ...installStarted, event: 'install_skipped' })).toBe(
      "Project 'a' at '/p/a' already installed in virtual environment 'a-env'"
    )
    expect(
      formatEvent({ ...installStarted, event: 'install_updating', strategy: 'reinstall' })
    ).toBe("Updating project 'a' from '/p/a' in virtual environment 'a-env'")
  })

  test('step messages', () => {
    expect(
      formatEvent({ event: 'step_started', pipeline: '/p', step: 'a:build', index: 0, total: 2 })
    ).toBe('Step 1/2: a:build')
    expect(
      formatEvent({
        event: 'step_completed',
        pipeline: '/p',
        step: 'a:build',
        index: 0,
        stdout: 'built',
        durationMs: 1,
      })
    ).toBe('built')
  })
})
