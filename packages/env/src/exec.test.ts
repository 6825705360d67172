/**
 * Tests for the exec module.
 *
 * The running node binary stands in for the external tools.
 */

import { mkdtemp, realpath, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, test } from 'vitest'

import { EnvironmentExecutionError } from '@tandem/core'

import { execCommand, formatCommand, shellQuote } from './exec.js'

const node = process.execPath

describe('execCommand', () => {
  test('passes each argument as a single argv entry', async () => {
    const result = await execCommand([
      node,
      '-e',
      'process.stdout.write(JSON.stringify(process.argv.slice(1)))',
      'cd /home && echo $PWD',
      "it's",
    ])
    expect(result.exitCode).toBe(0)
    expect(JSON.parse(result.stdout)).toEqual(['cd /home && echo $PWD', "it's"])
  })

  test('captures stderr separately', async () => {
    const result = await execCommand([node, '-e', 'process.stderr.write("warn")'])
    expect(result.stdout).toBe('')
    expect(result.stderr).toBe('warn')
  })

  test('rejects with exit code and stderr on failure', async () => {
    const promise = execCommand(
      [node, '-e', 'process.stderr.write("bad"); process.exit(4)'],
      { environment: 'proj' }
    )
    await expect(promise).rejects.toBeInstanceOf(EnvironmentExecutionError)
    await expect(promise).rejects.toMatchObject({
      exitCode: 4,
      stderr: 'bad',
      environment: 'proj',
    })
  })

  test('returns non-zero results with ignoreExitCode', async () => {
    const result = await execCommand([node, '-e', 'process.exit(4)'], { ignoreExitCode: true })
    expect(result.exitCode).toBe(4)
  })

  test('rejects when the executable does not exist', async () => {
    await expect(execCommand(['/nonexistent/tandem-tool'])).rejects.toMatchObject({
      exitCode: -1,
    })
  })

  test('rejects an empty command', async () => {
    await expect(execCommand([])).rejects.toMatchObject({ exitCode: -1, stderr: 'Empty command' })
  })

  test('kills the process on timeout', async () => {
    await expect(
      execCommand([node, '-e', 'setTimeout(() => {}, 10000)'], { timeout: 100 })
    ).rejects.toMatchObject({ exitCode: -1, stderr: 'Timeout exceeded (100ms)' })
  })

  test('merges extra environment variables', async () => {
    const result = await execCommand(
      [node, '-e', 'process.stdout.write(process.env.TANDEM_TEST_VALUE ?? "")'],
      { env: { TANDEM_TEST_VALUE: 'placeholder' } }
    )
    expect(result.stdout).toBe('placeholder')
  })

  test('runs in the given working directory', async () => {
    const tempDir = await mkdtemp(join(tmpdir(), 'tandem-exec-'))
    try {
      const result = await execCommand([node, '-e', 'process.stdout.write(process.cwd())'], {
        cwd: tempDir,
      })
      expect(result.stdout).toBe(await realpath(tempDir))
    } finally {
      await rm(tempDir, { recursive: true, force: true })
    }
  })
})

describe('formatCommand', () => {
  test('leaves plain arguments unquoted', () => {
    expect(formatCommand(['poetry', 'run', 'train', '--typeo', '/p:train'])).toBe(
      'poetry run train --typeo /p:train'
    )
  })

  test('quotes arguments with spaces', () => {
    expect(shellQuote('/path with spaces')).toBe("'/path with spaces'")
  })

  test('escapes single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'")
  })
})
