/**
 * Safe command execution using argv arrays (no shell interpolation).
 *
 * Every argument reaches the child process as exactly one argv entry, so
 * embedded whitespace or quotes are never re-split.
 */

import { spawn } from 'node:child_process'

import { EnvironmentExecutionError } from '@tandem/core'

/**
 * Result of a command execution.
 */
export interface ExecResult {
  /** Exit code from the process (-1 if it was killed or never started) */
  exitCode: number
  /** Standard output from the command */
  stdout: string
  /** Standard error from the command */
  stderr: string
}

/**
 * Options for command execution.
 */
export interface ExecOptions {
  /** Working directory for the command (defaults to cwd) */
  cwd?: string | undefined
  /** Environment variables to add/override */
  env?: Record<string, string> | undefined
  /** Timeout in milliseconds (default: none) */
  timeout?: number | undefined
  /** If true, don't throw on non-zero exit code */
  ignoreExitCode?: boolean | undefined
  /** Environment name reported in errors */
  environment?: string | undefined
}

/**
 * Quote a string for shell display if it contains special characters.
 */
export function shellQuote(str: string): string {
  if (/^[a-zA-Z0-9_./:=@%+-]+$/.test(str)) {
    return str
  }
  return `'${str.replace(/'/g, "'\\''")}'`
}

/**
 * Format an argv array as a copy-pasteable shell command.
 */
export function formatCommand(argv: string[]): string {
  return argv.map(shellQuote).join(' ')
}

/**
 * Execute a command safely using an argv array (no shell).
 *
 * @param argv - Executable followed by its arguments
 * @returns Result containing exitCode, stdout, and stderr
 * @throws EnvironmentExecutionError if the command fails (unless ignoreExitCode is true),
 *   cannot be started, or times out
 *
 * @example
 * ```typescript
 * const result = await execCommand(['poetry', 'env', 'info', '--path'], {
 *   cwd: projectPath,
 *   ignoreExitCode: true,
 * })
 * ```
 */
export function execCommand(argv: string[], options: ExecOptions = {}): Promise<ExecResult> {
  const { cwd, env, timeout, ignoreExitCode = false } = options
  const environment = options.environment ?? 'system'
  const [file, ...args] = argv
  const command = formatCommand(argv)

  if (file === undefined) {
    return Promise.reject(new EnvironmentExecutionError(environment, command, -1, 'Empty command'))
  }

  // Build spawn options, only include cwd if defined
  const spawnOptions: {
    cwd?: string
    env?: NodeJS.ProcessEnv
    stdio: ['ignore', 'pipe', 'pipe']
  } = {
    stdio: ['ignore', 'pipe', 'pipe'],
  }
  if (cwd !== undefined) {
    spawnOptions.cwd = cwd
  }
  if (env !== undefined) {
    spawnOptions.env = { ...process.env, ...env }
  }

  return new Promise<ExecResult>((resolve, reject) => {
    const proc = spawn(file, args, spawnOptions)
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let settled = false

    let timeoutId: ReturnType<typeof setTimeout> | undefined
    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        if (settled) return
        settled = true
        proc.kill()
        reject(
          new EnvironmentExecutionError(environment, command, -1, `Timeout exceeded (${timeout}ms)`)
        )
      }, timeout)
    }

    proc.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk))
    proc.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk))

    proc.on('error', (error) => {
      if (timeoutId) clearTimeout(timeoutId)
      if (settled) return
      settled = true
      reject(new EnvironmentExecutionError(environment, command, -1, error.message))
    })

    proc.on('close', (code) => {
      if (timeoutId) clearTimeout(timeoutId)
      if (settled) return
      settled = true

      const result: ExecResult = {
        exitCode: code ?? -1,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
      }

      if (result.exitCode !== 0 && !ignoreExitCode) {
        reject(
          new EnvironmentExecutionError(
            environment,
            command,
            result.exitCode,
            result.stderr || result.stdout
          )
        )
        return
      }

      resolve(result)
    })
  })
}
