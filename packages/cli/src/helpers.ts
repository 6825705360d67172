/**
 * Shared CLI helper utilities.
 */

import { resolve } from 'node:path'

import chalk from 'chalk'
import type { Command } from 'commander'

import {
  type EventSink,
  JsonlEventSink,
  StepParseError,
  fanOut,
  isConfigError,
  isEnvironmentError,
  isTandemError,
} from '@tandem/core'
import type { ProjectOptions } from '@tandem/engine'

import { ConsoleReporter } from './reporter.js'

/**
 * Options accepted by the program itself, ahead of any command.
 */
export type GlobalOptions = {
  logFile?: string | undefined
  verbose?: boolean | undefined
}

/**
 * What commands need from whoever builds the program.
 */
export interface CliContext extends Pick<ProjectOptions, 'environmentFactory'> {
  /** Terminal is interactive, so installs get a spinner */
  interactive?: boolean | undefined
}

export function readGlobalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>()
}

/**
 * Run `fn` with an event sink that reports to the console and, with
 * `--log-file`, appends JSONL events to that file.
 */
export async function withEventSink<T>(
  options: GlobalOptions,
  context: CliContext,
  fn: (events: EventSink) => Promise<T>
): Promise<T> {
  const reporter = new ConsoleReporter({
    verbose: options.verbose,
    spinner: context.interactive === true && options.verbose !== true,
  })
  const sinks: EventSink[] = [reporter]

  let log: JsonlEventSink | undefined
  if (options.logFile) {
    log = new JsonlEventSink({ outputPath: resolve(options.logFile) })
    await log.init()
    sinks.push(log)
  }

  try {
    const result = await fn(fanOut(...sinks))
    reporter.finish(true)
    return result
  } catch (error) {
    reporter.finish(false)
    throw error
  } finally {
    await log?.close()
  }
}

/**
 * Format error for display.
 */
export function formatError(error: unknown): string {
  if (isTandemError(error)) {
    const lines: string[] = [chalk.red(`Error: ${error.message}`)]
    if (error instanceof StepParseError) {
      lines.push(chalk.gray('  Steps take the form component:command[:subcommand]'))
    } else if (isConfigError(error)) {
      lines.push(chalk.gray(`  Descriptor: ${error.source}`))
    } else if (isEnvironmentError(error)) {
      lines.push(chalk.gray(`  Environment: ${error.environment}`))
    }
    return lines.join('\n')
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`)
  }

  return chalk.red(`Error: ${String(error)}`)
}
