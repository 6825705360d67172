/**
 * @tandem/cli - Command line interface for tandem.
 *
 * A thin argument parsing layer; project and pipeline logic lives in the
 * engine package.
 */

import { Command } from 'commander'

import { registerBuildCommand } from './commands/build.js'
import { registerRunCommand } from './commands/run.js'
import { type CliContext, formatError } from './helpers.js'

export { ConsoleReporter } from './reporter.js'
export type { ConsoleReporterOptions } from './reporter.js'
export { formatError, withEventSink } from './helpers.js'
export type { CliContext, GlobalOptions } from './helpers.js'

export const VERSION = '0.1.0'

/**
 * Create the CLI program.
 */
export function createProgram(context: CliContext = {}): Command {
  const program = new Command()
    .name('tandem')
    .description('Run multi-project pipelines, each project in its own environment')
    .version(VERSION)
    .option('--log-file <path>', 'Write lifecycle events to a JSONL file')
    .option('--verbose', 'Show debug events')

  registerRunCommand(program, context)
  registerBuildCommand(program, context)

  return program
}

/**
 * Main entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram({ interactive: process.stderr.isTTY === true })

  try {
    await program.parseAsync(argv)
  } catch (error) {
    console.error(formatError(error))
    process.exit(1)
  }
}
