/**
 * Run command - execute every step of a pipeline in order.
 */

import { resolve } from 'node:path'

import type { Command } from 'commander'

import { runPipelineAt } from '@tandem/engine'

import { type CliContext, readGlobalOptions, withEventSink } from '../helpers.js'
import { formatDuration, formatPath, summaryBlock } from '../ui.js'

export function registerRunCommand(program: Command, context: CliContext = {}): void {
  program
    .command('run')
    .description('Run the steps of a pipeline, installing projects as needed')
    .argument('<pipeline>', 'Pipeline directory containing pyproject.toml')
    .action(async (pipeline: string, _options: object, command: Command) => {
      const globals = readGlobalOptions(command)
      const pipelinePath = resolve(pipeline)
      const startTime = Date.now()

      const results = await withEventSink(globals, context, (events) =>
        runPipelineAt(pipelinePath, { events, environmentFactory: context.environmentFactory })
      )

      summaryBlock([
        { label: 'pipeline', value: formatPath(pipelinePath) },
        { label: 'steps', value: String(results.length) },
        { label: 'duration', value: formatDuration(Date.now() - startTime) },
      ])
    })
}
