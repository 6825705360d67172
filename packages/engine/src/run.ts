/**
 * Pipeline and build orchestration.
 *
 * Steps run strictly in order: each one is parsed, its project is loaded
 * and the command is awaited before the next step is looked at. The first
 * failure stops the pipeline and is re-thrown unchanged.
 */

import type { InstallAction } from './install-plan.js'
import { Pipeline, type PipelineOptions } from './pipeline.js'
import { type InstallOptions, Project, type ProjectOptions } from './project.js'
import { type ParsedStep, parseStep } from './step.js'

/**
 * Outcome of one pipeline step.
 */
export interface StepResult extends ParsedStep {
  /** Step as declared in the pipeline */
  step: string
  /** Captured standard output */
  stdout: string
  durationMs: number
}

/**
 * Run every step of `pipeline` in declared order.
 *
 * @returns One result per step
 * @throws StepParseError, MissingDescriptorError or EnvironmentExecutionError
 *   from the first failing step
 */
export async function runPipeline(pipeline: Pipeline): Promise<StepResult[]> {
  const events = pipeline.events
  const steps = pipeline.steps
  const startTime = Date.now()
  const results: StepResult[] = []

  events.emit({ event: 'pipeline_started', pipeline: pipeline.path, steps })

  for (const [index, step] of steps.entries()) {
    events.emit({
      event: 'step_started',
      pipeline: pipeline.path,
      step,
      index,
      total: steps.length,
    })
    const stepStart = Date.now()

    try {
      const parsed = parseStep(step)
      const project = await pipeline.createProject(parsed.component)
      const stdout = await pipeline.runStep(project, parsed.command, parsed.subcommand)
      const durationMs = Date.now() - stepStart

      events.emit({
        event: 'step_completed',
        pipeline: pipeline.path,
        step,
        index,
        stdout,
        durationMs,
      })
      results.push({ ...parsed, step, stdout, durationMs })
    } catch (error) {
      events.emit({
        event: 'step_failed',
        pipeline: pipeline.path,
        step,
        index,
        error: error instanceof Error ? error.message : String(error),
      })
      throw error
    }
  }

  events.emit({
    event: 'pipeline_completed',
    pipeline: pipeline.path,
    steps: steps.length,
    totalDurationMs: Date.now() - startTime,
  })
  return results
}

/**
 * Load the pipeline at `path` and run it.
 */
export async function runPipelineAt(
  path: string,
  options: PipelineOptions = {}
): Promise<StepResult[]> {
  const pipeline = await Pipeline.load(path, options)
  return runPipeline(pipeline)
}

/**
 * Make sure the project at `path` is installed in its environment.
 *
 * @returns The install action taken
 */
export async function buildProject(
  path: string,
  options: ProjectOptions & InstallOptions = {}
): Promise<InstallAction> {
  const project = await Project.load(path, {
    events: options.events,
    environmentFactory: options.environmentFactory,
  })
  return project.install({ force: options.force, strategy: options.strategy })
}
