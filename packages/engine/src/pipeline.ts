/**
 * Pipelines: ordered steps over sibling projects.
 */

import { join } from 'node:path'

import {
  type EventSink,
  MissingKeyError,
  ProjectConfig,
  type TypeoTable,
  isTomlTable,
  nullEventSink,
} from '@tandem/core'

import { Project, ProjectBase, type ProjectOptions } from './project.js'

/** Flag that precedes the override argument on every step command */
export const DEFAULT_OVERRIDE_FLAG = '--typeo'

export interface PipelineOptions extends ProjectOptions {
  /** Override flag passed to step commands (default: --typeo) */
  overrideFlag?: string | undefined
}

/**
 * A pipeline directory. Its steps run commands in the projects that live
 * in its subdirectories; the pipeline itself has no environment.
 */
export class Pipeline extends ProjectBase {
  readonly overrideFlag: string

  private readonly stepList: string[]
  private readonly typeo: TypeoTable
  private readonly options: ProjectOptions
  private readonly sink: EventSink

  /**
   * @throws MissingKeyError if `[tool.tandem].steps` or `[tool.typeo]` is absent
   */
  constructor(descriptor: ProjectConfig, options: PipelineOptions = {}) {
    super(descriptor)

    const steps = descriptor.tandem().steps
    if (steps === undefined) {
      throw new MissingKeyError(
        'tool.tandem.steps',
        descriptor.source,
        "Add a 'steps' list to the [tool.tandem] table."
      )
    }
    this.stepList = steps
    this.typeo = descriptor.typeo()

    this.overrideFlag = options.overrideFlag ?? DEFAULT_OVERRIDE_FLAG
    this.sink = options.events ?? nullEventSink
    this.options = { events: options.events, environmentFactory: options.environmentFactory }
  }

  /**
   * Load the pipeline rooted at `path`.
   *
   * @throws MissingDescriptorError if `path` has no pyproject.toml
   * @throws MissingKeyError if a required table is absent
   */
  static async load(path: string, options: PipelineOptions = {}): Promise<Pipeline> {
    const descriptor = await ProjectConfig.load(path, 'Pipeline')
    return new Pipeline(descriptor, options)
  }

  /** Ordered step descriptors */
  get steps(): string[] {
    return [...this.stepList]
  }

  /** `[tool.typeo]` table */
  get typeoConfig(): TypeoTable {
    return structuredClone(this.typeo)
  }

  /** Names registered under `[tool.typeo].scripts`, as a list or as table keys */
  get scripts(): string[] {
    const scripts = this.typeo.scripts
    if (Array.isArray(scripts)) {
      return [...scripts]
    }
    return isTomlTable(scripts) ? Object.keys(scripts) : []
  }

  /** Sink the pipeline and its projects report to */
  get events(): EventSink {
    return this.sink
  }

  /**
   * Project rooted at `<pipeline path>/<name>`, fresh for every call.
   *
   * @throws MissingDescriptorError if that directory has no pyproject.toml
   */
  createProject(name: string): Promise<Project> {
    return Project.load(join(this.path, name), this.options)
  }

  /**
   * Override argument for a step:
   * - `<path>` for an unregistered command
   * - `<path>:<command>` for a registered script
   * - `<path>:<command>:<subcommand>` for a registered script with a subcommand
   * - `<path>::<subcommand>` for an unregistered command with a subcommand
   */
  buildOverrideArgument(command: string, subcommand?: string): string {
    let argument = this.path
    if (this.scripts.includes(command)) {
      argument += `:${command}`
      if (subcommand !== undefined) {
        argument += `:${subcommand}`
      }
    } else if (subcommand !== undefined) {
      argument += `::${subcommand}`
    }
    return argument
  }

  /**
   * Run `command` in `project`'s environment with this pipeline's overrides.
   *
   * @returns Captured standard output
   */
  runStep(project: Project, command: string, subcommand?: string): Promise<string> {
    return project.run(command, this.overrideFlag, this.buildOverrideArgument(command, subcommand))
  }
}
