/**
 * Projects: a filesystem root, its descriptor and its environment.
 */

import {
  type DescriptorData,
  type EventSink,
  ProjectConfig,
  type TandemTable,
  nullEventSink,
} from '@tandem/core'
import { type Environment, type EnvironmentFactory, environmentFactory } from '@tandem/env'

import {
  type EnvironmentState,
  type InstallAction,
  type ResyncStrategy,
  decideInstall,
} from './install-plan.js'

/**
 * Options shared by projects and pipelines.
 */
export interface ProjectOptions {
  /** Receives lifecycle events (default: discarded) */
  events?: EventSink | undefined
  /** Builds the project's environment (default: from `[tool.tandem].environment`) */
  environmentFactory?: EnvironmentFactory | undefined
}

export interface InstallOptions {
  /** Re-sync even when the project is already installed */
  force?: boolean | undefined
  /** Capability used for a forced re-sync (default: reinstall) */
  strategy?: ResyncStrategy | undefined
}

/**
 * A directory with a pyproject.toml.
 */
export abstract class ProjectBase {
  /** Absolute filesystem location */
  readonly path: string

  protected readonly descriptor: ProjectConfig

  protected constructor(descriptor: ProjectConfig) {
    this.path = descriptor.root
    this.descriptor = descriptor
  }

  /** Independent copy of the whole descriptor */
  get config(): DescriptorData {
    return this.descriptor.data
  }
}

/**
 * An individual project or library with an environment managed by
 * poetry or conda, which may expose commands once installed.
 */
export class Project extends ProjectBase {
  readonly name: string

  private readonly env: Environment
  private readonly events: EventSink

  constructor(descriptor: ProjectConfig, options: ProjectOptions = {}) {
    super(descriptor)
    this.name = descriptor.projectName()
    this.events = options.events ?? nullEventSink

    const factory = options.environmentFactory ?? environmentFactory()
    this.env = factory({ name: this.name, path: this.path, settings: descriptor.tandem() })
  }

  /**
   * Load the project rooted at `path`.
   *
   * @throws MissingDescriptorError if `path` has no pyproject.toml
   */
  static async load(path: string, options: ProjectOptions = {}): Promise<Project> {
    const descriptor = await ProjectConfig.load(path, 'Project')
    return new Project(descriptor, options)
  }

  /** `[tool.tandem]` settings, empty when the table is absent */
  get settings(): TandemTable {
    return this.descriptor.tandem()
  }

  /** The environment associated with this project */
  get environment(): Environment {
    return this.env
  }

  async environmentState(): Promise<EnvironmentState> {
    if (!(await this.env.exists())) {
      return 'absent'
    }
    return (await this.env.contains(this)) ? 'installed' : 'not-installed'
  }

  /**
   * Install this project into its environment, creating the environment
   * if necessary.
   *
   * With `force`, an already-installed project is re-synced; otherwise
   * that case is logged and skipped.
   *
   * @returns The action taken
   */
  async install(options: InstallOptions = {}): Promise<InstallAction> {
    const state = await this.environmentState()
    return this.apply(decideInstall(state, options.force ?? false), options.strategy ?? 'reinstall')
  }

  /**
   * Run a command in the project's environment, installing the project
   * first when the environment is missing or does not contain it.
   *
   * Each argument is a single command-line parameter, even if it contains
   * spaces: `run('/bin/bash', '-c', 'cd /home && echo $PWD')` passes the
   * whole script to `bash -c`.
   *
   * @returns Standard output of the command
   * @throws EnvironmentExecutionError if the command exits non-zero
   */
  async run(...args: string[]): Promise<string> {
    const state = await this.environmentState()
    if (state !== 'installed') {
      await this.apply(decideInstall(state, false), 'reinstall')
    }

    const fields = this.eventFields()
    this.events.emit({ event: 'command_started', ...fields, argv: args })
    const startTime = Date.now()
    const stdout = await this.env.run(...args)
    this.events.emit({
      event: 'command_completed',
      ...fields,
      argv: args,
      durationMs: Date.now() - startTime,
    })
    return stdout
  }

  private async apply(action: InstallAction, strategy: ResyncStrategy): Promise<InstallAction> {
    const fields = this.eventFields()

    switch (action) {
      case 'create-and-install':
        await this.env.create()
        this.events.emit({ event: 'environment_created', ...fields })
        this.events.emit({ event: 'install_started', ...fields })
        await this.env.install()
        break
      case 'install':
        this.events.emit({ event: 'install_started', ...fields })
        await this.env.install()
        break
      case 'resync':
        this.events.emit({ event: 'install_updating', ...fields, strategy })
        if (strategy === 'update') {
          await this.env.update()
        } else {
          await this.env.install()
        }
        break
      case 'skip':
        this.events.emit({ event: 'install_skipped', ...fields })
        break
    }

    return action
  }

  private eventFields(): { project: string; path: string; environment: string } {
    return { project: this.name, path: this.path, environment: this.env.name }
  }
}
