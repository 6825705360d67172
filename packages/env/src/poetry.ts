/**
 * Poetry-managed virtual environments.
 */

import { EnvironmentStateError } from '@tandem/core'

import { type ExecOptions, execCommand } from './exec.js'
import {
  type Environment,
  type EnvironmentOptions,
  type EnvironmentOwner,
  type InstallableProject,
  resolvePoetryPath,
} from './types.js'

/**
 * The virtualenv poetry keeps for a project directory.
 *
 * Every call runs poetry with the project root as its working directory.
 */
export class PoetryEnvironment implements Environment {
  readonly name: string

  private readonly owner: EnvironmentOwner
  private readonly options: EnvironmentOptions
  private readonly poetry: string

  constructor(owner: EnvironmentOwner, options: EnvironmentOptions = {}) {
    this.owner = owner
    this.options = options
    this.name = owner.name
    this.poetry = resolvePoetryPath(options)
  }

  async exists(): Promise<boolean> {
    const result = await execCommand(
      [this.poetry, 'env', 'info', '--path'],
      this.execOptions({ ignoreExitCode: true })
    )
    return result.exitCode === 0 && result.stdout.trim().length > 0
  }

  async contains(project: InstallableProject): Promise<boolean> {
    if (!(await this.exists())) {
      throw new EnvironmentStateError(this.name, 'cannot check membership, environment does not exist')
    }
    const result = await execCommand(
      [this.poetry, 'run', 'python', '-m', 'pip', 'show', project.name],
      this.execOptions({ ignoreExitCode: true })
    )
    return result.exitCode === 0
  }

  async create(): Promise<void> {
    const python = this.owner.settings.python ?? 'python3'
    await execCommand([this.poetry, 'env', 'use', python], this.execOptions())
  }

  async install(): Promise<void> {
    await execCommand([this.poetry, 'install'], this.execOptions())
  }

  async update(): Promise<void> {
    await execCommand([this.poetry, 'update'], this.execOptions())
  }

  async run(...args: string[]): Promise<string> {
    const result = await execCommand([this.poetry, 'run', ...args], this.execOptions())
    return result.stdout
  }

  private execOptions(overrides: ExecOptions = {}): ExecOptions {
    return {
      cwd: this.owner.path,
      env: this.options.env,
      timeout: this.options.timeout,
      environment: this.name,
      ...overrides,
    }
  }
}
