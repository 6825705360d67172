/**
 * Named conda environments with the project installed by poetry.
 */

import { stat } from 'node:fs/promises'
import { basename, dirname, isAbsolute, join, resolve } from 'node:path'

import { EnvironmentStateError } from '@tandem/core'

import { type ExecOptions, execCommand } from './exec.js'
import {
  type Environment,
  type EnvironmentOptions,
  type EnvironmentOwner,
  type InstallableProject,
  resolveCondaPath,
  resolvePoetryPath,
} from './types.js'

/** Environment files looked for at the project root when none is configured */
export const CONDA_ENVIRONMENT_FILES = ['environment.yml', 'environment.yaml']

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile()
  } catch {
    return false
  }
}

/** Environment locations reported by `conda info --json` */
export interface CondaInfo {
  /** Prefixes of every known environment, the base installation included */
  envs: string[]
  /** Directories that hold named environments */
  envsDirs: string[]
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === 'string')
}

/**
 * Parse the output of `conda info --json`.
 */
export function parseCondaInfo(stdout: string): CondaInfo {
  let parsed: unknown
  try {
    parsed = JSON.parse(stdout)
  } catch {
    return { envs: [], envsDirs: [] }
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return { envs: [], envsDirs: [] }
  }
  return {
    envs: 'envs' in parsed ? stringList(parsed.envs) : [],
    envsDirs: 'envs_dirs' in parsed ? stringList(parsed.envs_dirs) : [],
  }
}

export class CondaEnvironment implements Environment {
  readonly name: string

  private readonly owner: EnvironmentOwner
  private readonly options: EnvironmentOptions
  private readonly conda: string
  private readonly poetry: string

  constructor(owner: EnvironmentOwner, options: EnvironmentOptions = {}) {
    this.owner = owner
    this.options = options
    this.name = owner.settings.conda_env ?? owner.name
    this.conda = resolveCondaPath(options)
    this.poetry = resolvePoetryPath(options)
  }

  /** True iff a named environment (not the base prefix) carries this name */
  async exists(): Promise<boolean> {
    const result = await execCommand([this.conda, 'info', '--json'], this.execOptions())
    const info = parseCondaInfo(result.stdout)
    const envsDirs = info.envsDirs.map((dir) => resolve(dir))
    return info.envs.some(
      (prefix) => basename(prefix) === this.name && envsDirs.includes(resolve(dirname(prefix)))
    )
  }

  async contains(project: InstallableProject): Promise<boolean> {
    if (!(await this.exists())) {
      throw new EnvironmentStateError(this.name, 'cannot check membership, environment does not exist')
    }
    const result = await execCommand(
      [this.conda, 'run', '-n', this.name, 'python', '-m', 'pip', 'show', project.name],
      this.execOptions({ ignoreExitCode: true })
    )
    return result.exitCode === 0
  }

  async create(): Promise<void> {
    const file = await this.environmentFile()
    if (file !== undefined) {
      await execCommand(
        [this.conda, 'env', 'create', '-n', this.name, '-f', file],
        this.execOptions()
      )
      return
    }

    const python = this.owner.settings.python
    const spec = python === undefined ? 'python' : `python=${python}`
    await execCommand([this.conda, 'create', '-y', '-n', this.name, spec], this.execOptions())
  }

  async install(): Promise<void> {
    await this.runPoetry('install')
  }

  async update(): Promise<void> {
    await this.runPoetry('update')
  }

  async run(...args: string[]): Promise<string> {
    const result = await execCommand(
      [this.conda, 'run', '--no-capture-output', '-n', this.name, ...args],
      this.execOptions()
    )
    return result.stdout
  }

  /**
   * Configured `conda_file`, else the first environment file found at the root.
   */
  async environmentFile(): Promise<string | undefined> {
    const configured = this.owner.settings.conda_file
    if (configured !== undefined) {
      return isAbsolute(configured) ? configured : join(this.owner.path, configured)
    }
    for (const candidate of CONDA_ENVIRONMENT_FILES) {
      const path = join(this.owner.path, candidate)
      if (await isFile(path)) {
        return path
      }
    }
    return undefined
  }

  private async runPoetry(subcommand: 'install' | 'update'): Promise<void> {
    // Poetry must install into the conda env rather than create its own virtualenv
    await execCommand(
      [this.conda, 'run', '-n', this.name, '--cwd', this.owner.path, this.poetry, subcommand],
      this.execOptions({ env: { ...this.options.env, POETRY_VIRTUALENVS_CREATE: 'false' } })
    )
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
