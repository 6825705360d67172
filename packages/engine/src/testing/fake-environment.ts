/**
 * In-memory environments for engine tests.
 */

import { EnvironmentExecutionError, EnvironmentStateError } from '@tandem/core'
import type {
  Environment,
  EnvironmentFactory,
  EnvironmentOwner,
  InstallableProject,
} from '@tandem/env'

import type { EnvironmentState } from '../install-plan.js'

/**
 * Records every mutating call; `exists` and `contains` are side-effect free.
 */
export class FakeEnvironment implements Environment {
  readonly name: string
  readonly calls: string[] = []
  /** Exit code for `run` (0 succeeds) */
  exitCode = 0

  private created: boolean
  private installed: boolean

  constructor(name: string, state: EnvironmentState = 'absent') {
    this.name = name
    this.created = state !== 'absent'
    this.installed = state === 'installed'
  }

  async exists(): Promise<boolean> {
    return this.created
  }

  async contains(_project: InstallableProject): Promise<boolean> {
    if (!this.created) {
      throw new EnvironmentStateError(this.name, 'cannot check membership, environment does not exist')
    }
    return this.installed
  }

  async create(): Promise<void> {
    this.calls.push('create')
    this.created = true
  }

  async install(): Promise<void> {
    this.calls.push('install')
    this.installed = true
  }

  async update(): Promise<void> {
    this.calls.push('update')
  }

  async run(...args: string[]): Promise<string> {
    const command = args.join(' ')
    this.calls.push(`run ${command}`)
    if (this.exitCode !== 0) {
      throw new EnvironmentExecutionError(this.name, command, this.exitCode, 'step failed')
    }
    return `${this.name}: ${command}`
  }

  count(call: string): number {
    return this.calls.filter((c) => c === call).length
  }
}

/**
 * Hands out one FakeEnvironment per project name, so state persists across
 * the fresh Project instances a pipeline creates.
 */
export class FakeEnvironmentRegistry {
  /** Project names in the order their environments were requested */
  readonly resolutions: string[] = []

  private readonly environments = new Map<string, FakeEnvironment>()
  private readonly initialState: EnvironmentState

  constructor(initialState: EnvironmentState = 'absent') {
    this.initialState = initialState
  }

  readonly factory: EnvironmentFactory = (owner: EnvironmentOwner) => {
    this.resolutions.push(owner.name)
    return this.get(owner.name)
  }

  get(name: string): FakeEnvironment {
    let env = this.environments.get(name)
    if (!env) {
      env = new FakeEnvironment(name, this.initialState)
      this.environments.set(name, env)
    }
    return env
  }
}
