/**
 * Environment capability interface.
 *
 * Provisioning tools stay opaque behind these five operations (plus
 * `update`), so the engine can be driven by a fake in tests.
 */

import type { TandemTable } from '@tandem/core'

/** What an environment needs to know about the project that owns it */
export interface EnvironmentOwner {
  /** Project name (`[tool.poetry].name`) */
  readonly name: string
  /** Absolute project root */
  readonly path: string
  /** `[tool.tandem]` settings */
  readonly settings: TandemTable
}

/** A project whose membership in an environment can be checked */
export interface InstallableProject {
  readonly name: string
  readonly path: string
}

/**
 * One project's isolated runtime.
 *
 * State moves `absent` → `exists` → `contains(project)`; `install` may
 * run again once the project is installed to re-sync it.
 */
export interface Environment {
  /** Environment name */
  readonly name: string

  /** True iff the environment has been provisioned */
  exists(): Promise<boolean>

  /**
   * True iff `project` is installed in this environment.
   *
   * @throws EnvironmentStateError if the environment does not exist
   */
  contains(project: InstallableProject): Promise<boolean>

  /** Provision a new, empty environment. Callers guard with `exists()`. */
  create(): Promise<void>

  /** Install (or re-install) the owning project */
  install(): Promise<void>

  /** Update the dependencies of the already-installed owning project */
  update(): Promise<void>

  /**
   * Run a command inside the environment. Each argument is passed as a
   * single argv entry.
   *
   * @returns Captured standard output
   * @throws EnvironmentExecutionError if the command exits non-zero
   */
  run(...args: string[]): Promise<string>
}

/** Options shared by the concrete environments */
export interface EnvironmentOptions {
  /** Path to the poetry executable (default: $TANDEM_POETRY or `poetry`) */
  poetryPath?: string | undefined
  /** Path to the conda executable (default: $TANDEM_CONDA or `conda`) */
  condaPath?: string | undefined
  /** Extra environment variables for every spawned process */
  env?: Record<string, string> | undefined
  /** Per-process timeout in milliseconds (default: none) */
  timeout?: number | undefined
}

/** Builds the environment for a project */
export type EnvironmentFactory = (owner: EnvironmentOwner) => Environment

export function resolvePoetryPath(options: EnvironmentOptions): string {
  return options.poetryPath ?? process.env['TANDEM_POETRY'] ?? 'poetry'
}

export function resolveCondaPath(options: EnvironmentOptions): string {
  return options.condaPath ?? process.env['TANDEM_CONDA'] ?? 'conda'
}
