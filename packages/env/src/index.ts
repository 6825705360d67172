/**
 * @tandem/env
 *
 * Isolated per-project environments and the safe subprocess layer
 * they shell out through.
 */

export type {
  Environment,
  EnvironmentFactory,
  EnvironmentOptions,
  EnvironmentOwner,
  InstallableProject,
} from './types.js'
export { resolveCondaPath, resolvePoetryPath } from './types.js'

export { execCommand, formatCommand, shellQuote } from './exec.js'
export type { ExecOptions, ExecResult } from './exec.js'

export { PoetryEnvironment } from './poetry.js'
export { CONDA_ENVIRONMENT_FILES, CondaEnvironment, parseCondaInfo } from './conda.js'
export type { CondaInfo } from './conda.js'
export { createEnvironment, environmentFactory } from './factory.js'
