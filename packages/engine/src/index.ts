/**
 * @tandem/engine
 *
 * Project lifecycle and pipeline step resolution.
 */

export { Project, ProjectBase } from './project.js'
export type { InstallOptions, ProjectOptions } from './project.js'

export { DEFAULT_OVERRIDE_FLAG, Pipeline } from './pipeline.js'
export type { PipelineOptions } from './pipeline.js'

export { formatStep, parseStep } from './step.js'
export type { ParsedStep } from './step.js'

export { INSTALL_RULES, decideInstall } from './install-plan.js'
export type { EnvironmentState, InstallAction, InstallRule, ResyncStrategy } from './install-plan.js'

export { buildProject, runPipeline, runPipelineAt } from './run.js'
export type { StepResult } from './run.js'
