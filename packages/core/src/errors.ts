/**
 * Typed error classes for tandem
 *
 * Error hierarchy:
 * - TandemError (base)
 *   - ConfigError (descriptor issues)
 *     - MissingDescriptorError (no pyproject.toml at the project root)
 *     - MissingKeyError (required table absent)
 *     - ConfigParseError (TOML parse failures)
 *     - ConfigValidationError (schema validation failures)
 *   - StepParseError (malformed pipeline step)
 *   - EnvironmentError (environment operations)
 *     - EnvironmentExecutionError (process exited non-zero)
 *     - EnvironmentStateError (operation invalid in the current state)
 */

import type { ValidationError } from './schemas/index.js'

/** Base error class for all tandem errors */
export class TandemError extends Error {
  readonly code: string

  constructor(message: string, code: string) {
    super(message)
    this.name = 'TandemError'
    this.code = code
    Error.captureStackTrace?.(this, this.constructor)
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/** Base class for configuration-related errors */
export class ConfigError extends TandemError {
  readonly source: string

  constructor(message: string, code: string, source: string) {
    super(message, code)
    this.name = 'ConfigError'
    this.source = source
  }
}

/** Error thrown when a project root has no descriptor file */
export class MissingDescriptorError extends ConfigError {
  readonly descriptorPath: string
  readonly owner: string

  constructor(owner: string, root: string, descriptorPath: string) {
    super(
      `${owner} ${root} has no associated 'pyproject.toml' at location ${descriptorPath}`,
      'MISSING_DESCRIPTOR_ERROR',
      descriptorPath
    )
    this.name = 'MissingDescriptorError'
    this.descriptorPath = descriptorPath
    this.owner = owner
  }
}

/** Error thrown when a required table or key is absent from a descriptor. `table` is the dotted path. */
export class MissingKeyError extends ConfigError {
  readonly table: string

  constructor(table: string, source: string, hint?: string) {
    const suffix = hint ? ` ${hint}` : ''
    super(`Config file ${source} has no '${table}' entry.${suffix}`, 'MISSING_KEY_ERROR', source)
    this.name = 'MissingKeyError'
    this.table = table
  }
}

/** Error thrown when TOML parsing fails */
export class ConfigParseError extends ConfigError {
  constructor(message: string, source: string) {
    super(message, 'CONFIG_PARSE_ERROR', source)
    this.name = 'ConfigParseError'
  }
}

/** Error thrown when schema validation fails */
export class ConfigValidationError extends ConfigError {
  readonly validationErrors: ValidationError[]

  constructor(message: string, source: string, validationErrors: ValidationError[]) {
    const details = validationErrors.map((e) => `  ${e.path}: ${e.message}`).join('\n')
    super(`${message}:\n${details}`, 'CONFIG_VALIDATION_ERROR', source)
    this.name = 'ConfigValidationError'
    this.validationErrors = validationErrors
  }
}

// ============================================================================
// Pipeline errors
// ============================================================================

/** Error thrown when a pipeline step string cannot be parsed */
export class StepParseError extends TandemError {
  readonly rawStep: string

  constructor(rawStep: string) {
    super(`Can't parse pipeline step '${rawStep}'`, 'STEP_PARSE_ERROR')
    this.name = 'StepParseError'
    this.rawStep = rawStep
  }
}

// ============================================================================
// Environment errors
// ============================================================================

/** Base class for environment-related errors */
export class EnvironmentError extends TandemError {
  readonly environment: string

  constructor(message: string, code: string, environment: string) {
    super(message, code)
    this.name = 'EnvironmentError'
    this.environment = environment
  }
}

/** Error thrown when a command run through an environment exits non-zero */
export class EnvironmentExecutionError extends EnvironmentError {
  readonly command: string
  readonly exitCode: number
  readonly stderr: string

  constructor(environment: string, command: string, exitCode: number, stderr: string) {
    super(
      `Command failed in environment '${environment}' (exit ${exitCode}): ${command}\n${stderr}`,
      'ENVIRONMENT_EXECUTION_ERROR',
      environment
    )
    this.name = 'EnvironmentExecutionError'
    this.command = command
    this.exitCode = exitCode
    this.stderr = stderr
  }
}

/** Error thrown when an operation's precondition on the environment does not hold */
export class EnvironmentStateError extends EnvironmentError {
  constructor(environment: string, message: string) {
    super(`Environment '${environment}': ${message}`, 'ENVIRONMENT_STATE_ERROR', environment)
    this.name = 'EnvironmentStateError'
  }
}

// ============================================================================
// Type guards
// ============================================================================

export function isTandemError(error: unknown): error is TandemError {
  return error instanceof TandemError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isEnvironmentError(error: unknown): error is EnvironmentError {
  return error instanceof EnvironmentError
}
