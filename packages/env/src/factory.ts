/**
 * Picks the environment backend configured in `[tool.tandem].environment`.
 */

import { CondaEnvironment } from './conda.js'
import { PoetryEnvironment } from './poetry.js'
import type {
  Environment,
  EnvironmentFactory,
  EnvironmentOptions,
  EnvironmentOwner,
} from './types.js'

export function createEnvironment(
  owner: EnvironmentOwner,
  options: EnvironmentOptions = {}
): Environment {
  const kind = owner.settings.environment ?? 'poetry'
  switch (kind) {
    case 'poetry':
      return new PoetryEnvironment(owner, options)
    case 'conda':
      return new CondaEnvironment(owner, options)
  }
}

/**
 * Factory bound to a fixed set of options, as passed to projects.
 */
export function environmentFactory(options: EnvironmentOptions = {}): EnvironmentFactory {
  return (owner) => createEnvironment(owner, options)
}
