/**
 * Pipeline step descriptors: `component:command[:subcommand]`.
 */

import { StepParseError } from '@tandem/core'

export interface ParsedStep {
  /** Sibling directory of the pipeline holding the target project */
  component: string
  /** Command run inside the component's environment */
  command: string
  /** Optional subcommand selecting subcommand-scoped settings */
  subcommand?: string | undefined
}

/**
 * Split a step into its two or three non-empty fields.
 *
 * @throws StepParseError for any other shape
 */
export function parseStep(raw: string): ParsedStep {
  const fields = raw.split(':')
  if (fields.some((field) => field.length === 0)) {
    throw new StepParseError(raw)
  }

  const [component, command, subcommand] = fields
  if (fields.length === 2 && component !== undefined && command !== undefined) {
    return { component, command }
  }
  if (fields.length === 3 && component !== undefined && command !== undefined) {
    return { component, command, subcommand }
  }
  throw new StepParseError(raw)
}

/**
 * Inverse of `parseStep`.
 */
export function formatStep(step: ParsedStep): string {
  const fields = [step.component, step.command]
  if (step.subcommand !== undefined) {
    fields.push(step.subcommand)
  }
  return fields.join(':')
}
