/**
 * JSON Schema validation for the tool tables of pyproject.toml
 */

import { createRequire } from 'node:module'
import AjvModule, { type ErrorObject } from 'ajv'

import type { TandemTable, TypeoTable } from '../types.js'

const require = createRequire(import.meta.url)
const tandemTableSchema = require('./tandem-table.schema.json')
const typeoTableSchema = require('./typeo-table.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

const Ajv = AjvModule.default

const ajv = new Ajv({
  strict: true,
  // `scripts` may be a list or a table
  allowUnionTypes: true,
  allErrors: true,
  verbose: true,
})

const validateTandemSchema = ajv.compile<TandemTable>(tandemTableSchema)
const validateTypeoSchema = ajv.compile<TypeoTable>(typeoTableSchema)

// ============================================================================
// Validation result types
// ============================================================================

export interface ValidationError {
  path: string
  message: string
  keyword: string
  params: Record<string, unknown>
}

export type ValidationResult<T> =
  | { valid: true; data: T }
  | { valid: false; errors: ValidationError[] }

// ============================================================================
// Validation functions
// ============================================================================

function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  if (err.keyword === 'enum') {
    const allowed = err.params['allowedValues']
    if (Array.isArray(allowed)) {
      return `must be one of ${allowed.map((v) => `"${String(v)}"`).join(', ')}`
    }
  }

  return defaultMsg
}

function formatErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  if (!errors) return []

  return errors.map((err) => ({
    path: err.instancePath || '/',
    message: friendlyMessage(err),
    keyword: err.keyword,
    params: { ...err.params },
  }))
}

/**
 * Validate a `[tool.tandem]` table
 */
export function validateTandemTable(data: unknown): ValidationResult<TandemTable> {
  if (validateTandemSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateTandemSchema.errors) }
}

/**
 * Validate a `[tool.typeo]` table
 */
export function validateTypeoTable(data: unknown): ValidationResult<TypeoTable> {
  if (validateTypeoSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateTypeoSchema.errors) }
}

