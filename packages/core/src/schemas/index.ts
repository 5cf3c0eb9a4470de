/**
 * JSON Schema validation for gitcmd config files
 */

import { createRequire } from 'node:module'
import AjvModule, { type ErrorObject, type SchemaObject } from 'ajv'

import type { ConfigFile } from '../types/config.js'

const require = createRequire(import.meta.url)
const configSchema: SchemaObject = require('./config.schema.json')

// ============================================================================
// Ajv instance setup
// ============================================================================

// ajv is CommonJS; under NodeNext the class sits on the default export's `default`
const Ajv = AjvModule.default

const ajv = new Ajv({
  strict: true,
  allErrors: true,
  verbose: true,
})

const validateConfigSchema = ajv.compile<ConfigFile>(configSchema)

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

/**
 * Provide a more helpful error message for known validation patterns.
 */
function friendlyMessage(err: ErrorObject): string {
  const defaultMsg = err.message || 'Unknown error'

  // Additional properties errors - show which property is invalid
  if (err.keyword === 'additionalProperties') {
    const prop: unknown = err.params['additionalProperty']
    return `unknown property "${String(prop)}"`
  }

  if (err.keyword === 'enum') {
    const allowed: unknown = err.params['allowedValues']
    if (Array.isArray(allowed)) {
      return `must be one of: ${allowed.map(String).join(', ')}`
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
 * Validate a config file (config.toml parsed to object)
 */
export function validateConfigFile(data: unknown): ValidationResult<ConfigFile> {
  if (validateConfigSchema(data)) {
    return { valid: true, data }
  }
  return { valid: false, errors: formatErrors(validateConfigSchema.errors) }
}
