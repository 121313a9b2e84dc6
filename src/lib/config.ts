import { ZodError, z } from 'zod'
import {
  ENV_KEY_ACCESS_LOG,
  ENV_KEY_GZIP,
  ENV_KEY_SHOW_FAILURE_CAUSE
} from './constants.js'

const TRUE_VALUES = ['true', '1', 'yes', 'on']
const FALSE_VALUES = ['false', '0', 'no', 'off', '']

const env_flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine(
    (value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value),
    { message: `Expected one of ${[...TRUE_VALUES, ...FALSE_VALUES.filter(Boolean)].join(', ')}` }
  )
  .transform((value) => TRUE_VALUES.includes(value))
  .optional()
  .transform((value) => value ?? false)

const config_schema = z.object({
  [ENV_KEY_ACCESS_LOG]: env_flag,
  [ENV_KEY_GZIP]: env_flag,
  [ENV_KEY_SHOW_FAILURE_CAUSE]: env_flag
})

export interface GraphQLLambdaConfig {
  enable_access_log: boolean
  enable_gzip_compression: boolean
  show_failure_cause: boolean
}

export class ConfigValidationError extends Error {
  readonly invalid: string[]

  constructor(invalid: string[], cause?: unknown) {
    super(`Invalid graphql-lambda environment: ${invalid.join(', ')}`, { cause })
    this.name = 'ConfigValidationError'
    this.invalid = invalid
  }
}

let CONFIG: GraphQLLambdaConfig | null = null

/**
 * Resolve the adapter switches from the environment.
 * Parsed once per process; every switch is off unless set.
 */
export function load_config(env: NodeJS.ProcessEnv = process.env): GraphQLLambdaConfig {
  if (CONFIG !== null) return CONFIG

  try {
    const parsed = config_schema.parse(env)
    CONFIG = {
      enable_access_log: parsed[ENV_KEY_ACCESS_LOG],
      enable_gzip_compression: parsed[ENV_KEY_GZIP],
      show_failure_cause: parsed[ENV_KEY_SHOW_FAILURE_CAUSE]
    }
    return CONFIG
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(
        error.issues.map((issue) => issue.path.join('.')),
        error
      )
    }
    throw error
  }
}

export function reset_config(): void {
  CONFIG = null
}
