import { LogLevels, createConsola } from 'consola'
import type { LogType } from 'consola'
import { ENV_KEY_LOG_LEVEL } from './constants.js'

const DEFAULT_LEVEL = LogLevels.info

function is_log_type(name: string): name is LogType {
  return Object.hasOwn(LogLevels, name)
}

/**
 * Consola level for a level name such as `debug`, `warn` or `silent`.
 * Unknown or missing names fall back to info.
 */
export function resolve_log_level(name: string | undefined): number {
  const normalized = name?.trim().toLowerCase()
  if (normalized && is_log_type(normalized)) {
    return LogLevels[normalized]
  }
  return DEFAULT_LEVEL
}

// CloudWatch stamps every line itself
export const logger = createConsola({
  level: resolve_log_level(process.env[ENV_KEY_LOG_LEVEL]),
  formatOptions: {
    date: false,
    colors: false
  }
}).withTag('graphql-lambda')
