import type { ProxyHeaders } from './types.js'

/**
 * Case-insensitive header lookup. API Gateway v1 keeps the client's
 * casing, v2 lowercases, and v1 sends null when there are no headers.
 */
export function get_header(headers: ProxyHeaders, name: string): string | undefined {
  if (!headers) return undefined

  const wanted = name.toLowerCase()
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value
    }
  }
  return undefined
}
