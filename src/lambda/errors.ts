import type { GraphQLFormattedError } from 'graphql'
import { ACCESS_DENIED_CODE, ACCESS_DENIED_MESSAGE } from '../lib/constants.js'

export type FailureKind =
  | 'malformed_request'
  | 'access_denied'
  | 'validation_failure'
  | 'execution_failure'
  | 'serialization_failure'

/**
 * Base error for everything that can go wrong during an invocation.
 * The kind says which step failed; classification switches on it.
 */
export class GraphQLLambdaError extends Error {
  readonly kind: FailureKind
  readonly extensions: Record<string, unknown>

  constructor(
    kind: FailureKind,
    message: string,
    options: { cause?: unknown; extensions?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'GraphQLLambdaError'
    this.kind = kind
    this.extensions = options.extensions ?? {}
  }

  to_graphql(): GraphQLFormattedError {
    return {
      message: this.message,
      extensions: { ...this.extensions }
    }
  }
}

/**
 * Raised by a validator, or by a resolver during execution, when the caller
 * may not see the requested data. Surfaces as a GraphQL error, not a 500.
 */
export class AccessDeniedError extends GraphQLLambdaError {
  constructor(message = ACCESS_DENIED_MESSAGE, options: { cause?: unknown } = {}) {
    super('access_denied', message, {
      cause: options.cause,
      extensions: { code: ACCESS_DENIED_CODE }
    })
    this.name = 'AccessDeniedError'
  }
}

export function is_access_denied(error: unknown): error is GraphQLLambdaError & { kind: 'access_denied' } {
  return error instanceof GraphQLLambdaError && error.kind === 'access_denied'
}

/**
 * Tag a failure with the step it came from. Errors that already carry
 * a kind keep it, so an AccessDeniedError raised anywhere stays one.
 */
export function as_failure(error: unknown, kind: FailureKind, message: string): GraphQLLambdaError {
  if (error instanceof GraphQLLambdaError) return error
  const detail = error instanceof Error ? error.message : String(error)
  return new GraphQLLambdaError(kind, `${message}: ${detail}`, { cause: error })
}

export type ClassifiedFailure =
  | { kind: 'access_denied'; error: GraphQLLambdaError }
  | { kind: 'internal'; error: GraphQLLambdaError }

export function classify_failure(error: unknown): ClassifiedFailure {
  const failure = as_failure(error, 'execution_failure', 'Unexpected failure')
  if (is_access_denied(failure)) {
    return { kind: 'access_denied', error: failure }
  }
  return { kind: 'internal', error: failure }
}

/**
 * Stack text of a failure followed by each of its causes, for the
 * debug body of a 500 response.
 */
export function failure_detail(error: unknown): string {
  const lines: string[] = []
  let current: unknown = error
  let depth = 0

  while (current !== undefined && depth < 10) {
    const text = current instanceof Error
      ? (current.stack ?? `${current.name}: ${current.message}`)
      : String(current)
    lines.push(depth === 0 ? text : `Caused by: ${text}`)
    current = current instanceof Error ? current.cause : undefined
    depth++
  }

  return lines.join('\n')
}
