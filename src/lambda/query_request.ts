import { z } from 'zod'
import { GraphQLLambdaError } from './errors.js'
import type { QueryRequest } from './types.js'

const query_request_schema = z.object({
  query: z.string({
    required_error: 'query is required',
    invalid_type_error: 'query must be a string'
  }),
  operationName: z.string().nullish(),
  variables: z.record(z.unknown()).nullish()
})

function decode_body(body: string | null | undefined, is_base64_encoded: boolean): string {
  if (body === null || body === undefined || body === '') {
    throw new GraphQLLambdaError('malformed_request', 'Request body is empty')
  }
  return is_base64_encoded ? Buffer.from(body, 'base64').toString('utf-8') : body
}

/**
 * Decode an invocation body into a query request.
 * Unknown top-level fields (extensions, id) are ignored.
 */
export function parse_query_request(
  body: string | null | undefined,
  is_base64_encoded = false
): QueryRequest {
  const text = decode_body(body, is_base64_encoded)

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new GraphQLLambdaError('malformed_request', 'Request body is not valid JSON', {
      cause: error
    })
  }

  const parsed = query_request_schema.safeParse(json)
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new GraphQLLambdaError('malformed_request', `Invalid GraphQL request: ${detail}`, {
      cause: parsed.error
    })
  }

  const { query, operationName, variables } = parsed.data
  return Object.freeze({
    query,
    ...(operationName != null ? { operationName } : {}),
    variables: Object.freeze({ ...(variables ?? {}) })
  })
}

export function serialize_query_request(request: QueryRequest): string {
  return JSON.stringify({
    query: request.query,
    operationName: request.operationName,
    variables: request.variables
  })
}
