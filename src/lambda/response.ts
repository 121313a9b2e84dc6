import {
  ENCODING_GZIP,
  GRAPHQL_ERRORS_FIELD,
  GRAPHQL_RESPONSE_HEADERS,
  HEADER_CONTENT_ENCODING,
  INTERNAL_SERVER_ERROR_BODY
} from '../lib/constants.js'
import { gzip_body } from './compression.js'
import { GraphQLLambdaError, as_failure, failure_detail } from './errors.js'
import type { ExecutionResult, ProxyResponse } from './types.js'

/**
 * Render an execution result as its response body. An errors list that
 * is present but empty is left out entirely.
 */
export function serialize_execution_result(result: ExecutionResult): string {
  const document: Record<string, unknown> = {}

  if (result.errors !== undefined) {
    document[GRAPHQL_ERRORS_FIELD] = result.errors
  }
  if (result.data !== undefined) {
    document.data = result.data
  }
  if (result.extensions !== undefined) {
    document.extensions = result.extensions
  }

  const errors = document[GRAPHQL_ERRORS_FIELD]
  if (Array.isArray(errors) && errors.length === 0) {
    delete document[GRAPHQL_ERRORS_FIELD]
  }

  try {
    return JSON.stringify(document)
  } catch (error) {
    throw as_failure(error, 'serialization_failure', 'Failed to serialize execution result')
  }
}

export function build_success_response(body: string, compress: boolean): ProxyResponse {
  if (!compress) {
    return {
      statusCode: 200,
      headers: { ...GRAPHQL_RESPONSE_HEADERS },
      body,
      isBase64Encoded: false
    }
  }

  return {
    statusCode: 200,
    headers: { ...GRAPHQL_RESPONSE_HEADERS, [HEADER_CONTENT_ENCODING]: ENCODING_GZIP },
    body: gzip_body(body),
    isBase64Encoded: true
  }
}

// Denials are part of the query's own authorization model: 200 with a GraphQL error
export function build_access_denied_response(error: GraphQLLambdaError): ProxyResponse {
  return {
    statusCode: 200,
    headers: { ...GRAPHQL_RESPONSE_HEADERS },
    body: JSON.stringify({ [GRAPHQL_ERRORS_FIELD]: [error.to_graphql()] }),
    isBase64Encoded: false
  }
}

export function build_internal_error_response(error: unknown, show_failure_cause: boolean): ProxyResponse {
  return {
    statusCode: 500,
    headers: { ...GRAPHQL_RESPONSE_HEADERS },
    body: show_failure_cause ? failure_detail(error) : INTERNAL_SERVER_ERROR_BODY,
    isBase64Encoded: false
  }
}
