/**
 * Shared constants for graphql-lambda
 * Used by both source code and tests to ensure consistency
 */

// Request header names (matched case-insensitively)
export const HEADER_AUTHORIZATION = 'Authorization'
export const HEADER_ACCEPT_ENCODING = 'Accept-Encoding'

// Response header names
export const HEADER_CONTENT_TYPE = 'Content-Type'
export const HEADER_CONTENT_ENCODING = 'Content-Encoding'
export const HEADER_ALLOW_ORIGIN = 'Access-Control-Allow-Origin'

export const CONTENT_TYPE_JSON = 'application/json; charset=utf-8'
export const ENCODING_GZIP = 'gzip'

/**
 * Headers carried by every response, success or failure.
 * Compressed responses add Content-Encoding to a copy of these.
 */
export const GRAPHQL_RESPONSE_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  [HEADER_ALLOW_ORIGIN]: '*',
  [HEADER_CONTENT_TYPE]: CONTENT_TYPE_JSON
})

// Execution result field dropped from the body when empty
export const GRAPHQL_ERRORS_FIELD = 'errors'

// Body of a 500 response when the failure cause is hidden
export const INTERNAL_SERVER_ERROR_BODY = 'Internal Server Error'

// Message of the GraphQL error entry produced for a denied request
export const ACCESS_DENIED_MESSAGE = 'AccessDeniedError'
export const ACCESS_DENIED_CODE = 'ACCESS_DENIED'

// Environment variable keys read by the configuration layer
export const ENV_KEY_ACCESS_LOG = 'GRAPHQL_LAMBDA_ACCESS_LOG'
export const ENV_KEY_GZIP = 'GRAPHQL_LAMBDA_GZIP'
export const ENV_KEY_SHOW_FAILURE_CAUSE = 'GRAPHQL_LAMBDA_SHOW_FAILURE_CAUSE'
export const ENV_KEY_LOG_LEVEL = 'GRAPHQL_LAMBDA_LOG_LEVEL'
