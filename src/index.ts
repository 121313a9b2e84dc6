export { GraphQLLambda } from './lambda/graphql_lambda.js'
export { ExecutionContext } from './lambda/execution_context.js'
export type { ExecutionContextState } from './lambda/execution_context.js'
export { InvocationCache, invocation_cache, cache_key } from './lambda/invocation_cache.js'
export type { CacheKey } from './lambda/invocation_cache.js'
export { create_schema_engine } from './lambda/schema_engine.js'
export type { SchemaEngineOptions } from './lambda/schema_engine.js'
export { parse_query_request, serialize_query_request } from './lambda/query_request.js'
export { accepts_gzip, gzip_body } from './lambda/compression.js'
export { get_header } from './lambda/headers.js'
export { serialize_execution_result } from './lambda/response.js'
export {
  GraphQLLambdaError,
  AccessDeniedError,
  is_access_denied,
  classify_failure
} from './lambda/errors.js'
export type { FailureKind, ClassifiedFailure } from './lambda/errors.js'
export type {
  ExecutionEngine,
  ExecutionRequest,
  ExecutionResult,
  GraphQLErrorEntry,
  GraphQLLambdaOptions,
  ProxyEvent,
  ProxyHeaders,
  ProxyResponse,
  QueryRequest
} from './lambda/types.js'
export { load_config, reset_config, ConfigValidationError } from './lib/config.js'
export type { GraphQLLambdaConfig } from './lib/config.js'
export { logger } from './lib/logger.js'
