import type { Context } from 'aws-lambda'
import { load_config } from '../lib/config.js'
import { HEADER_AUTHORIZATION } from '../lib/constants.js'
import { logger } from '../lib/logger.js'
import { accepts_gzip } from './compression.js'
import { as_failure, classify_failure } from './errors.js'
import type { ExecutionContext } from './execution_context.js'
import { get_header } from './headers.js'
import { invocation_cache } from './invocation_cache.js'
import { parse_query_request } from './query_request.js'
import {
  build_access_denied_response,
  build_internal_error_response,
  build_success_response,
  serialize_execution_result
} from './response.js'
import type {
  ExecutionEngine,
  ExecutionResult,
  GraphQLLambdaOptions,
  ProxyEvent,
  ProxyResponse,
  QueryRequest
} from './types.js'

/**
 * Lambda handler that runs one GraphQL query per API Gateway proxy event.
 *
 * Deployments subclass it, supplying how a caller is authenticated (`validate`)
 * and what the resolvers get as context (`build_context`), then export the
 * bound `handler`:
 *
 * ```ts
 * class ApiLambda extends GraphQLLambda<User, ApiContext> {
 *   protected validate(authorization?: string) { return verify_token(authorization) }
 *   protected build_context(user: User, query: QueryRequest) { return new ApiContext(user, query) }
 * }
 *
 * export const handler = new ApiLambda(create_schema_engine({ schema })).handler
 * ```
 *
 * Every invocation ends by evicting the process-wide invocation cache,
 * whatever happened before it.
 */
export abstract class GraphQLLambda<U, C extends ExecutionContext<U>> {
  private readonly engine: ExecutionEngine<C>
  private readonly options: GraphQLLambdaOptions

  constructor(engine: ExecutionEngine<C>, options: GraphQLLambdaOptions = {}) {
    this.engine = engine
    this.options = options
  }

  /**
   * Resolve the caller from the Authorization header, which may be missing.
   * Reject with AccessDeniedError to answer with a GraphQL error.
   */
  protected abstract validate(authorization: string | undefined): Promise<U>

  protected abstract build_context(user: U, query: QueryRequest): C

  enable_access_log(): boolean {
    return this.options.enable_access_log ?? load_config().enable_access_log
  }

  enable_gzip_compression(): boolean {
    return this.options.enable_gzip_compression ?? load_config().enable_gzip_compression
  }

  // Exposes stack traces to callers; debugging only
  show_failure_cause(): boolean {
    return this.options.show_failure_cause ?? load_config().show_failure_cause
  }

  readonly handler = (event: ProxyEvent, context?: Context): Promise<ProxyResponse> =>
    this.handle(event, context)

  async handle(event: ProxyEvent, lambda_context?: Context): Promise<ProxyResponse> {
    try {
      return await this.execute(event, lambda_context)
    } catch (error) {
      return this.failure_response(error, lambda_context)
    } finally {
      invocation_cache.evict()
    }
  }

  private async execute(event: ProxyEvent, lambda_context?: Context): Promise<ProxyResponse> {
    const query = parse_query_request(event.body, event.isBase64Encoded)

    const authorization = get_header(event.headers, HEADER_AUTHORIZATION)
    let user: U
    try {
      user = await this.validate(authorization)
    } catch (error) {
      throw as_failure(error, 'validation_failure', 'Failed to validate user')
    }

    if (this.enable_access_log()) {
      const request = lambda_context ? ` [${lambda_context.awsRequestId}]` : ''
      logger.info(
        `Executing query ${query.operationName ?? '(anonymous)'}, for user ${describe_user(user)}${request}`
      )
    }

    const graph_context = this.build_context(user, query)

    let execution: Promise<ExecutionResult>
    try {
      execution = this.engine.execute({
        query: query.query,
        operation_name: query.operationName,
        variables: query.variables,
        context: graph_context
      })
    } catch (error) {
      throw as_failure(error, 'execution_failure', 'Failed to dispatch query')
    }

    try {
      graph_context.start(execution)
    } catch (error) {
      // The query is already running; let it settle so its cache writes land before eviction
      await execution.then(
        () => undefined,
        (execution_error: unknown) =>
          logger.debug('Execution settled after context start failed', execution_error)
      )
      throw error
    }

    let result: ExecutionResult
    try {
      result = await execution
    } catch (error) {
      throw as_failure(error, 'execution_failure', 'Query execution failed')
    }

    const body = serialize_execution_result(result)
    const compress = this.enable_gzip_compression() && accepts_gzip(event.headers)
    return build_success_response(body, compress)
  }

  private failure_response(error: unknown, lambda_context?: Context): ProxyResponse {
    const failure = classify_failure(error)
    const request_id = lambda_context?.awsRequestId

    if (failure.kind === 'access_denied') {
      logger.error('Failed to validate user', { kind: failure.error.kind, request_id }, failure.error)
      return build_access_denied_response(failure.error)
    }

    logger.error('Failed to invoke graph', { kind: failure.error.kind, request_id }, failure.error)
    return build_internal_error_response(failure.error, this.resolve_show_failure_cause())
  }

  // A bad environment must still end in a 500, with the cause hidden
  private resolve_show_failure_cause(): boolean {
    try {
      return this.show_failure_cause()
    } catch (error) {
      logger.warn('Could not resolve show_failure_cause, hiding failure cause', error)
      return false
    }
  }
}

function describe_user(user: unknown): string {
  if (user === null || user === undefined) return String(user)
  if (typeof user === 'object') {
    if ('id' in user && (typeof user.id === 'string' || typeof user.id === 'number')) {
      return String(user.id)
    }
    return user.constructor?.name ?? 'object'
  }
  return String(user)
}
