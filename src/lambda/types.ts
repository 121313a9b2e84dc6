import type {
  APIGatewayProxyEvent,
  APIGatewayProxyEventV2,
  APIGatewayProxyStructuredResultV2
} from 'aws-lambda'
import type { GraphQLFormattedError } from 'graphql'

/**
 * Proxy events the adapter accepts. Only body, headers and
 * isBase64Encoded are read, which both payload versions share.
 */
export type ProxyEvent = APIGatewayProxyEvent | APIGatewayProxyEventV2

export type ProxyHeaders = ProxyEvent['headers'] | null | undefined

export interface ProxyResponse extends APIGatewayProxyStructuredResultV2 {
  statusCode: number
  headers: Record<string, string>
  body: string
  isBase64Encoded: boolean
}

export interface QueryRequest {
  readonly query: string
  readonly operationName?: string
  readonly variables: Readonly<Record<string, unknown>>
}

/**
 * An error entry as it appears in a response body. graphql-js errors
 * serialize to this shape through their toJSON.
 */
export type GraphQLErrorEntry = GraphQLFormattedError | { toJSON(): GraphQLFormattedError }

export interface ExecutionResult {
  readonly data?: unknown
  readonly errors?: ReadonlyArray<GraphQLErrorEntry>
  readonly extensions?: Readonly<Record<string, unknown>>
}

export interface ExecutionRequest<C> {
  query: string
  operation_name?: string
  variables: Readonly<Record<string, unknown>>
  context: C
}

/**
 * Runs one query against a schema. Must hand back the in-flight
 * promise without waiting on it.
 */
export interface ExecutionEngine<C> {
  execute(request: ExecutionRequest<C>): Promise<ExecutionResult>
}

export interface GraphQLLambdaOptions {
  enable_access_log?: boolean
  enable_gzip_compression?: boolean
  show_failure_cause?: boolean
}
