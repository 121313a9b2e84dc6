import { graphql } from 'graphql'
import type { GraphQLFieldResolver, GraphQLSchema } from 'graphql'
import type { ExecutionEngine, ExecutionRequest, ExecutionResult } from './types.js'

export interface SchemaEngineOptions<C> {
  schema: GraphQLSchema
  root_value?: unknown
  field_resolver?: GraphQLFieldResolver<unknown, C>
}

/**
 * Execution engine over a graphql-js schema. The execution context is
 * passed through as the GraphQL context value.
 *
 * Resolver errors come back in `errors`; a GraphQLLambdaError thrown by a
 * resolver lends its extensions (e.g. `code: ACCESS_DENIED`) to the entry.
 */
export function create_schema_engine<C>(options: SchemaEngineOptions<C>): ExecutionEngine<C> {
  const { schema, root_value, field_resolver } = options

  return {
    execute(request: ExecutionRequest<C>): Promise<ExecutionResult> {
      return graphql({
        schema,
        source: request.query,
        rootValue: root_value,
        contextValue: request.context,
        variableValues: request.variables,
        operationName: request.operation_name,
        fieldResolver: field_resolver
      })
    }
  }
}
