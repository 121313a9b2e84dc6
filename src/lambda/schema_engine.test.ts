import { describe, it, expect } from 'vitest'
import { buildSchema } from 'graphql'
import { AccessDeniedError } from './errors.js'
import { create_schema_engine } from './schema_engine.js'

interface Ctx {
  user_id: string
}

const schema = buildSchema(`
  type Query {
    whoami: String
    echo(text: String!): String
    forbidden: String
  }
`)

const root_value = {
  whoami: (_args: unknown, context: Ctx) => context.user_id,
  echo: ({ text }: { text: string }) => text,
  forbidden: () => {
    throw new AccessDeniedError('No access to forbidden')
  }
}

describe('create_schema_engine', () => {
  const engine = create_schema_engine<Ctx>({ schema, root_value })

  it('should pass the context through as the GraphQL context value', async () => {
    const result = await engine.execute({
      query: '{ whoami }',
      variables: {},
      context: { user_id: 'user-7' }
    })

    expect(result).toEqual({ data: { whoami: 'user-7' } })
  })

  it('should select the named operation and apply variables', async () => {
    const result = await engine.execute({
      query: 'query A { whoami } query B($t: String!) { echo(text: $t) }',
      operation_name: 'B',
      variables: { t: 'hi' },
      context: { user_id: 'user-7' }
    })

    expect(result).toEqual({ data: { echo: 'hi' } })
  })

  it('should return an unresolved promise when dispatched', () => {
    const execution = engine.execute({ query: '{ whoami }', variables: {}, context: { user_id: 'u' } })

    expect(execution).toBeInstanceOf(Promise)
  })

  it('should report resolver errors with the extensions of a GraphQLLambdaError', async () => {
    const result = await engine.execute({ query: '{ forbidden }', variables: {}, context: { user_id: 'u' } })

    expect(JSON.parse(JSON.stringify(result))).toEqual({
      errors: [
        {
          message: 'No access to forbidden',
          locations: [{ line: 1, column: 3 }],
          path: ['forbidden'],
          extensions: { code: 'ACCESS_DENIED' }
        }
      ],
      data: { forbidden: null }
    })
  })

  it('should report validation errors without data', async () => {
    const result = await engine.execute({ query: '{ nope }', variables: {}, context: { user_id: 'u' } })

    expect(result.data).toBeUndefined()
    expect(result.errors).toHaveLength(1)
    expect(JSON.parse(JSON.stringify(result.errors))[0].message).toBe(
      'Cannot query field "nope" on type "Query".'
    )
  })
})
