import { describe, it, expect } from 'vitest'
import { GraphQLLambdaError } from './errors.js'
import { ExecutionContext } from './execution_context.js'
import type { ExecutionResult, QueryRequest } from './types.js'

class RecordingContext extends ExecutionContext<string> {
  readonly started_with: Array<Promise<ExecutionResult>> = []

  protected on_start(execution: Promise<ExecutionResult>): void {
    this.started_with.push(execution)
  }
}

const query: QueryRequest = { query: '{ a }', variables: {} }

describe('ExecutionContext', () => {
  it('should begin in the created state', () => {
    const context = new RecordingContext('user-1', query)

    expect(context.state).toBe('created')
    expect(context.started).toBe(false)
    expect(context.execution).toBeNull()
    expect(context.user).toBe('user-1')
    expect(context.query).toBe(query)
  })

  it('should move to started and call on_start with the execution', () => {
    const context = new RecordingContext('user-1', query)
    const execution = Promise.resolve<ExecutionResult>({ data: { a: 1 } })

    context.start(execution)

    expect(context.state).toBe('started')
    expect(context.started).toBe(true)
    expect(context.execution).toBe(execution)
    expect(context.started_with).toEqual([execution])
  })

  it('should accept an execution that has not resolved yet', () => {
    const context = new RecordingContext('user-1', query)
    const execution = new Promise<ExecutionResult>(() => {})

    context.start(execution)

    expect(context.started_with).toEqual([execution])
  })

  it('should refuse a second start', () => {
    const context = new RecordingContext('user-1', query)
    const execution = Promise.resolve<ExecutionResult>({ data: null })
    context.start(execution)

    expect(() => context.start(execution)).toThrow(GraphQLLambdaError)
    expect(() => context.start(execution)).toThrow('Execution context already started')
    expect(context.started_with).toHaveLength(1)
  })
})
