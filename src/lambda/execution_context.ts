import { GraphQLLambdaError } from './errors.js'
import type { ExecutionResult, QueryRequest } from './types.js'

export type ExecutionContextState = 'created' | 'started'

/**
 * Per-invocation state handed to the engine as the GraphQL context value.
 *
 * Resolvers read the caller from here rather than from anything global.
 * Subclass it to carry loaders, tracing spans and the like; override
 * `on_start` to hook into the in-flight execution.
 */
export abstract class ExecutionContext<U> {
  readonly user: U
  readonly query: QueryRequest
  private _state: ExecutionContextState = 'created'
  private _execution: Promise<ExecutionResult> | null = null

  constructor(user: U, query: QueryRequest) {
    this.user = user
    this.query = query
  }

  get state(): ExecutionContextState {
    return this._state
  }

  get started(): boolean {
    return this._state === 'started'
  }

  /**
   * The in-flight execution, once started.
   */
  get execution(): Promise<ExecutionResult> | null {
    return this._execution
  }

  /**
   * Called by the adapter once the query has been dispatched and before its
   * result is awaited. Exactly once per context.
   */
  start(execution: Promise<ExecutionResult>): void {
    if (this._state !== 'created') {
      throw new GraphQLLambdaError('execution_failure', 'Execution context already started')
    }
    this._state = 'started'
    this._execution = execution
    this.on_start(execution)
  }

  /**
   * Must not block. Attach callbacks to `execution` for work that has to
   * wait for the result.
   */
  protected on_start(_execution: Promise<ExecutionResult>): void {}
}
