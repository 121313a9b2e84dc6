export type CacheKey = string

/**
 * Cache that lives as long as the Lambda execution environment.
 *
 * Resolvers use it to share lookups within one invocation. A warm container
 * runs many invocations for different callers, so the adapter evicts it at the
 * end of every invocation; nothing stored here may outlive the request that
 * stored it.
 */
export class InvocationCache {
  private readonly entries = new Map<CacheKey, unknown>()
  private readonly loads = new Map<CacheKey, Promise<unknown>>()

  get size(): number {
    return this.entries.size + this.loads.size
  }

  has(key: CacheKey): boolean {
    return this.entries.has(key)
  }

  get<T>(key: CacheKey): T | undefined {
    return this.entries.get(key) as T | undefined
  }

  set<T>(key: CacheKey, value: T): this {
    this.entries.set(key, value)
    return this
  }

  delete(key: CacheKey): boolean {
    const removed = this.entries.delete(key)
    return this.loads.delete(key) || removed
  }

  /**
   * Memoize an async lookup. Concurrent callers share one promise; a
   * rejected load is forgotten so the next caller tries again. Loads are
   * keyed apart from values stored with `set`.
   */
  load<T>(key: CacheKey, loader: () => Promise<T>): Promise<T> {
    const cached = this.loads.get(key)
    if (cached !== undefined) {
      return cached as Promise<T>
    }

    const promise = loader()
    this.loads.set(key, promise)
    promise.catch(() => {
      if (this.loads.get(key) === promise) {
        this.loads.delete(key)
      }
    })
    return promise
  }

  evict(): void {
    this.entries.clear()
    this.loads.clear()
  }
}

export function cache_key(namespace: string, id: string | number): CacheKey {
  return `${namespace}:${id}`
}

export const invocation_cache = new InvocationCache()
