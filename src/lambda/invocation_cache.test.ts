import { describe, it, expect, vi, beforeEach } from 'vitest'
import { InvocationCache, cache_key, invocation_cache } from './invocation_cache.js'

describe('InvocationCache', () => {
  let cache: InvocationCache

  beforeEach(() => {
    cache = new InvocationCache()
  })

  it('should store and return values', () => {
    cache.set('user:1', { id: '1' })

    expect(cache.has('user:1')).toBe(true)
    expect(cache.get<{ id: string }>('user:1')).toEqual({ id: '1' })
    expect(cache.get('user:2')).toBeUndefined()
    expect(cache.size).toBe(1)
  })

  it('should delete single entries', () => {
    cache.set('a', 1)

    expect(cache.delete('a')).toBe(true)
    expect(cache.delete('a')).toBe(false)
    expect(cache.size).toBe(0)
  })

  it('should share one promise between concurrent loads of a key', async () => {
    const loader = vi.fn(async () => 'value')

    const first = cache.load('k', loader)
    const second = cache.load('k', loader)

    expect(second).toBe(first)
    await expect(first).resolves.toBe('value')
    expect(loader).toHaveBeenCalledTimes(1)
  })

  it('should forget a rejected load so the next caller retries', async () => {
    const loader = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce('recovered')

    await expect(cache.load('k', loader)).rejects.toThrow('timeout')
    await expect(cache.load('k', loader)).resolves.toBe('recovered')
    expect(loader).toHaveBeenCalledTimes(2)
  })

  it('should count loads and values and delete either', async () => {
    cache.set('value', 1)
    await cache.load('loaded', async () => 2)

    expect(cache.size).toBe(2)
    expect(cache.delete('loaded')).toBe(true)
    expect(cache.size).toBe(1)
  })

  it('should empty everything on evict and tolerate repeated evicts', async () => {
    cache.set('a', 1)
    await cache.load('b', async () => 2)

    cache.evict()
    cache.evict()

    expect(cache.size).toBe(0)
    expect(cache.has('a')).toBe(false)
  })

  it('should run the loader again after an evict', async () => {
    const loader = vi.fn(async () => 'value')

    await cache.load('k', loader)
    cache.evict()
    await cache.load('k', loader)

    expect(loader).toHaveBeenCalledTimes(2)
  })
})

describe('cache_key', () => {
  it('should join namespace and id', () => {
    expect(cache_key('user', 42)).toBe('user:42')
  })
})

describe('invocation_cache', () => {
  it('should be a process-wide InvocationCache', () => {
    expect(invocation_cache).toBeInstanceOf(InvocationCache)
  })
})
