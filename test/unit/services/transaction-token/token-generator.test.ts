import {
  StaleAuthTokenError,
  StaleKeyError,
  TransientNetworkError,
} from '@root/types/errors.js'
import type { TransactionTokenStrategy } from '@root/types/transaction-token.types.js'
import { TokenGenerator } from '@services/transaction-token/token-generator.js'
import { describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

/**
 * Strategy whose material is loaded by refresh() and cleared by invalidate().
 */
function createStrategy(loaded = false) {
  let material = loaded
  const strategy = {
    version: 'test1',
    derive: vi.fn((path: string, method: string, timestamp: number) => {
      if (!material) throw new StaleKeyError('No site key loaded')
      return `${method}:${path}:${timestamp}`
    }),
    refresh: vi.fn(async () => {
      material = true
    }),
    invalidate: vi.fn(() => {
      material = false
    }),
    describe: vi.fn(() => ({
      cached: material,
      fetchedAt: null,
      expiresAt: null,
    })),
  } satisfies TransactionTokenStrategy
  return strategy
}

describe('TokenGenerator', () => {
  it('should derive from cached material without refreshing', async () => {
    const strategy = createStrategy(true)
    const generator = new TokenGenerator(strategy, createMockLogger())

    await expect(generator.issue('/path', 'GET', 1000)).resolves.toBe(
      'GET:/path:1000',
    )
    expect(strategy.refresh).not.toHaveBeenCalled()
  })

  it('should use its clock when no timestamp is given', async () => {
    const strategy = createStrategy(true)
    const generator = new TokenGenerator(
      strategy,
      createMockLogger(),
      () => 5000,
    )

    await expect(generator.issue('/path', 'GET')).resolves.toBe(
      'GET:/path:5000',
    )
  })

  it('should refresh stale material once and derive again', async () => {
    const strategy = createStrategy(false)
    const generator = new TokenGenerator(strategy, createMockLogger())

    await expect(generator.issue('/path', 'GET', 1000)).resolves.toBe(
      'GET:/path:1000',
    )
    expect(strategy.refresh).toHaveBeenCalledTimes(1)
    expect(strategy.derive).toHaveBeenCalledTimes(2)
  })

  it('should share one refresh between concurrent callers', async () => {
    const strategy = createStrategy(false)
    const generator = new TokenGenerator(strategy, createMockLogger())

    const tokens = await Promise.all([
      generator.issue('/a', 'GET', 1),
      generator.issue('/b', 'GET', 2),
      generator.issue('/c', 'GET', 3),
    ])

    expect(tokens).toEqual(['GET:/a:1', 'GET:/b:2', 'GET:/c:3'])
    expect(strategy.refresh).toHaveBeenCalledTimes(1)
  })

  it('should report material still stale after refresh as a rejected token', async () => {
    const strategy = createStrategy(false)
    strategy.refresh.mockResolvedValue(undefined)
    const generator = new TokenGenerator(strategy, createMockLogger())

    const error = await generator.issue('/path', 'GET', 1).catch((e) => e)

    expect(error).toBeInstanceOf(StaleAuthTokenError)
    expect(error.message).toBe(
      'Key material still stale after refresh: No site key loaded',
    )
  })

  it('should propagate refresh failures', async () => {
    const strategy = createStrategy(false)
    strategy.refresh.mockRejectedValue(
      new TransientNetworkError('Failed to fetch /: HTTP 503', 503),
    )
    const generator = new TokenGenerator(strategy, createMockLogger())

    await expect(generator.issue('/path', 'GET', 1)).rejects.toThrow(
      'Failed to fetch /: HTTP 503',
    )
  })

  it('should invalidate before a forced refresh', async () => {
    const strategy = createStrategy(true)
    const generator = new TokenGenerator(strategy, createMockLogger())

    await generator.forceRefresh()

    expect(strategy.invalidate).toHaveBeenCalledTimes(1)
    expect(strategy.refresh).toHaveBeenCalledTimes(1)
    expect(generator.describe()).toEqual({
      version: 'test1',
      cached: true,
      fetchedAt: null,
      expiresAt: null,
    })
  })
})
