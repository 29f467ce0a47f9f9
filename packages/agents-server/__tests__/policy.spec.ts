// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { clampIterations, createAgentPolicy, retryBackoffMs, RetryState } from '../src/agent/policy'

describe('createAgentPolicy', () => {
  it('fills defaults and freezes the result', () => {
    const policy = createAgentPolicy()
    expect(policy).toEqual({
      maxIterationsDefault: 6,
      maxIterationsCap: 20,
      minConfidenceToFinalize: 0.45,
      retry: { maxTotalRetries: 3, maxRetriesPerTool: 2, backoffBaseMs: 150 }
    })
    expect(Object.isFrozen(policy)).toBe(true)
    expect(Object.isFrozen(policy.retry)).toBe(true)
  })

  it('merges partial retry overrides', () => {
    const policy = createAgentPolicy({ retry: { maxTotalRetries: 1 } })
    expect(policy.retry).toEqual({ maxTotalRetries: 1, maxRetriesPerTool: 2, backoffBaseMs: 150 })
  })

  it('rejects out-of-range values', () => {
    expect(() => createAgentPolicy({ minConfidenceToFinalize: 1.5 })).toThrow()
    expect(() => createAgentPolicy({ maxIterationsCap: 0 })).toThrow()
  })
})

describe('clampIterations', () => {
  const policy = createAgentPolicy({ maxIterationsCap: 5 })

  it('clamps into [1, cap]', () => {
    expect(clampIterations(0, policy)).toBe(1)
    expect(clampIterations(-3, policy)).toBe(1)
    expect(clampIterations(3, policy)).toBe(3)
    expect(clampIterations(9, policy)).toBe(5)
  })

  it('is idempotent', () => {
    for (const n of [-1, 0, 1, 4, 5, 6, 100]) {
      const once = clampIterations(n, policy)
      expect(clampIterations(once, policy)).toBe(once)
    }
  })
})

describe('retryBackoffMs', () => {
  it('doubles per attempt from the base', () => {
    const policy = createAgentPolicy()
    expect([1, 2, 3].map((n) => retryBackoffMs(n, policy))).toEqual([150, 300, 600])
    expect(retryBackoffMs(0, policy)).toBe(150)
  })
})

describe('RetryState', () => {
  const policy = createAgentPolicy()

  it('caps retries per tool', () => {
    const state = new RetryState()
    expect(state.canRetry('now', policy)).toBe(true)
    state.markRetry('now')
    state.markRetry('now')
    expect(state.canRetry('now', policy)).toBe(false)
    expect(state.canRetry('echo', policy)).toBe(true)
    expect(state.toolRetries('now')).toBe(2)
    expect(state.totalRetries).toBe(2)
  })

  it('caps retries globally across tools', () => {
    const state = new RetryState()
    state.markRetry('a')
    state.markRetry('b')
    state.markRetry('c')
    expect(state.canRetry('d', policy)).toBe(false)
    expect(state.perToolSnapshot()).toEqual({ a: 1, b: 1, c: 1 })
  })

  it('counts unattributed retries against the global budget only', () => {
    const state = new RetryState()
    expect(state.canRetry(null, policy)).toBe(true)
    state.markRetry(null)
    state.markRetry(undefined)
    expect(state.totalRetries).toBe(2)
    expect(state.toolRetries(null)).toBe(0)
    expect(state.perToolSnapshot()).toEqual({})
    state.markRetry(null)
    expect(state.canRetry(null, policy)).toBe(false)
  })

  it('denies everything with a zero budget', () => {
    const strict = createAgentPolicy({ retry: { maxTotalRetries: 0 } })
    expect(new RetryState().canRetry(null, strict)).toBe(false)
  })
})
