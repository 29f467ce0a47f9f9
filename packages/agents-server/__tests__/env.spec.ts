// @vitest-environment node
import { describe, expect, it } from 'vitest'
import { assertProductionEnv, buildAgentPolicy, EnvValidationError, parseEnv } from '../src/services/env'
import { getDefaultModelName, getOpenAI } from '../src/services/llm'

describe('parseEnv', () => {
  it('applies defaults to an empty environment', () => {
    const env = parseEnv({})
    expect(env.NODE_ENV).toBe('development')
    expect(env.PORT).toBe(3002)
    expect(env.LOG_LEVEL).toBe('info')
    expect(env.API_KEY).toBeUndefined()
  })

  it('treats blank values as unset', () => {
    const env = parseEnv({ API_KEY: '  ', PORT: '', AGENT_MAX_TOTAL_RETRIES: '' })
    expect(env.API_KEY).toBeUndefined()
    expect(env.PORT).toBe(3002)
    expect(env.AGENT_MAX_TOTAL_RETRIES).toBeUndefined()
  })

  it('accepts any deployment name for NODE_ENV', () => {
    expect(parseEnv({ NODE_ENV: 'staging' }).NODE_ENV).toBe('staging')
  })

  it('coerces numeric settings', () => {
    const env = parseEnv({ PORT: '8080', AGENT_MIN_CONFIDENCE_TO_FINALIZE: '0.6' })
    expect(env.PORT).toBe(8080)
    expect(env.AGENT_MIN_CONFIDENCE_TO_FINALIZE).toBe(0.6)
  })

  it('rejects invalid values with the offending keys', () => {
    expect(() => parseEnv({ PORT: 'abc' })).toThrow(EnvValidationError)
    expect(() => parseEnv({ AGENT_MAX_RETRIES_PER_TOOL: '-1' })).toThrow(/AGENT_MAX_RETRIES_PER_TOOL/)
  })
})

describe('buildAgentPolicy', () => {
  it('maps overrides onto an immutable policy', () => {
    const policy = buildAgentPolicy(
      parseEnv({ AGENT_MAX_TOTAL_RETRIES: '5', AGENT_MAX_ITERATIONS_CAP: '8', AGENT_RETRY_BACKOFF_BASE_MS: '0' })
    )
    expect(policy).toEqual({
      maxIterationsDefault: 6,
      maxIterationsCap: 8,
      minConfidenceToFinalize: 0.45,
      retry: { maxTotalRetries: 5, maxRetriesPerTool: 2, backoffBaseMs: 0 }
    })
    expect(Object.isFrozen(policy)).toBe(true)
  })
})

describe('assertProductionEnv', () => {
  it('requires an API key in production only', () => {
    expect(() => assertProductionEnv(parseEnv({ NODE_ENV: 'production' }))).toThrow(
      '[agents-server] Missing required environment variables in production: API_KEY'
    )
    expect(() => assertProductionEnv(parseEnv({ NODE_ENV: 'production', API_KEY: 'test-secret' }))).not.toThrow()
    expect(() => assertProductionEnv(parseEnv({ NODE_ENV: 'development' }))).not.toThrow()
    expect(() => assertProductionEnv(parseEnv({ NODE_ENV: 'staging' }))).not.toThrow()
  })
})

describe('llm settings', () => {
  it('resolves the default model name by precedence', () => {
    expect(getDefaultModelName({})).toBe('gpt-4o')
    expect(getDefaultModelName({ OPENAI_MODEL: 'legacy-model' })).toBe('legacy-model')
    expect(getDefaultModelName({ OPENAI_DEFAULT_MODEL: 'primary-model', OPENAI_MODEL: 'legacy-model' })).toBe('primary-model')
  })

  it('returns no client without a key', () => {
    expect(getOpenAI({})).toBeNull()
  })
})
