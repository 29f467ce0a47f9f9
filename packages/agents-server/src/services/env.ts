import { config as loadDotenv } from 'dotenv'
import { resolve } from 'node:path'
import { z } from 'zod'
import { createAgentPolicy, type AgentPolicy } from '../agent/policy'

// Blank values in .env files count as unset
const blankToUndefined = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value)

const optionalString = z.preprocess(blankToUndefined, z.string().min(1).optional())
const optionalInt = (min: number) => z.preprocess(blankToUndefined, z.coerce.number().int().min(min).optional())

export const EnvSchema = z.object({
  // Anything other than 'production' counts as non-production
  NODE_ENV: z.preprocess(blankToUndefined, z.string().default('development')),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(3002)),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.string().default('info')),
  API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_DEFAULT_MODEL: optionalString,
  OPENAI_MODEL: optionalString,
  AGENT_MAX_ITERATIONS_DEFAULT: optionalInt(1),
  AGENT_MAX_ITERATIONS_CAP: optionalInt(1),
  AGENT_MIN_CONFIDENCE_TO_FINALIZE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).optional()),
  AGENT_MAX_TOTAL_RETRIES: optionalInt(0),
  AGENT_MAX_RETRIES_PER_TOOL: optionalInt(0),
  AGENT_RETRY_BACKOFF_BASE_MS: optionalInt(0)
})

export type Env = z.infer<typeof EnvSchema>

export class EnvValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(`Invalid environment: ${issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`)
    this.name = 'EnvValidationError'
  }
}

/** Loads `.env` then `.env.local` (overriding) from each directory, in order. */
export function loadEnvFiles(dirs: string[]): void {
  for (const dir of dirs) {
    loadDotenv({ path: resolve(dir, '.env'), override: false })
    loadDotenv({ path: resolve(dir, '.env.local'), override: true })
  }
}

export function parseEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source)
  if (!parsed.success) {
    throw new EnvValidationError(parsed.error.issues)
  }
  return parsed.data
}

let cached: Env | null = null

export function getEnv(): Env {
  if (cached) return cached
  cached = parseEnv()
  return cached
}

export function buildAgentPolicy(env: Env): AgentPolicy {
  return createAgentPolicy({
    maxIterationsDefault: env.AGENT_MAX_ITERATIONS_DEFAULT,
    maxIterationsCap: env.AGENT_MAX_ITERATIONS_CAP,
    minConfidenceToFinalize: env.AGENT_MIN_CONFIDENCE_TO_FINALIZE,
    retry: {
      maxTotalRetries: env.AGENT_MAX_TOTAL_RETRIES,
      maxRetriesPerTool: env.AGENT_MAX_RETRIES_PER_TOOL,
      backoffBaseMs: env.AGENT_RETRY_BACKOFF_BASE_MS
    }
  })
}

/** Production deployments must configure the bearer key. */
export function assertProductionEnv(env: Env): void {
  if (env.NODE_ENV !== 'production') return
  const missing: string[] = []
  if (!env.API_KEY) missing.push('API_KEY')
  if (missing.length > 0) {
    throw new Error(`[agents-server] Missing required environment variables in production: ${missing.join(', ')}`)
  }
}
