import OpenAI from 'openai'
import type { Env } from './env'

export const DEFAULT_MODEL_FALLBACK = 'gpt-4o'

/**
 * Default chat model. Precedence:
 *  1) OPENAI_DEFAULT_MODEL
 *  2) OPENAI_MODEL (legacy alias)
 *  3) 'gpt-4o'
 */
export function getDefaultModelName(env: Pick<Env, 'OPENAI_DEFAULT_MODEL' | 'OPENAI_MODEL'>): string {
  const m = env.OPENAI_DEFAULT_MODEL || env.OPENAI_MODEL || DEFAULT_MODEL_FALLBACK
  return m.trim()
}

let client: OpenAI | null = null

export function getOpenAI(env: Pick<Env, 'OPENAI_API_KEY'>): OpenAI | null {
  if (!env.OPENAI_API_KEY) return null
  if (client) return client
  client = new OpenAI({ apiKey: env.OPENAI_API_KEY })
  return client
}
