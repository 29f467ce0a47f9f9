import { createError, getHeader, readBody, type H3Event } from 'h3'
import type { ZodError, ZodType, ZodTypeDef } from 'zod'
import { getAgents, type Agents } from '../services/agents-container'

declare module 'h3' {
  interface H3EventContext {
    /** Injected by the app (or a test) in place of the process-wide container. */
    agents?: Agents
  }
}

export const ANONYMOUS_USER = 'anonymous'

export function resolveAgents(event: H3Event): Agents {
  return event.context.agents ?? getAgents()
}

export function resolveUserId(event: H3Event): string {
  const raw = getHeader(event, 'x-user-id')
  const trimmed = typeof raw === 'string' ? raw.trim() : ''
  return trimmed || ANONYMOUS_USER
}

export function resolveCorrelationId(event: H3Event): string | undefined {
  const raw = getHeader(event, 'x-correlation-id')
  return typeof raw === 'string' && raw.trim() ? raw.trim() : undefined
}

export function invalidInput(statusMessage: string, error: ZodError) {
  return createError({
    statusCode: 400,
    statusMessage,
    data: {
      issues: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code
      }))
    }
  })
}

/** Reads and validates a JSON body; invalid input becomes a 400 with the zod issues. */
export async function parseBody<TOut, TIn = TOut>(
  event: H3Event,
  schema: ZodType<TOut, ZodTypeDef, TIn>,
  label: string
): Promise<TOut> {
  const body: unknown = await readBody(event)
  const parsed = schema.safeParse(body ?? {})
  if (!parsed.success) {
    throw invalidInput(`Invalid ${label} payload`, parsed.error)
  }
  return parsed.data
}
