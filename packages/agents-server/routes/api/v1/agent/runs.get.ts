import { defineEventHandler, getQuery } from 'h3'
import { z } from 'zod'
import { invalidInput, resolveAgents, resolveUserId } from '../../../../src/utils/http'

const MAX_RUNS_LIMIT = 100

const RunsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .default(20)
    .transform((n) => Math.min(n, MAX_RUNS_LIMIT))
})

export default defineEventHandler((event) => {
  const parsed = RunsQuerySchema.safeParse(getQuery(event))
  if (!parsed.success) {
    throw invalidInput('Invalid runs query', parsed.error)
  }
  const runs = resolveAgents(event).transcripts.listByUser(resolveUserId(event), parsed.data.limit)
  return { ok: true, count: runs.length, runs }
})
