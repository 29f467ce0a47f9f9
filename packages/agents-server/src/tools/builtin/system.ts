import { defineTool, type RegisteredTool } from '../types'

type EchoArgs = { text: string }
type NowArgs = { tz?: string }

export function createEchoTool(): RegisteredTool {
  return defineTool<EchoArgs>({
    name: 'echo',
    description: 'Returns the provided text.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', minLength: 1, maxLength: 10_000 }
      },
      required: ['text'],
      additionalProperties: false
    },
    handler: (ctx, { text }) => ({ ok: true, data: { text, user_id: ctx.userId } })
  })
}

export function createNowTool(clock: () => Date = () => new Date()): RegisteredTool {
  return defineTool<NowArgs>({
    name: 'now',
    description: 'Returns the current server time (UTC, ISO 8601).',
    inputSchema: {
      type: 'object',
      properties: {
        tz: { type: 'string', nullable: true, default: 'UTC' }
      },
      required: [],
      additionalProperties: false
    },
    handler: (_ctx, { tz }) => ({ ok: true, data: { utc_now: clock().toISOString(), tz: tz || 'UTC' } })
  })
}
