import { defineEventHandler } from 'h3'
import { AgentRunRequestSchema, type AgentRunResponseWire } from '@agent-loop/shared'
import { fromRunRequestWire, toRunResponseWire } from '../../../../src/agent/wire'
import { parseBody, resolveAgents, resolveUserId } from '../../../../src/utils/http'

export default defineEventHandler(async (event): Promise<AgentRunResponseWire> => {
  const body = await parseBody(event, AgentRunRequestSchema, 'agent run')
  const agents = resolveAgents(event)
  const userId = resolveUserId(event)
  const request = fromRunRequestWire(body)

  const response = await agents.loop.run({ userId, request })
  agents.transcripts.record(userId, request, response)
  return toRunResponseWire(response)
})
