import { defineEventHandler } from 'h3'
import { AgentRunRequestSchema } from '@agent-loop/shared'
import { fromRunRequestWire, toStepWire, toToolTraceWire } from '../../../../src/agent/wire'
import { getLogger } from '../../../../src/services/logger'
import { parseBody, resolveAgents, resolveCorrelationId, resolveUserId } from '../../../../src/utils/http'
import { createSse } from '../../../../src/utils/sse'

export default defineEventHandler(async (event) => {
  // Validate before opening the stream so bad input is still a plain 400
  const body = await parseBody(event, AgentRunRequestSchema, 'agent run')
  const agents = resolveAgents(event)
  const userId = resolveUserId(event)
  const cid = resolveCorrelationId(event)
  const request = fromRunRequestWire(body)

  const sse = createSse(event, { correlationId: cid })
  // Steps go out as they are recorded; frames are chained to keep their order
  let pending: Promise<void> = Promise.resolve()

  try {
    const response = await agents.loop.run({
      userId,
      request,
      onStep: (step) => {
        pending = pending.then(() => sse.send({ type: 'step', step: toStepWire(step) }))
      }
    })
    await pending
    agents.transcripts.record(userId, request, response)
    if (sse.aborted()) {
      getLogger().info('agent_stream_client_gone', { correlationId: cid, userId, traceId: response.decisionTrace.trace_id })
      return
    }

    for (const trace of response.toolTraces) {
      await sse.send({ type: 'tool_trace', tool_trace: toToolTraceWire(trace) })
    }
    await sse.send({
      type: 'final',
      ok: response.ok,
      answer: response.answer,
      error: response.error ?? null,
      decision_trace: response.decisionTrace
    })
    await sse.send({ type: 'done', done: true })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    getLogger().error('agent_stream_failed', { correlationId: cid, userId, error: message })
    await sse.sendNamed('error', { message })
  } finally {
    sse.close()
  }
})
