import { defineEventHandler } from 'h3'
import { ToolExecuteRequestSchema, type ToolExecuteRequest, type ToolExecuteResponse } from '@agent-loop/shared'
import { parseBody, resolveAgents, resolveUserId } from '../../../../src/utils/http'

// Direct invocation for operators; no whitelist applies here.
export default defineEventHandler(async (event): Promise<ToolExecuteResponse> => {
  const body: ToolExecuteRequest = await parseBody(event, ToolExecuteRequestSchema, 'tool execute')
  const rec = await resolveAgents(event).executor.execute({
    userId: resolveUserId(event),
    toolName: body.name,
    args: body.args,
    traceId: body.trace_id,
    taskId: body.task_id
  })
  return {
    ok: rec.ok,
    tool: rec.toolName,
    latency_ms: rec.latencyMs,
    output: rec.output,
    error: rec.error ?? null
  }
})
