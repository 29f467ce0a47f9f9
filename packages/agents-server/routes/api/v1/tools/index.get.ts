import { defineEventHandler } from 'h3'
import type { ToolSpecWire } from '@agent-loop/shared'
import { resolveAgents } from '../../../../src/utils/http'

export default defineEventHandler((event) => {
  const tools: ToolSpecWire[] = resolveAgents(event)
    .registry.listSpecs()
    .map((spec) => ({ name: spec.name, description: spec.description, input_schema: spec.inputSchema }))
  return { ok: true, count: tools.length, tools }
})
