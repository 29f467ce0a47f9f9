import { defineEventHandler } from 'h3'
import { getLogger } from '../../../src/services/logger'
import { resolveAgents } from '../../../src/utils/http'

export default defineEventHandler((event) => {
  const agents = resolveAgents(event)
  const llmConfigured = agents.plannerKind === 'llm'
  getLogger().info('health_check', { tools: agents.registry.size, planner: agents.plannerKind })

  return {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptimeSeconds: Math.round(process.uptime()),
    services: {
      tools: { count: agents.registry.size },
      planner: { kind: agents.plannerKind, llmConfigured }
    },
    env: {
      nodeEnv: agents.env.NODE_ENV
    }
  }
})
