import { createApp, createRouter, type App } from 'h3'
import { createAgents, type Agents } from '../src/services/agents-container'
import type { Env } from '../src/services/env'
import { getLogger } from '../src/services/logger'
import healthGet from '../routes/api/v1/health.get'
import agentRunPost from '../routes/api/v1/agent/run.post'
import agentStreamPost from '../routes/api/v1/agent/stream.post'
import agentRunsGet from '../routes/api/v1/agent/runs.get'
import toolsIndexGet from '../routes/api/v1/tools/index.get'
import toolsExecutePost from '../routes/api/v1/tools/execute.post'
import { createAuthMiddleware } from './middleware/auth'
import cors from './middleware/cors'

export type ServerAppOptions = {
  agents?: Agents
  env?: Env
}

export function createApiRouter() {
  return createRouter()
    .get('/api/v1/health', healthGet)
    .post('/api/v1/agent/run', agentRunPost)
    .post('/api/v1/agent/stream', agentStreamPost)
    .get('/api/v1/agent/runs', agentRunsGet)
    .get('/api/v1/tools', toolsIndexGet)
    .post('/api/v1/tools/execute', toolsExecutePost)
}

export function createServerApp(options: ServerAppOptions = {}): { app: App; agents: Agents } {
  const agents = options.agents ?? createAgents({ env: options.env })
  const env = options.env ?? agents.env
  const log = getLogger()

  const app = createApp({
    onRequest(event) {
      event.context.agents = agents
    },
    onError(error, event) {
      if (error.statusCode >= 500) {
        log.error('http_error', { path: event.path, statusCode: error.statusCode, error: error.message })
      }
    }
  })

  app.use(cors)
  app.use(createAuthMiddleware(env.API_KEY))
  app.use(createApiRouter())

  return { app, agents }
}
