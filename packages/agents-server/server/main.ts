import { createServer } from 'node:http'
import { fileURLToPath } from 'node:url'
import { toNodeListener } from 'h3'
import { assertProductionEnv, getEnv, loadEnvFiles } from '../src/services/env'
import { getLogger } from '../src/services/logger'
import { createServerApp } from './app'

// Package directory first, then the repository root
loadEnvFiles([
  fileURLToPath(new URL('..', import.meta.url)),
  fileURLToPath(new URL('../../..', import.meta.url))
])

const env = getEnv()
assertProductionEnv(env)

const { app, agents } = createServerApp({ env })
const log = getLogger()

createServer(toNodeListener(app)).listen(env.PORT, () => {
  log.info('server_listening', {
    port: env.PORT,
    planner: agents.plannerKind,
    tools: agents.registry.listSpecs().map((t) => t.name)
  })
})
