import { AgentLoop } from '../agent/agent-loop'
import { FallbackPlanner } from '../agent/planners/fallback-planner'
import { LlmPlanner, openAiChatClient } from '../agent/planners/llm-planner'
import type { AgentPolicy } from '../agent/policy'
import type { Planner } from '../agent/types'
import { registerDefaultTools } from '../tools/default-tools'
import { ToolExecutor } from '../tools/executor'
import { ToolRegistry } from '../tools/registry'
import { buildAgentPolicy, getEnv, type Env } from './env'
import { getDefaultModelName, getOpenAI } from './llm'
import { getLogger } from './logger'
import { createInMemoryNoteStore, type NoteStore } from './note-store'
import { createInMemoryRunTranscriptStore, type RunTranscriptStore } from './run-transcript-store'

export type PlannerKind = 'llm' | 'fallback' | 'custom'

export type Agents = {
  env: Env
  policy: AgentPolicy
  registry: ToolRegistry
  executor: ToolExecutor
  planner: Planner
  plannerKind: PlannerKind
  loop: AgentLoop
  notes: NoteStore
  transcripts: RunTranscriptStore
}

export type CreateAgentsOptions = {
  env?: Env
  policy?: AgentPolicy
  /** Overrides planner selection (tests, scripted runs). */
  planner?: Planner
  clock?: () => Date
}

function selectPlanner(env: Env, registry: ToolRegistry): { planner: Planner; kind: PlannerKind } {
  const openai = getOpenAI(env)
  if (!openai) {
    getLogger().warn('planner_model_not_configured', { fallback: 'deterministic' })
    return { planner: new FallbackPlanner(), kind: 'fallback' }
  }
  const planner = new LlmPlanner({ client: openAiChatClient(openai), registry, model: getDefaultModelName(env) })
  return { planner, kind: 'llm' }
}

export function createAgents(options: CreateAgentsOptions = {}): Agents {
  const env = options.env ?? getEnv()
  const policy = options.policy ?? buildAgentPolicy(env)
  const notes = createInMemoryNoteStore({ now: options.clock })
  const registry = registerDefaultTools(new ToolRegistry(), { notes, clock: options.clock })
  const executor = new ToolExecutor(registry)
  const selected = options.planner
    ? { planner: options.planner, kind: 'custom' as const }
    : selectPlanner(env, registry)

  return {
    env,
    policy,
    registry,
    executor,
    planner: selected.planner,
    plannerKind: selected.kind,
    loop: new AgentLoop({ planner: selected.planner, executor, policy }),
    notes,
    transcripts: createInMemoryRunTranscriptStore()
  }
}

let cached: Agents | null = null

export function getAgents(): Agents {
  if (cached) return cached
  cached = createAgents()
  return cached
}
