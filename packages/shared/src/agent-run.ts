import { z } from 'zod'

export const AgentActionEnum = z.enum(['tool', 'reflect', 'retry', 'final'])
export type AgentAction = z.infer<typeof AgentActionEnum>

export const AGENT_RUN_LIMITS = {
  maxIterations: { min: 1, max: 20, default: 6 },
  timeoutMs: { min: 1_000, max: 120_000, default: 20_000 }
} as const

export const FunctionCallSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({})
})
export type FunctionCall = z.infer<typeof FunctionCallSchema>

// Wire shape of a run request. Keys are snake_case on the wire. An absent
// max_iterations falls back to the server policy's default.
export const AgentRunRequestSchema = z.object({
  prompt: z.string().trim().min(1),
  max_iterations: z
    .number()
    .int()
    .min(AGENT_RUN_LIMITS.maxIterations.min)
    .max(AGENT_RUN_LIMITS.maxIterations.max)
    .optional(),
  allow_tools: z.boolean().default(true),
  tool_whitelist: z.array(z.string().min(1)).nullable().optional(),
  timeout_ms: z
    .number()
    .int()
    .min(AGENT_RUN_LIMITS.timeoutMs.min)
    .max(AGENT_RUN_LIMITS.timeoutMs.max)
    .default(AGENT_RUN_LIMITS.timeoutMs.default)
})
export type AgentRunRequestWire = z.output<typeof AgentRunRequestSchema>

export const AgentStepSchema = z.object({
  step_index: z.number().int().nonnegative(),
  thought: z.string().default(''),
  action: AgentActionEnum,
  function_call: FunctionCallSchema.nullable().default(null),
  final_text: z.string().nullable().default(null),
  confidence: z.number(),
  notes: z.record(z.unknown()).default({})
})
export type AgentStepWire = z.infer<typeof AgentStepSchema>

export const ToolTraceSchema = z.object({
  step: z.number().int().nonnegative(),
  tool: z.string(),
  ok: z.boolean(),
  latency_ms: z.number().int().nonnegative(),
  output: z.record(z.unknown()),
  error: z.string().nullable()
})
export type ToolTraceWire = z.infer<typeof ToolTraceSchema>

export const DecisionTraceSchema = z.object({
  trace_id: z.string(),
  iterations: z.number().int().nonnegative(),
  max_iterations: z.number().int().positive(),
  timeout_ms: z.number().int(),
  elapsed_ms: z.number().int().nonnegative(),
  retry_total: z.number().int().nonnegative(),
  retry_per_tool: z.record(z.number().int().nonnegative()),
  policy: z.object({
    min_confidence_to_finalize: z.number(),
    max_total_retries: z.number().int(),
    max_retries_per_tool: z.number().int()
  }),
  whitelist_active: z.boolean(),
  whitelist: z.array(z.string()).nullable()
})
export type DecisionTraceWire = z.infer<typeof DecisionTraceSchema>

export const AgentRunResponseSchema = z.object({
  ok: z.boolean(),
  answer: z.string(),
  steps: z.array(AgentStepSchema),
  tool_traces: z.array(ToolTraceSchema),
  decision_trace: DecisionTraceSchema,
  error: z.string().nullable()
})
export type AgentRunResponseWire = z.infer<typeof AgentRunResponseSchema>

// SSE frames emitted by the streaming run endpoint, in emission order:
// every step, every tool trace, one final frame, then done.
export const AgentStreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('step'), step: AgentStepSchema }),
  z.object({ type: z.literal('tool_trace'), tool_trace: ToolTraceSchema }),
  z.object({
    type: z.literal('final'),
    ok: z.boolean(),
    answer: z.string(),
    error: z.string().nullable(),
    decision_trace: DecisionTraceSchema
  }),
  z.object({ type: z.literal('done'), done: z.literal(true) })
])
export type AgentStreamEvent = z.infer<typeof AgentStreamEventSchema>

export const ToolExecuteRequestSchema = z.object({
  name: z.string().trim().min(1),
  args: z.record(z.unknown()).default({}),
  trace_id: z.string().min(1).optional(),
  task_id: z.string().min(1).optional()
})
export type ToolExecuteRequest = z.infer<typeof ToolExecuteRequestSchema>

export const ToolExecuteResponseSchema = z.object({
  ok: z.boolean(),
  tool: z.string(),
  latency_ms: z.number().int().nonnegative(),
  output: z.record(z.unknown()),
  error: z.string().nullable()
})
export type ToolExecuteResponse = z.infer<typeof ToolExecuteResponseSchema>

export const ToolSpecSchema = z.object({
  name: z.string(),
  description: z.string(),
  input_schema: z.record(z.unknown())
})
export type ToolSpecWire = z.infer<typeof ToolSpecSchema>

export const RunTranscriptSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  prompt: z.string(),
  max_iterations: z.number().int(),
  allow_tools: z.boolean(),
  tool_whitelist: z.array(z.string()).nullable(),
  timeout_ms: z.number().int(),
  ok: z.boolean(),
  answer: z.string(),
  error: z.string().nullable(),
  steps_count: z.number().int().nonnegative(),
  decision_trace: DecisionTraceSchema,
  tool_traces: z.array(ToolTraceSchema),
  created_at: z.string()
})
export type RunTranscriptWire = z.infer<typeof RunTranscriptSchema>
