import { performance } from 'node:perf_hooks'
import { getLogger } from '../services/logger'
import type { ToolRegistry } from './registry'
import { formatToolArgIssues, type ToolContext } from './types'

export type ToolExecutionRecord = {
  readonly toolName: string
  readonly args: Record<string, unknown>
  readonly ok: boolean
  readonly latencyMs: number
  readonly output: Record<string, unknown>
  readonly error?: string
}

export type ToolExecuteInput = {
  userId: string
  toolName: string
  args: Record<string, unknown>
  taskId?: string
  traceId?: string
  metadata?: Record<string, unknown>
  /** When present, only these tool names may run. */
  whitelist?: ReadonlySet<string> | null
}

type Clock = () => number

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}

/**
 * Runs one tool invocation. Every failure (whitelist, lookup, validation,
 * handler) comes back as `ok: false` with an error string; nothing is thrown
 * to the caller and nothing is retried here.
 */
export class ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly now: Clock = () => performance.now()
  ) {}

  async execute(input: ToolExecuteInput): Promise<ToolExecutionRecord> {
    const started = this.now()
    const { toolName, args } = input
    const log = getLogger()

    const finish = (result: { ok: boolean; output?: Record<string, unknown>; error?: string }): ToolExecutionRecord => {
      const record: ToolExecutionRecord = {
        toolName,
        args,
        ok: result.ok,
        latencyMs: Math.max(0, Math.floor(this.now() - started)),
        output: result.output ?? {},
        ...(result.error !== undefined ? { error: result.error } : {})
      }
      log.info('tool_execute', {
        tool: toolName,
        ok: record.ok,
        latencyMs: record.latencyMs,
        traceId: input.traceId,
        error: record.error
      })
      return record
    }

    if (input.whitelist && !input.whitelist.has(toolName)) {
      return finish({ ok: false, error: `Tool '${toolName}' is not allowed by whitelist` })
    }

    const tool = this.registry.get(toolName)
    if (!tool) {
      return finish({ ok: false, error: `Unknown tool '${toolName}'` })
    }

    const ctx: ToolContext = {
      userId: input.userId,
      taskId: input.taskId,
      traceId: input.traceId,
      metadata: input.metadata ?? {}
    }

    try {
      const validation = tool.validate(args)
      if (!validation.ok) {
        log.warn('tool_invalid_args', { tool: toolName, issues: validation.issues, traceId: input.traceId })
        return finish({
          ok: false,
          error: `Invalid input for tool '${toolName}': ${formatToolArgIssues(validation.issues)}`
        })
      }
      const out = await validation.run(ctx)
      return finish({ ok: out.ok, output: out.data, error: out.error })
    } catch (err) {
      return finish({ ok: false, error: `Unhandled tool error: ${errorMessage(err)}` })
    }
  }
}
