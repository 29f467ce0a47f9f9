import Ajv, { type ErrorObject, type JSONSchemaType } from 'ajv'

export type ToolContext = {
  userId: string
  taskId?: string
  traceId?: string
  metadata: Record<string, unknown>
}

export type ToolOutput = {
  ok: boolean
  data: Record<string, unknown>
  error?: string
}

export type ToolArgIssue = {
  path: string
  message: string
  keyword: string
}

export type ToolArgsValidation =
  | { ok: true; run: (ctx: ToolContext) => Promise<ToolOutput> }
  | { ok: false; issues: ToolArgIssue[] }

export type ToolSpec = {
  name: string
  description: string
  inputSchema: Record<string, unknown>
}

/**
 * A capability as the registry and executor see it. Validated arguments stay
 * bound inside `validate`'s result, so a tool can only ever run with input
 * that passed its own schema.
 */
export interface RegisteredTool {
  readonly name: string
  readonly description: string
  readonly inputSchema: Record<string, unknown>
  validate(args: unknown): ToolArgsValidation
}

export type ToolDefinition<TArgs> = {
  name: string
  description: string
  inputSchema: JSONSchemaType<TArgs> & Record<string, unknown>
  handler: (ctx: ToolContext, args: TArgs) => Promise<ToolOutput> | ToolOutput
}

type AjvInstance = InstanceType<typeof Ajv>

let sharedAjv: AjvInstance | null = null

function getAjv(): AjvInstance {
  if (sharedAjv) return sharedAjv
  sharedAjv = new Ajv({ allErrors: true, useDefaults: true })
  return sharedAjv
}

function mapAjvErrors(errors: ErrorObject[] | null | undefined): ToolArgIssue[] {
  return (errors ?? []).map((err) => ({
    path: err.instancePath || '(root)',
    message: err.message ?? 'is invalid',
    keyword: err.keyword
  }))
}

export function formatToolArgIssues(issues: ToolArgIssue[]): string {
  return issues.map((issue) => `${issue.path} ${issue.message}`).join('; ')
}

export function defineTool<TArgs>(definition: ToolDefinition<TArgs>, ajv: AjvInstance = getAjv()): RegisteredTool {
  const check = ajv.compile<TArgs>(definition.inputSchema)

  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    validate(args) {
      // useDefaults writes into the value; keep the caller's args untouched
      const candidate: unknown = structuredClone(args ?? {})
      if (!check(candidate)) {
        return { ok: false, issues: mapAjvErrors(check.errors) }
      }
      return { ok: true, run: async (ctx) => definition.handler(ctx, candidate) }
    }
  }
}
