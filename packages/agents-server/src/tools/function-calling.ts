import type { ToolRegistry } from './registry'

export type ToolDescriptor = {
  type: 'function'
  function: {
    name: string
    description: string
    parameters: Record<string, unknown>
  }
}

export function buildToolDescriptors(registry: ToolRegistry, whitelist?: readonly string[] | null): ToolDescriptor[] {
  const allow = whitelist ? new Set(whitelist) : null
  return registry
    .listSpecs()
    .filter((spec) => !allow || allow.has(spec.name))
    .map((spec): ToolDescriptor => ({
      type: 'function',
      function: {
        name: spec.name,
        description: spec.description,
        parameters: spec.inputSchema
      }
    }))
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Models send arguments as a JSON string, an object, or occasionally garbage.
 * Always yields an object.
 */
export function parseFunctionCallArguments(raw: unknown): Record<string, unknown> {
  if (raw === null || raw === undefined) return {}
  if (isRecord(raw)) return raw
  if (typeof raw === 'string') {
    const text = raw.trim()
    if (!text) return {}
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch {
      return { raw: text }
    }
    return isRecord(parsed) ? parsed : { value: parsed }
  }
  return { value: raw }
}
