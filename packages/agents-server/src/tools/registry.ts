import type { RegisteredTool, ToolSpec } from './types'

export class UnknownToolError extends Error {
  constructor(public readonly toolName: string) {
    super(`Unknown tool '${toolName}'`)
    this.name = 'UnknownToolError'
  }
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>()

  register(tool: RegisteredTool): void {
    if (!tool.name.trim()) {
      throw new Error('Tool name is required')
    }
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' already registered`)
    }
    this.tools.set(tool.name, tool)
  }

  unregister(name: string): void {
    this.tools.delete(name)
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name)
  }

  require(name: string): RegisteredTool {
    const tool = this.get(name)
    if (!tool) throw new UnknownToolError(name)
    return tool
  }

  listSpecs(): ToolSpec[] {
    return Array.from(this.tools.values())
      .map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  get size(): number {
    return this.tools.size
  }

  clear(): void {
    this.tools.clear()
  }
}
