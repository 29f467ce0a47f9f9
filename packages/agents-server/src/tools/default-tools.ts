import type { NoteStore } from '../services/note-store'
import { createMemoryTools } from './builtin/memory'
import { createEchoTool, createNowTool } from './builtin/system'
import type { ToolRegistry } from './registry'

export function registerDefaultTools(registry: ToolRegistry, deps: { notes: NoteStore; clock?: () => Date }) {
  registry.register(createEchoTool())
  registry.register(createNowTool(deps.clock))
  for (const tool of createMemoryTools(deps.notes)) {
    registry.register(tool)
  }
  return registry
}
