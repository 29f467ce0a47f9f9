import type { Note, NoteStore } from '../../services/note-store'
import { defineTool, type RegisteredTool } from '../types'

type WriteNoteArgs = { text: string; tags?: string[] }
type RecentArgs = { limit?: number }
type QueryArgs = { query: string; limit?: number }

function serializeNote(note: Note) {
  return { id: note.id, text: note.text, tags: note.tags, created_at: note.createdAt }
}

export function createMemoryTools(notes: NoteStore): RegisteredTool[] {
  const writeNote = defineTool<WriteNoteArgs>({
    name: 'memory_write_note',
    description: 'Stores a short note in the caller\'s memory.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', minLength: 1, maxLength: 4_000 },
        tags: { type: 'array', items: { type: 'string', minLength: 1 }, maxItems: 20, nullable: true }
      },
      required: ['text'],
      additionalProperties: false
    },
    handler: (ctx, { text, tags }) => {
      const note = notes.write(ctx.userId, { text, tags: tags ?? [] })
      return { ok: true, data: { note: serializeNote(note) } }
    }
  })

  const recent = defineTool<RecentArgs>({
    name: 'memory_recent',
    description: 'Lists the caller\'s most recent notes, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        limit: { type: 'integer', minimum: 1, maximum: 50, nullable: true, default: 10 }
      },
      required: [],
      additionalProperties: false
    },
    handler: (ctx, { limit }) => {
      const found = notes.recent(ctx.userId, limit ?? 10)
      return { ok: true, data: { count: found.length, notes: found.map(serializeNote) } }
    }
  })

  const query = defineTool<QueryArgs>({
    name: 'memory_query',
    description: 'Finds the caller\'s notes containing every word of the query.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', minLength: 1, maxLength: 500 },
        limit: { type: 'integer', minimum: 1, maximum: 50, nullable: true, default: 5 }
      },
      required: ['query'],
      additionalProperties: false
    },
    handler: (ctx, args) => {
      const found = notes.query(ctx.userId, args.query, args.limit ?? 5)
      return { ok: true, data: { query: args.query, count: found.length, notes: found.map(serializeNote) } }
    }
  })

  return [writeNote, recent, query]
}
