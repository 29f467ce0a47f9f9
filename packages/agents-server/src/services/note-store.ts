import { randomUUID } from 'node:crypto'

export type Note = {
  id: string
  userId: string
  text: string
  tags: string[]
  createdAt: string
}

export type NoteInput = {
  text: string
  tags?: string[]
}

export type NoteStore = {
  write(userId: string, input: NoteInput): Note
  recent(userId: string, limit: number): Note[]
  query(userId: string, query: string, limit: number): Note[]
  clear(): void
}

type NoteStoreOptions = {
  maxNotesPerUser?: number
  now?: () => Date
  genId?: () => string
}

function matchesAll(note: Note, terms: string[]): boolean {
  const haystack = [note.text, ...note.tags].join(' ').toLowerCase()
  return terms.every((term) => haystack.includes(term))
}

export const DEFAULT_MAX_NOTES_PER_USER = 200

/** Per-user notes kept in process memory, newest last internally. Oldest notes are evicted past the cap. */
export function createInMemoryNoteStore(options: NoteStoreOptions = {}): NoteStore {
  const maxNotesPerUser = Math.max(1, options.maxNotesPerUser ?? DEFAULT_MAX_NOTES_PER_USER)
  const now = options.now ?? (() => new Date())
  const genId = options.genId ?? (() => randomUUID())
  const byUser = new Map<string, Note[]>()

  const listFor = (userId: string) => byUser.get(userId) ?? []

  return {
    write(userId, input) {
      const note: Note = {
        id: genId(),
        userId,
        text: input.text,
        tags: [...(input.tags ?? [])],
        createdAt: now().toISOString()
      }
      const list = byUser.get(userId)
      if (list) {
        list.push(note)
        if (list.length > maxNotesPerUser) list.splice(0, list.length - maxNotesPerUser)
      } else {
        byUser.set(userId, [note])
      }
      return note
    },
    recent(userId, limit) {
      return listFor(userId).slice().reverse().slice(0, Math.max(0, limit))
    },
    query(userId, query, limit) {
      const terms = query.toLowerCase().split(/\s+/).filter(Boolean)
      if (!terms.length) return []
      return listFor(userId)
        .slice()
        .reverse()
        .filter((note) => matchesAll(note, terms))
        .slice(0, Math.max(0, limit))
    },
    clear() {
      byUser.clear()
    }
  }
}
