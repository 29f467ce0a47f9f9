import { createError, defineEventHandler, getHeader } from 'h3'

/** Bearer check on /api/ routes; a no-op unless an API key is configured. */
export function createAuthMiddleware(apiKey: string | undefined) {
  return defineEventHandler((event) => {
    if (!apiKey) return
    if (!event.path.startsWith('/api/')) return
    // Always let CORS preflight pass
    if (event.method === 'OPTIONS') return
    const header = getHeader(event, 'authorization') ?? ''
    if (!header.startsWith('Bearer ')) {
      throw createError({ statusCode: 401, statusMessage: 'Missing bearer token' })
    }
    const token = header.slice('Bearer '.length)
    if (token !== apiKey) {
      throw createError({ statusCode: 403, statusMessage: 'Invalid API key' })
    }
  })
}
