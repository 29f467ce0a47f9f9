import { defineEventHandler, getHeader, setHeader } from 'h3'

export const CORS_ALLOW_HEADERS = 'content-type,authorization,x-user-id,x-correlation-id'

// Reflects the caller's origin on /api/ routes and short-circuits preflight.
export default defineEventHandler((event) => {
  if (!event.path.startsWith('/api/')) return

  const origin = getHeader(event, 'origin')
  if (origin) {
    setHeader(event, 'Vary', 'Origin')
    setHeader(event, 'Access-Control-Allow-Origin', origin)
  }
  setHeader(event, 'Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
  setHeader(event, 'Access-Control-Allow-Headers', CORS_ALLOW_HEADERS)
  setHeader(event, 'Access-Control-Max-Age', 600)

  if (event.method === 'OPTIONS') {
    event.node.res.statusCode = 204
    event.node.res.end()
  }
})
