import type { ServerResponse } from 'node:http'
import { setHeader, type H3Event } from 'h3'
import type { AgentStreamEvent } from '@agent-loop/shared'
import { getLogger } from '../services/logger'

/**
 * SSE writer with:
 * - Standard headers
 * - Event names and incremental ids
 * - Optional heartbeats
 * - Backpressure handling
 * - Disconnect cleanup
 */
export type SseWriter = {
  send: (evt: AgentStreamEvent) => Promise<void>
  sendNamed: (type: string, data: Record<string, unknown>) => Promise<void>
  close: () => void
  aborted: () => boolean
}

export type SseOptions = {
  correlationId?: string
  /** 0 disables heartbeats. */
  heartbeatMs?: number
}

export function formatSseFrame(type: string, id: number, data: Record<string, unknown>): string {
  return `event: ${type}\nid: ${id}\ndata: ${JSON.stringify(data)}\n\n`
}

export function createSse(event: H3Event, opts: SseOptions = {}): SseWriter {
  const res: ServerResponse = event.node.res
  const heartbeatMs = opts.heartbeatMs ?? 15000
  const correlationId = opts.correlationId
  const log = getLogger()
  let id = 1
  let closed = false

  // Standard SSE headers + proxy buffering off
  setHeader(event, 'Content-Type', 'text/event-stream; charset=utf-8')
  setHeader(event, 'Cache-Control', 'no-cache, no-transform')
  setHeader(event, 'Connection', 'keep-alive')
  setHeader(event, 'X-Accel-Buffering', 'no')
  setHeader(event, 'Content-Encoding', 'identity')
  res.statusCode = 200
  if (typeof res.flushHeaders === 'function') res.flushHeaders()

  // Prologue comment to open stream in some proxies
  res.write(':\n\n')

  const isGone = () => closed || res.writableEnded || res.destroyed

  const writeRaw = (chunk: string) =>
    new Promise<void>((resolve) => {
      if (isGone()) {
        closed = true
        return resolve()
      }
      if (res.write(chunk)) return resolve()
      if (isGone()) {
        closed = true
        return resolve()
      }

      const start = Date.now()
      const cleanup = () => {
        res.off('drain', handleDrain)
        res.off('close', handleTerminate)
      }
      const handleDrain = () => {
        cleanup()
        log.info('sse_drain', { correlationId, waitMs: Date.now() - start })
        resolve()
      }
      const handleTerminate = () => {
        cleanup()
        resolve()
      }

      log.warn('sse_backpressure', { correlationId, bytes: Buffer.byteLength(chunk) })
      res.once('drain', handleDrain)
      res.once('close', handleTerminate)
    })

  const sendNamed = async (type: string, data: Record<string, unknown>) => {
    if (closed) return
    const frame = formatSseFrame(type, id, correlationId ? { correlationId, ...data } : data)
    id++
    await writeRaw(frame)
  }

  const send = (evt: AgentStreamEvent) => sendNamed(evt.type, evt)

  const hbTimer =
    heartbeatMs > 0
      ? setInterval(() => {
          sendNamed('heartbeat', { ts: Date.now() }).catch((err: unknown) => {
            log.warn('sse_heartbeat_failed', { correlationId, error: String(err) })
          })
        }, heartbeatMs)
      : null

  const onClose = () => {
    if (closed) return
    closed = true
    if (hbTimer) clearInterval(hbTimer)
    if (!res.writableEnded) res.end()
  }

  // The response (not the request) closes when the client goes away
  res.on('close', onClose)

  return {
    send,
    sendNamed,
    close: onClose,
    aborted: () => closed
  }
}
