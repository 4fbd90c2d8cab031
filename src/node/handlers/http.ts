/**
 * Route table types and the request/response plumbing shared by handlers.
 */

import type http from 'http'
import type { REQUEST_TIMEOUT_MS } from '../shared/constants'
import { NotARepositoryError, ValidationError } from '../shared/errors'

export type HttpMethod = 'GET' | 'POST' | 'DELETE'

export type DeadlineKind = keyof typeof REQUEST_TIMEOUT_MS

export type RouteContext = {
  query: Record<string, string>
  /** Parsed JSON body; `{}` when the request had none. */
  body: unknown
  /** Aborted on deadline or client disconnect. */
  signal: AbortSignal
}

export type Route = {
  method: HttpMethod
  /** Deadline applied to the whole handler; null for instant routes. */
  deadline: DeadlineKind | null
  handle: (context: RouteContext) => Promise<unknown>
}

export type RouteTable = Record<string, Route>

export type ApiResponse = { success: true; data: unknown } | { success: false; error: string }

const MAX_BODY_BYTES = 1024 * 1024

export function parseBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    let size = 0
    req.on('data', (chunk: Buffer) => {
      size += chunk.length
      if (size > MAX_BODY_BYTES) {
        reject(new ValidationError('request body too large', 'body'))
        req.destroy()
        return
      }
      chunks.push(chunk)
    })
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf-8')
      if (!raw.trim()) return resolve({})
      try {
        resolve(JSON.parse(raw))
      } catch {
        reject(new ValidationError('invalid JSON body', 'body'))
      }
    })
    req.on('error', reject)
  })
}

export function sendJson(res: http.ServerResponse, status: number, data: ApiResponse): void {
  if (res.destroyed || res.headersSent) return
  const json = JSON.stringify(data)
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(json)
  })
  res.end(json)
}

/**
 * HTTP status for an error thrown by a handler.
 */
export function statusFor(error: unknown): number {
  if (error instanceof ValidationError || error instanceof NotARepositoryError) return 400
  return 500
}
