/**
 * HTTP API server.
 *
 * Plain node:http with a static route table. Every request gets an
 * AbortSignal that fires on the route's deadline or when the client goes
 * away, and that signal reaches the git process.
 */

import type { Logger } from '@shared/logger'
import { silentLogger } from '@shared/logger'
import http from 'http'
import type { RepoService } from '../services/RepoService'
import { REQUEST_TIMEOUT_MS } from '../shared/constants'
import { toPublicMessage } from '../shared/errors'
import { type DeadlineKind, parseBody, type RouteTable, sendJson, statusFor } from './http'
import { createRoutes } from './routes'

export type ApiServerOptions = {
  service: RepoService
  logger?: Logger
  /** Overrides per deadline kind, in milliseconds. */
  deadlines?: Partial<Record<DeadlineKind, number>>
}

export type StartApiServerOptions = ApiServerOptions & {
  host: string
  port: number
}

export type RunningServer = {
  server: http.Server
  /** Base URL, e.g. `http://127.0.0.1:8080`. */
  url: string
  close(): Promise<void>
}

export function createApiServer(options: ApiServerOptions): http.Server {
  const logger = (options.logger ?? silentLogger).child('http')
  const deadlines = { ...REQUEST_TIMEOUT_MS, ...options.deadlines }
  const routes = createRoutes(options.service)

  return http.createServer((req, res) => {
    handleRequest(routes, deadlines, logger, req, res).catch((error: unknown) => {
      logger.error('Unhandled request failure', { url: req.url, error })
      sendJson(res, 500, { success: false, error: 'internal error' })
    })
  })
}

async function handleRequest(
  routes: RouteTable,
  deadlines: Record<DeadlineKind, number>,
  logger: Logger,
  req: http.IncomingMessage,
  res: http.ServerResponse
): Promise<void> {
  const url = new URL(req.url ?? '/', 'http://localhost')
  const route = Object.hasOwn(routes, url.pathname) ? routes[url.pathname] : undefined

  if (!route) {
    sendJson(res, 404, { success: false, error: `unknown route: ${url.pathname}` })
    return
  }
  if (req.method !== route.method) {
    res.setHeader('Allow', route.method)
    sendJson(res, 405, { success: false, error: `method ${req.method ?? ''} not allowed` })
    return
  }

  const disconnect = new AbortController()
  res.on('close', () => {
    if (!res.writableFinished) disconnect.abort(new Error('client disconnected'))
  })
  const signal = route.deadline
    ? AbortSignal.any([disconnect.signal, AbortSignal.timeout(deadlines[route.deadline])])
    : disconnect.signal

  const started = Date.now()
  try {
    const body = route.method === 'POST' ? await parseBody(req) : {}
    const data = await route.handle({ query: Object.fromEntries(url.searchParams), body, signal })
    sendJson(res, 200, { success: true, data })
    logger.debug('Request handled', { method: req.method, path: url.pathname, ms: Date.now() - started })
  } catch (error) {
    const status = statusFor(error)
    const message = toPublicMessage(error)
    if (status >= 500) {
      logger.error('Request failed', { method: req.method, path: url.pathname, error: message })
    } else {
      logger.warn('Request rejected', { method: req.method, path: url.pathname, error: message })
    }
    sendJson(res, status, { success: false, error: message })
  }
}

/**
 * Creates the server and starts listening. Port 0 picks a free port.
 */
export async function startApiServer(options: StartApiServerOptions): Promise<RunningServer> {
  const server = createApiServer(options)
  const logger = (options.logger ?? silentLogger).child('http')

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject)
    server.listen(options.port, options.host, () => {
      server.off('error', reject)
      resolve()
    })
  })

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : options.port
  const host = options.host.includes(':') ? `[${options.host}]` : options.host
  const url = `http://${host}:${port}`
  logger.info('API listening', { url })

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()))
        server.closeAllConnections()
      })
  }
}
