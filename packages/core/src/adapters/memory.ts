import type { HttpMethod } from '../types'
import type { TransportAdapter, TransportRequest, TransportResponse } from './adapter'
import { textToBytes } from '../encoding/base64'

/**
 * MemoryReply - Canned response; `json` takes precedence over `body`
 */
export interface MemoryReply {
  status: number
  json?: unknown
  body?: Uint8Array | string
  headers?: Record<string, string>
}

export type MemoryHandler = (request: TransportRequest) => MemoryReply | Promise<MemoryReply>

interface MemoryRoute {
  method: HttpMethod
  path: string
  handler: MemoryHandler
}

/**
 * MemoryTransport - In-memory transport for testing
 *
 * Routes are matched on method and decoded URL path. Unmatched requests get a
 * 404 with an `error` body, like a gateway that lacks the endpoint.
 */
export class MemoryTransport implements TransportAdapter {
  readonly name = 'memory'

  /** Every request received, in order */
  readonly requests: TransportRequest[] = []

  private routes: MemoryRoute[] = []
  private closed = false

  /**
   * Answer `method path` with a fixed reply or a handler
   */
  on(method: HttpMethod, path: string, reply: MemoryReply | MemoryHandler): this {
    const handler: MemoryHandler = typeof reply === 'function' ? reply : () => reply
    this.routes.unshift({ method, path, handler })
    return this
  }

  /**
   * Make `method path` fail as if the connection broke
   */
  fail(method: HttpMethod, path: string, error: Error): this {
    return this.on(method, path, () => {
      throw error
    })
  }

  get isClosed(): boolean {
    return this.closed
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    this.requests.push(request)

    const path = decodeURIComponent(new URL(request.url).pathname)
    const route = this.routes.find((r) => r.method === request.method && r.path === path)

    if (!route) {
      return toResponse({ status: 404, json: { error: `No route for ${request.method} ${path}` } })
    }

    return toResponse(await route.handler(request))
  }

  close(): void {
    this.closed = true
  }

  /**
   * Last request sent to `path`, if any
   */
  lastRequestTo(path: string): TransportRequest | undefined {
    return [...this.requests]
      .reverse()
      .find((r) => decodeURIComponent(new URL(r.url).pathname) === path)
  }
}

function toResponse(reply: MemoryReply): TransportResponse {
  const headers: Record<string, string> = {}
  for (const [key, value] of Object.entries(reply.headers ?? {})) {
    headers[key.toLowerCase()] = value
  }

  let body: Uint8Array
  if (reply.json !== undefined) {
    body = textToBytes(JSON.stringify(reply.json))
    headers['content-type'] ??= 'application/json'
  } else if (typeof reply.body === 'string') {
    body = textToBytes(reply.body)
  } else {
    body = reply.body ?? new Uint8Array()
  }

  return { status: reply.status, headers, body }
}

/**
 * Create an in-memory transport
 */
export function createMemoryTransport(): MemoryTransport {
  return new MemoryTransport()
}
