import type { TransportAdapter, TransportRequest, TransportResponse } from '@gatewire/core'
import { basicAuthHeader, toSearchParams } from '@gatewire/core'

/**
 * FetchApp - Anything that answers fetch-style requests in process, such as a Hono app
 */
export interface FetchApp {
  request(input: string, init: RequestInit): Response | Promise<Response>
}

/**
 * StubTransport - Routes client requests into an in-process app instead of the network
 */
export class StubTransport implements TransportAdapter {
  readonly name = 'gateway-stub'

  constructor(private readonly app: FetchApp) {}

  async request(request: TransportRequest): Promise<TransportResponse> {
    const url = new URL(request.url)
    if (request.query) {
      url.search = toSearchParams(request.query).toString()
    }

    const headers: Record<string, string> = {}
    if (request.auth) {
      headers.authorization = basicAuthHeader(request.auth)
    }
    let body: string | undefined
    if (request.body !== undefined) {
      headers['content-type'] = 'application/json'
      body = JSON.stringify(request.body)
    }

    const response = await this.app.request(url.toString(), {
      method: request.method,
      headers,
      body,
    })

    const responseHeaders: Record<string, string> = {}
    response.headers.forEach((value, key) => {
      responseHeaders[key.toLowerCase()] = value
    })
    return {
      status: response.status,
      headers: responseHeaders,
      body: new Uint8Array(await response.arrayBuffer()),
    }
  }
}
