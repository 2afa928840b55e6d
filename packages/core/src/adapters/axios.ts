import axios, { type AxiosInstance } from 'axios'
import { Agent as HttpsAgent } from 'https'
import type { TransportAdapter, TransportRequest, TransportResponse } from './adapter'
import { toSearchParams } from './adapter'
import { textToBytes } from '../encoding/base64'

/**
 * AxiosTransportOptions
 */
export interface AxiosTransportOptions {
  /** Axios instance to send requests with (defaults to a fresh one) */
  instance?: AxiosInstance

  /** Keep connections open between requests (default: true) */
  keepAlive?: boolean
}

/**
 * AxiosTransport - HTTP transport backed by axios
 *
 * Holds one https agent per TLS policy so connections are reused across calls.
 */
export class AxiosTransport implements TransportAdapter {
  readonly name = 'axios'

  private instance: AxiosInstance
  private agents: { verifying: HttpsAgent; permissive: HttpsAgent }

  constructor(options: AxiosTransportOptions = {}) {
    const keepAlive = options.keepAlive ?? true
    this.instance = options.instance ?? axios.create()
    this.agents = {
      verifying: new HttpsAgent({ keepAlive, rejectUnauthorized: true }),
      permissive: new HttpsAgent({ keepAlive, rejectUnauthorized: false }),
    }
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.instance.request<unknown>({
      method: request.method,
      url: request.url,
      params: request.query ? toSearchParams(request.query) : undefined,
      data: request.body,
      auth: request.auth,
      timeout: request.timeoutMs,
      httpsAgent: request.verifyTls ? this.agents.verifying : this.agents.permissive,
      responseType: 'arraybuffer',
      // Status handling belongs to the dispatcher
      validateStatus: () => true,
    })

    const entries: Array<[string, unknown]> = Object.entries(response.headers)
    const headers: Record<string, string> = {}
    for (const [key, value] of entries) {
      if (value === undefined || value === null) continue
      headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value)
    }

    return {
      status: response.status,
      headers,
      body: toBytes(response.data),
    }
  }

  close(): void {
    this.agents.verifying.destroy()
    this.agents.permissive.destroy()
  }
}

function toBytes(data: unknown): Uint8Array {
  if (data instanceof Uint8Array) return data
  if (data instanceof ArrayBuffer) return new Uint8Array(data)
  if (data === undefined || data === null) return new Uint8Array()
  if (typeof data === 'string') return textToBytes(data)
  return textToBytes(JSON.stringify(data))
}

/**
 * Create an axios transport
 */
export function createAxiosTransport(options?: AxiosTransportOptions): AxiosTransport {
  return new AxiosTransport(options)
}
