import type { TransportAuth } from '../auth'
import type { HttpMethod, WireParams } from '../types'

/**
 * TransportRequest - A fully resolved HTTP request
 */
export interface TransportRequest {
  method: HttpMethod
  /** Absolute URL without query string */
  url: string
  /** Serialized with `toSearchParams` */
  query?: WireParams
  /** Sent as JSON */
  body?: WireParams
  auth?: TransportAuth
  /** Verify the server's TLS certificate */
  verifyTls: boolean
  /** Request timeout in milliseconds (0 = none) */
  timeoutMs: number
}

/**
 * TransportResponse - Status, lower-cased headers and the raw body
 */
export interface TransportResponse {
  status: number
  headers: Record<string, string>
  body: Uint8Array
}

/**
 * TransportAdapter - Interface that all HTTP transports must implement
 *
 * Transports report every status the server returns; they only throw when no
 * response was received (connection refused, timeout, malformed reply).
 */
export interface TransportAdapter {
  /** Transport identifier */
  readonly name: string

  /**
   * Perform a request
   */
  request(request: TransportRequest): Promise<TransportResponse>

  /**
   * Release pooled connections
   */
  close?(): void
}

/**
 * Serialize query parameters. Arrays repeat the key, objects are sent as JSON.
 */
export function toSearchParams(query: WireParams): URLSearchParams {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        params.append(key, typeof item === 'object' ? JSON.stringify(item) : String(item))
      }
    } else if (typeof value === 'object') {
      params.append(key, JSON.stringify(value))
    } else {
      params.append(key, String(value))
    }
  }
  return params
}
