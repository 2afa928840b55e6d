import type { Logger } from 'pino'
import type { TransportAdapter, TransportRequest, TransportResponse } from '../adapters/adapter'
import type { AuthScheme } from '../auth'
import type { HttpMethod, WireParams } from '../types'
import { BackendUnreachableError, UnexpectedStatusError } from '../errors'
import { bytesToText } from '../encoding/base64'

/**
 * OperationRequest - One gateway call as built by a facade operation
 */
export interface OperationRequest {
  method: HttpMethod
  /** Path below the base URL, already percent-encoded (see `gatewayPath`) */
  path: string
  /** Query string for GET, JSON body otherwise */
  params?: WireParams
  /** Status codes that count as success */
  expectedStatus: readonly number[]
  /** Message for failures whose body carries no `error` field */
  fallbackMessage?: string
}

/**
 * GatewayResponse - A response whose status was expected
 */
export class GatewayResponse {
  constructor(
    readonly status: number,
    readonly headers: Record<string, string>,
    readonly body: Uint8Array
  ) {}

  text(): string {
    return bytesToText(this.body)
  }

  /** Parsed JSON body; undefined when the body is empty */
  json(): unknown {
    const text = this.text()
    return text.trim() === '' ? undefined : JSON.parse(text)
  }
}

export interface RequestDispatcherOptions {
  baseUrl: string
  transport: TransportAdapter
  auth: AuthScheme
  verifyTls: boolean
  timeoutMs: number
  logger: Logger
}

/**
 * Build a request path from literal segments, percent-encoding each one
 */
export function gatewayPath(...segments: string[]): string {
  return '/' + segments.map((s) => encodeURIComponent(s)).join('/')
}

/**
 * RequestDispatcher - Sends operation requests and checks their status
 */
export class RequestDispatcher {
  private baseUrl: string
  private transport: TransportAdapter
  private auth: AuthScheme
  private verifyTls: boolean
  private timeoutMs: number
  private logger: Logger

  constructor(options: RequestDispatcherOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.transport = options.transport
    this.auth = options.auth
    this.verifyTls = options.verifyTls
    this.timeoutMs = options.timeoutMs
    this.logger = options.logger.child({ component: 'dispatcher' })
  }

  async dispatch(op: OperationRequest): Promise<GatewayResponse> {
    const request: TransportRequest = {
      method: op.method,
      url: this.baseUrl + op.path,
      auth: this.auth.toTransportAuth(),
      verifyTls: this.verifyTls,
      timeoutMs: this.timeoutMs,
    }
    if (op.params) {
      if (op.method === 'GET') {
        request.query = op.params
      } else {
        request.body = op.params
      }
    }

    let response: TransportResponse
    try {
      response = await this.transport.request(request)
    } catch (error) {
      this.logger.debug({ method: op.method, path: op.path, err: error }, 'Gateway request failed')
      throw new BackendUnreachableError(
        `Could not reach gateway for ${op.method} ${op.path}`,
        error
      )
    }

    this.logger.debug(
      { method: op.method, path: op.path, status: response.status },
      'Gateway response'
    )

    if (!op.expectedStatus.includes(response.status)) {
      throw new UnexpectedStatusError(
        response.status,
        extractErrorMessage(response.body),
        op.fallbackMessage ?? `Unexpected status ${response.status} from ${op.method} ${op.path}`
      )
    }

    return new GatewayResponse(response.status, response.headers, response.body)
  }
}

/**
 * The `error` field of a JSON error body, if it has one
 */
function extractErrorMessage(body: Uint8Array): string | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(bytesToText(body))
  } catch {
    // Not JSON; the caller's fallback message applies
    return null
  }
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    return typeof parsed.error === 'string' ? parsed.error : null
  }
  return null
}
