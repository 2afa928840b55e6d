import { bytesToBase64, textToBytes } from './encoding/base64'

/**
 * TransportAuth - Credentials in the form transports attach to a request
 */
export interface TransportAuth {
  username: string
  password: string
}

/**
 * AuthScheme - Supplies the credentials sent with every gateway request
 */
export interface AuthScheme {
  readonly scheme: 'none' | 'basic'

  /** Credentials to attach, or undefined for anonymous requests */
  toTransportAuth(): TransportAuth | undefined
}

export class NoAuth implements AuthScheme {
  readonly scheme = 'none'

  toTransportAuth(): undefined {
    return undefined
  }
}

/**
 * BasicAuth - HTTP basic credentials
 */
export class BasicAuth implements AuthScheme {
  readonly scheme = 'basic'

  constructor(
    private readonly username: string,
    private readonly password: string
  ) {}

  toTransportAuth(): TransportAuth {
    return { username: this.username, password: this.password }
  }
}

/**
 * Render an Authorization header value for basic credentials
 */
export function basicAuthHeader(auth: TransportAuth): string {
  return `Basic ${bytesToBase64(textToBytes(`${auth.username}:${auth.password}`))}`
}
