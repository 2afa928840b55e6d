/**
 * Errors raised by gateway operations
 */

export type GatewayErrorCode =
  | 'BACKEND_UNREACHABLE'
  | 'UNEXPECTED_STATUS'
  | 'UNSUPPORTED_FEATURE'
  | 'INVALID_USAGE'

/**
 * GatewayError - Base class for everything the client throws
 */
export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
  }
}

/**
 * BackendUnreachableError - The gateway could not be reached or its reply could not be read
 */
export class BackendUnreachableError extends GatewayError {
  readonly code = 'BACKEND_UNREACHABLE'

  constructor(message: string, cause?: unknown) {
    super(message, cause)
    this.name = 'BackendUnreachableError'
  }
}

/**
 * UnexpectedStatusError - The gateway answered with a status the operation does not accept
 */
export class UnexpectedStatusError extends GatewayError {
  readonly code = 'UNEXPECTED_STATUS'

  /** HTTP status returned by the gateway */
  readonly status: number

  /** Message from the `error` field of the response body, if there was one */
  readonly backendMessage: string | null

  constructor(status: number, backendMessage: string | null, fallbackMessage: string, cause?: unknown) {
    super(backendMessage ?? fallbackMessage, cause)
    this.name = 'UnexpectedStatusError'
    this.status = status
    this.backendMessage = backendMessage
  }
}

/**
 * UnsupportedFeatureError - The addressed gateway cannot perform the requested action
 */
export class UnsupportedFeatureError extends GatewayError {
  readonly code = 'UNSUPPORTED_FEATURE'

  readonly feature: string

  /** Version tag or capability the gateway would need to offer */
  readonly requirement: string

  constructor(feature: string, requirement: string, cause?: unknown) {
    super(`Gateway does not support ${feature} (requires ${requirement})`, cause)
    this.name = 'UnsupportedFeatureError'
    this.feature = feature
    this.requirement = requirement
  }
}

/**
 * InvalidUsageError - Contradictory or incomplete arguments, detected before any network call
 */
export class InvalidUsageError extends GatewayError {
  readonly code = 'INVALID_USAGE'

  constructor(reason: string, cause?: unknown) {
    super(reason, cause)
    this.name = 'InvalidUsageError'
  }
}

export function isGatewayError(value: unknown): value is GatewayError {
  return value instanceof GatewayError
}
