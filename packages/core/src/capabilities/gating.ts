import type { BackendDescriptor } from '../types'
import { hasCapability, supportsVersion } from '../types'
import { UnsupportedFeatureError } from '../errors'

export const SEND_ENDPOINTS = {
  legacy: 'v1/send',
  current: 'v2/send',
} as const

export type SendEndpoint = (typeof SEND_ENDPOINTS)[keyof typeof SEND_ENDPOINTS]

export type GatedOperation = 'send_message' | 'receive'

/**
 * RequestedFeatures - Optional features a single call asks for
 */
export interface RequestedFeatures {
  /** Number of attachments, paths and byte sequences together */
  attachments?: number
  mentions?: boolean
  quote?: boolean
}

export type GateDecision =
  | { permitted: true }
  | { permitted: false; error: UnsupportedFeatureError }

/**
 * The send endpoint to use: v2 when the gateway offers it
 */
export function selectSendEndpoint(descriptor: BackendDescriptor): SendEndpoint {
  return supportsVersion(descriptor, 'v2') ? SEND_ENDPOINTS.current : SEND_ENDPOINTS.legacy
}

/**
 * Decide whether the gateway can serve an operation with the requested features
 */
export function checkGate(
  operation: GatedOperation,
  features: RequestedFeatures,
  descriptor: BackendDescriptor
): GateDecision {
  switch (operation) {
    case 'send_message': {
      const endpoint = selectSendEndpoint(descriptor)
      if ((features.attachments ?? 0) > 1 && !supportsVersion(descriptor, 'v2')) {
        return deny('multiple attachments', 'v2')
      }
      if (features.mentions && !hasCapability(descriptor, endpoint, 'mentions')) {
        return deny('mentions', `${endpoint} capability "mentions"`)
      }
      if (features.quote && !hasCapability(descriptor, endpoint, 'quotes')) {
        return deny('quotes', `${endpoint} capability "quotes"`)
      }
      return { permitted: true }
    }
    case 'receive':
      if (descriptor.mode === 'json-rpc') {
        return deny('receive over REST', 'normal mode')
      }
      return { permitted: true }
  }
}

/**
 * Throw the gate's UnsupportedFeatureError unless the operation is permitted
 */
export function assertPermitted(
  operation: GatedOperation,
  features: RequestedFeatures,
  descriptor: BackendDescriptor
): void {
  const decision = checkGate(operation, features, descriptor)
  if (!decision.permitted) {
    throw decision.error
  }
}

function deny(feature: string, requirement: string): GateDecision {
  return { permitted: false, error: new UnsupportedFeatureError(feature, requirement) }
}
