/**
 * BackendMode - How the gateway drives its messaging daemon
 *
 * In `json-rpc` mode inbound messages are only delivered over the gateway's
 * websocket, so REST polling of /v1/receive is unavailable.
 */
export type BackendMode = 'normal' | 'json-rpc' | 'unknown'

/**
 * BackendDescriptor - What a gateway reports about itself
 */
export interface BackendDescriptor {
  /** API version tags, e.g. 'v1', 'v2' */
  supportedVersions: ReadonlySet<string>
  /** Build number (1 when the gateway does not report one) */
  buildNumber: number
  mode: BackendMode
  /** Endpoint name (e.g. 'v2/send') to the optional features it advertises */
  capabilities: ReadonlyMap<string, ReadonlySet<string>>
  /** Gateway release string, if reported */
  version?: string
}

/**
 * Descriptor assumed for gateways without an introspection endpoint
 */
export function createLegacyDescriptor(): BackendDescriptor {
  return {
    supportedVersions: new Set(['v1']),
    buildNumber: 1,
    mode: 'unknown',
    capabilities: new Map(),
  }
}

export function supportsVersion(descriptor: BackendDescriptor, version: string): boolean {
  return descriptor.supportedVersions.has(version)
}

/**
 * True iff `feature` is advertised for `endpoint`. Unknown endpoints advertise nothing.
 */
export function hasCapability(
  descriptor: BackendDescriptor,
  endpoint: string,
  feature: string
): boolean {
  return descriptor.capabilities.get(endpoint)?.has(feature) ?? false
}

/**
 * Map a reported mode to a BackendMode; anything unrecognised is 'unknown'
 */
export function parseBackendMode(mode: unknown): BackendMode {
  switch (mode) {
    case 'normal':
    case 'native':
      return 'normal'
    case 'json-rpc':
      return 'json-rpc'
    default:
      return 'unknown'
  }
}
