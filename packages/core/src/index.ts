// Types
export * from './types'

// Errors
export {
  GatewayError,
  BackendUnreachableError,
  UnexpectedStatusError,
  UnsupportedFeatureError,
  InvalidUsageError,
  isGatewayError,
} from './errors'
export type { GatewayErrorCode } from './errors'

// Transports
export type { TransportAdapter, TransportRequest, TransportResponse } from './adapters/adapter'
export { toSearchParams } from './adapters/adapter'
export { createAxiosTransport, AxiosTransport } from './adapters/axios'
export type { AxiosTransportOptions } from './adapters/axios'
export { createMemoryTransport, MemoryTransport } from './adapters/memory'
export type { MemoryReply, MemoryHandler } from './adapters/memory'

// Authentication
export { NoAuth, BasicAuth, basicAuthHeader } from './auth'
export type { AuthScheme, TransportAuth } from './auth'

// Encoding
export { bytesToBase64, base64ToBytes, textToBytes, bytesToText } from './encoding/base64'

// Request pipeline
export { CapabilityResolver, ABOUT_PATH } from './capabilities/resolver'
export type { DescriptorSource } from './capabilities/resolver'
export {
  checkGate,
  assertPermitted,
  selectSendEndpoint,
  SEND_ENDPOINTS,
} from './capabilities/gating'
export type {
  GatedOperation,
  GateDecision,
  RequestedFeatures,
  SendEndpoint,
} from './capabilities/gating'
export {
  ParameterFormatter,
  createParameterFormatter,
  readWholeFile,
} from './formatting/formatter'
export type {
  EndpointContext,
  FileReader,
  FormatOptions,
  ParameterFormatterOptions,
} from './formatting/formatter'
export { RequestDispatcher, GatewayResponse, gatewayPath } from './dispatch/dispatcher'
export type { OperationRequest, RequestDispatcherOptions } from './dispatch/dispatcher'

// Services
export { GatewayClient, createGatewayClient } from './services/gateway'
export type { GatewayClientOptions } from './services/gateway'

// Configuration & logging
export { loadConfig, createGatewayClientFromEnv } from './config'
export type { GatewayConfig } from './config'
export { createLogger } from './logger'
export type { Logger } from './logger'
