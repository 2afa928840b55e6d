import pino from 'pino'
import { expect } from '@jest/globals'
import type { BackendDescriptor, BackendMode, GatewayClientOptions, MemoryTransport } from '../src'
import { GatewayClient, NoAuth, RequestDispatcher } from '../src'

export const ACCOUNT = '+15550000001'
export const OTHER = '+15550000002'
export const BASE_URL = 'http://gateway.test'

export const silentLogger = pino({ level: 'silent' })

export function createTestClient(
  transport: MemoryTransport,
  overrides: Partial<GatewayClientOptions> = {}
): GatewayClient {
  return new GatewayClient({
    baseUrl: BASE_URL,
    account: ACCOUNT,
    transport,
    logger: silentLogger,
    ...overrides,
  })
}

export function createTestDispatcher(transport: MemoryTransport): RequestDispatcher {
  return new RequestDispatcher({
    baseUrl: BASE_URL,
    transport,
    auth: new NoAuth(),
    verifyTls: true,
    timeoutMs: 0,
    logger: silentLogger,
  })
}

export function makeDescriptor(
  versions: string[],
  capabilities: Record<string, string[]> = {},
  mode: BackendMode = 'normal'
): BackendDescriptor {
  return {
    supportedVersions: new Set(versions),
    buildNumber: 2,
    mode,
    capabilities: new Map(
      Object.entries(capabilities).map(([endpoint, features]) => [endpoint, new Set(features)])
    ),
  }
}

/**
 * The rejection reason of `promise`; fails when it resolves
 */
export async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (error) {
    return error
  }
  throw new Error('Expected promise to reject')
}

export function assertInstance<T>(value: unknown, type: new (...args: never[]) => T): T {
  expect(value).toBeInstanceOf(type)
  if (!(value instanceof type)) {
    throw new Error(`Expected an instance of ${type.name}`)
  }
  return value
}
