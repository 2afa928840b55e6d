import type { Context } from 'hono'
import type { TransportAuth } from '@gatewire/core'
import { z } from 'zod'
import type { GatewayStore } from './store'

/**
 * StubSettings - How the stub presents itself, with defaults applied
 */
export interface StubSettings {
  versions: string[]
  build: number
  mode: string
  capabilities: Record<string, string[]>
  about: boolean
  credentials?: TransportAuth
  /** Recipients the stub accepts; any number when unset */
  knownNumbers?: string[]
}

/**
 * Variables added to Hono context
 */
export interface StubVariables {
  store: GatewayStore
  settings: StubSettings
}

export type StubEnv = { Variables: StubVariables }

export function getStore(c: Context<StubEnv>): GatewayStore {
  return c.get('store')
}

export function getSettings(c: Context<StubEnv>): StubSettings {
  return c.get('settings')
}

/**
 * Parse and validate a JSON request body; null when it is not acceptable
 */
export async function readBody<T>(
  c: Context<StubEnv>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    return null
  }
  const result = schema.safeParse(body)
  return result.success ? result.data : null
}
