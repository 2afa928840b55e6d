import { z } from 'zod'
import type { AuthScheme } from './auth'
import type { GatewayClientOptions } from './services/gateway'
import { BasicAuth, NoAuth } from './auth'
import { GatewayClient } from './services/gateway'
import { InvalidUsageError } from './errors'

const envSchema = z
  .object({
    GATEWIRE_BASE_URL: z.string().url(),
    GATEWIRE_ACCOUNT: z.string().min(1),
    GATEWIRE_USERNAME: z.string().min(1).optional(),
    GATEWIRE_PASSWORD: z.string().optional(),
    GATEWIRE_VERIFY_TLS: z.enum(['true', 'false']).optional(),
    GATEWIRE_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  })
  .refine((env) => (env.GATEWIRE_USERNAME === undefined) === (env.GATEWIRE_PASSWORD === undefined), {
    message: 'GATEWIRE_USERNAME and GATEWIRE_PASSWORD must be set together',
  })

export interface GatewayConfig {
  /** Gateway base URL */
  baseUrl: string
  /** Registered number the client acts as */
  account: string
  auth: AuthScheme
  verifyTls: boolean
  /** Request timeout in milliseconds (0 = none) */
  timeoutMs: number
}

/**
 * Read client configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new InvalidUsageError(`Invalid gateway configuration: ${issues}`, result.error)
  }

  const parsed = result.data
  return {
    baseUrl: parsed.GATEWIRE_BASE_URL,
    account: parsed.GATEWIRE_ACCOUNT,
    auth:
      parsed.GATEWIRE_USERNAME !== undefined && parsed.GATEWIRE_PASSWORD !== undefined
        ? new BasicAuth(parsed.GATEWIRE_USERNAME, parsed.GATEWIRE_PASSWORD)
        : new NoAuth(),
    verifyTls: parsed.GATEWIRE_VERIFY_TLS !== 'false',
    timeoutMs: parsed.GATEWIRE_TIMEOUT_MS ?? 0,
  }
}

/**
 * Create a gateway client configured from environment variables
 */
export function createGatewayClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Omit<GatewayClientOptions, keyof GatewayConfig>> = {}
): GatewayClient {
  return new GatewayClient({ ...loadConfig(env), ...overrides })
}
