import { Hono } from 'hono'
import type { TransportAuth } from '@gatewire/core'
import { createAuthMiddleware } from './middleware/auth'
import { messagesRoutes } from './routes/messages'
import { groupsRoutes } from './routes/groups'
import { GatewayStore } from './store'
import { StubTransport } from './transport'
import type { StubEnv, StubSettings } from './context'

export type { StubEnv, StubSettings, StubVariables } from './context'
export type { StoredMessage, StoredGroup, InboundEnvelope } from './store'
export type { FetchApp } from './transport'
export { GatewayStore, StubTransport, createAuthMiddleware }

/**
 * Options for creating the stub gateway
 */
export interface GatewayStubOptions {
  /** API versions reported by /v1/about (default: ['v1', 'v2']) */
  versions?: string[]

  /** Build number reported by /v1/about (default: 2) */
  build?: number

  /** Operating mode reported by /v1/about (default: 'normal') */
  mode?: string

  /** Per-endpoint capabilities (default: mentions and quotes on v2/send) */
  capabilities?: Record<string, string[]>

  /** Serve /v1/about; false emulates a legacy gateway (default: true) */
  about?: boolean

  /** Require these basic credentials on every request */
  credentials?: TransportAuth

  /** Accept only these recipients */
  knownNumbers?: string[]
}

export interface GatewayStub {
  app: Hono<StubEnv>
  store: GatewayStore
  settings: StubSettings
  /** Transport that sends client requests to `app` */
  transport: StubTransport
}

/**
 * Create Hono app emulating the gateway's REST surface
 */
export function createGatewayStub(options: GatewayStubOptions = {}): GatewayStub {
  const settings: StubSettings = {
    versions: options.versions ?? ['v1', 'v2'],
    build: options.build ?? 2,
    mode: options.mode ?? 'normal',
    capabilities: options.capabilities ?? { 'v2/send': ['mentions', 'quotes'] },
    about: options.about ?? true,
    credentials: options.credentials,
    knownNumbers: options.knownNumbers,
  }
  const store = new GatewayStore()

  const app = new Hono<StubEnv>()
  app.use('*', createAuthMiddleware(settings.credentials))
  app.use('*', async (c, next) => {
    c.set('store', store)
    c.set('settings', settings)
    await next()
  })

  if (settings.about) {
    app.get('/v1/about', (c) =>
      c.json({
        versions: settings.versions,
        build: settings.build,
        mode: settings.mode,
        capabilities: settings.capabilities,
      })
    )
  }

  app.route('/', messagesRoutes)
  app.route('/v1/groups', groupsRoutes)
  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  return { app, store, settings, transport: new StubTransport(app) }
}
