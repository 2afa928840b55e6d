import type { Logger } from 'pino'
import type { RequestDispatcher, GatewayResponse } from '../dispatch/dispatcher'
import type { BackendDescriptor } from '../types'
import { aboutSchema, createLegacyDescriptor, parseBackendMode } from '../types'
import { BackendUnreachableError, UnexpectedStatusError } from '../errors'

export const ABOUT_PATH = '/v1/about'

/**
 * DescriptorSource - Anything that can describe the gateway
 */
export interface DescriptorSource {
  describe(): Promise<BackendDescriptor>
}

/**
 * CapabilityResolver - Reads the gateway's self-description
 *
 * Nothing is cached: each call queries the gateway again.
 */
export class CapabilityResolver implements DescriptorSource {
  private logger: Logger

  constructor(
    private readonly dispatcher: RequestDispatcher,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'capabilities' })
  }

  /**
   * Fetch a descriptor. A gateway without the introspection endpoint is a
   * legacy gateway, not an error.
   */
  async describe(): Promise<BackendDescriptor> {
    let response: GatewayResponse
    try {
      response = await this.dispatcher.dispatch({
        method: 'GET',
        path: ABOUT_PATH,
        expectedStatus: [200, 404],
      })
    } catch (error) {
      if (error instanceof UnexpectedStatusError) {
        throw new BackendUnreachableError(
          `Couldn't determine gateway API version (status ${error.status})`,
          error
        )
      }
      throw error
    }

    if (response.status === 404) {
      this.logger.info('No introspection endpoint, assuming legacy gateway')
      return createLegacyDescriptor()
    }

    let body: unknown
    try {
      body = response.json()
    } catch (error) {
      throw new BackendUnreachableError("Couldn't determine gateway API version", error)
    }
    const result = aboutSchema.safeParse(body)
    if (!result.success) {
      throw new BackendUnreachableError("Couldn't determine gateway API version", result.error)
    }
    const parsed = result.data

    const capabilities = new Map<string, ReadonlySet<string>>()
    for (const [endpoint, features] of Object.entries(parsed.capabilities ?? {})) {
      capabilities.set(endpoint, new Set(features))
    }

    const descriptor: BackendDescriptor = {
      supportedVersions: new Set(parsed.versions),
      buildNumber: parsed.build ?? 1,
      mode: parseBackendMode(parsed.mode),
      capabilities,
      version: parsed.version,
    }
    this.logger.debug(
      {
        versions: parsed.versions,
        build: descriptor.buildNumber,
        mode: descriptor.mode,
      },
      'Gateway described'
    )
    return descriptor
  }
}
