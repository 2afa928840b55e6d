import { describe, expect, test } from '@jest/globals'

import { InvalidUsageError, createGatewayClientFromEnv, createMemoryTransport, loadConfig } from '../../src'
import { ACCOUNT, assertInstance, silentLogger } from '../helpers'

const BASE_ENV = {
  GATEWIRE_BASE_URL: 'https://gateway.test:8443',
  GATEWIRE_ACCOUNT: ACCOUNT,
}

function configError(env: NodeJS.ProcessEnv): InvalidUsageError {
  let thrown: unknown
  try {
    loadConfig(env)
  } catch (error) {
    thrown = error
  }
  return assertInstance(thrown, InvalidUsageError)
}

describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig(BASE_ENV)

    expect(config.baseUrl).toBe('https://gateway.test:8443')
    expect(config.account).toBe(ACCOUNT)
    expect(config.auth.scheme).toBe('none')
    expect(config.auth.toTransportAuth()).toBeUndefined()
    expect(config.verifyTls).toBe(true)
    expect(config.timeoutMs).toBe(0)
  })

  test('reads credentials, TLS policy and timeout', () => {
    const config = loadConfig({
      ...BASE_ENV,
      GATEWIRE_USERNAME: 'user',
      GATEWIRE_PASSWORD: 'test-secret',
      GATEWIRE_VERIFY_TLS: 'false',
      GATEWIRE_TIMEOUT_MS: '1500',
    })

    expect(config.auth.scheme).toBe('basic')
    expect(config.auth.toTransportAuth()).toEqual({ username: 'user', password: 'test-secret' })
    expect(config.verifyTls).toBe(false)
    expect(config.timeoutMs).toBe(1500)
  })

  test('requires a base URL', () => {
    expect(configError({ GATEWIRE_ACCOUNT: ACCOUNT }).message).toBe(
      'Invalid gateway configuration: GATEWIRE_BASE_URL: Required'
    )
  })

  test('rejects a username without a password', () => {
    expect(configError({ ...BASE_ENV, GATEWIRE_USERNAME: 'user' }).message).toBe(
      'Invalid gateway configuration: GATEWIRE_USERNAME and GATEWIRE_PASSWORD must be set together'
    )
  })

  test('rejects a negative timeout', () => {
    expect(configError({ ...BASE_ENV, GATEWIRE_TIMEOUT_MS: '-1' }).message).toBe(
      'Invalid gateway configuration: GATEWIRE_TIMEOUT_MS: Number must be greater than or equal to 0'
    )
  })

  test('rejects an unknown TLS setting', () => {
    const error = configError({ ...BASE_ENV, GATEWIRE_VERIFY_TLS: 'yes' })

    expect(error.message.startsWith('Invalid gateway configuration: GATEWIRE_VERIFY_TLS: ')).toBe(true)
  })
})

describe('createGatewayClientFromEnv', () => {
  test('builds a client from the environment', async () => {
    const transport = createMemoryTransport().on('GET', '/v1/accounts', { status: 200, json: [ACCOUNT] })

    const client = createGatewayClientFromEnv(
      { ...BASE_ENV, GATEWIRE_USERNAME: 'user', GATEWIRE_PASSWORD: 'test-secret' },
      { transport, logger: silentLogger }
    )
    const accounts = await client.listAccounts()

    expect(client.account).toBe(ACCOUNT)
    expect(accounts).toEqual([ACCOUNT])
    expect(transport.requests[0].url).toBe('https://gateway.test:8443/v1/accounts')
    expect(transport.requests[0].auth).toEqual({ username: 'user', password: 'test-secret' })
  })
})
