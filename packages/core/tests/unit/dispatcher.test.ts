import { describe, expect, test } from '@jest/globals'

import {
  BackendUnreachableError,
  BasicAuth,
  MemoryTransport,
  RequestDispatcher,
  UnexpectedStatusError,
  gatewayPath,
  isGatewayError,
} from '../../src'
import { assertInstance, catchError, createTestDispatcher, silentLogger } from '../helpers'

describe('gatewayPath', () => {
  test('joins segments below the root', () => {
    expect(gatewayPath('v1', 'groups', '+15550000001')).toBe('/v1/groups/%2B15550000001')
  })

  test('encodes reserved characters inside a segment', () => {
    expect(gatewayPath('v1', 'groups', 'group.ab/c=')).toBe('/v1/groups/group.ab%2Fc%3D')
  })
})

describe('RequestDispatcher.dispatch', () => {
  test('sends GET params as the query string', async () => {
    const transport = new MemoryTransport().on('GET', '/v1/search', { status: 200, json: [] })

    await createTestDispatcher(transport).dispatch({
      method: 'GET',
      path: '/v1/search',
      params: { numbers: ['+15550000002'] },
      expectedStatus: [200],
    })

    const request = transport.lastRequestTo('/v1/search')
    expect(request?.url).toBe('http://gateway.test/v1/search')
    expect(request?.query).toEqual({ numbers: ['+15550000002'] })
    expect(request?.body).toBeUndefined()
  })

  test('sends other params as the JSON body', async () => {
    const transport = new MemoryTransport().on('POST', '/v2/send', { status: 201 })

    await createTestDispatcher(transport).dispatch({
      method: 'POST',
      path: '/v2/send',
      params: { message: 'hi' },
      expectedStatus: [201],
    })

    const request = transport.lastRequestTo('/v2/send')
    expect(request?.body).toEqual({ message: 'hi' })
    expect(request?.query).toBeUndefined()
  })

  test('trims trailing slashes from the base URL', async () => {
    const transport = new MemoryTransport().on('GET', '/v1/accounts', { status: 200, json: [] })
    const dispatcher = new RequestDispatcher({
      baseUrl: 'http://gateway.test///',
      transport,
      auth: new BasicAuth('user', 'test-secret'),
      verifyTls: false,
      timeoutMs: 2500,
      logger: silentLogger,
    })

    await dispatcher.dispatch({ method: 'GET', path: '/v1/accounts', expectedStatus: [200] })

    expect(transport.requests[0]).toEqual({
      method: 'GET',
      url: 'http://gateway.test/v1/accounts',
      auth: { username: 'user', password: 'test-secret' },
      verifyTls: false,
      timeoutMs: 2500,
    })
  })

  test('returns the response when the status is expected', async () => {
    const transport = new MemoryTransport().on('DELETE', '/v1/accounts/x/pin', { status: 204 })

    const response = await createTestDispatcher(transport).dispatch({
      method: 'DELETE',
      path: '/v1/accounts/x/pin',
      expectedStatus: [204],
    })

    expect(response.status).toBe(204)
    expect(response.json()).toBeUndefined()
  })

  test('uses the error field of the body as the message', async () => {
    const transport = new MemoryTransport().on('POST', '/v2/send', {
      status: 400,
      json: { error: 'Invalid recipient' },
    })

    const error = assertInstance(
      await catchError(
        createTestDispatcher(transport).dispatch({
          method: 'POST',
          path: '/v2/send',
          expectedStatus: [201],
          fallbackMessage: 'Unknown error while sending message',
        })
      ),
      UnexpectedStatusError
    )

    expect(error.status).toBe(400)
    expect(error.backendMessage).toBe('Invalid recipient')
    expect(error.message).toBe('Invalid recipient')
  })

  test('falls back to the operation message for a body without an error field', async () => {
    const transport = new MemoryTransport().on('POST', '/v2/send', {
      status: 500,
      body: 'Internal Server Error',
    })

    const error = assertInstance(
      await catchError(
        createTestDispatcher(transport).dispatch({
          method: 'POST',
          path: '/v2/send',
          expectedStatus: [201],
          fallbackMessage: 'Unknown error while sending message',
        })
      ),
      UnexpectedStatusError
    )

    expect(error.backendMessage).toBeNull()
    expect(error.message).toBe('Unknown error while sending message')
  })

  test('falls back to a generic message when the operation gives none', async () => {
    const transport = new MemoryTransport().on('GET', '/v1/accounts', {
      status: 502,
      json: { error: 42 },
    })

    const error = assertInstance(
      await catchError(
        createTestDispatcher(transport).dispatch({
          method: 'GET',
          path: '/v1/accounts',
          expectedStatus: [200],
        })
      ),
      UnexpectedStatusError
    )

    expect(error.message).toBe('Unexpected status 502 from GET /v1/accounts')
  })

  test('turns transport failures into unreachable errors', async () => {
    const timeout = new Error('timeout of 1000ms exceeded')
    const transport = new MemoryTransport().fail('GET', '/v1/accounts', timeout)

    const error = assertInstance(
      await catchError(
        createTestDispatcher(transport).dispatch({
          method: 'GET',
          path: '/v1/accounts',
          expectedStatus: [200],
        })
      ),
      BackendUnreachableError
    )

    expect(error.message).toBe('Could not reach gateway for GET /v1/accounts')
    expect(error.cause).toBe(timeout)
    expect(error.code).toBe('BACKEND_UNREACHABLE')
    expect(isGatewayError(error)).toBe(true)
    expect(isGatewayError(timeout)).toBe(false)
  })
})
