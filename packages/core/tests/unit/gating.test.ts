import { describe, expect, test } from '@jest/globals'

import {
  UnsupportedFeatureError,
  assertPermitted,
  checkGate,
  createLegacyDescriptor,
  selectSendEndpoint,
} from '../../src'
import { assertInstance, makeDescriptor } from '../helpers'

describe('selectSendEndpoint', () => {
  test('prefers v2 when offered', () => {
    expect(selectSendEndpoint(makeDescriptor(['v1', 'v2']))).toBe('v2/send')
  })

  test('uses v1 on legacy gateways', () => {
    expect(selectSendEndpoint(createLegacyDescriptor())).toBe('v1/send')
  })
})

describe('checkGate', () => {
  test('permits a plain message anywhere', () => {
    expect(checkGate('send_message', {}, createLegacyDescriptor())).toEqual({ permitted: true })
  })

  test('permits one attachment on v1', () => {
    expect(checkGate('send_message', { attachments: 1 }, makeDescriptor(['v1']))).toEqual({
      permitted: true,
    })
  })

  test('denies several attachments without v2', () => {
    const decision = checkGate('send_message', { attachments: 2 }, makeDescriptor(['v1']))

    expect(decision.permitted).toBe(false)
    if (decision.permitted) return
    expect(decision.error.feature).toBe('multiple attachments')
    expect(decision.error.requirement).toBe('v2')
    expect(decision.error.message).toBe(
      'Gateway does not support multiple attachments (requires v2)'
    )
  })

  test('permits mentions when the send endpoint advertises them', () => {
    const descriptor = makeDescriptor(['v1', 'v2'], { 'v2/send': ['mentions'] })

    expect(checkGate('send_message', { mentions: true }, descriptor)).toEqual({ permitted: true })
  })

  test('denies mentions when v2/send lacks the capability', () => {
    const descriptor = makeDescriptor(['v1', 'v2'], { 'v2/send': ['quotes'] })

    const decision = checkGate('send_message', { mentions: true }, descriptor)

    expect(decision.permitted).toBe(false)
    if (decision.permitted) return
    expect(decision.error.message).toBe(
      'Gateway does not support mentions (requires v2/send capability "mentions")'
    )
  })

  test('checks capabilities of the endpoint that will be used', () => {
    // v1/send is selected, so a v2/send capability does not help
    const descriptor = makeDescriptor(['v1'], { 'v2/send': ['quotes'] })

    const decision = checkGate('send_message', { quote: true }, descriptor)

    expect(decision.permitted).toBe(false)
    if (decision.permitted) return
    expect(decision.error.requirement).toBe('v1/send capability "quotes"')
  })

  test('denies receive in json-rpc mode', () => {
    const decision = checkGate('receive', {}, makeDescriptor(['v1', 'v2'], {}, 'json-rpc'))

    expect(decision.permitted).toBe(false)
    if (decision.permitted) return
    expect(decision.error.feature).toBe('receive over REST')
  })

  test('permits receive in normal and unknown modes', () => {
    expect(checkGate('receive', {}, makeDescriptor(['v1'], {}, 'normal')).permitted).toBe(true)
    expect(checkGate('receive', {}, createLegacyDescriptor()).permitted).toBe(true)
  })
})

describe('assertPermitted', () => {
  test('throws the denial as an UnsupportedFeatureError', () => {
    let thrown: unknown
    try {
      assertPermitted('send_message', { quote: true }, createLegacyDescriptor())
    } catch (error) {
      thrown = error
    }

    const error = assertInstance(thrown, UnsupportedFeatureError)
    expect(error.code).toBe('UNSUPPORTED_FEATURE')
    expect(error.feature).toBe('quotes')
  })

  test('returns quietly when permitted', () => {
    expect(() =>
      assertPermitted('send_message', { attachments: 3 }, makeDescriptor(['v2']))
    ).not.toThrow()
  })
})
