import { Hono } from 'hono'
import { z } from 'zod'
import type { Context } from 'hono'
import { base64ToBytes } from '@gatewire/core'
import type { StubEnv } from '../context'
import { getSettings, getStore, readBody } from '../context'

const mentionSchema = z.object({
  author: z.string(),
  start: z.number().int(),
  length: z.number().int(),
})

const sendV1Schema = z.object({
  message: z.string(),
  number: z.string(),
  recipients: z.array(z.string()).optional(),
  group_id: z.string().optional(),
  base64_attachment: z.string().optional(),
})

const sendV2Schema = z.object({
  message: z.string(),
  number: z.string(),
  recipients: z.array(z.string()).min(1),
  base64_attachments: z.array(z.string()).optional(),
  mentions: z.array(mentionSchema).optional(),
  quote_timestamp: z.number().optional(),
  quote_author: z.string().optional(),
  quote_message: z.string().optional(),
})

/**
 * Messages routes
 */
export const messagesRoutes = new Hono<StubEnv>()

// Legacy send: one attachment, groups through group_id
messagesRoutes.post('/v1/send', async (c) => {
  const body = await readBody(c, sendV1Schema)
  if (!body) {
    return c.json({ error: 'Invalid send request' }, 400)
  }

  const recipients = body.recipients ?? []
  if ((recipients.length === 0) === (body.group_id === undefined)) {
    return c.json({ error: 'Please provide recipients or a group id' }, 400)
  }

  const rejected = rejectRecipients(c, body.number, recipients)
  if (rejected) return rejected
  if (body.group_id !== undefined && !getStore(c).getGroup(body.number, body.group_id)) {
    return c.json({ error: 'invalid group' }, 400)
  }

  const attachments = decodeAttachments(
    body.base64_attachment === undefined ? [] : [body.base64_attachment]
  )
  if (!attachments) {
    return c.json({ error: 'invalid attachment' }, 400)
  }

  getStore(c).recordMessage({
    endpoint: 'v1/send',
    number: body.number,
    message: body.message,
    recipients,
    groupId: body.group_id,
    attachments,
    mentions: [],
  })
  return c.body(null, 201)
})

// Current send: attachment list, mentions and quotes when advertised
messagesRoutes.post('/v2/send', async (c) => {
  const settings = getSettings(c)
  if (!settings.versions.includes('v2')) {
    return c.json({ error: 'Not found' }, 404)
  }

  const body = await readBody(c, sendV2Schema)
  if (!body) {
    return c.json({ error: 'Invalid send request' }, 400)
  }

  const features = settings.capabilities['v2/send'] ?? []
  if (body.mentions && !features.includes('mentions')) {
    return c.json({ error: 'mentions are not supported' }, 400)
  }
  const quoted = body.quote_timestamp !== undefined || body.quote_author !== undefined
  if (quoted && !features.includes('quotes')) {
    return c.json({ error: 'quotes are not supported' }, 400)
  }

  const groupIds = body.recipients.filter((r) => r.startsWith('group.'))
  const numbers = body.recipients.filter((r) => !r.startsWith('group.'))
  const rejected = rejectRecipients(c, body.number, numbers)
  if (rejected) return rejected
  if (groupIds.some((id) => !getStore(c).getGroup(body.number, id))) {
    return c.json({ error: 'invalid group' }, 400)
  }

  const attachments = decodeAttachments(body.base64_attachments ?? [])
  if (!attachments) {
    return c.json({ error: 'invalid attachment' }, 400)
  }

  const stored = getStore(c).recordMessage({
    endpoint: 'v2/send',
    number: body.number,
    message: body.message,
    recipients: body.recipients,
    attachments,
    mentions: body.mentions ?? [],
  })
  return c.json({ timestamp: stored.timestamp }, 201)
})

// Poll inbound messages
messagesRoutes.get('/v1/receive/:number', (c) => {
  if (getSettings(c).mode === 'json-rpc') {
    return c.json({ error: 'Only available in normal mode' }, 400)
  }

  const max = c.req.query('max_messages')
  const envelopes = getStore(c).drain(
    c.req.param('number'),
    max === undefined ? undefined : parseInt(max, 10)
  )
  return c.json(envelopes)
})

/**
 * 400 response when a recipient is not known to the stub
 */
function rejectRecipients(c: Context<StubEnv>, account: string, recipients: string[]) {
  const known = getSettings(c).knownNumbers
  if (!known) return null
  const unknown = recipients.filter((r) => r !== account && !known.includes(r))
  return unknown.length > 0 ? c.json({ error: 'invalid recipient' }, 400) : null
}

function decodeAttachments(encoded: string[]): Uint8Array[] | null {
  try {
    return encoded.map((item) => base64ToBytes(item))
  } catch {
    return null
  }
}
