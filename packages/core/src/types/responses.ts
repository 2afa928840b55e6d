import { z } from 'zod'

/**
 * Shape of GET /v1/about
 */
export const aboutSchema = z.object({
  versions: z.array(z.string()),
  build: z.number().int().optional(),
  mode: z.unknown().optional(),
  version: z.string().optional(),
  capabilities: z.record(z.string(), z.array(z.string())).optional(),
})

export const sendResultSchema = z
  .object({
    timestamp: z.union([z.string(), z.number()]).optional(),
  })
  .transform((result) => ({
    timestamp: result.timestamp === undefined ? undefined : String(result.timestamp),
  }))

export type SendResult = z.infer<typeof sendResultSchema>

export const createdGroupSchema = z.object({ id: z.string() })

export const groupSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    internal_id: z.string().optional(),
    description: z.string().optional(),
    members: z.array(z.string()).optional(),
    admins: z.array(z.string()).optional(),
    pending_invites: z.array(z.string()).optional(),
    pending_requests: z.array(z.string()).optional(),
    blocked: z.boolean().optional(),
    invite_link: z.string().optional(),
  })
  .transform((group) => ({
    id: group.id,
    name: group.name,
    internalId: group.internal_id,
    description: group.description,
    members: group.members ?? [],
    admins: group.admins ?? [],
    pendingInvites: group.pending_invites ?? [],
    pendingRequests: group.pending_requests ?? [],
    blocked: group.blocked ?? false,
    inviteLink: group.invite_link || undefined,
  }))

export type Group = z.infer<typeof groupSchema>

export const contactSchema = z
  .object({
    number: z.string(),
    uuid: z.string().optional(),
    name: z.string().optional(),
    profile_name: z.string().optional(),
    username: z.string().optional(),
    blocked: z.boolean().optional(),
    message_expiration: z.string().optional(),
  })
  .transform((contact) => ({
    number: contact.number,
    uuid: contact.uuid,
    name: contact.name || undefined,
    profileName: contact.profile_name || undefined,
    username: contact.username || undefined,
    blocked: contact.blocked ?? false,
    messageExpiration: contact.message_expiration,
  }))

export type Contact = z.infer<typeof contactSchema>

export const identitySchema = z
  .object({
    number: z.string(),
    uuid: z.string().optional(),
    status: z.string(),
    fingerprint: z.string().optional(),
    safety_number: z.string().optional(),
    added: z.string().optional(),
  })
  .transform((identity) => ({
    number: identity.number,
    uuid: identity.uuid,
    status: identity.status,
    fingerprint: identity.fingerprint,
    safetyNumber: identity.safety_number,
    added: identity.added,
  }))

export type Identity = z.infer<typeof identitySchema>

export const searchResultSchema = z.object({
  number: z.string(),
  registered: z.boolean(),
})

export type SearchResult = z.infer<typeof searchResultSchema>

/**
 * Inbound envelopes are passed through as the gateway reports them
 */
export const receivedEnvelopeSchema = z.record(z.string(), z.unknown())

export type ReceivedEnvelope = z.infer<typeof receivedEnvelopeSchema>
