import { z } from 'zod'
import type { Logger } from 'pino'
import type { TransportAdapter } from '../adapters/adapter'
import type { AuthScheme } from '../auth'
import type { FileReader } from '../formatting/formatter'
import type { GatewayResponse } from '../dispatch/dispatcher'
import type {
  BackendDescriptor,
  Contact,
  CreateGroupOptions,
  Group,
  Identity,
  Mention,
  Quote,
  RawObject,
  ReactionOptions,
  ReceiptOptions,
  ReceivedEnvelope,
  ReceiveOptions,
  SearchResult,
  SendMessageOptions,
  SendResult,
  UpdateContactOptions,
  UpdateGroupOptions,
  UpdateProfileOptions,
  VerifyIdentityOptions,
} from '../types'
import {
  contactSchema,
  createdGroupSchema,
  groupSchema,
  identitySchema,
  receivedEnvelopeSchema,
  searchResultSchema,
  sendResultSchema,
} from '../types'
import { AxiosTransport } from '../adapters/axios'
import { NoAuth } from '../auth'
import { CapabilityResolver } from '../capabilities/resolver'
import { SEND_ENDPOINTS, assertPermitted, selectSendEndpoint } from '../capabilities/gating'
import { ParameterFormatter } from '../formatting/formatter'
import { RequestDispatcher, gatewayPath } from '../dispatch/dispatcher'
import { BackendUnreachableError, InvalidUsageError } from '../errors'
import { createLogger } from '../logger'

/**
 * GatewayClientOptions
 */
export interface GatewayClientOptions {
  /** Gateway base URL, e.g. 'http://localhost:8080' */
  baseUrl: string

  /** Registered number the client acts as */
  account: string

  /** Credentials for every request (default: none) */
  auth?: AuthScheme

  /** Verify the gateway's TLS certificate (default: true) */
  verifyTls?: boolean

  /** Request timeout in milliseconds (default: 0, no timeout) */
  timeoutMs?: number

  /** HTTP transport (defaults to axios) */
  transport?: TransportAdapter

  /** Logger (defaults to pino at GATEWIRE_LOG_LEVEL or 'warn') */
  logger?: Logger

  /** Reads attachment and avatar files (defaults to fs) */
  readFile?: FileReader
}

/**
 * GatewayClient - High-level operations against a messaging gateway
 *
 * The client keeps no per-call state, so one instance may serve concurrent
 * callers as far as its transport allows.
 */
export class GatewayClient {
  readonly account: string

  private transport: TransportAdapter
  private dispatcher: RequestDispatcher
  private resolver: CapabilityResolver
  private formatter: ParameterFormatter

  constructor(options: GatewayClientOptions) {
    const logger = options.logger ?? createLogger()
    const verifyTls = options.verifyTls ?? true

    this.account = options.account
    this.transport = options.transport ?? new AxiosTransport()
    this.dispatcher = new RequestDispatcher({
      baseUrl: options.baseUrl,
      transport: this.transport,
      auth: options.auth ?? new NoAuth(),
      verifyTls,
      timeoutMs: options.timeoutMs ?? 0,
      logger,
    })
    this.resolver = new CapabilityResolver(this.dispatcher, logger)
    this.formatter = new ParameterFormatter({
      descriptors: this.resolver,
      readFile: options.readFile,
    })

    if (!verifyTls) {
      logger.warn({ baseUrl: options.baseUrl }, 'TLS certificate verification is disabled')
    }
  }

  /**
   * Describe the gateway's versions, build, mode and capabilities
   */
  async about(): Promise<BackendDescriptor> {
    return this.resolver.describe()
  }

  /**
   * Release pooled connections held by the transport
   */
  close(): void {
    this.transport.close?.()
  }

  // ============================================================
  // Messages
  // ============================================================

  /**
   * Send a message to recipients or to a group
   */
  async sendMessage(options: SendMessageOptions): Promise<SendResult> {
    const recipients = options.recipients ?? []
    if (recipients.length === 0 && options.groupId === undefined) {
      throw new InvalidUsageError(
        "Can't send message: provide one or more recipients or a group id"
      )
    }
    if (recipients.length > 0 && options.groupId !== undefined) {
      throw new InvalidUsageError(
        "Can't send message: provide either recipients or a group id, not both"
      )
    }

    const descriptor = await this.resolver.describe()
    const endpoint = selectSendEndpoint(descriptor)
    const mentions = options.mentions ?? []
    assertPermitted(
      'send_message',
      {
        attachments: (options.filenames?.length ?? 0) + (options.attachmentsAsBytes?.length ?? 0),
        mentions: mentions.length > 0,
        quote: isQuoteRequested(options.quote),
      },
      descriptor
    )

    // Legacy gateways address groups through a dedicated field
    const legacy = endpoint === SEND_ENDPOINTS.legacy
    let target: RawObject
    if (options.groupId === undefined) {
      target = { recipients }
    } else if (legacy) {
      target = { group_id: options.groupId }
    } else {
      target = { recipients: [options.groupId] }
    }

    const params = await this.formatter.format(
      {
        message: options.message,
        number: this.account,
        ...target,
        filenames: options.filenames,
        attachments_as_bytes: options.attachmentsAsBytes,
        mentions: mentions.length > 0 ? mentions.map(toWireMention) : undefined,
        quote_timestamp: options.quote?.timestamp,
        quote_author: options.quote?.author,
        quote_message: options.quote?.message,
        quote_mentions: options.quote?.mentions?.length
          ? options.quote.mentions.map(toWireMention)
          : undefined,
        text_mode: options.textMode,
        link_preview: options.linkPreview && {
          url: options.linkPreview.url,
          title: options.linkPreview.title,
          description: options.linkPreview.description,
          base64_thumbnail: options.linkPreview.thumbnail,
        },
        view_once: options.viewOnce,
        edit_timestamp: options.editTimestamp,
        notify_self: options.notifySelf,
        sticker: options.sticker,
      },
      'send_message',
      { descriptor }
    )

    const response = await this.dispatcher.dispatch({
      method: 'POST',
      path: `/${endpoint}`,
      params,
      expectedStatus: [201],
      fallbackMessage: 'Unknown error while sending message',
    })
    return decode(response, sendResultSchema, 'send result', {})
  }

  /**
   * Fetch messages queued on the gateway for this account
   */
  async receive(options: ReceiveOptions = {}): Promise<ReceivedEnvelope[]> {
    const descriptor = await this.resolver.describe()
    assertPermitted('receive', {}, descriptor)

    const params = await this.formatter.format(
      {
        timeout: options.timeout,
        ignore_attachments: options.ignoreAttachments,
        ignore_stories: options.ignoreStories,
        max_messages: options.maxMessages,
        send_read_receipts: options.sendReadReceipts,
      },
      'receive'
    )
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'receive', this.account),
      params,
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while receiving messages',
    })
    return decode(response, z.array(receivedEnvelopeSchema), 'received messages', [])
  }

  // ============================================================
  // Groups
  // ============================================================

  /**
   * Create a group and return its id
   */
  async createGroup(options: CreateGroupOptions): Promise<string> {
    const permissions = options.permissions
    const params = await this.formatter.format({
      name: options.name,
      members: options.members,
      description: options.description,
      permissions: permissions && {
        add_members: permissions.addMembers,
        edit_group: permissions.editGroup,
        send_messages: permissions.sendMessages,
      },
      group_link: options.groupLink,
      expiration_time: options.expirationTime,
    })
    const response = await this.dispatcher.dispatch({
      method: 'POST',
      path: gatewayPath('v1', 'groups', this.account),
      params,
      expectedStatus: [201],
      fallbackMessage: 'Unknown error while creating group',
    })
    return decode(response, createdGroupSchema, 'created group').id
  }

  async listGroups(): Promise<Group[]> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'groups', this.account),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while listing groups',
    })
    return decode(response, z.array(groupSchema), 'group list', [])
  }

  async getGroup(groupId: string): Promise<Group> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'groups', this.account, groupId),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while fetching group',
    })
    return decode(response, groupSchema, 'group')
  }

  /**
   * Update group name, description, avatar or message timer
   */
  async updateGroup(groupId: string, options: UpdateGroupOptions): Promise<void> {
    const params = await this.formatter.format(
      {
        name: options.name,
        description: options.description,
        filename: options.avatarFilename,
        attachment_as_bytes: options.avatarBytes,
        expiration_time: options.expirationTime,
      },
      'update_group'
    )
    await this.dispatcher.dispatch({
      method: 'PUT',
      path: gatewayPath('v1', 'groups', this.account, groupId),
      params,
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while updating group',
    })
  }

  async deleteGroup(groupId: string): Promise<void> {
    await this.dispatcher.dispatch({
      method: 'DELETE',
      path: gatewayPath('v1', 'groups', this.account, groupId),
      expectedStatus: [200, 204],
      fallbackMessage: 'Unknown error while deleting group',
    })
  }

  async joinGroup(groupId: string): Promise<void> {
    await this.groupAction('POST', groupId, 'join', undefined, 'joining group')
  }

  async quitGroup(groupId: string): Promise<void> {
    await this.groupAction('POST', groupId, 'quit', undefined, 'leaving group')
  }

  async blockGroup(groupId: string): Promise<void> {
    await this.groupAction('POST', groupId, 'block', undefined, 'blocking group')
  }

  async addMembers(groupId: string, members: string[]): Promise<void> {
    await this.groupAction('POST', groupId, 'members', { members }, 'adding group members')
  }

  async removeMembers(groupId: string, members: string[]): Promise<void> {
    await this.groupAction('DELETE', groupId, 'members', { members }, 'removing group members')
  }

  async addAdmins(groupId: string, admins: string[]): Promise<void> {
    await this.groupAction('POST', groupId, 'admins', { admins }, 'adding group admins')
  }

  async removeAdmins(groupId: string, admins: string[]): Promise<void> {
    await this.groupAction('DELETE', groupId, 'admins', { admins }, 'removing group admins')
  }

  private async groupAction(
    method: 'POST' | 'DELETE',
    groupId: string,
    action: string,
    raw: RawObject | undefined,
    description: string
  ): Promise<void> {
    await this.dispatcher.dispatch({
      method,
      path: gatewayPath('v1', 'groups', this.account, groupId, action),
      params: raw && (await this.formatter.format(raw)),
      expectedStatus: [204],
      fallbackMessage: `Unknown error while ${description}`,
    })
  }

  // ============================================================
  // Profile & contacts
  // ============================================================

  async updateProfile(options: UpdateProfileOptions): Promise<void> {
    const params = await this.formatter.format(
      {
        name: options.name,
        about: options.about,
        filename: options.avatarFilename,
        attachment_as_bytes: options.avatarBytes,
      },
      'update_profile'
    )
    await this.dispatcher.dispatch({
      method: 'PUT',
      path: gatewayPath('v1', 'profiles', this.account),
      params,
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while updating profile',
    })
  }

  async listContacts(): Promise<Contact[]> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'contacts', this.account),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while listing contacts',
    })
    return decode(response, z.array(contactSchema), 'contact list', [])
  }

  async updateContact(options: UpdateContactOptions): Promise<void> {
    const params = await this.formatter.format(
      {
        contact: options.contact,
        name: options.name,
        expiration_in_seconds: options.expirationInSeconds,
      },
      'update_contact'
    )
    await this.dispatcher.dispatch({
      method: 'PUT',
      path: gatewayPath('v1', 'contacts', this.account),
      params,
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while updating contact',
    })
  }

  /**
   * Push the contact list to linked devices
   */
  async syncContacts(): Promise<void> {
    await this.dispatcher.dispatch({
      method: 'POST',
      path: gatewayPath('v1', 'contacts', this.account, 'sync'),
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while syncing contacts',
    })
  }

  // ============================================================
  // Reactions & receipts
  // ============================================================

  async addReaction(options: ReactionOptions): Promise<void> {
    await this.react('POST', options, 'Unknown error while adding reaction')
  }

  async removeReaction(options: ReactionOptions): Promise<void> {
    await this.react('DELETE', options, 'Unknown error while removing reaction')
  }

  private async react(
    method: 'POST' | 'DELETE',
    options: ReactionOptions,
    fallbackMessage: string
  ): Promise<void> {
    const params = await this.formatter.format({
      recipient: options.recipient,
      reaction: options.reaction,
      target_author: options.targetAuthor,
      timestamp: options.timestamp,
    })
    await this.dispatcher.dispatch({
      method,
      path: gatewayPath('v1', 'reactions', this.account),
      params,
      expectedStatus: [204],
      fallbackMessage,
    })
  }

  async sendReceipt(options: ReceiptOptions): Promise<void> {
    const params = await this.formatter.format({
      recipient: options.recipient,
      receipt_type: options.receiptType,
      timestamp: options.timestamp,
    })
    await this.dispatcher.dispatch({
      method: 'POST',
      path: gatewayPath('v1', 'receipts', this.account),
      params,
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while sending receipt',
    })
  }

  // ============================================================
  // Identities
  // ============================================================

  async listIdentities(): Promise<Identity[]> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'identities', this.account),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while listing identities',
    })
    return decode(response, z.array(identitySchema), 'identity list', [])
  }

  /**
   * Trust the keys of `numberToTrust`
   */
  async verifyIdentity(options: VerifyIdentityOptions): Promise<void> {
    const trustAll = options.trustAllKnownKeys === true
    const safetyNumber = options.verifiedSafetyNumber
    if (trustAll && safetyNumber !== undefined) {
      throw new InvalidUsageError(
        'Trust either all known keys or a verified safety number, not both'
      )
    }
    if (!trustAll && safetyNumber === undefined) {
      throw new InvalidUsageError(
        'Trusting an identity needs trustAllKnownKeys or a verified safety number'
      )
    }

    const params = await this.formatter.format(
      {
        number_to_trust: options.numberToTrust,
        trust_all_known_keys: trustAll ? true : undefined,
        verified_safety_number: safetyNumber,
      },
      'verify_identity'
    )
    await this.dispatcher.dispatch({
      method: 'PUT',
      path: gatewayPath('v1', 'identities', this.account, 'trust', options.numberToTrust),
      params,
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while trusting identity',
    })
  }

  // ============================================================
  // Attachments
  // ============================================================

  /**
   * Ids of attachments stored on the gateway
   */
  async listAttachments(): Promise<string[]> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'attachments'),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while listing attachments',
    })
    return decode(response, z.array(z.string()), 'attachment list', [])
  }

  /**
   * Raw content of a stored attachment
   */
  async getAttachment(attachmentId: string): Promise<Uint8Array> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'attachments', attachmentId),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while fetching attachment',
    })
    return response.body
  }

  async deleteAttachment(attachmentId: string): Promise<void> {
    await this.dispatcher.dispatch({
      method: 'DELETE',
      path: gatewayPath('v1', 'attachments', attachmentId),
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while deleting attachment',
    })
  }

  // ============================================================
  // Search & accounts
  // ============================================================

  /**
   * Check which numbers are registered with the messaging service
   */
  async search(numbers: string[]): Promise<SearchResult[]> {
    if (numbers.length === 0) {
      throw new InvalidUsageError('Search needs at least one number')
    }
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'search'),
      params: await this.formatter.format({ numbers }),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while searching numbers',
    })
    return decode(response, z.array(searchResultSchema), 'search result', [])
  }

  /**
   * Numbers registered on the gateway
   */
  async listAccounts(): Promise<string[]> {
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'accounts'),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while listing accounts',
    })
    return decode(response, z.array(z.string()), 'account list', [])
  }

  /**
   * Set the registration lock PIN
   */
  async setPin(pin: string): Promise<void> {
    if (pin.length === 0) {
      throw new InvalidUsageError('PIN must not be empty')
    }
    await this.dispatcher.dispatch({
      method: 'POST',
      path: gatewayPath('v1', 'accounts', this.account, 'pin'),
      params: await this.formatter.format({ pin }),
      expectedStatus: [201],
      fallbackMessage: 'Unknown error while setting PIN',
    })
  }

  async removePin(): Promise<void> {
    await this.dispatcher.dispatch({
      method: 'DELETE',
      path: gatewayPath('v1', 'accounts', this.account, 'pin'),
      expectedStatus: [204],
      fallbackMessage: 'Unknown error while removing PIN',
    })
  }

  /**
   * QR code (PNG) that links a new device to the account
   */
  async qrCodeLink(deviceName: string, options: { qrcodeVersion?: number } = {}): Promise<Uint8Array> {
    if (deviceName.trim().length === 0) {
      throw new InvalidUsageError('A device name is required to link a device')
    }
    const response = await this.dispatcher.dispatch({
      method: 'GET',
      path: gatewayPath('v1', 'qrcodelink'),
      params: await this.formatter.format({
        device_name: deviceName,
        qrcode_version: options.qrcodeVersion,
      }),
      expectedStatus: [200],
      fallbackMessage: 'Unknown error while creating device link',
    })
    return response.body
  }
}

function toWireMention(mention: Mention): RawObject {
  return { author: mention.author, start: mention.start, length: mention.length }
}

function isQuoteRequested(quote: Quote | undefined): boolean {
  if (!quote) return false
  return (
    quote.timestamp !== undefined ||
    quote.author !== undefined ||
    quote.message !== undefined ||
    (quote.mentions?.length ?? 0) > 0
  )
}

/**
 * Parse and validate a JSON response body. An empty body decodes as `empty`.
 */
function decode<T>(
  response: GatewayResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
  empty?: unknown
): T {
  let body: unknown
  try {
    body = response.json()
  } catch (error) {
    throw new BackendUnreachableError(`Could not parse ${what} from gateway`, error)
  }
  const result = schema.safeParse(body ?? empty)
  if (!result.success) {
    throw new BackendUnreachableError(`Unexpected ${what} from gateway`, result.error)
  }
  return result.data
}

/**
 * Create a gateway client
 */
export function createGatewayClient(options: GatewayClientOptions): GatewayClient {
  return new GatewayClient(options)
}
