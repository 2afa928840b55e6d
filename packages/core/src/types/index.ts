export * from './capabilities'
export * from './wire'
export * from './responses'

// ============================================================
// Messages
// ============================================================

/**
 * Mention - Highlights a user inside the message text
 */
export interface Mention {
  /** Number or UUID of the mentioned user */
  author: string
  /** Offset of the mention in the message, in UTF-16 code units */
  start: number
  length: number
}

/**
 * Quote - The message being replied to. Setting any field requests a quote.
 */
export interface Quote {
  /** Timestamp of the quoted message */
  timestamp?: number
  /** Author of the quoted message */
  author?: string
  /** Text of the quoted message */
  message?: string
  mentions?: Mention[]
}

export interface LinkPreview {
  url: string
  title: string
  description?: string
  /** Thumbnail image, base64-encoded before sending */
  thumbnail?: Uint8Array
}

/**
 * SendMessageOptions - Options for sending a message
 *
 * Exactly one of `recipients` and `groupId` must be given.
 */
export interface SendMessageOptions {
  message: string
  recipients?: string[]
  groupId?: string
  /** Paths of files to attach, read when the message is sent */
  filenames?: string[]
  /** In-memory attachments, sent ahead of `filenames` */
  attachmentsAsBytes?: Uint8Array[]
  mentions?: Mention[]
  quote?: Quote
  textMode?: 'normal' | 'styled'
  linkPreview?: LinkPreview
  viewOnce?: boolean
  /** Timestamp of a previously sent message this one replaces */
  editTimestamp?: number
  notifySelf?: boolean
  /** Sticker as `<packId>:<stickerId>` */
  sticker?: string
}

/**
 * ReceiveOptions - Options for polling inbound messages
 */
export interface ReceiveOptions {
  /** Seconds the gateway waits for new messages */
  timeout?: number
  ignoreAttachments?: boolean
  ignoreStories?: boolean
  maxMessages?: number
  sendReadReceipts?: boolean
}

// ============================================================
// Groups
// ============================================================

export type GroupPermission = 'only-admins' | 'every-member'

export interface GroupPermissions {
  addMembers?: GroupPermission
  editGroup?: GroupPermission
  sendMessages?: GroupPermission
}

export interface CreateGroupOptions {
  name: string
  members: string[]
  description?: string
  permissions?: GroupPermissions
  groupLink?: 'disabled' | 'enabled' | 'enabled-with-approval'
  /** Disappearing-message timer in seconds */
  expirationTime?: number
}

/**
 * UpdateGroupOptions - Give the avatar as a path or as bytes, not both
 */
export interface UpdateGroupOptions {
  name?: string
  description?: string
  avatarFilename?: string
  avatarBytes?: Uint8Array
  expirationTime?: number
}

// ============================================================
// Profile & contacts
// ============================================================

/**
 * UpdateProfileOptions - Give the avatar as a path or as bytes, not both
 */
export interface UpdateProfileOptions {
  name?: string
  about?: string
  avatarFilename?: string
  avatarBytes?: Uint8Array
}

export interface UpdateContactOptions {
  /** Number of the contact to update */
  contact: string
  name?: string
  expirationInSeconds?: number
}

// ============================================================
// Reactions, receipts, identities
// ============================================================

export interface ReactionOptions {
  recipient: string
  /** Emoji */
  reaction: string
  /** Author of the message reacted to */
  targetAuthor: string
  /** Timestamp of the message reacted to */
  timestamp: number
}

export interface ReceiptOptions {
  recipient: string
  receiptType: 'read' | 'viewed'
  timestamp: number
}

/**
 * VerifyIdentityOptions - Trust either all known keys or one verified safety number
 */
export interface VerifyIdentityOptions {
  numberToTrust: string
  trustAllKnownKeys?: boolean
  verifiedSafetyNumber?: string
}
