import { bytesToBase64, textToBytes } from '@gatewire/core'

/**
 * StoredMessage - A message accepted by one of the send endpoints
 */
export interface StoredMessage {
  endpoint: 'v1/send' | 'v2/send'
  number: string
  message: string
  recipients: string[]
  groupId?: string
  /** Decoded attachments in the order received */
  attachments: Uint8Array[]
  mentions: Array<{ author: string; start: number; length: number }>
  timestamp: string
}

/**
 * StoredGroup - A group as kept by the stub
 */
export interface StoredGroup {
  id: string
  name: string
  description?: string
  members: string[]
  admins: string[]
}

export type InboundEnvelope = Record<string, unknown>

/**
 * GatewayStore - In-memory state behind the stub gateway
 */
export class GatewayStore {
  /** Every accepted message, in order */
  readonly sent: StoredMessage[] = []

  private groups: Map<string, Map<string, StoredGroup>> = new Map()
  private inbox: Map<string, InboundEnvelope[]> = new Map()
  private lastTimestamp = 1700000000000
  private groupCounter = 1

  nextTimestamp(): string {
    this.lastTimestamp += 1
    return String(this.lastTimestamp)
  }

  recordMessage(message: Omit<StoredMessage, 'timestamp'>): StoredMessage {
    const stored = { ...message, timestamp: this.nextTimestamp() }
    this.sent.push(stored)
    return stored
  }

  // ============================================================
  // Groups
  // ============================================================

  createGroup(
    account: string,
    group: { name: string; members: string[]; description?: string }
  ): StoredGroup {
    const id = `group.${bytesToBase64(textToBytes(`stub-group-${this.groupCounter++}`))}`
    const stored: StoredGroup = {
      id,
      name: group.name,
      description: group.description,
      members: [account, ...group.members],
      admins: [account],
    }
    this.groupsOf(account).set(id, stored)
    return stored
  }

  listGroups(account: string): StoredGroup[] {
    return Array.from(this.groupsOf(account).values())
  }

  getGroup(account: string, groupId: string): StoredGroup | null {
    return this.groupsOf(account).get(groupId) ?? null
  }

  deleteGroup(account: string, groupId: string): boolean {
    return this.groupsOf(account).delete(groupId)
  }

  private groupsOf(account: string): Map<string, StoredGroup> {
    let groups = this.groups.get(account)
    if (!groups) {
      groups = new Map()
      this.groups.set(account, groups)
    }
    return groups
  }

  // ============================================================
  // Inbound messages
  // ============================================================

  /**
   * Queue an envelope for the next receive call of `account`
   */
  enqueue(account: string, envelope: InboundEnvelope): void {
    const queue = this.inbox.get(account) ?? []
    queue.push(envelope)
    this.inbox.set(account, queue)
  }

  /**
   * Take up to `max` queued envelopes (all of them when unset)
   */
  drain(account: string, max?: number): InboundEnvelope[] {
    const queue = this.inbox.get(account) ?? []
    const count = max === undefined ? queue.length : Math.min(max, queue.length)
    return queue.splice(0, count)
  }
}
