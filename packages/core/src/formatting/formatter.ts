import { readFile } from 'fs/promises'
import type { DescriptorSource } from '../capabilities/resolver'
import type { BackendDescriptor, RawParams, RawValue, WireParams, WireValue } from '../types'
import { supportsVersion } from '../types'
import { assertPermitted } from '../capabilities/gating'
import { InvalidUsageError } from '../errors'
import { bytesToBase64 } from '../encoding/base64'

/**
 * EndpointContext - Logical operation whose formatting rules apply
 */
export type EndpointContext =
  | 'receive'
  | 'send_message'
  | 'update_profile'
  | 'update_group'
  | 'update_contact'
  | 'verify_identity'

/**
 * FileReader - Reads a whole file; the handle is closed before it resolves
 */
export type FileReader = (path: string) => Promise<Uint8Array>

export const readWholeFile: FileReader = (path) => readFile(path)

/** Raw field names the formatter rewrites */
const FIELDS = {
  filenames: 'filenames',
  attachmentsAsBytes: 'attachments_as_bytes',
  avatarFilename: 'filename',
  avatarBytes: 'attachment_as_bytes',
  contact: 'contact',
  numberToTrust: 'number_to_trust',
} as const

export interface ParameterFormatterOptions {
  /** Consulted for `send_message` when no descriptor is passed in */
  descriptors?: DescriptorSource
  readFile?: FileReader
}

export interface FormatOptions {
  /** Descriptor the caller already fetched */
  descriptor?: BackendDescriptor
}

/**
 * ParameterFormatter - Turns raw operation parameters into wire parameters
 */
export class ParameterFormatter {
  private descriptors?: DescriptorSource
  private readFile: FileReader

  constructor(options: ParameterFormatterOptions = {}) {
    this.descriptors = options.descriptors
    this.readFile = options.readFile ?? readWholeFile
  }

  /**
   * Drop absent values, apply the rules of `context`, then encode what is
   * left as JSON values
   */
  async format(
    raw: RawParams,
    context?: EndpointContext,
    options: FormatOptions = {}
  ): Promise<WireParams> {
    const params = dropAbsent(raw)

    switch (context) {
      case 'receive':
        for (const [key, value] of Object.entries(params)) {
          if (typeof value === 'boolean') {
            params[key] = value ? 'true' : 'false'
          }
        }
        break
      case 'send_message':
        await this.resolveAttachments(params, options.descriptor ?? (await this.describe()))
        break
      case 'update_profile':
      case 'update_group':
        await this.resolveAvatar(params)
        break
      case 'update_contact':
        if (FIELDS.contact in params) {
          params.recipient = params[FIELDS.contact]
          delete params[FIELDS.contact]
        }
        break
      case 'verify_identity':
        // Already part of the URL path
        delete params[FIELDS.numberToTrust]
        break
    }

    return toWireParams(params)
  }

  private async describe(): Promise<BackendDescriptor> {
    if (!this.descriptors) {
      throw new InvalidUsageError('Formatting a message needs a backend descriptor')
    }
    return this.descriptors.describe()
  }

  /**
   * v2 gateways take every attachment as a list of base64 strings, bytes
   * first. Legacy gateways take a single `base64_attachment`.
   */
  private async resolveAttachments(
    params: Record<string, RawValue>,
    descriptor: BackendDescriptor
  ): Promise<void> {
    const bytes = takeBytesList(params, FIELDS.attachmentsAsBytes)
    const files = takeStringList(params, FIELDS.filenames)

    if (supportsVersion(descriptor, 'v2')) {
      const encoded = bytes.map((item) => bytesToBase64(item))
      for (const file of files) {
        encoded.push(bytesToBase64(await this.readFile(file)))
      }
      if (encoded.length > 0) {
        params.base64_attachments = encoded
      }
      return
    }

    assertPermitted('send_message', { attachments: bytes.length + files.length }, descriptor)
    if (bytes.length === 1) {
      params.base64_attachment = bytesToBase64(bytes[0])
    } else if (files.length === 1) {
      params.base64_attachment = bytesToBase64(await this.readFile(files[0]))
    }
  }

  private async resolveAvatar(params: Record<string, RawValue>): Promise<void> {
    const filename = params[FIELDS.avatarFilename]
    const bytes = params[FIELDS.avatarBytes]
    delete params[FIELDS.avatarFilename]
    delete params[FIELDS.avatarBytes]

    if (filename !== undefined && bytes !== undefined) {
      throw new InvalidUsageError('Give the avatar either as a filename or as bytes, not both')
    }

    if (filename !== undefined) {
      if (typeof filename !== 'string') {
        throw new InvalidUsageError(`${FIELDS.avatarFilename} must be a path`)
      }
      params.base64_avatar = bytesToBase64(await this.readFile(filename))
    } else if (bytes !== undefined) {
      if (!(bytes instanceof Uint8Array)) {
        throw new InvalidUsageError(`${FIELDS.avatarBytes} must be a byte array`)
      }
      params.base64_avatar = bytesToBase64(bytes)
    }
  }
}

/**
 * Copy of `raw` without its undefined and null entries
 */
export function dropAbsent(raw: RawParams): Record<string, RawValue> {
  const params: Record<string, RawValue> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (value !== undefined && value !== null) {
      params[key] = value
    }
  }
  return params
}

export function toWireParams(params: Record<string, RawValue>): WireParams {
  const wire: WireParams = {}
  for (const [key, value] of Object.entries(params)) {
    const converted = toWireValue(value)
    if (converted !== undefined) {
      wire[key] = converted
    }
  }
  return wire
}

function toWireValue(value: RawValue): WireValue | undefined {
  if (value === undefined || value === null) return undefined
  if (value instanceof Uint8Array) return bytesToBase64(value)
  if (Array.isArray(value)) {
    const items: WireValue[] = []
    for (const item of value) {
      const converted = toWireValue(item)
      if (converted !== undefined) items.push(converted)
    }
    return items
  }
  if (typeof value === 'object') return toWireParams(value)
  return value
}

function takeBytesList(params: Record<string, RawValue>, key: string): Uint8Array[] {
  const value = params[key]
  delete params[key]
  if (value === undefined) return []
  if (Array.isArray(value) && value.every(isBytes)) return value
  throw new InvalidUsageError(`${key} must be a list of byte arrays`)
}

function takeStringList(params: Record<string, RawValue>, key: string): string[] {
  const value = params[key]
  delete params[key]
  if (value === undefined) return []
  if (Array.isArray(value) && value.every(isString)) return value
  throw new InvalidUsageError(`${key} must be a list of paths`)
}

function isBytes(value: RawValue): value is Uint8Array {
  return value instanceof Uint8Array
}

function isString(value: RawValue): value is string {
  return typeof value === 'string'
}

/**
 * Create a parameter formatter
 */
export function createParameterFormatter(options?: ParameterFormatterOptions): ParameterFormatter {
  return new ParameterFormatter(options)
}
