/**
 * JSON value as sent to the gateway
 */
export type WireValue = string | number | boolean | WireValue[] | WireObject

export interface WireObject {
  [key: string]: WireValue
}

/**
 * WireParams - Formatted parameters ready for the query string or JSON body
 */
export type WireParams = WireObject

/**
 * Parameter value before formatting. Absent values (`undefined`, `null`) are
 * dropped; byte values are base64-encoded.
 */
export type RawValue =
  | string
  | number
  | boolean
  | Uint8Array
  | RawValue[]
  | RawObject
  | null
  | undefined

export interface RawObject {
  [key: string]: RawValue
}

/**
 * RawParams - Parameters as assembled by an operation
 */
export type RawParams = RawObject

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'
