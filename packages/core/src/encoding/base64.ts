import * as tweetnaclUtil from 'tweetnacl-util'

const { encodeBase64, decodeBase64 } = tweetnaclUtil

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * Encode bytes to base64
 */
export function bytesToBase64(bytes: Uint8Array): string {
  return encodeBase64(bytes)
}

/**
 * Decode base64 to bytes
 */
export function base64ToBytes(base64: string): Uint8Array {
  return decodeBase64(base64)
}

/**
 * UTF-8 encode a string
 */
export function textToBytes(text: string): Uint8Array {
  return encoder.encode(text)
}

/**
 * UTF-8 decode bytes (invalid sequences become U+FFFD)
 */
export function bytesToText(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}
