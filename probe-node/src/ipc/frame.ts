/**
 * Frame encoding for the LSP base protocol.
 *
 * Frame structure:
 * - ASCII header lines, each terminated by `\r\n`
 * - an empty line (`\r\n`) closing the header block
 * - body bytes (UTF-8 JSON), exactly `Content-Length` of them
 *
 * `Content-Length` counts encoded bytes, not characters. Other headers
 * (e.g. `Content-Type`) are accepted and ignored.
 *
 * @module
 * @remarks Node.js only. Uses Buffer for byte-exact lengths.
 */

import { DecodingError, EncodingError, FramingError } from '../errors.js'
import type { Message } from './message.js'

/** Separator between header lines. */
export const HEADER_LINE_SEPARATOR = '\r\n'

/** Separator between the header block and the body. */
export const HEADER_TERMINATOR = '\r\n\r\n'

/** The only header the decoder acts on. Matched case-sensitively. */
export const CONTENT_LENGTH_HEADER = 'Content-Length'

/**
 * Maximum header block size in bytes, terminator included.
 * A larger block without an empty line is rejected as malformed.
 */
export const MAX_HEADER_SIZE = 8 * 1024

/**
 * Prefix a body with its `Content-Length` header.
 *
 * @param body - UTF-8 encoded body bytes
 * @returns Buffer containing header block + body
 */
export function encodeFrame(body: Uint8Array): Buffer {
  const header = Buffer.from(
    `${CONTENT_LENGTH_HEADER}: ${body.length}${HEADER_TERMINATOR}`,
    'ascii'
  )
  return Buffer.concat([header, body])
}

/**
 * Serialize a message and frame it.
 *
 * @throws EncodingError if the message cannot be serialized to JSON
 */
export function encodeMessage(message: Message): Buffer {
  let json: string | undefined
  try {
    json = JSON.stringify(message)
  } catch (err) {
    throw new EncodingError(err)
  }
  if (json === undefined) {
    throw new EncodingError(new Error('message serialized to undefined'))
  }
  return encodeFrame(Buffer.from(json, 'utf8'))
}

/**
 * Parse a header block (without the terminating empty line) and return the
 * declared body length.
 *
 * @throws FramingError if `Content-Length` is missing or not a non-negative integer
 */
export function parseHeaderBlock(block: string): number {
  let contentLength: number | undefined

  for (const line of block.split(HEADER_LINE_SEPARATOR)) {
    if (line === '') continue
    const colon = line.indexOf(':')
    if (colon === -1) {
      throw new FramingError(`malformed header line ${JSON.stringify(line)}`)
    }
    if (line.slice(0, colon) !== CONTENT_LENGTH_HEADER) {
      continue
    }
    const value = line.slice(colon + 1).trim()
    if (!/^\d+$/.test(value)) {
      throw new FramingError(`invalid ${CONTENT_LENGTH_HEADER} value ${JSON.stringify(value)}`)
    }
    contentLength = Number.parseInt(value, 10)
  }

  if (contentLength === undefined) {
    throw new FramingError(`missing ${CONTENT_LENGTH_HEADER} header`)
  }
  return contentLength
}

/**
 * Parse body bytes as JSON. An empty body decodes to `{}`.
 *
 * @throws DecodingError on malformed content, carrying the raw bytes
 */
export function decodeBody(raw: Buffer): unknown {
  if (raw.length === 0) {
    return {}
  }
  try {
    return JSON.parse(raw.toString('utf8'))
  } catch (err) {
    throw new DecodingError(Buffer.from(raw), err)
  }
}
