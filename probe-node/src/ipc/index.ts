/**
 * Framing and message layer for the LSP base protocol.
 *
 * @module
 */

export { type DecodeResult, FrameDecoder } from './frame-decoder.js'
export { describeMessage, FrameWriter, writeFrame } from './frame-writer.js'
export {
  CONTENT_LENGTH_HEADER,
  decodeBody,
  encodeFrame,
  encodeMessage,
  HEADER_LINE_SEPARATOR,
  HEADER_TERMINATOR,
  MAX_HEADER_SIZE,
  parseHeaderBlock
} from './frame.js'
export {
  type ClassifiedMessage,
  classifyMessage,
  ErrorCodes,
  type Message,
  type MessageId,
  type NotificationMessage,
  type RequestMessage,
  type ResponseErrorObject,
  type ResponseMessage
} from './message.js'
