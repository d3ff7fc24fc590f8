/**
 * FrameWriter: writes framed messages to the server's stdin.
 *
 * - Writes wait on backpressure (`drain`) instead of buffering unboundedly
 * - Writes are serialized on a promise chain, so frames never interleave
 *   even when several calls are issued concurrently
 * - Any failure to write becomes a {@link StreamClosedError} naming the
 *   message that was being sent
 *
 * @module
 */
import type { Writable } from 'node:stream'
import { StreamClosedError } from '../errors.js'
import { encodeMessage } from './frame.js'
import type { Message } from './message.js'

/**
 * How a message is named in write errors.
 */
export function describeMessage(message: Message): string {
  if ('method' in message) {
    return 'id' in message
      ? `request "${message.method}" (id ${message.id})`
      : `notification "${message.method}"`
  }
  return `response to id ${String(message.id)}`
}

/**
 * Write one frame, resolving once the stream has accepted it. When the
 * stream's buffer is full this waits for `drain`; a stream that errors,
 * closes or finishes first rejects instead.
 *
 * @param target - what is being written, for error messages
 * @throws StreamClosedError if stdin is unavailable or fails during the write
 */
export function writeFrame(input: Writable, frame: Buffer, target: string): Promise<void> {
  if (input.destroyed) {
    return Promise.reject(new StreamClosedError('destroyed', target))
  }
  if (input.writableEnded) {
    return Promise.reject(new StreamClosedError('ended', target))
  }

  return new Promise((resolve, reject) => {
    let settled = false

    const settle = (err?: StreamClosedError) => {
      if (settled) return
      settled = true
      input.off('error', onError)
      input.off('close', onClose)
      input.off('finish', onFinish)
      input.off('drain', onDrain)
      if (err === undefined) {
        resolve()
      } else {
        reject(err)
      }
    }

    const onError = (err: Error) => settle(new StreamClosedError('errored', target, err))
    const onClose = () => settle(new StreamClosedError('closed', target))
    const onFinish = () => settle(new StreamClosedError('ended', target))
    const onDrain = () => settle()

    input.on('error', onError)
    input.on('close', onClose)
    input.on('finish', onFinish)

    let accepted: boolean
    try {
      accepted = input.write(frame)
    } catch (err) {
      settle(new StreamClosedError('errored', target, err))
      return
    }

    if (accepted) {
      // An EPIPE from this write is emitted asynchronously; give it a turn
      setImmediate(() => settle())
    } else {
      input.on('drain', onDrain)
    }
  })
}

export class FrameWriter {
  private tail: Promise<void> = Promise.resolve()

  constructor(private readonly input: Writable) {}

  /**
   * Encode and write one message. Encoding happens before the message joins
   * the write queue, so an unserializable message fails without touching the
   * stream.
   *
   * @throws EncodingError if the message cannot be serialized
   * @throws StreamClosedError if stdin is no longer writable
   */
  write(message: Message): Promise<void> {
    let frame: Buffer
    try {
      frame = encodeMessage(message)
    } catch (err) {
      return Promise.reject(err)
    }

    const target = describeMessage(message)
    const next = this.tail.then(() => writeFrame(this.input, frame, target))
    // Keep the chain alive past a failed write; the caller sees the rejection
    this.tail = next.catch(() => undefined)
    return next
  }
}
