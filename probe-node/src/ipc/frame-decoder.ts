/**
 * FrameDecoder: incremental decoder for `Content-Length` framed messages.
 *
 * Bytes are pushed as they arrive on the server's stdout. Every complete
 * frame comes back as a {@link DecodeResult}; incomplete data stays
 * buffered until the next push. Exactly the declared number of body bytes is
 * consumed for each frame, including frames whose body fails to parse, so
 * one bad frame never shifts the position of the next one.
 *
 * A header block that cannot be parsed (stray log output on stdout, a bad
 * `Content-Length`) is reported once; the decoder then skips ahead to the
 * next line starting with `Content-Length:` and resumes there.
 *
 * @module
 */
import { DecodingError, FramingError } from '../errors.js'
import {
  CONTENT_LENGTH_HEADER,
  decodeBody,
  HEADER_TERMINATOR,
  MAX_HEADER_SIZE,
  parseHeaderBlock
} from './frame.js'

/**
 * Outcome of decoding one frame.
 */
export type DecodeResult =
  | { readonly ok: true; readonly message: unknown }
  | { readonly ok: false; readonly error: FramingError | DecodingError }

const TERMINATOR_SIZE = HEADER_TERMINATOR.length
const HEADER_PREFIX = `${CONTENT_LENGTH_HEADER}:`
const LINE_FEED = 0x0a

function readContentLength(block: string): number | FramingError {
  try {
    return parseHeaderBlock(block)
  } catch (err) {
    if (err instanceof FramingError) return err
    throw err
  }
}

/**
 * Offset of the first `Content-Length:` that begins a line, or -1.
 * Offset 0 only counts when the buffer itself starts at a line boundary.
 */
function findHeaderLine(buffer: Buffer, atLineStart: boolean): number {
  let from = 0
  for (;;) {
    const index = buffer.indexOf(HEADER_PREFIX, from, 'ascii')
    if (index === -1) return -1
    if (index === 0 ? atLineStart : buffer[index - 1] === LINE_FEED) return index
    from = index + 1
  }
}

export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0)
  /** Body length of the frame whose header has been read, or null while reading a header. */
  private bodyLength: number | null = null
  /** Skipping bytes until the next `Content-Length:` line. */
  private resyncing = false
  /** Whether `buffer[0]` starts a line; only tracked while resyncing. */
  private atLineStart = false
  /** A header error was reported and no header has parsed since. */
  private desyncReported = false

  /**
   * Number of bytes held back waiting for the rest of a frame.
   */
  get buffered(): number {
    return this.buffer.length
  }

  /**
   * Append a chunk and return every frame it completes, in stream order.
   */
  push(chunk: Buffer): DecodeResult[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk])
    const results: DecodeResult[] = []

    for (;;) {
      let bodyLength = this.bodyLength
      if (bodyLength === null) {
        if (this.resyncing && !this.resync()) {
          return results
        }

        const headerEnd = this.buffer.indexOf(HEADER_TERMINATOR)
        if (headerEnd === -1) {
          if (this.buffer.length > MAX_HEADER_SIZE) {
            this.fail(new FramingError(`header block exceeds ${MAX_HEADER_SIZE} bytes`), results)
            continue
          }
          return results
        }

        const parsed =
          headerEnd + TERMINATOR_SIZE > MAX_HEADER_SIZE
            ? new FramingError(`header block exceeds ${MAX_HEADER_SIZE} bytes`)
            : readContentLength(this.buffer.subarray(0, headerEnd).toString('ascii'))
        if (parsed instanceof FramingError) {
          this.fail(parsed, results)
          continue
        }

        this.buffer = this.buffer.subarray(headerEnd + TERMINATOR_SIZE)
        this.desyncReported = false
        bodyLength = parsed
        this.bodyLength = parsed
      }

      if (this.buffer.length < bodyLength) {
        // Incomplete body, wait for more data
        return results
      }

      const raw = this.buffer.subarray(0, bodyLength)
      this.buffer = this.buffer.subarray(bodyLength)
      this.bodyLength = null

      try {
        results.push({ ok: true, message: decodeBody(raw) })
      } catch (err) {
        if (!(err instanceof DecodingError)) throw err
        results.push({ ok: false, error: err })
      }
    }
  }

  /**
   * Signal end-of-input. Any partially received frame is reported as a
   * truncated-frame {@link FramingError}.
   */
  end(): DecodeResult[] {
    const results: DecodeResult[] = []

    if (this.bodyLength !== null) {
      results.push({
        ok: false,
        error: new FramingError(
          `truncated frame: expected ${this.bodyLength} body bytes, stream ended after ${this.buffer.length}`
        )
      })
    } else if (this.buffer.length > 0 && !this.resyncing) {
      results.push({
        ok: false,
        error: new FramingError(
          `truncated header: stream ended with ${this.buffer.length} unterminated header bytes`
        )
      })
    }

    this.buffer = Buffer.alloc(0)
    this.bodyLength = null
    this.resyncing = false
    this.atLineStart = false
    this.desyncReported = false
    return results
  }

  /**
   * Report a header error (once per desync) and start skipping from the
   * current position. The bytes at offset 0 are treated as mid-line so the
   * failed header itself is never matched again.
   */
  private fail(error: FramingError, results: DecodeResult[]): void {
    if (!this.desyncReported) {
      results.push({ ok: false, error })
      this.desyncReported = true
    }
    this.resyncing = true
    this.atLineStart = false
  }

  /**
   * Drop bytes up to the next `Content-Length:` line.
   *
   * @returns true once the buffer starts at such a line
   */
  private resync(): boolean {
    const start = findHeaderLine(this.buffer, this.atLineStart)
    if (start !== -1) {
      this.buffer = this.buffer.subarray(start)
      this.resyncing = false
      return true
    }

    const lastLineFeed = this.buffer.lastIndexOf(LINE_FEED)
    if (lastLineFeed !== -1) {
      this.buffer = this.buffer.subarray(lastLineFeed + 1)
      this.atLineStart = true
    }
    // Keep a line start that may still grow into a header, drop anything else
    const partial = this.buffer.toString('ascii')
    if (!(this.atLineStart && HEADER_PREFIX.startsWith(partial))) {
      this.buffer = Buffer.alloc(0)
      this.atLineStart = false
    }
    return false
  }
}
