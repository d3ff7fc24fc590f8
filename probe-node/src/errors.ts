/**
 * Error taxonomy for the probe transport.
 *
 * Launch and premature-exit errors are fatal to session startup. Timeout and
 * process-exit errors are outcomes a caller branches on. Framing and decoding
 * errors describe a single frame; the decoder stays aligned after them.
 *
 * @module
 */

/**
 * Base class for every error raised by the probe.
 */
export class ProbeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProbeError'
  }
}

/**
 * The executable could not be spawned (missing binary, permissions).
 */
export class LaunchError extends ProbeError {
  constructor(
    public readonly file: string,
    public readonly code: string | undefined,
    cause: unknown
  ) {
    super(`Failed to launch "${file}": ${errorMessage(cause)}`, { cause })
    this.name = 'LaunchError'
  }
}

/**
 * The process exited during the startup grace period.
 */
export class PrematureExitError extends ProbeError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderrTail: readonly string[] = []
  ) {
    const reason = exitCode !== null ? `exit code ${exitCode}` : `signal ${signal ?? 'unknown'}`
    const tail = stderrTail.length > 0 ? `\n${stderrTail.join('\n')}` : ''
    super(`Server exited during startup with ${reason}${tail}`)
    this.name = 'PrematureExitError'
  }
}

/**
 * Malformed or truncated header block.
 */
export class FramingError extends ProbeError {
  constructor(reason: string) {
    super(`Framing error: ${reason}`)
    this.name = 'FramingError'
  }
}

/**
 * A frame body that is not valid JSON. The raw bytes are kept for diagnostics.
 */
export class DecodingError extends ProbeError {
  constructor(
    public readonly raw: Buffer,
    cause: unknown
  ) {
    super(`Failed to decode message body (${raw.length} bytes): ${errorMessage(cause)}`, { cause })
    this.name = 'DecodingError'
  }
}

/**
 * An outgoing message could not be serialized.
 */
export class EncodingError extends ProbeError {
  constructor(cause: unknown) {
    super(`Failed to encode message: ${errorMessage(cause)}`, { cause })
    this.name = 'EncodingError'
  }
}

/**
 * No matching response arrived within the call's budget.
 */
export class TimeoutError extends ProbeError {
  constructor(
    public readonly method: string,
    public readonly id: number,
    public readonly elapsedMs: number
  ) {
    super(`Request "${method}" (id ${id}) timed out after ${elapsedMs}ms`)
    this.name = 'TimeoutError'
  }
}

/**
 * The session ended while a call was pending, or before it could be sent.
 */
export class ProcessExitedError extends ProbeError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null
  ) {
    const reason =
      exitCode === null && signal === null
        ? 'session closed'
        : exitCode !== null
          ? `exit code ${exitCode}`
          : `signal ${signal}`
    super(`Server process exited (${reason})`)
    this.name = 'ProcessExitedError'
  }
}

/**
 * The server answered with a JSON-RPC error object.
 */
export class ResponseError extends ProbeError {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown
  ) {
    super(message)
    this.name = 'ResponseError'
  }
}

/**
 * A send was refused by the client lifecycle.
 */
export class ClientStateError extends ProbeError {
  constructor(
    public readonly state: string,
    public readonly method: string
  ) {
    super(`Cannot send "${method}" while client is ${state}`)
    this.name = 'ClientStateError'
  }
}

export type StreamClosedReason = 'destroyed' | 'ended' | 'closed' | 'errored'

/**
 * A frame could not be written because the server's stdin is gone.
 * `target` names what was being sent, e.g. `request "initialize"`.
 */
export class StreamClosedError extends ProbeError {
  constructor(
    public readonly reason: StreamClosedReason,
    public readonly target: string,
    cause?: unknown
  ) {
    const detail = cause === undefined ? '' : `: ${errorMessage(cause)}`
    super(`Cannot write ${target}: server stdin ${reason}${detail}`, { cause })
    this.name = 'StreamClosedError'
  }
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
