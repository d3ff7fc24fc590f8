/**
 * ProtocolClient: JSON-RPC request/response correlation over a session.
 *
 * Lifecycle (gates what the client sends, never what it accepts):
 *   uninitialized → initializing → ready → shutting_down → closed
 *
 * - start(session) attaches the stdout reader: uninitialized → initializing
 * - a successful `initialize` response: initializing → ready
 * - sending `shutdown`: ready → shutting_down
 * - session exit or close(): any → closed
 *
 * Responses are matched to pending calls by id, never by arrival order.
 * Everything else the server sends (notifications, server requests, late
 * responses for abandoned ids, unclassifiable frames) is a server event and
 * goes to the observer. Each call owns one timer, armed when it is sent, so
 * a stream of interleaved frames cannot extend its budget.
 *
 * Invariants:
 * - ids are strictly increasing from 1 and never reused within an instance
 * - a timed-out call leaves the session usable
 * - when the session ends, every pending call rejects with ProcessExitedError
 *
 * @module
 */
import { DEFAULT_CONFIG, type ProbeConfig, resolveProbeConfig } from '../config.js'
import {
  ClientStateError,
  type DecodingError,
  errorMessage,
  type FramingError,
  ProcessExitedError,
  ResponseError,
  TimeoutError
} from '../errors.js'
import { type DecodeResult, FrameDecoder } from '../ipc/frame-decoder.js'
import { FrameWriter } from '../ipc/frame-writer.js'
import {
  classifyMessage,
  ErrorCodes,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage
} from '../ipc/message.js'
import { createLogger, type Logger } from '../logger.js'
import {
  type ExitInfo,
  ProcessSession,
  type SessionCommand,
  type SessionHandle,
  type SessionOptions
} from '../process/session.js'
import { raceTimeout } from '../timers.js'

export type ClientState = 'uninitialized' | 'initializing' | 'ready' | 'shutting_down' | 'closed'

/**
 * Anything received from the server that is not the reply to a pending call.
 */
export type ServerEvent =
  | { readonly kind: 'notification'; readonly message: NotificationMessage }
  | { readonly kind: 'request'; readonly message: RequestMessage }
  | { readonly kind: 'unmatched_response'; readonly message: ResponseMessage }
  | { readonly kind: 'unknown'; readonly message: unknown }
  | { readonly kind: 'protocol_error'; readonly error: FramingError | DecodingError }

/**
 * Answers a server-to-client request. Throw a ResponseError to reply with a
 * specific JSON-RPC error.
 */
export type ServerRequestHandler = (request: RequestMessage) => unknown

export type TraceDirection = 'send' | 'receive'

/**
 * Method names driving the lifecycle. Defaults are the LSP ones.
 */
export interface LifecycleMethods {
  readonly initialize: string
  readonly shutdown: string
  readonly exit: string
}

export const LSP_LIFECYCLE: LifecycleMethods = {
  initialize: 'initialize',
  shutdown: 'shutdown',
  exit: 'exit'
}

export interface ProtocolClientOptions {
  /** Default budget for call() (default 5000ms). */
  readonly callTimeoutMs?: number
  /** Budget for the shutdown request sent by close() (default 2000ms). */
  readonly shutdownTimeoutMs?: number
  /** Wait for a voluntary exit, then SIGTERM → SIGKILL grace (default 2000ms). */
  readonly killGraceMs?: number
  /** Refuse sends the current state does not allow (default true). */
  readonly enforceLifecycle?: boolean
  readonly lifecycle?: Partial<LifecycleMethods>
  readonly onServerEvent?: (event: ServerEvent) => void
  readonly serverRequestHandler?: ServerRequestHandler
  /** Sees every message sent and every decoded message received. */
  readonly onTrace?: (direction: TraceDirection, message: unknown) => void
  readonly logger?: Logger
}

export interface CallOptions {
  readonly timeoutMs?: number
}

export interface SpawnClientOptions extends ProtocolClientOptions, SessionOptions {
  /** Defaults to configuration resolved from the environment. */
  readonly config?: ProbeConfig
}

interface PendingCall {
  readonly id: number
  readonly method: string
  readonly startedAt: number
  readonly timer: NodeJS.Timeout
  readonly resolve: (result: unknown) => void
  readonly reject: (err: Error) => void
}

/** How long stdout may keep delivering buffered frames after the process exits. */
const DRAIN_WINDOW_MS = 100

export class ProtocolClient {
  private stateValue: ClientState = 'uninitialized'
  private nextId = 1
  private readonly pending = new Map<number, PendingCall>()
  private readonly decoder = new FrameDecoder()
  private session: SessionHandle | null = null
  private writer: FrameWriter | null = null
  private exitInfo: ExitInfo | null = null
  private closing: Promise<void> | null = null
  private resolveStdoutEnded: () => void = () => undefined
  private readonly stdoutEnded: Promise<void>

  private readonly callTimeoutMs: number
  private readonly shutdownTimeoutMs: number
  private readonly killGraceMs: number
  private readonly enforceLifecycle: boolean
  private readonly lifecycle: LifecycleMethods
  private readonly logger: Logger

  constructor(private readonly options: ProtocolClientOptions = {}) {
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CONFIG.callTimeoutMs
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_CONFIG.shutdownTimeoutMs
    this.killGraceMs = options.killGraceMs ?? DEFAULT_CONFIG.killGraceMs
    this.enforceLifecycle = options.enforceLifecycle ?? true
    this.lifecycle = { ...LSP_LIFECYCLE, ...options.lifecycle }
    this.logger = options.logger ?? createLogger(DEFAULT_CONFIG.logLevel)
    this.stdoutEnded = new Promise((resolve) => {
      this.resolveStdoutEnded = () => resolve()
    })
  }

  /**
   * Spawn a server process and attach a client to it.
   *
   * Options given here override the environment configuration.
   *
   * @throws LaunchError if the server cannot be spawned
   * @throws PrematureExitError if it exits during the startup grace period
   */
  static async spawn(
    command: SessionCommand,
    options: SpawnClientOptions = {}
  ): Promise<ProtocolClient> {
    const config = options.config ?? resolveProbeConfig()
    const logger = options.logger ?? createLogger(config.logLevel)
    const session = await ProcessSession.start(command, {
      startupGraceMs: options.startupGraceMs ?? config.startupGraceMs,
      stderr: options.stderr,
      logger
    })
    const client = new ProtocolClient({
      ...options,
      callTimeoutMs: options.callTimeoutMs ?? config.callTimeoutMs,
      shutdownTimeoutMs: options.shutdownTimeoutMs ?? config.shutdownTimeoutMs,
      killGraceMs: options.killGraceMs ?? config.killGraceMs,
      logger
    })
    client.start(session)
    return client
  }

  get state(): ClientState {
    return this.stateValue
  }

  /** Number of calls awaiting a response. */
  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Attach to a running session and begin reading its stdout.
   *
   * @throws ClientStateError if the client was already started
   */
  start(session: SessionHandle): void {
    if (this.stateValue !== 'uninitialized') {
      throw new ClientStateError(this.stateValue, 'start')
    }
    this.session = session
    this.writer = new FrameWriter(session.stdin)
    this.stateValue = 'initializing'

    session.stdout.on('data', this.onData)
    session.stdout.on('end', this.onEnd)
    session.stdout.on('error', this.onStdoutError)
    void session.exited.then(this.onSessionExit)
  }

  /**
   * Send a request and wait for its response.
   *
   * @returns the response's `result`
   * @throws ResponseError if the server answered with an error object
   * @throws TimeoutError if no response arrived within the budget
   * @throws ProcessExitedError if the session ended first
   * @throws ClientStateError if the lifecycle does not allow this request
   * @throws EncodingError if params cannot be serialized
   */
  async call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    const writer = this.requireWritable('request', method)
    const timeoutMs = options.timeoutMs ?? this.callTimeoutMs
    const id = this.nextId++
    const message: RequestMessage = {
      jsonrpc: '2.0',
      id,
      method,
      ...(params !== undefined && { params })
    }

    const response = new Promise<unknown>((resolve, reject) => {
      const startedAt = Date.now()
      const timer = setTimeout(() => {
        this.pending.delete(id)
        reject(new TimeoutError(method, id, Date.now() - startedAt))
      }, timeoutMs)
      this.pending.set(id, { id, method, startedAt, timer, resolve, reject })
    })

    if (method === this.lifecycle.shutdown && this.stateValue === 'ready') {
      this.stateValue = 'shutting_down'
    }

    this.trace('send', message)
    writer.write(message).catch((err: unknown) => {
      this.rejectPending(id, err instanceof Error ? err : new Error(String(err)))
    })

    return response
  }

  /**
   * Send a notification. No response is expected.
   *
   * @throws ClientStateError if the lifecycle does not allow this notification
   * @throws ProcessExitedError if the session has ended
   */
  async notify(method: string, params?: unknown): Promise<void> {
    const writer = this.requireWritable('notification', method)
    const message: NotificationMessage = {
      jsonrpc: '2.0',
      method,
      ...(params !== undefined && { params })
    }
    this.trace('send', message)
    await writer.write(message)
  }

  /**
   * Shut the server down cooperatively, then terminate the session.
   *
   * Sends `shutdown` (bounded by shutdownTimeoutMs) when the client is ready,
   * and `exit` when it is ready or already shutting down, gives the server
   * killGraceMs to leave on its own, then terminates it. Calls still pending
   * at that point are rejected with ProcessExitedError once the process is
   * gone. Never throws; failures are logged. Safe to call twice.
   */
  close(): Promise<void> {
    if (this.closing === null) {
      this.closing = this.runClose()
    }
    return this.closing
  }

  private async runClose(): Promise<void> {
    const session = this.session
    if (session === null) {
      this.stateValue = 'closed'
      return
    }

    const state = this.stateValue
    if ((state === 'ready' || state === 'shutting_down') && session.isAlive()) {
      // A caller that already sent shutdown is owed only the exit notification
      if (state === 'ready') {
        try {
          await this.call(this.lifecycle.shutdown, undefined, { timeoutMs: this.shutdownTimeoutMs })
        } catch (err) {
          this.logger.warn(`shutdown request failed: ${errorMessage(err)}`)
        }
      }
      if (session.isAlive()) {
        try {
          await this.notify(this.lifecycle.exit)
        } catch (err) {
          this.logger.warn(`exit notification failed: ${errorMessage(err)}`)
        }
        await raceTimeout(session.exited, this.killGraceMs)
      }
    }

    // Calls still pending end with the session, not on their own timers
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer)
    }

    let info: ExitInfo | null = this.exitInfo
    try {
      info = await session.terminate(this.killGraceMs)
    } catch (err) {
      this.logger.warn(`terminating server failed: ${errorMessage(err)}`)
    }
    this.finish(info)
  }

  /**
   * Return the writer if `method` may be sent now.
   */
  private requireWritable(kind: 'request' | 'notification', method: string): FrameWriter {
    const state = this.stateValue
    if (this.writer === null || state === 'uninitialized' || state === 'closed') {
      throw new ClientStateError(state, method)
    }
    if (this.session === null || !this.session.isAlive()) {
      throw new ProcessExitedError(this.exitInfo?.code ?? null, this.exitInfo?.signal ?? null)
    }
    if (this.enforceLifecycle && !this.allows(kind, method)) {
      throw new ClientStateError(state, method)
    }
    return this.writer
  }

  private allows(kind: 'request' | 'notification', method: string): boolean {
    const { initialize, exit } = this.lifecycle
    switch (this.stateValue) {
      case 'initializing':
        return kind === 'request' ? method === initialize : method === exit
      case 'ready':
        return !(kind === 'request' && method === initialize)
      case 'shutting_down':
        return kind === 'notification' && method === exit
      default:
        return false
    }
  }

  private readonly onData = (chunk: Buffer): void => {
    for (const result of this.decoder.push(chunk)) {
      this.dispatch(result)
    }
  }

  private readonly onEnd = (): void => {
    for (const result of this.decoder.end()) {
      this.dispatch(result)
    }
    this.resolveStdoutEnded()
  }

  private readonly onStdoutError = (err: Error): void => {
    this.logger.warn(`server stdout error: ${err.message}`)
  }

  private readonly onSessionExit = async (info: ExitInfo): Promise<void> => {
    this.exitInfo = info
    // Frames already written by the server may still be in the pipe
    await raceTimeout(this.stdoutEnded, DRAIN_WINDOW_MS)
    this.finish(info)
  }

  private dispatch(result: DecodeResult): void {
    if (!result.ok) {
      this.onFrameError(result.error)
      return
    }

    this.trace('receive', result.message)
    const classified = classifyMessage(result.message)

    switch (classified.kind) {
      case 'response':
        this.onResponse(classified.message)
        return
      case 'notification':
        this.emit({ kind: 'notification', message: classified.message })
        return
      case 'request':
        this.emit({ kind: 'request', message: classified.message })
        void this.answerServerRequest(classified.message)
        return
      case 'unknown':
        this.logger.debug('received a frame that is not a JSON-RPC message')
        this.emit({ kind: 'unknown', message: classified.message })
    }
  }

  private onResponse(message: ResponseMessage): void {
    const entry = typeof message.id === 'number' ? this.pending.get(message.id) : undefined
    if (entry === undefined) {
      this.logger.debug(`discarding response for unknown id ${String(message.id)}`)
      this.emit({ kind: 'unmatched_response', message })
      return
    }

    this.pending.delete(entry.id)
    clearTimeout(entry.timer)

    if (message.error !== undefined) {
      entry.reject(new ResponseError(message.error.code, message.error.message, message.error.data))
      return
    }

    if (entry.method === this.lifecycle.initialize && this.stateValue === 'initializing') {
      this.stateValue = 'ready'
    }
    entry.resolve(message.result)
  }

  /**
   * A frame failed to decode. Servers in scope answer in order, so the
   * error belongs to the oldest pending call; with none pending it becomes
   * a server event.
   */
  private onFrameError(error: FramingError | DecodingError): void {
    this.logger.warn(error.message)
    const oldest = this.pending.values().next()
    if (oldest.done) {
      this.emit({ kind: 'protocol_error', error })
      return
    }
    this.rejectPending(oldest.value.id, error)
  }

  private async answerServerRequest(request: RequestMessage): Promise<void> {
    let reply: ResponseMessage
    const handler = this.options.serverRequestHandler
    if (handler === undefined) {
      reply = {
        jsonrpc: '2.0',
        id: request.id,
        error: { code: ErrorCodes.MethodNotFound, message: `Unhandled method ${request.method}` }
      }
    } else {
      try {
        const result = await handler(request)
        reply = { jsonrpc: '2.0', id: request.id, result: result ?? null }
      } catch (err) {
        reply = {
          jsonrpc: '2.0',
          id: request.id,
          error:
            err instanceof ResponseError
              ? { code: err.code, message: err.message, data: err.data }
              : { code: ErrorCodes.InternalError, message: errorMessage(err) }
        }
      }
    }

    if (this.writer === null || this.session === null || !this.session.isAlive()) {
      return
    }
    this.trace('send', reply)
    try {
      await this.writer.write(reply)
    } catch (err) {
      this.logger.warn(`failed to answer server request "${request.method}": ${errorMessage(err)}`)
    }
  }

  private rejectPending(id: number, err: Error): void {
    const entry = this.pending.get(id)
    if (entry === undefined) return
    this.pending.delete(id)
    clearTimeout(entry.timer)
    entry.reject(err)
  }

  /**
   * Enter the closed state and fail whatever is still pending.
   */
  private finish(info: ExitInfo | null): void {
    if (this.stateValue === 'closed') return
    this.stateValue = 'closed'

    const error = new ProcessExitedError(info?.code ?? null, info?.signal ?? null)
    for (const entry of this.pending.values()) {
      clearTimeout(entry.timer)
      entry.reject(error)
    }
    this.pending.clear()

    const stdout = this.session?.stdout
    if (stdout !== undefined) {
      stdout.off('data', this.onData)
      stdout.off('end', this.onEnd)
      // Keep draining so a server still writing never blocks on a full pipe
      stdout.resume()
    }
  }

  private emit(event: ServerEvent): void {
    const observer = this.options.onServerEvent
    if (observer === undefined) return
    try {
      observer(event)
    } catch (err) {
      this.logger.warn(`server event observer failed: ${errorMessage(err)}`)
    }
  }

  private trace(direction: TraceDirection, message: unknown): void {
    const onTrace = this.options.onTrace
    if (onTrace === undefined) return
    try {
      onTrace(direction, message)
    } catch (err) {
      this.logger.warn(`trace hook failed: ${errorMessage(err)}`)
    }
  }
}
