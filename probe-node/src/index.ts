/**
 * lsp-probe
 *
 * Drives a Language Server Protocol server over stdio and observes it:
 * framing, request/response correlation, stderr monitoring and process
 * lifecycle.
 *
 * @packageDocumentation
 */

// Client
export {
  type CallOptions,
  type ClientState,
  type LifecycleMethods,
  LSP_LIFECYCLE,
  ProtocolClient,
  type ProtocolClientOptions,
  type ServerEvent,
  type ServerRequestHandler,
  type SpawnClientOptions,
  type TraceDirection
} from './client/protocol-client.js'
export {
  type ClientInfo,
  completion,
  defaultInitializeParams,
  didChange,
  didClose,
  didOpen,
  initialize
} from './client/lsp.js'

// Configuration and logging
export { DEFAULT_CONFIG, type ProbeConfig, resolveProbeConfig } from './config.js'
export { createLogger, type Logger, type LogLevel, silentLogger } from './logger.js'

// Errors
export {
  ClientStateError,
  DecodingError,
  EncodingError,
  errorMessage,
  FramingError,
  LaunchError,
  PrematureExitError,
  ProbeError,
  ProcessExitedError,
  ResponseError,
  StreamClosedError,
  type StreamClosedReason,
  TimeoutError
} from './errors.js'

// Framing (re-export for advanced usage)
export {
  type ClassifiedMessage,
  classifyMessage,
  CONTENT_LENGTH_HEADER,
  type DecodeResult,
  decodeBody,
  encodeFrame,
  encodeMessage,
  ErrorCodes,
  FrameDecoder,
  FrameWriter,
  MAX_HEADER_SIZE,
  type Message,
  type MessageId,
  type NotificationMessage,
  parseHeaderBlock,
  type RequestMessage,
  type ResponseErrorObject,
  type ResponseMessage
} from './ipc/index.js'

// Process
export {
  type ExitInfo,
  ProcessSession,
  type SessionCommand,
  type SessionHandle,
  type SessionOptions,
  type SessionState
} from './process/session.js'
export {
  DEFAULT_STDERR_RULES,
  keywordClassifier,
  type StderrClassifier,
  type StderrEvent,
  StderrMonitor,
  type StderrMonitorOptions,
  type StderrObserver,
  type StderrRule,
  StderrTally
} from './process/stderr-monitor.js'
