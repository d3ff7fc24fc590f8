/**
 * JSON-RPC 2.0 message shapes carried by the framing layer.
 *
 * @module
 */

export type MessageId = number | string

/**
 * JSON-RPC error object.
 */
export interface ResponseErrorObject {
  readonly code: number
  readonly message: string
  readonly data?: unknown
}

export interface RequestMessage {
  readonly jsonrpc: '2.0'
  readonly id: MessageId
  readonly method: string
  readonly params?: unknown
}

export interface NotificationMessage {
  readonly jsonrpc: '2.0'
  readonly method: string
  readonly params?: unknown
}

export interface ResponseMessage {
  readonly jsonrpc: '2.0'
  readonly id: MessageId | null
  readonly result?: unknown
  readonly error?: ResponseErrorObject
}

export type Message = RequestMessage | NotificationMessage | ResponseMessage

/**
 * Result of classifying a decoded frame body.
 * `unknown` covers bodies that fit none of the three variants (e.g. `{}`).
 */
export type ClassifiedMessage =
  | { readonly kind: 'request'; readonly message: RequestMessage }
  | { readonly kind: 'notification'; readonly message: NotificationMessage }
  | { readonly kind: 'response'; readonly message: ResponseMessage }
  | { readonly kind: 'unknown'; readonly message: unknown }

/** Standard JSON-RPC error codes used by the client. */
export const ErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603
} as const

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isMessageId(value: unknown): value is MessageId {
  return (typeof value === 'number' && Number.isInteger(value)) || typeof value === 'string'
}

function isErrorObject(value: unknown): value is ResponseErrorObject {
  return isPlainObject(value) && typeof value.code === 'number' && typeof value.message === 'string'
}

/**
 * Sort a decoded body into request, notification, response or unknown.
 *
 * Presence of `method` decides between request/notification; a frame with
 * `id` and no `method` is a response when it carries `result` or a valid
 * `error`.
 */
export function classifyMessage(body: unknown): ClassifiedMessage {
  if (!isPlainObject(body)) {
    return { kind: 'unknown', message: body }
  }

  const { id, method } = body
  if (typeof method === 'string') {
    if (isMessageId(id)) {
      return {
        kind: 'request',
        message: { jsonrpc: '2.0', id, method, ...('params' in body && { params: body.params }) }
      }
    }
    if (id === undefined) {
      return {
        kind: 'notification',
        message: { jsonrpc: '2.0', method, ...('params' in body && { params: body.params }) }
      }
    }
    return { kind: 'unknown', message: body }
  }

  if ((isMessageId(id) || id === null) && ('result' in body || isErrorObject(body.error))) {
    return {
      kind: 'response',
      message: {
        jsonrpc: '2.0',
        id,
        ...('result' in body && { result: body.result }),
        ...(isErrorObject(body.error) && { error: body.error })
      }
    }
  }

  return { kind: 'unknown', message: body }
}
