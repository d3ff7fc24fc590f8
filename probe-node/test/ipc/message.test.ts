import { describe, expect, it } from 'vitest'
import { classifyMessage, ErrorCodes } from '../../src/ipc/message.js'

describe('classifyMessage', () => {
  it('classifies a request by method and id', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 3, method: 'workspace/configuration', params: {} }))
      .toEqual({
        kind: 'request',
        message: { jsonrpc: '2.0', id: 3, method: 'workspace/configuration', params: {} }
      })
  })

  it('accepts string ids on requests', () => {
    const classified = classifyMessage({ jsonrpc: '2.0', id: 'abc', method: 'x' })
    expect(classified).toEqual({
      kind: 'request',
      message: { jsonrpc: '2.0', id: 'abc', method: 'x' }
    })
  })

  it('classifies a notification by method without id', () => {
    expect(classifyMessage({ jsonrpc: '2.0', method: 'window/logMessage', params: { type: 3 } }))
      .toEqual({
        kind: 'notification',
        message: { jsonrpc: '2.0', method: 'window/logMessage', params: { type: 3 } }
      })
  })

  it('omits params when the frame has none', () => {
    const classified = classifyMessage({ jsonrpc: '2.0', method: 'exit' })
    expect(classified.kind).toBe('notification')
    expect(classified.message).not.toHaveProperty('params')
  })

  it('classifies a success response', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 1, result: { capabilities: {} } })).toEqual({
      kind: 'response',
      message: { jsonrpc: '2.0', id: 1, result: { capabilities: {} } }
    })
  })

  it('classifies a null result as a response', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 2, result: null }).kind).toBe('response')
  })

  it('classifies an error response, including a null id', () => {
    const error = { code: ErrorCodes.ParseError, message: 'Parse error' }
    expect(classifyMessage({ jsonrpc: '2.0', id: null, error })).toEqual({
      kind: 'response',
      message: { jsonrpc: '2.0', id: null, error }
    })
  })

  it('does not treat a malformed error object as a response', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 1, error: 'boom' }).kind).toBe('unknown')
  })

  it('does not treat a fractional id as a request', () => {
    expect(classifyMessage({ jsonrpc: '2.0', id: 1.5, method: 'x' }).kind).toBe('unknown')
  })

  it('classifies an empty object as unknown', () => {
    expect(classifyMessage({})).toEqual({ kind: 'unknown', message: {} })
  })

  it('classifies non-objects as unknown', () => {
    expect(classifyMessage([1, 2]).kind).toBe('unknown')
    expect(classifyMessage('text').kind).toBe('unknown')
    expect(classifyMessage(null).kind).toBe('unknown')
  })
})

describe('ErrorCodes', () => {
  it('uses the JSON-RPC reserved codes', () => {
    expect(ErrorCodes.MethodNotFound).toBe(-32601)
    expect(ErrorCodes.InternalError).toBe(-32603)
  })
})
