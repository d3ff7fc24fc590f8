import { afterEach, describe, expect, it } from 'vitest'
import {
  completion,
  defaultInitializeParams,
  didChange,
  didClose,
  didOpen,
  initialize
} from '../../src/client/lsp.js'
import { ProtocolClient } from '../../src/client/protocol-client.js'
import { ProbeError } from '../../src/errors.js'
import { silentLogger } from '../../src/logger.js'
import { FakeSession } from '../_harness/fake-session.js'

const clients: ProtocolClient[] = []

afterEach(async () => {
  await Promise.all(clients.splice(0).map((c) => c.close()))
})

function setup() {
  const session = new FakeSession()
  const client = new ProtocolClient({ logger: silentLogger, shutdownTimeoutMs: 50, killGraceMs: 20 })
  client.start(session)
  clients.push(client)
  return { client, session }
}

async function initialized() {
  const ctx = setup()
  ctx.session.respond('initialize', () => ({ capabilities: { completionProvider: {} } }))
  await initialize(ctx.client)
  await ctx.session.nextMessage()
  await ctx.session.nextMessage()
  return ctx
}

describe('defaultInitializeParams', () => {
  it('advertises snippet completion support', () => {
    const params = defaultInitializeParams({ name: 'probe-test', version: '1.0.0' })

    expect(params).toEqual({
      processId: process.pid,
      clientInfo: { name: 'probe-test', version: '1.0.0' },
      rootUri: null,
      capabilities: {
        textDocument: { completion: { completionItem: { snippetSupport: true } } }
      },
      workspaceFolders: null
    })
  })
})

describe('initialize', () => {
  it('sends initialize then initialized and returns the result', async () => {
    const { client, session } = setup()
    session.respond('initialize', () => ({
      capabilities: { completionProvider: {} },
      serverInfo: { name: 'fake-server' }
    }))

    const result = await initialize(client)

    expect(result).toEqual({
      capabilities: { completionProvider: {} },
      serverInfo: { name: 'fake-server' }
    })
    expect(client.state).toBe('ready')

    const first = await session.nextMessage()
    expect(first.method).toBe('initialize')
    expect(first.params).toEqual(defaultInitializeParams())
    await expect(session.nextMessage()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'initialized',
      params: {}
    })
  })

  it('rejects a result without capabilities', async () => {
    const { client, session } = setup()
    session.respond('initialize', () => ({ serverInfo: { name: 'broken' } }))

    await expect(initialize(client)).rejects.toBeInstanceOf(ProbeError)
    expect(session.received.map((m) => m.method)).toEqual(['initialize'])
  })
})

describe('text document notifications', () => {
  it('sends didOpen, didChange and didClose', async () => {
    const { client, session } = await initialized()
    const uri = 'file:///tmp/main.txt'

    await didOpen(client, { uri, languageId: 'plaintext', version: 1, text: 'hel' })
    await didChange(client, uri, 2, 'hello')
    await didClose(client, uri)

    await expect(session.nextMessage()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'textDocument/didOpen',
      params: { textDocument: { uri, languageId: 'plaintext', version: 1, text: 'hel' } }
    })
    await expect(session.nextMessage()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'textDocument/didChange',
      params: { textDocument: { uri, version: 2 }, contentChanges: [{ text: 'hello' }] }
    })
    await expect(session.nextMessage()).resolves.toEqual({
      jsonrpc: '2.0',
      method: 'textDocument/didClose',
      params: { textDocument: { uri } }
    })
  })
})

describe('completion', () => {
  const uri = 'file:///tmp/main.txt'
  const position = { line: 0, character: 3 }

  it('sends an invoked completion request', async () => {
    const { client, session } = await initialized()
    session.respond('textDocument/completion', () => null)

    await completion(client, uri, position)

    const request = await session.nextMessage()
    expect(request.params).toEqual({
      textDocument: { uri },
      position,
      context: { triggerKind: 1 }
    })
  })

  it('wraps an item array in a complete list', async () => {
    const { client, session } = await initialized()
    session.respond('textDocument/completion', () => [{ label: 'hello' }, { label: 'help' }])

    await expect(completion(client, uri, position)).resolves.toEqual({
      isIncomplete: false,
      items: [{ label: 'hello' }, { label: 'help' }]
    })
  })

  it('keeps the incomplete flag of a list', async () => {
    const { client, session } = await initialized()
    session.respond('textDocument/completion', () => ({
      isIncomplete: true,
      items: [{ label: 'hello', kind: 1 }]
    }))

    await expect(completion(client, uri, position)).resolves.toEqual({
      isIncomplete: true,
      items: [{ label: 'hello', kind: 1 }]
    })
  })

  it('drops entries without a label', async () => {
    const { client, session } = await initialized()
    session.respond('textDocument/completion', () => [{ label: 'ok' }, { insertText: 'x' }, 3])

    await expect(completion(client, uri, position)).resolves.toEqual({
      isIncomplete: false,
      items: [{ label: 'ok' }]
    })
  })

  it('treats a null result as an empty list', async () => {
    const { client, session } = await initialized()
    session.respond('textDocument/completion', () => null)

    await expect(completion(client, uri, position)).resolves.toEqual({
      isIncomplete: false,
      items: []
    })
  })
})
