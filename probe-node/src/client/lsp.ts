/**
 * Typed LSP conveniences over ProtocolClient.
 *
 * These only shape messages; they make no assumption about how a
 * particular server ranks or filters anything.
 *
 * @module
 */
import type {
  CompletionItem,
  CompletionList,
  InitializeParams,
  InitializeResult,
  Position,
  TextDocumentItem
} from 'vscode-languageserver-protocol'
import { ProbeError } from '../errors.js'
import type { CallOptions, ProtocolClient } from './protocol-client.js'

/** CompletionTriggerKind.Invoked */
const TRIGGER_INVOKED = 1

export interface ClientInfo {
  readonly name: string
  readonly version?: string
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isInitializeResult(value: unknown): value is InitializeResult {
  return isPlainObject(value) && isPlainObject(value.capabilities)
}

function isCompletionItem(value: unknown): value is CompletionItem {
  return isPlainObject(value) && typeof value.label === 'string'
}

/**
 * Initialize params advertising snippet completion support.
 */
export function defaultInitializeParams(
  clientInfo: ClientInfo = { name: 'lsp-probe' }
): InitializeParams {
  return {
    processId: process.pid,
    clientInfo: { ...clientInfo },
    rootUri: null,
    capabilities: {
      textDocument: {
        completion: {
          completionItem: { snippetSupport: true }
        }
      }
    },
    workspaceFolders: null
  }
}

/**
 * Run the handshake: `initialize` request, then `initialized` notification.
 *
 * @throws ProbeError if the result carries no capabilities object
 */
export async function initialize(
  client: ProtocolClient,
  params: InitializeParams = defaultInitializeParams(),
  options?: CallOptions
): Promise<InitializeResult> {
  const result = await client.call('initialize', params, options)
  if (!isInitializeResult(result)) {
    throw new ProbeError('initialize result has no capabilities object')
  }
  await client.notify('initialized', {})
  return result
}

export function didOpen(client: ProtocolClient, document: TextDocumentItem): Promise<void> {
  return client.notify('textDocument/didOpen', { textDocument: document })
}

/**
 * Replace the whole document text (full sync).
 */
export function didChange(
  client: ProtocolClient,
  uri: string,
  version: number,
  text: string
): Promise<void> {
  return client.notify('textDocument/didChange', {
    textDocument: { uri, version },
    contentChanges: [{ text }]
  })
}

export function didClose(client: ProtocolClient, uri: string): Promise<void> {
  return client.notify('textDocument/didClose', { textDocument: { uri } })
}

/**
 * Request completion at a position and normalize the reply to a list.
 * A `null` result becomes an empty complete list; entries without a label
 * are dropped.
 */
export async function completion(
  client: ProtocolClient,
  uri: string,
  position: Position,
  options?: CallOptions
): Promise<CompletionList> {
  const result = await client.call(
    'textDocument/completion',
    {
      textDocument: { uri },
      position,
      context: { triggerKind: TRIGGER_INVOKED }
    },
    options
  )

  if (Array.isArray(result)) {
    return { isIncomplete: false, items: result.filter(isCompletionItem) }
  }
  if (isPlainObject(result) && Array.isArray(result.items)) {
    return {
      isIncomplete: result.isIncomplete === true,
      items: result.items.filter(isCompletionItem)
    }
  }
  return { isIncomplete: false, items: [] }
}
