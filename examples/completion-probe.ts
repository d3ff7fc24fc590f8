/**
 * Example: probe a language server's completion on a scratch document.
 *
 * Usage:
 *   npx tsx examples/completion-probe.ts <server> [args...]
 *
 * Spawns the server, runs the handshake, opens a one-line document and
 * prints the completion labels offered at its end, followed by a count of
 * notable stderr lines. Timeouts and log level come from the LSP_PROBE_*
 * environment variables.
 */
import {
  completion,
  didOpen,
  errorMessage,
  initialize,
  keywordClassifier,
  ProtocolClient,
  StderrTally
} from '@lsp-probe/probe-node'

const [file, ...args] = process.argv.slice(2)
if (file === undefined) {
  process.stderr.write('usage: completion-probe <server> [args...]\n')
  process.exit(2)
}

const text = 'pri'
const uri = 'file:///scratch/probe.txt'
const tally = new StderrTally()

const client = await ProtocolClient.spawn(
  { file, args },
  {
    stderr: { classifier: keywordClassifier(), observer: tally },
    onServerEvent: (event) => {
      if (event.kind === 'notification') {
        process.stderr.write(`server notification: ${event.message.method}\n`)
      }
    }
  }
)

try {
  const result = await initialize(client)
  process.stdout.write(`server: ${result.serverInfo?.name ?? 'unknown'}\n`)

  await didOpen(client, { uri, languageId: 'plaintext', version: 1, text })
  const list = await completion(client, uri, { line: 0, character: text.length })
  for (const item of list.items) {
    process.stdout.write(`${item.label}\n`)
  }
  if (list.isIncomplete) {
    process.stdout.write('(list incomplete)\n')
  }
} catch (err) {
  process.stderr.write(`probe failed: ${errorMessage(err)}\n`)
  process.exitCode = 1
} finally {
  await client.close()
}

for (const tag of ['panic', 'error', 'warn']) {
  process.stdout.write(`stderr ${tag}: ${tally.count(tag)}\n`)
}
