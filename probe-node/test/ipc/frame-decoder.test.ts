import { describe, expect, it } from 'vitest'
import { DecodingError, FramingError } from '../../src/errors.js'
import { encodeFrame } from '../../src/ipc/frame.js'
import { type DecodeResult, FrameDecoder } from '../../src/ipc/frame-decoder.js'

function frame(json: string): Buffer {
  return encodeFrame(Buffer.from(json, 'utf8'))
}

function messages(results: DecodeResult[]): unknown[] {
  return results.flatMap((r) => (r.ok ? [r.message] : []))
}

function errorOf(result: DecodeResult | undefined): Error | undefined {
  return result !== undefined && !result.ok ? result.error : undefined
}

describe('FrameDecoder', () => {
  it('decodes a complete frame', () => {
    const decoder = new FrameDecoder()
    const results = decoder.push(frame('{"jsonrpc":"2.0","id":1,"result":null}'))
    expect(results).toEqual([{ ok: true, message: { jsonrpc: '2.0', id: 1, result: null } }])
    expect(decoder.buffered).toBe(0)
  })

  it('decodes a frame delivered one byte at a time', () => {
    const decoder = new FrameDecoder()
    const bytes = frame('{"method":"ping","params":{"text":"héllo"}}')
    const results: DecodeResult[] = []
    for (let i = 0; i < bytes.length; i++) {
      results.push(...decoder.push(bytes.subarray(i, i + 1)))
    }
    expect(messages(results)).toEqual([{ method: 'ping', params: { text: 'héllo' } }])
  })

  it('holds a partial body until the rest arrives', () => {
    const decoder = new FrameDecoder()
    const bytes = frame('{"a":1}')
    expect(decoder.push(bytes.subarray(0, bytes.length - 2))).toEqual([])
    expect(decoder.buffered).toBe(5)
    expect(decoder.push(bytes.subarray(bytes.length - 2))).toEqual([
      { ok: true, message: { a: 1 } }
    ])
  })

  it('decodes several frames from one chunk in order', () => {
    const decoder = new FrameDecoder()
    const chunk = Buffer.concat([frame('1'), frame('"two"'), frame('[3]')])
    expect(messages(decoder.push(chunk))).toEqual([1, 'two', [3]])
  })

  it('ignores headers other than Content-Length', () => {
    const decoder = new FrameDecoder()
    const chunk = Buffer.from(
      'Content-Type: application/vscode-jsonrpc; charset=utf-8\r\nContent-Length: 2\r\n\r\n{}',
      'ascii'
    )
    expect(decoder.push(chunk)).toEqual([{ ok: true, message: {} }])
  })

  it('decodes a zero-length body to an empty object', () => {
    const decoder = new FrameDecoder()
    expect(decoder.push(Buffer.from('Content-Length: 0\r\n\r\n', 'ascii'))).toEqual([
      { ok: true, message: {} }
    ])
  })

  it('counts the body length in bytes for multi-byte content', () => {
    const decoder = new FrameDecoder()
    const chunk = Buffer.concat([frame('"日本語"'), frame('"next"')])
    expect(messages(decoder.push(chunk))).toEqual(['日本語', 'next'])
  })

  it('stays aligned after a body that is not valid JSON', () => {
    const decoder = new FrameDecoder()
    const chunk = Buffer.concat([frame('{oops}'), frame('{"ok":true}')])
    const results = decoder.push(chunk)

    expect(results).toHaveLength(2)
    const error = errorOf(results[0])
    expect(error).toBeInstanceOf(DecodingError)
    if (error instanceof DecodingError) {
      expect(error.raw.toString('utf8')).toBe('{oops}')
    }
    expect(results[1]).toEqual({ ok: true, message: { ok: true } })
  })

  it('reports a header block without Content-Length and resumes after it', () => {
    const decoder = new FrameDecoder()
    const chunk = Buffer.concat([Buffer.from('Content-Type: x\r\n\r\n', 'ascii'), frame('7')])
    const results = decoder.push(chunk)

    expect(results).toHaveLength(2)
    expect(errorOf(results[0])?.message).toBe('Framing error: missing Content-Length header')
    expect(results[1]).toEqual({ ok: true, message: 7 })
  })

  describe('resynchronization', () => {
    it('skips a stray log line and decodes the frames after it', () => {
      const decoder = new FrameDecoder()
      const chunk = Buffer.concat([
        Buffer.from('server starting\r\n', 'ascii'),
        frame('{"id":1}'),
        frame('{"id":2}'),
        frame('{"id":3}')
      ])
      const results = decoder.push(chunk)

      expect(results).toHaveLength(4)
      expect(errorOf(results[0])?.message).toBe(
        'Framing error: malformed header line "server starting"'
      )
      expect(messages(results)).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }])
      expect(decoder.buffered).toBe(0)
    })

    it('reports one error for a run of bad header lines', () => {
      const decoder = new FrameDecoder()
      const chunk = Buffer.concat([
        Buffer.from('junk\r\nContent-Length: abc\r\n\r\n', 'ascii'),
        frame('1')
      ])
      const results = decoder.push(chunk)

      expect(results).toHaveLength(2)
      expect(errorOf(results[0])?.message).toBe('Framing error: malformed header line "junk"')
      expect(results[1]).toEqual({ ok: true, message: 1 })
    })

    it('recovers when the stray text is split across chunks', () => {
      const decoder = new FrameDecoder()
      expect(decoder.push(Buffer.from('noise without newline', 'ascii'))).toEqual([])

      const results = decoder.push(Buffer.concat([Buffer.from(' more\r\n', 'ascii'), frame('{}')]))

      expect(results).toHaveLength(2)
      expect(errorOf(results[0])?.message).toBe(
        'Framing error: malformed header line "noise without newline more"'
      )
      expect(results[1]).toEqual({ ok: true, message: {} })
    })

    it('keeps a partial Content-Length line while skipping', () => {
      const decoder = new FrameDecoder()
      const first = decoder.push(Buffer.from('garbage\r\n\r\nContent-Le', 'ascii'))

      expect(errorOf(first[0])?.message).toBe('Framing error: malformed header line "garbage"')
      expect(decoder.buffered).toBe(10)
      expect(decoder.push(Buffer.from('ngth: 2\r\n\r\n{}', 'ascii'))).toEqual([
        { ok: true, message: {} }
      ])
    })

    it('reports a new error after a good frame', () => {
      const decoder = new FrameDecoder()
      const chunk = Buffer.concat([
        Buffer.from('one\r\n', 'ascii'),
        frame('1'),
        Buffer.from('two\r\n', 'ascii'),
        frame('2')
      ])
      const results = decoder.push(chunk)

      expect(results.map((r) => (r.ok ? r.message : r.error.message))).toEqual([
        'Framing error: malformed header line "one"',
        1,
        'Framing error: malformed header line "two"',
        2
      ])
    })

    it('does not report skipped bytes as a truncated header at end of input', () => {
      const decoder = new FrameDecoder()
      decoder.push(Buffer.from('oops\r\n\r\nstill garbage', 'ascii'))
      expect(decoder.end()).toEqual([])
    })
  })

  it('reports an invalid Content-Length value', () => {
    const decoder = new FrameDecoder()
    const results = decoder.push(Buffer.from('Content-Length: ten\r\n\r\n', 'ascii'))
    expect(errorOf(results[0])).toBeInstanceOf(FramingError)
    expect(errorOf(results[0])?.message).toBe(
      'Framing error: invalid Content-Length value "ten"'
    )
  })

  it('rejects a header block larger than MAX_HEADER_SIZE', () => {
    const decoder = new FrameDecoder()
    const results = decoder.push(Buffer.alloc(8193, 'X'))
    expect(results).toHaveLength(1)
    expect(errorOf(results[0])?.message).toBe('Framing error: header block exceeds 8192 bytes')
    expect(decoder.buffered).toBe(0)
  })

  it('reports a truncated body at end of input', () => {
    const decoder = new FrameDecoder()
    expect(decoder.push(Buffer.from('Content-Length: 10\r\n\r\n{"a"', 'ascii'))).toEqual([])

    const results = decoder.end()
    expect(results).toHaveLength(1)
    expect(errorOf(results[0])?.message).toBe(
      'Framing error: truncated frame: expected 10 body bytes, stream ended after 4'
    )
    expect(decoder.buffered).toBe(0)
  })

  it('reports a truncated header at end of input', () => {
    const decoder = new FrameDecoder()
    decoder.push(Buffer.from('Content-Len', 'ascii'))
    expect(errorOf(decoder.end()[0])?.message).toBe(
      'Framing error: truncated header: stream ended with 11 unterminated header bytes'
    )
  })

  it('ends cleanly between frames', () => {
    const decoder = new FrameDecoder()
    decoder.push(frame('{}'))
    expect(decoder.end()).toEqual([])
  })
})
