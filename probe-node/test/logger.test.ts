import { describe, expect, it } from 'vitest'
import { createLogger } from '../src/logger.js'

function capture(level: Parameters<typeof createLogger>[0]) {
  const lines: string[] = []
  const logger = createLogger(level, (line) => lines.push(line))
  return { lines, logger }
}

describe('createLogger', () => {
  it('prefixes lines with the tool name and level', () => {
    const { lines, logger } = capture('debug')
    logger.warn('server ignored SIGTERM')
    expect(lines).toEqual(['[lsp-probe] warn: server ignored SIGTERM\n'])
  })

  it('drops messages below the threshold', () => {
    const { lines, logger } = capture('warn')
    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')
    expect(lines).toEqual(['[lsp-probe] warn: c\n', '[lsp-probe] error: d\n'])
  })

  it('writes nothing at silent', () => {
    const { lines, logger } = capture('silent')
    logger.error('x')
    expect(lines).toEqual([])
  })
})
