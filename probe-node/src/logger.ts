/**
 * Diagnostic logging for the probe.
 *
 * Log lines go to stderr, never stdout: a harness embedded in a stdio tool
 * must leave stdout alone.
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
}

/**
 * Create a logger writing `[lsp-probe] <level>: <message>` lines.
 *
 * @param minLevel - lowest level that is written
 * @param write - sink for formatted lines (defaults to process.stderr)
 */
export function createLogger(
  minLevel: LogLevel = 'info',
  write: (line: string) => void = (line) => {
    process.stderr.write(line)
  }
): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return
    write(`[lsp-probe] ${level}: ${message}\n`)
  }

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message)
  }
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger('silent')
