/**
 * StderrMonitor: drains the server's stderr line by line.
 *
 * Runs on its own listener, independent of the stdout frame path. Each line
 * goes through a classifier; tagged lines are handed to an observer. The
 * monitor keeps reading until end-of-input or stop(), and after stop() the
 * stream is still drained (and discarded) so a chatty server never blocks on
 * a full stderr pipe.
 *
 * Monitoring is best-effort: read, classifier and observer errors are
 * logged and skipped.
 *
 * @module
 */
import { createInterface, type Interface } from 'node:readline'
import type { Readable } from 'node:stream'
import { errorMessage } from '../errors.js'
import { type Logger, silentLogger } from '../logger.js'

/**
 * A stderr line the classifier found notable.
 */
export interface StderrEvent {
  readonly tag: string
  readonly line: string
  /** 1-based line number within the stream */
  readonly lineNumber: number
}

/**
 * Maps a line to a tag, or null to ignore it.
 */
export type StderrClassifier = (line: string) => string | null

export interface StderrObserver {
  onEvent(event: StderrEvent): void
}

export interface StderrMonitorOptions {
  readonly classifier?: StderrClassifier
  readonly observer?: StderrObserver
  readonly logger?: Logger
  /** Number of most recent raw lines kept for diagnostics (default 20). */
  readonly tailSize?: number
}

/**
 * A classification rule: `pattern` is a substring or a RegExp.
 */
export interface StderrRule {
  readonly tag: string
  readonly pattern: string | RegExp
}

export const DEFAULT_STDERR_RULES: readonly StderrRule[] = [
  { tag: 'panic', pattern: 'panicked' },
  { tag: 'error', pattern: 'ERROR' },
  { tag: 'warn', pattern: 'WARN' }
]

/**
 * Build a classifier from ordered rules. First matching rule wins.
 */
export function keywordClassifier(
  rules: readonly StderrRule[] = DEFAULT_STDERR_RULES
): StderrClassifier {
  return (line) => {
    for (const rule of rules) {
      const matched =
        typeof rule.pattern === 'string' ? line.includes(rule.pattern) : rule.pattern.test(line)
      if (matched) return rule.tag
    }
    return null
  }
}

export class StderrMonitor {
  private readonly classifier: StderrClassifier
  private readonly observer: StderrObserver | undefined
  private readonly logger: Logger
  private readonly tailSize: number
  private readonly recent: string[] = []
  private rl: Interface | null = null
  private lines = 0
  private finished = false
  private readonly resolveDone: (lines: number) => void

  /**
   * Resolves with the number of lines read once consumption has finished
   * (end-of-input or stop()).
   */
  readonly done: Promise<number>

  constructor(
    private readonly stream: Readable,
    options: StderrMonitorOptions = {}
  ) {
    this.classifier = options.classifier ?? keywordClassifier()
    this.observer = options.observer
    this.logger = options.logger ?? silentLogger
    this.tailSize = options.tailSize ?? 20
    let resolveDone: (lines: number) => void = () => undefined
    this.done = new Promise((resolve) => {
      resolveDone = resolve
    })
    this.resolveDone = resolveDone
  }

  /**
   * Most recent raw lines, oldest first.
   */
  get tail(): readonly string[] {
    return [...this.recent]
  }

  get lineCount(): number {
    return this.lines
  }

  /**
   * Begin consuming the stream.
   *
   * @throws Error if called twice
   */
  start(): void {
    if (this.rl !== null || this.finished) {
      throw new Error('StderrMonitor already started')
    }
    const rl = createInterface({ input: this.stream, crlfDelay: Number.POSITIVE_INFINITY })
    rl.on('line', this.onLine)
    rl.on('error', this.onError)
    rl.on('close', this.onClose)
    this.rl = rl
  }

  /**
   * Stop classifying. Remaining input is drained and discarded.
   */
  stop(): void {
    if (this.rl === null || this.finished) return
    this.rl.close()
  }

  private readonly onLine = (line: string): void => {
    if (this.finished) return
    this.lines++
    this.recent.push(line)
    if (this.recent.length > this.tailSize) {
      this.recent.shift()
    }

    let tag: string | null
    try {
      tag = this.classifier(line)
    } catch (err) {
      this.logger.warn(`stderr classifier failed on line ${this.lines}: ${errorMessage(err)}`)
      return
    }
    if (tag === null || this.observer === undefined) return

    try {
      this.observer.onEvent({ tag, line, lineNumber: this.lines })
    } catch (err) {
      this.logger.warn(`stderr observer failed on line ${this.lines}: ${errorMessage(err)}`)
    }
  }

  private readonly onError = (err: Error): void => {
    this.logger.warn(`stderr read error: ${err.message}`)
  }

  private readonly onClose = (): void => {
    if (this.finished) return
    this.finished = true
    this.rl = null
    // Keep the pipe flowing after an explicit stop
    if (!this.stream.destroyed) {
      this.stream.resume()
    }
    this.resolveDone(this.lines)
  }
}

/**
 * Observer that counts events per tag and keeps the latest ones.
 */
export class StderrTally implements StderrObserver {
  private readonly counts = new Map<string, number>()
  private readonly latest: StderrEvent[] = []

  constructor(private readonly keep = 100) {}

  onEvent(event: StderrEvent): void {
    this.counts.set(event.tag, (this.counts.get(event.tag) ?? 0) + 1)
    this.latest.push(event)
    if (this.latest.length > this.keep) {
      this.latest.shift()
    }
  }

  count(tag: string): number {
    return this.counts.get(tag) ?? 0
  }

  get events(): readonly StderrEvent[] {
    return [...this.latest]
  }

  reset(): void {
    this.counts.clear()
    this.latest.length = 0
  }
}
