/**
 * ProcessSession: owns one server child process and its three pipes.
 *
 * Lifecycle:
 * 1. start() spawns the command and starts the stderr monitor at once
 * 2. a startup grace period catches servers that die immediately
 *    (missing dependency, bad flags) before any protocol exchange
 * 3. terminate() closes stdin, sends SIGTERM, and escalates to SIGKILL
 *    after the grace period
 *
 * State: not_started → running → terminating → exited. stdin is only
 * writable while running; stdout may still be drained while terminating.
 *
 * @module
 */
import { type ChildProcessWithoutNullStreams, spawn } from 'node:child_process'
import type { Readable, Writable } from 'node:stream'
import { LaunchError, PrematureExitError } from '../errors.js'
import { type Logger, silentLogger } from '../logger.js'
import { raceTimeout } from '../timers.js'
import { StderrMonitor, type StderrMonitorOptions } from './stderr-monitor.js'

export type SessionState = 'not_started' | 'running' | 'terminating' | 'exited'

export interface ExitInfo {
  readonly code: number | null
  readonly signal: NodeJS.Signals | null
}

/**
 * Command used to launch the server. No shell is involved.
 */
export interface SessionCommand {
  readonly file: string
  readonly args?: readonly string[]
  readonly cwd?: string
  readonly env?: NodeJS.ProcessEnv
}

export interface SessionOptions {
  /** Wait after spawn before the liveness check (default 500ms). */
  readonly startupGraceMs?: number
  /** Options for the stderr monitor started with the process. */
  readonly stderr?: Omit<StderrMonitorOptions, 'logger'>
  readonly logger?: Logger
}

/**
 * The view of a session the protocol client needs. ProcessSession is the
 * production implementation; tests supply in-process stand-ins.
 */
export interface SessionHandle {
  readonly stdin: Writable
  readonly stdout: Readable
  readonly exited: Promise<ExitInfo>
  isAlive(): boolean
  terminate(gracePeriodMs: number): Promise<ExitInfo>
}

function errnoCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined
}

export class ProcessSession implements SessionHandle {
  private stateValue: SessionState = 'not_started'
  private exitInfo: ExitInfo | null = null
  private readonly logger: Logger

  readonly exited: Promise<ExitInfo>
  readonly stderrMonitor: StderrMonitor

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly command: SessionCommand,
    options: SessionOptions
  ) {
    this.logger = options.logger ?? silentLogger
    this.stderrMonitor = new StderrMonitor(child.stderr, {
      ...options.stderr,
      logger: this.logger
    })
    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        this.exitInfo = { code, signal }
        this.stateValue = 'exited'
        this.logger.debug(
          `server "${command.file}" exited (code ${code ?? 'null'}, signal ${signal ?? 'null'})`
        )
        resolve({ code, signal })
      })
    })
    // Writes racing a dying server surface through the frame writer
    child.stdin.on('error', (err) => {
      this.logger.debug(`server stdin error: ${err.message}`)
    })
  }

  /**
   * Spawn the server and verify it survives the startup grace period.
   *
   * @throws LaunchError if the executable cannot be spawned
   * @throws PrematureExitError if the process exits during the grace period
   */
  static async start(command: SessionCommand, options: SessionOptions = {}): Promise<ProcessSession> {
    const logger = options.logger ?? silentLogger
    const startupGraceMs = options.startupGraceMs ?? 500

    let child: ChildProcessWithoutNullStreams
    try {
      // stdio defaults to three pipes
      child = spawn(command.file, command.args ?? [], {
        cwd: command.cwd,
        env: command.env ?? process.env
      })
    } catch (err) {
      throw new LaunchError(command.file, err instanceof Error ? errnoCode(err) : undefined, err)
    }

    // spawn() reports a missing executable asynchronously via 'error'
    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError)
        resolve()
      }
      const onError = (err: Error) => {
        child.off('spawn', onSpawn)
        reject(new LaunchError(command.file, errnoCode(err), err))
      }
      child.once('spawn', onSpawn)
      child.once('error', onError)
    })

    const session = new ProcessSession(child, command, options)
    session.stateValue = 'running'
    session.stderrMonitor.start()
    child.on('error', (err) => {
      logger.warn(`server process error: ${err.message}`)
    })
    logger.debug(`spawned "${command.file}" (pid ${child.pid ?? 'unknown'})`)

    const early = await raceTimeout(session.exited, startupGraceMs)
    if (early !== null) {
      // Let the monitor read whatever the server printed before dying
      await raceTimeout(session.stderrMonitor.done, 100)
      throw new PrematureExitError(early.code, early.signal, session.stderrMonitor.tail)
    }

    return session
  }

  get state(): SessionState {
    return this.stateValue
  }

  get pid(): number | undefined {
    return this.child.pid
  }

  get stdin(): Writable {
    return this.child.stdin
  }

  get stdout(): Readable {
    return this.child.stdout
  }

  get stderr(): Readable {
    return this.child.stderr
  }

  /**
   * Exit code and signal once the process has exited, null before.
   */
  get exitStatus(): ExitInfo | null {
    return this.exitInfo
  }

  isAlive(): boolean {
    return this.stateValue === 'running'
  }

  /**
   * Ask the process to exit, escalating to SIGKILL after `gracePeriodMs`.
   * Calling it again, or after exit, returns the same exit info.
   */
  async terminate(gracePeriodMs: number): Promise<ExitInfo> {
    if (this.stateValue !== 'running') {
      return this.exited
    }
    this.stateValue = 'terminating'

    if (!this.child.stdin.destroyed) {
      this.child.stdin.end()
    }
    this.child.kill('SIGTERM')

    const exited = await raceTimeout(this.exited, gracePeriodMs)
    if (exited !== null) {
      return exited
    }

    this.logger.warn(
      `server "${this.command.file}" ignored SIGTERM for ${gracePeriodMs}ms, sending SIGKILL`
    )
    this.child.kill('SIGKILL')
    return this.exited
  }
}
