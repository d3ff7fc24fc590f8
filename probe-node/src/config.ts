/**
 * Environment-driven defaults for timeouts and logging.
 *
 * Environment variables:
 * - LSP_PROBE_CALL_TIMEOUT_MS (default 5000): budget for a single call
 * - LSP_PROBE_STARTUP_GRACE_MS (default 500): wait after spawn before the
 *   liveness check
 * - LSP_PROBE_SHUTDOWN_TIMEOUT_MS (default 2000): budget for the shutdown
 *   request during close()
 * - LSP_PROBE_KILL_GRACE_MS (default 2000): SIGTERM to SIGKILL grace period
 * - LSP_PROBE_LOG_LEVEL (default info): debug | info | warn | error | silent
 *
 * @module
 */
import { LOG_LEVELS, type LogLevel } from './logger.js'

export interface ProbeConfig {
  readonly callTimeoutMs: number
  readonly startupGraceMs: number
  readonly shutdownTimeoutMs: number
  readonly killGraceMs: number
  readonly logLevel: LogLevel
}

export const DEFAULT_CONFIG: ProbeConfig = {
  callTimeoutMs: 5_000,
  startupGraceMs: 500,
  shutdownTimeoutMs: 2_000,
  killGraceMs: 2_000,
  logLevel: 'info'
}

type Env = Readonly<Record<string, string | undefined>>

function parseDuration(env: Env, name: string, fallback: number): number {
  const raw = env[name]
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`${name} must be a non-negative integer (milliseconds), got "${raw}"`)
  }
  return Number.parseInt(raw, 10)
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function parseLogLevel(env: Env, fallback: LogLevel): LogLevel {
  const raw = env.LSP_PROBE_LOG_LEVEL
  if (raw === undefined || raw === '') {
    return fallback
  }
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new Error(`LSP_PROBE_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`)
  }
  return level
}

/**
 * Resolve configuration from the environment.
 *
 * @throws Error naming the offending variable when a value is invalid
 */
export function resolveProbeConfig(env: Env = process.env): ProbeConfig {
  return {
    callTimeoutMs: parseDuration(env, 'LSP_PROBE_CALL_TIMEOUT_MS', DEFAULT_CONFIG.callTimeoutMs),
    startupGraceMs: parseDuration(env, 'LSP_PROBE_STARTUP_GRACE_MS', DEFAULT_CONFIG.startupGraceMs),
    shutdownTimeoutMs: parseDuration(
      env,
      'LSP_PROBE_SHUTDOWN_TIMEOUT_MS',
      DEFAULT_CONFIG.shutdownTimeoutMs
    ),
    killGraceMs: parseDuration(env, 'LSP_PROBE_KILL_GRACE_MS', DEFAULT_CONFIG.killGraceMs),
    logLevel: parseLogLevel(env, DEFAULT_CONFIG.logLevel)
  }
}
