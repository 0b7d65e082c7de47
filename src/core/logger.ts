import { appendFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'

import type { Logger } from './types.js'

export type LogLevel = 'info' | 'warn' | 'error'

const LEVEL_RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 }

let muted = false

export function setLoggerMuted(value: boolean): void {
  muted = value
}

export interface LoggerOptions {
  /** JSON-lines file receiving every level. */
  filePath?: string
  /** Lowest level echoed to stderr. */
  consoleLevel?: LogLevel
  /** Fields merged into every entry, e.g. the agent id. */
  bindings?: Record<string, unknown>
}

function formatEntry(
  level: LogLevel,
  event: string,
  bindings: Record<string, unknown> | undefined,
  data: Record<string, unknown> | undefined
): string {
  return JSON.stringify({
    ts: new Date().toISOString(),
    level: level.toUpperCase(),
    event,
    ...(bindings ?? {}),
    ...(data ?? {})
  })
}

/** JSON logger writing to an optional file sink and a filtered console sink. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleRank = LEVEL_RANK[options.consoleLevel ?? 'warn']
  let fileReady = false

  function emit(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const line = formatEntry(level, event, options.bindings, data)

    if (options.filePath) {
      if (!fileReady) {
        mkdirSync(dirname(options.filePath), { recursive: true })
        fileReady = true
      }
      appendFileSync(options.filePath, `${line}\n`, 'utf-8')
    }

    if (muted || LEVEL_RANK[level] < consoleRank) return
    // eslint-disable-next-line no-console
    console.error(line)
  }

  return {
    info(event, data) {
      emit('info', event, data)
    },
    warn(event, data) {
      emit('warn', event, data)
    },
    error(event, data) {
      emit('error', event, data)
    }
  }
}

/** Daily log file inside an agent's `logs/` directory. */
export function agentLogPath(logsDir: string, now: Date = new Date()): string {
  return join(logsDir, `${now.toISOString().slice(0, 10)}.log`)
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
}

/**
 * Hands out one logger per agent, each writing to that agent's daily log file.
 */
export function agentLoggerFactory(
  logsDirFor: (agentId: string) => string,
  consoleLevel: LogLevel = 'warn'
): (agentId: string) => Logger {
  const cache = new Map<string, Logger>()
  return (agentId) => {
    let agentLogger = cache.get(agentId)
    if (!agentLogger) {
      agentLogger = createLogger({
        filePath: agentLogPath(logsDirFor(agentId)),
        consoleLevel,
        bindings: { agentId }
      })
      cache.set(agentId, agentLogger)
    }
    return agentLogger
  }
}
