import pc from 'picocolors'

import type { AgentConfig } from '../config/agent-config.js'
import { displayName } from '../config/models.js'
import { formatDuration } from '../core/errors.js'
import { previewOf } from '../core/history-query.js'
import type { TimeoutWindow } from '../core/timeout-policy.js'
import type { HistoryStats, Turn } from '../core/types.js'

export type Write = (text: string) => void

export function formatTurnLine(turn: Turn): string {
  const role = turn.role === 'user' ? pc.cyan('user') : pc.green('assistant')
  return `${pc.dim(`#${turn.seq}`)} ${role} ${pc.dim(turn.timestamp)}\n  ${previewOf(turn.content)}`
}

export function formatStats(stats: HistoryStats): string {
  const lines = [
    `Turns:       ${stats.totalTurns} (${stats.userTurns} user, ${stats.assistantTurns} assistant)`,
    `Characters:  ${stats.totalCharacters} (avg ${stats.averageLength})`,
    `Tokens:      ${stats.totalTokens} (avg ${stats.averageTokens})`
  ]
  if (stats.latency) {
    lines.push(
      `Latency:     min ${stats.latency.min}ms, max ${stats.latency.max}ms, mean ${stats.latency.mean}ms`
    )
  }
  if (stats.firstTimestamp && stats.lastTimestamp) {
    lines.push(`Span:        ${stats.firstTimestamp} → ${stats.lastTimestamp}`)
  }
  if (stats.durationMs !== null) lines.push(`Duration:    ${formatDuration(stats.durationMs)}`)
  return lines.join('\n')
}

export function formatConfig(config: AgentConfig): string {
  return Object.entries(config)
    .map(([key, value]) => `${pc.bold(key.padEnd(18))} ${value === null ? pc.dim('null') : String(value)}`)
    .join('\n')
}

export function formatInfo(agentId: string, root: string, config: AgentConfig, window: TimeoutWindow): string {
  return [
    `${pc.bold('Agent:')}    ${agentId}`,
    `${pc.bold('Model:')}    ${displayName(config.model)} (${config.model}), effort ${config.reasoningEffort}`,
    `${pc.bold('Timeout:')}  ${formatDuration(window.timeoutMs)} (range ${formatDuration(window.floorMs)} - ${formatDuration(window.ceilingMs)})`,
    `${pc.bold('Stream:')}   ${config.stream ? 'on' : 'off'}`,
    `${pc.bold('Storage:')}  ${root}`
  ].join('\n')
}

export function formatError(message: string): string {
  return pc.red(message)
}

export function formatNotice(message: string): string {
  return pc.yellow(message)
}
