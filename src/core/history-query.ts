import type { HistoryStats, LatencyStats, Turn } from './types.js'

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

/**
 * Case-insensitive substring search. The result re-scans `turns` on every
 * iteration, so it can be consumed more than once.
 */
export function searchTurns(turns: readonly Turn[], term: string, limit = Infinity): Iterable<Turn> {
  const needle = term.toLowerCase()
  return {
    *[Symbol.iterator]() {
      let found = 0
      for (const turn of turns) {
        if (found >= limit) return
        if (turn.content.toLowerCase().includes(needle)) {
          found += 1
          yield turn
        }
      }
    }
  }
}

export function tokensOf(turn: Turn): number {
  const meta = turn.metadata
  if (!meta) return 0
  return meta.totalTokens ?? (meta.inputTokens ?? 0) + (meta.outputTokens ?? 0)
}

function latencyOf(turns: readonly Turn[]): LatencyStats | null {
  const samples = turns.flatMap((turn) => (turn.metadata?.latencyMs === undefined ? [] : [turn.metadata.latencyMs]))
  if (samples.length === 0) return null
  const total = samples.reduce((sum, value) => sum + value, 0)
  return {
    min: Math.min(...samples),
    max: Math.max(...samples),
    mean: round2(total / samples.length)
  }
}

export function computeStats(turns: readonly Turn[]): HistoryStats {
  const totalTurns = turns.length
  const totalCharacters = turns.reduce((sum, turn) => sum + turn.content.length, 0)
  const totalTokens = turns.reduce((sum, turn) => sum + tokensOf(turn), 0)
  const first = turns[0]
  const last = turns[turns.length - 1]

  return {
    totalTurns,
    userTurns: turns.filter((turn) => turn.role === 'user').length,
    assistantTurns: turns.filter((turn) => turn.role === 'assistant').length,
    totalCharacters,
    averageLength: totalTurns === 0 ? 0 : Math.floor(totalCharacters / totalTurns),
    totalTokens,
    averageTokens: totalTurns === 0 ? 0 : round2(totalTokens / totalTurns),
    latency: latencyOf(turns),
    firstTimestamp: first?.timestamp ?? null,
    lastTimestamp: last?.timestamp ?? null,
    durationMs: first && last ? Date.parse(last.timestamp) - Date.parse(first.timestamp) : null
  }
}

export function previewOf(content: string, max = 100): string {
  return content.length > max ? `${content.slice(0, max)}...` : content
}

/** Last `count` turns, for `/history n`. */
export function tail(turns: readonly Turn[], count: number): readonly Turn[] {
  return count <= 0 ? [] : turns.slice(-count)
}
