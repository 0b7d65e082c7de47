export interface Logger {
  info(event: string, data?: Record<string, unknown>): void
  warn(event: string, data?: Record<string, unknown>): void
  error(event: string, data?: Record<string, unknown>): void
}

export type Role = 'user' | 'assistant'

export interface TurnMetadata {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
  latencyMs?: number
  reasoningSummary?: string
  model?: string
  reasoningEffort?: string
  finishReason?: string
  includedFiles?: string[]
}

/**
 * One finalized exchange unit. Turns are never edited after they are appended.
 */
export interface Turn {
  readonly seq: number
  readonly role: Role
  readonly content: string
  readonly timestamp: string
  readonly metadata?: Readonly<TurnMetadata>
}

/** A turn as submitted to the store, before it is sequenced. */
export interface NewTurn {
  seq?: number
  role: Role
  content: string
  timestamp?: string
  metadata?: TurnMetadata
}

export interface LatencyStats {
  min: number
  max: number
  mean: number
}

export interface HistoryStats {
  totalTurns: number
  userTurns: number
  assistantTurns: number
  totalCharacters: number
  averageLength: number
  totalTokens: number
  averageTokens: number
  latency: LatencyStats | null
  firstTimestamp: string | null
  lastTimestamp: string | null
  durationMs: number | null
}
