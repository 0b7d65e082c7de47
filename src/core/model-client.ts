import type { ModelVariant, ReasoningEffort } from '../config/models.js'

export interface ChatMessage {
  role: 'developer' | 'user' | 'assistant'
  content: string
}

/** Everything the remote endpoint needs for one call. */
export interface ChatRequest {
  model: ModelVariant
  messages: ChatMessage[]
  reasoningEffort: ReasoningEffort
  verbosity: 'low' | 'medium' | 'high'
  temperature?: number
  topP?: number
  maxOutputTokens?: number
}

export interface TokenUsage {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}

export interface Completion {
  content: string
  reasoningSummary?: string
  usage?: TokenUsage
  finishReason?: string
}

export type StreamEvent =
  | { kind: 'content'; delta: string }
  | { kind: 'reasoning'; delta: string }
  | { kind: 'done'; usage?: TokenUsage; finishReason?: string }

/**
 * Remote model contract. Implementations must stop work and reject (or end
 * iteration by throwing) once `signal` aborts.
 */
export interface ModelClient {
  complete(request: ChatRequest, signal: AbortSignal): Promise<Completion>
  stream(request: ChatRequest, signal: AbortSignal): AsyncIterable<StreamEvent>
}
