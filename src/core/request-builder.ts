import type { AgentConfig } from '../config/agent-config.js'
import type { ChatMessage, ChatRequest } from './model-client.js'
import type { Turn } from './types.js'

/**
 * Builds the call from configuration, prior turns and the new user text.
 * The system prompt travels as a `developer` message; sampling parameters at
 * their neutral value (1.0) are left out.
 */
export function buildChatRequest(config: AgentConfig, history: readonly Turn[], userText: string): ChatRequest {
  const messages: ChatMessage[] = []
  if (config.systemPrompt) {
    messages.push({ role: 'developer', content: config.systemPrompt })
  }
  for (const turn of history) {
    messages.push({ role: turn.role, content: turn.content })
  }
  messages.push({ role: 'user', content: userText })

  return {
    model: config.model,
    messages,
    reasoningEffort: config.reasoningEffort,
    verbosity: config.textVerbosity,
    ...(config.temperature !== 1 ? { temperature: config.temperature } : {}),
    ...(config.topP !== 1 ? { topP: config.topP } : {}),
    ...(config.maxOutputTokens !== null ? { maxOutputTokens: config.maxOutputTokens } : {})
  }
}
