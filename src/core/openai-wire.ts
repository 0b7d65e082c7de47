import { z } from 'zod'

import type { ChatRequest, TokenUsage } from './model-client.js'

export interface WireContentPart {
  type: 'text'
  text: string
}

export interface WireMessage {
  role: 'developer' | 'user' | 'assistant'
  content: WireContentPart[]
}

/** Body of `POST /chat/completions`. */
export interface ChatCompletionPayload {
  model: string
  messages: WireMessage[]
  response_format: { type: 'text' }
  verbosity: 'low' | 'medium' | 'high'
  reasoning_effort: 'low' | 'medium' | 'high'
  stream?: true
  stream_options?: { include_usage: true }
  max_completion_tokens?: number
  temperature?: number
  top_p?: number
}

const wireUsageSchema = z
  .object({
    prompt_tokens: z.number().int().nonnegative().optional(),
    completion_tokens: z.number().int().nonnegative().optional(),
    total_tokens: z.number().int().nonnegative().optional()
  })
  .nullable()
  .optional()

const wireTextSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.string(), text: z.string().optional() })),
  z.null()
])

export const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: wireTextSchema.optional(),
        reasoning_content: z.string().nullable().optional()
      }),
      finish_reason: z.string().nullable().optional()
    })
  ),
  usage: wireUsageSchema
})

export const chatCompletionChunkSchema = z.object({
  choices: z.array(
    z.object({
      delta: z
        .object({
          content: z.string().nullable().optional(),
          reasoning_content: z.string().nullable().optional()
        })
        .default({}),
      finish_reason: z.string().nullable().optional()
    })
  ),
  usage: wireUsageSchema
})

export const wireErrorSchema = z.object({
  error: z.object({ message: z.string(), type: z.string().nullable().optional() })
})

export type ChatCompletion = z.infer<typeof chatCompletionSchema>
export type ChatCompletionChunk = z.infer<typeof chatCompletionChunkSchema>

export function toPayload(request: ChatRequest, stream: boolean): ChatCompletionPayload {
  return {
    model: request.model,
    messages: request.messages.map((message): WireMessage => ({
      role: message.role,
      content: [{ type: 'text', text: message.content }]
    })),
    response_format: { type: 'text' },
    verbosity: request.verbosity,
    reasoning_effort: request.reasoningEffort,
    ...(stream ? { stream: true as const, stream_options: { include_usage: true as const } } : {}),
    ...(request.maxOutputTokens !== undefined ? { max_completion_tokens: request.maxOutputTokens } : {}),
    ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    ...(request.topP !== undefined ? { top_p: request.topP } : {})
  }
}

export function toUsage(usage: z.infer<typeof wireUsageSchema>): TokenUsage | undefined {
  if (!usage) return undefined
  return {
    ...(usage.prompt_tokens !== undefined ? { inputTokens: usage.prompt_tokens } : {}),
    ...(usage.completion_tokens !== undefined ? { outputTokens: usage.completion_tokens } : {}),
    ...(usage.total_tokens !== undefined ? { totalTokens: usage.total_tokens } : {})
  }
}

/** Flattens string or content-part message bodies into plain text. */
export function messageText(content: z.infer<typeof wireTextSchema> | undefined): string {
  if (content === undefined || content === null) return ''
  if (typeof content === 'string') return content
  return content.map((part) => part.text ?? '').join('')
}

/** Extracts the human-readable message from an error response body. */
export function errorMessageFrom(body: string, status: number): string {
  try {
    const parsed = wireErrorSchema.safeParse(JSON.parse(body))
    if (parsed.success) return parsed.data.error.message
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error
  }
  const trimmed = body.trim()
  return trimmed ? `HTTP ${status}: ${trimmed.slice(0, 200)}` : `HTTP ${status}`
}
