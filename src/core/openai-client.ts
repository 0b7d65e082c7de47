import { classifyStatus, UpstreamError } from './errors.js'
import type { ChatRequest, Completion, ModelClient, StreamEvent, TokenUsage } from './model-client.js'
import {
  chatCompletionChunkSchema,
  chatCompletionSchema,
  errorMessageFrom,
  messageText,
  toPayload,
  toUsage
} from './openai-wire.js'
import { readSseData } from './sse.js'
import type { Logger } from './types.js'

export interface OpenAIClientOptions {
  apiKey: string
  baseUrl: string
  logger: Logger
  fetchImpl?: typeof fetch
}

/**
 * Chat-completions client over `fetch`. Does not retry: every failure is
 * surfaced so the user decides whether to resubmit.
 */
export class OpenAIClient implements ModelClient {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly options: OpenAIClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch
  }

  async complete(request: ChatRequest, signal: AbortSignal): Promise<Completion> {
    const response = await this.post(request, false, signal)
    const text = await response.text()

    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (error) {
      throw new UpstreamError('server', 'Endpoint returned a non-JSON body', response.status, {
        operation: 'model.complete',
        cause: error
      })
    }
    const parsed = chatCompletionSchema.safeParse(raw)
    const choice = parsed.success ? parsed.data.choices[0] : undefined
    if (!parsed.success || !choice) {
      throw new UpstreamError('server', 'Endpoint returned an unexpected response shape', response.status, {
        operation: 'model.complete',
        ...(parsed.success ? {} : { cause: parsed.error })
      })
    }

    const usage = toUsage(parsed.data.usage)
    return {
      content: messageText(choice.message.content),
      ...(choice.message.reasoning_content ? { reasoningSummary: choice.message.reasoning_content } : {}),
      ...(usage ? { usage } : {}),
      ...(choice.finish_reason ? { finishReason: choice.finish_reason } : {})
    }
  }

  async *stream(request: ChatRequest, signal: AbortSignal): AsyncGenerator<StreamEvent> {
    const response = await this.post(request, true, signal)
    if (!response.body) {
      throw new UpstreamError('server', 'Streaming response has no body', response.status, {
        operation: 'model.stream'
      })
    }

    let usage: TokenUsage | undefined
    let finishReason: string | undefined

    for await (const data of readSseData(response.body)) {
      if (data === '[DONE]') {
        yield { kind: 'done', ...(usage ? { usage } : {}), ...(finishReason ? { finishReason } : {}) }
        return
      }

      let raw: unknown
      try {
        raw = JSON.parse(data)
      } catch (error) {
        this.options.logger.warn('model.stream_bad_json', { error: String(error), preview: data.slice(0, 80) })
        continue
      }
      const chunk = chatCompletionChunkSchema.safeParse(raw)
      if (!chunk.success) {
        this.options.logger.warn('model.stream_bad_chunk', { preview: data.slice(0, 80) })
        continue
      }

      usage = toUsage(chunk.data.usage) ?? usage
      const choice = chunk.data.choices[0]
      if (!choice) continue
      if (choice.delta.reasoning_content) yield { kind: 'reasoning', delta: choice.delta.reasoning_content }
      if (choice.delta.content) yield { kind: 'content', delta: choice.delta.content }
      if (choice.finish_reason) finishReason = choice.finish_reason
    }

    // Some endpoints close after the finish reason without a [DONE] marker.
    if (finishReason) {
      yield { kind: 'done', ...(usage ? { usage } : {}), finishReason }
    }
  }

  private async post(request: ChatRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`
    this.options.logger.info('model.request', {
      model: request.model,
      reasoningEffort: request.reasoningEffort,
      stream,
      messages: request.messages.length
    })

    let response: Response
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.options.apiKey}`
        },
        body: JSON.stringify(toPayload(request, stream)),
        signal
      })
    } catch (error) {
      if (signal.aborted) throw error
      throw new UpstreamError('network', `Could not reach ${url}`, undefined, {
        operation: 'model.request',
        cause: error
      })
    }

    if (!response.ok) {
      const message = errorMessageFrom(await response.text(), response.status)
      const kind = classifyStatus(response.status)
      this.options.logger.error('model.request_failed', { status: response.status, kind, message })
      throw new UpstreamError(kind, message, response.status, { operation: 'model.request' })
    }
    return response
  }
}
