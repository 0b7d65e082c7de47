import {
  ChatAgentError,
  LockedError,
  StreamInterruptedError,
  TimeoutError,
  UpstreamError
} from './errors.js'
import { silentLogger } from './logger.js'
import type { ChatRequest, ModelClient, StreamEvent, TokenUsage } from './model-client.js'
import { startDeadline, type Deadline } from './timeout-policy.js'
import type { Logger } from './types.js'

export type AssemblyState = 'idle' | 'receiving' | 'completed' | 'interrupted' | 'timedOut' | 'cancelled'

const TRANSITIONS: Record<AssemblyState, readonly AssemblyState[]> = {
  idle: ['receiving'],
  receiving: ['completed', 'interrupted', 'timedOut', 'cancelled'],
  completed: ['idle'],
  interrupted: ['idle'],
  timedOut: ['idle'],
  cancelled: ['idle']
}

export interface AssembleOptions {
  stream: boolean
  timeoutMs: number
  /** User-initiated cancel. */
  signal?: AbortSignal
  onFragment?: (delta: string) => void
  onReasoning?: (delta: string) => void
  agentId?: string
}

/** Result of a call that reached the `completed` state. */
export interface AssembledResponse {
  content: string
  reasoningSummary?: string
  usage?: TokenUsage
  finishReason?: string
  latencyMs: number
}

type Assembled = Omit<AssembledResponse, 'latencyMs'>

/** Rejects as soon as `signal` aborts, even if `promise` never settles. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason)
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason)
    signal.addEventListener('abort', onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(error)
      }
    )
  })
}

/**
 * Drives one call to the remote model and assembles its result. Modeled as a
 * state machine; only the `completed` state yields a response, so partial
 * content from a failed call never leaves this class.
 */
export class ResponseAssembler {
  private current: AssemblyState = 'idle'

  constructor(
    private readonly client: ModelClient,
    private readonly logger: Logger = silentLogger,
    private readonly clock: () => number = Date.now
  ) {}

  get state(): AssemblyState {
    return this.current
  }

  async assemble(request: ChatRequest, options: AssembleOptions): Promise<AssembledResponse> {
    if (this.current === 'receiving') {
      throw new LockedError('A call is already in flight', process.pid, {
        agentId: options.agentId,
        operation: 'model.call'
      })
    }
    if (this.current !== 'idle') this.transition('idle')
    this.transition('receiving')

    const deadline = startDeadline(options.timeoutMs, options.signal)
    const started = this.clock()
    this.logger.info('model.call_started', {
      model: request.model,
      reasoningEffort: request.reasoningEffort,
      stream: options.stream,
      timeoutMs: options.timeoutMs
    })

    try {
      const assembled = options.stream
        ? await this.consumeStream(request, deadline, options)
        : await raceAbort(this.client.complete(request, deadline.signal), deadline.signal)
      this.transition('completed')
      const latencyMs = this.clock() - started
      this.logger.info('model.call_completed', { latencyMs, characters: assembled.content.length })
      return { ...assembled, latencyMs }
    } catch (error) {
      throw this.fail(error, deadline, options)
    } finally {
      deadline.clear()
    }
  }

  private async consumeStream(request: ChatRequest, deadline: Deadline, options: AssembleOptions): Promise<Assembled> {
    const iterator = this.client.stream(request, deadline.signal)[Symbol.asyncIterator]()
    let content = ''
    let reasoning = ''

    try {
      for (;;) {
        const next: IteratorResult<StreamEvent> = await raceAbort(iterator.next(), deadline.signal)
        if (next.done) {
          throw new StreamInterruptedError('ended-early', 'Stream ended before the completion signal', {
            agentId: options.agentId,
            operation: 'model.stream'
          })
        }

        const event = next.value
        switch (event.kind) {
          case 'content':
            content += event.delta
            options.onFragment?.(event.delta)
            break
          case 'reasoning':
            reasoning += event.delta
            options.onReasoning?.(event.delta)
            break
          case 'done':
            return {
              content,
              ...(reasoning ? { reasoningSummary: reasoning } : {}),
              ...(event.usage ? { usage: event.usage } : {}),
              ...(event.finishReason ? { finishReason: event.finishReason } : {})
            }
        }
      }
    } finally {
      this.close(iterator)
    }
  }

  /** Closes the stream without waiting on it; an aborted transport may never settle. */
  private close(iterator: AsyncIterator<StreamEvent>): void {
    const closing = iterator.return?.()
    if (!closing) return
    closing.then(
      () => undefined,
      (error: unknown) => this.logger.warn('model.stream_close_failed', { error: String(error) })
    )
  }

  private fail(error: unknown, deadline: Deadline, options: AssembleOptions): ChatAgentError {
    const context = { agentId: options.agentId, operation: options.stream ? 'model.stream' : 'model.complete' }

    if (deadline.expired) {
      this.transition('timedOut')
      this.logger.warn('model.call_timed_out', { timeoutMs: options.timeoutMs })
      return new TimeoutError(options.timeoutMs, { ...context, cause: error })
    }
    if (deadline.cancelled) {
      this.transition('cancelled')
      this.logger.warn('model.call_cancelled')
      return new StreamInterruptedError('cancelled', 'Request cancelled', { ...context, cause: error })
    }

    this.transition('interrupted')
    this.logger.error('model.call_failed', { error: String(error) })
    if (error instanceof ChatAgentError) return error
    if (options.stream) {
      return new StreamInterruptedError('transport', 'Stream broke off before completion', {
        ...context,
        cause: error
      })
    }
    return new UpstreamError('network', 'Request failed before a response arrived', undefined, {
      ...context,
      cause: error
    })
  }

  private transition(to: AssemblyState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Invalid assembler transition ${this.current} -> ${to}`)
    }
    this.current = to
  }
}
