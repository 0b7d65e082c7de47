import type { AgentConfig, AgentConfigInput } from '../config/agent-config.js'
import { AgentLock } from './agent-lock.js'
import type { AgentPaths } from './agent-paths.js'
import type { ModelClientFactory } from './client-factory.js'
import type { ConfigStore } from './config-store.js'
import { LockedError, ValidationError } from './errors.js'
import { expandFileInclusions } from './file-inclusion.js'
import type { HistoryStore } from './history-store.js'
import { silentLogger } from './logger.js'
import type { ModelClient } from './model-client.js'
import { buildChatRequest } from './request-builder.js'
import { ResponseAssembler, type AssembledResponse } from './response-assembler.js'
import { resolveTimeout, type TimeoutWindow } from './timeout-policy.js'
import type { Logger, Turn, TurnMetadata } from './types.js'

export interface ChatSessionDeps {
  configStore: ConfigStore
  historyStore: HistoryStore
  createClient: ModelClientFactory
  /** Roots searched for `{path}` placeholders. */
  searchRoots: (paths: AgentPaths) => string[]
  logger?: Logger
  /** Settings applied when the agent is created. */
  initialConfig?: AgentConfigInput
}

export interface SendOptions {
  onFragment?: (delta: string) => void
  onReasoning?: (delta: string) => void
  signal?: AbortSignal
  /** Overrides the policy window. */
  timeoutMs?: number
}

function assistantMetadata(config: AgentConfig, response: AssembledResponse): TurnMetadata {
  const usage = response.usage
  return {
    model: config.model,
    reasoningEffort: config.reasoningEffort,
    latencyMs: response.latencyMs,
    ...(usage?.inputTokens !== undefined ? { inputTokens: usage.inputTokens } : {}),
    ...(usage?.outputTokens !== undefined ? { outputTokens: usage.outputTokens } : {}),
    ...(usage?.totalTokens !== undefined ? { totalTokens: usage.totalTokens } : {}),
    ...(response.reasoningSummary && config.reasoningSummary !== 'none'
      ? { reasoningSummary: response.reasoningSummary }
      : {}),
    ...(response.finishReason ? { finishReason: response.finishReason } : {})
  }
}

/**
 * One interactive conversation with an agent. Holds the agent lock for its
 * lifetime so a second process cannot drive the same agent concurrently.
 */
export class ChatSession {
  private closed = false
  private client: ModelClient | undefined
  private assembler: ResponseAssembler | undefined

  private constructor(
    readonly paths: AgentPaths,
    private config: AgentConfig,
    private readonly lock: AgentLock,
    private readonly deps: ChatSessionDeps,
    private readonly logger: Logger
  ) {}

  /**
   * Locks the agent, loads or creates its configuration and checks that its
   * history parses. A `CorruptionError` is passed on so the caller can offer
   * backup recovery.
   */
  static async open(agentId: string, deps: ChatSessionDeps): Promise<ChatSession> {
    const paths = deps.historyStore.paths(agentId)
    const logger = deps.logger ?? silentLogger
    const lock = await AgentLock.acquire(paths, logger)
    try {
      const config = await deps.configStore.loadOrCreate(agentId, deps.initialConfig)
      const history = await deps.historyStore.load(agentId)
      logger.info('session.opened', { model: config.model, turns: history.length })
      return new ChatSession(paths, config, lock, deps, logger)
    } catch (error) {
      await lock.release()
      throw error
    }
  }

  get agentId(): string {
    return this.paths.agentId
  }

  get configuration(): AgentConfig {
    return this.config
  }

  get timeoutWindow(): TimeoutWindow {
    return resolveTimeout(this.config.model, this.config.reasoningEffort)
  }

  async history(): Promise<readonly Turn[]> {
    return this.deps.historyStore.load(this.agentId)
  }

  /** Applies one configuration edit; the next call uses the new settings. */
  async setConfigValue(key: string, raw: string): Promise<AgentConfig> {
    this.ensureOpen()
    const previousModel = this.config.model
    this.config = await this.deps.configStore.setValue(this.agentId, key, raw)
    if (this.config.model !== previousModel) {
      this.client = undefined
      this.assembler = undefined
    }
    return this.config
  }

  /**
   * Sends one user message. The user turn and the assistant turn are appended
   * only after the call completes; on any failure history is left unchanged.
   */
  async send(text: string, options: SendOptions = {}): Promise<Turn> {
    this.ensureOpen()
    if (text.trim() === '') {
      throw new ValidationError('Message must not be empty', [{ path: 'text', message: 'empty' }], {
        agentId: this.agentId,
        operation: 'session.send'
      })
    }

    const config = this.config
    const inclusion = await expandFileInclusions(text, {
      searchRoots: this.deps.searchRoots(this.paths),
      logger: this.logger,
      agentId: this.agentId
    })
    const history = await this.deps.historyStore.load(this.agentId)
    const request = buildChatRequest(config, history, inclusion.text)
    const timeoutMs = options.timeoutMs ?? resolveTimeout(config.model, config.reasoningEffort).timeoutMs

    const response = await this.assemblerFor(config).assemble(request, {
      stream: config.stream,
      timeoutMs,
      agentId: this.agentId,
      ...(options.signal ? { signal: options.signal } : {}),
      ...(options.onFragment ? { onFragment: options.onFragment } : {}),
      ...(options.onReasoning ? { onReasoning: options.onReasoning } : {})
    })

    const [, assistant] = await this.deps.historyStore.appendExchange(
      this.agentId,
      {
        role: 'user',
        content: inclusion.text,
        ...(inclusion.includedFiles.length > 0 ? { metadata: { includedFiles: inclusion.includedFiles } } : {})
      },
      { role: 'assistant', content: response.content, metadata: assistantMetadata(config, response) },
      { cap: config.maxHistorySize }
    )
    return assistant
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    await this.lock.release()
    this.logger.info('session.closed')
  }

  private assemblerFor(config: AgentConfig): ResponseAssembler {
    if (!this.assembler || !this.client) {
      this.client = this.deps.createClient(config, this.paths, this.logger)
      this.assembler = new ResponseAssembler(this.client, this.logger)
    }
    return this.assembler
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new LockedError(`Session for "${this.agentId}" is closed`, undefined, {
        agentId: this.agentId,
        operation: 'session'
      })
    }
  }
}
