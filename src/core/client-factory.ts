import type { AgentConfig } from '../config/agent-config.js'
import { resolveApiKey } from '../config/load.js'
import type { RuntimeConfig } from '../config/schema.js'
import type { AgentPaths } from './agent-paths.js'
import type { ModelClient } from './model-client.js'
import { OpenAIClient } from './openai-client.js'
import type { Logger } from './types.js'

export type ModelClientFactory = (config: AgentConfig, paths: AgentPaths, logger: Logger) => ModelClient

/** Builds the HTTP client for an agent, resolving its API key on first use. */
export function openAIClientFactory(runtime: RuntimeConfig, fetchImpl?: typeof fetch): ModelClientFactory {
  return (config, paths, logger) =>
    new OpenAIClient({
      apiKey: resolveApiKey(runtime, paths.root, config.model, paths.agentId),
      baseUrl: runtime.baseUrl,
      logger,
      ...(fetchImpl ? { fetchImpl } : {})
    })
}
