import { readdir } from 'node:fs/promises'

import type { AgentConfigInput } from '../config/agent-config.js'
import type { RuntimeConfig } from '../config/schema.js'
import type { AgentPaths } from './agent-paths.js'
import { ChatSession, type ChatSessionDeps } from './chat-session.js'
import { openAIClientFactory, type ModelClientFactory } from './client-factory.js'
import { ConfigStore } from './config-store.js'
import { isErrorCode } from './errors.js'
import { HistoryExporter } from './export.js'
import { defaultSearchRoots } from './file-inclusion.js'
import { HistoryStore } from './history-store.js'
import { agentLoggerFactory } from './logger.js'
import type { Logger } from './types.js'

export interface WorkspaceOptions {
  cwd?: string
  now?: () => Date
  createClient?: ModelClientFactory
  loggerFor?: (agentId: string) => Logger
}

/** Stores and collaborators for one agents root, shared by every command. */
export interface Workspace {
  runtime: RuntimeConfig
  configStore: ConfigStore
  historyStore: HistoryStore
  exporter: HistoryExporter
  loggerFor: (agentId: string) => Logger
  searchRoots: (paths: AgentPaths) => string[]
  cwd: string
  openSession(agentId: string, initialConfig?: AgentConfigInput): Promise<ChatSession>
  listAgents(): Promise<string[]>
}

export function createWorkspace(runtime: RuntimeConfig, options: WorkspaceOptions = {}): Workspace {
  const cwd = options.cwd ?? process.cwd()
  const loggerFor: (agentId: string) => Logger =
    options.loggerFor ?? agentLoggerFactory((agentId) => configStore.paths(agentId).logs, runtime.logLevel)
  const common = {
    agentsRoot: runtime.agentsRoot,
    loggerFor,
    ...(options.now ? { now: options.now } : {})
  }

  const configStore = new ConfigStore(common)
  const historyStore = new HistoryStore({ ...common, backupRetention: runtime.backupRetention })
  const exporter = new HistoryExporter(historyStore, {
    loggerFor,
    ...(options.now ? { now: options.now } : {})
  })
  const createClient = options.createClient ?? openAIClientFactory(runtime)
  const searchRoots = (paths: AgentPaths): string[] => defaultSearchRoots(cwd, paths.uploads)

  return {
    runtime,
    configStore,
    historyStore,
    exporter,
    loggerFor,
    searchRoots,
    cwd,
    openSession(agentId, initialConfig) {
      const deps: ChatSessionDeps = {
        configStore,
        historyStore,
        createClient,
        searchRoots,
        logger: loggerFor(agentId),
        ...(initialConfig ? { initialConfig } : {})
      }
      return ChatSession.open(agentId, deps)
    },
    async listAgents() {
      try {
        const entries = await readdir(runtime.agentsRoot, { withFileTypes: true })
        return entries
          .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
          .map((entry) => entry.name)
          .sort()
      } catch (error) {
        if (isErrorCode(error, 'ENOENT')) return []
        throw error
      }
    }
  }
}
