import { join } from 'node:path'

import { ValidationError } from './errors.js'

const AGENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,63}$/

export interface AgentPaths {
  agentId: string
  root: string
  config: string
  history: string
  lock: string
  backups: string
  exports: string
  logs: string
  uploads: string
}

export function assertAgentId(agentId: string): void {
  if (!AGENT_ID_PATTERN.test(agentId)) {
    throw new ValidationError(
      `Invalid agent id "${agentId}"`,
      [{ path: 'agentId', message: 'use 1-64 letters, digits, "-" or "_", starting with a letter or digit' }],
      { agentId, operation: 'agent.resolve' }
    )
  }
}

/** On-disk layout of one agent. Each file is independent of the others. */
export function agentPaths(agentsRoot: string, agentId: string): AgentPaths {
  assertAgentId(agentId)
  const root = join(agentsRoot, agentId)
  return {
    agentId,
    root,
    config: join(root, 'config.yaml'),
    history: join(root, 'history.json'),
    lock: join(root, 'agent.lock'),
    backups: join(root, 'backups'),
    exports: join(root, 'exports'),
    logs: join(root, 'logs'),
    uploads: join(root, 'uploads')
  }
}
