import { readFile } from 'node:fs/promises'

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'

import {
  defaultConfig,
  isEditableKey,
  parseConfigValue,
  validateConfig,
  type AgentConfig,
  type AgentConfigInput
} from '../config/agent-config.js'
import { agentPaths, type AgentPaths } from './agent-paths.js'
import { writeFileAtomic } from './atomic-write.js'
import { NotFoundError, PersistenceError, ValidationError, isErrorCode } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './types.js'

export interface ConfigStoreOptions {
  agentsRoot: string
  loggerFor?: (agentId: string) => Logger
  now?: () => Date
}

/**
 * Per-agent configuration in `config.yaml`. Independent of the history file:
 * a failed or corrupt config never touches history.
 */
export class ConfigStore {
  constructor(private readonly options: ConfigStoreOptions) {}

  paths(agentId: string): AgentPaths {
    return agentPaths(this.options.agentsRoot, agentId)
  }

  /** Fails with `NotFoundError` if the agent has never been configured. */
  async load(agentId: string): Promise<AgentConfig> {
    const paths = this.paths(agentId)
    let text: string
    try {
      text = await readFile(paths.config, 'utf-8')
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        throw new NotFoundError(`Agent "${agentId}" has no configuration`, {
          agentId,
          operation: 'config.load',
          cause: error
        })
      }
      throw new PersistenceError(`Could not read configuration for "${agentId}"`, {
        agentId,
        operation: 'config.load',
        cause: error
      })
    }

    let raw: unknown
    try {
      raw = parseYaml(text)
    } catch (error) {
      throw new ValidationError(`config.yaml for "${agentId}" is not valid YAML`, [], {
        agentId,
        operation: 'config.load',
        cause: error
      })
    }

    const result = validateConfig(raw ?? {}, { agentId, operation: 'config.load' })
    if (result instanceof ValidationError) throw result
    return Object.freeze(result)
  }

  /**
   * Loads the configuration, materializing and persisting the defaults (plus
   * `initial`) the first time an agent is used.
   */
  async loadOrCreate(agentId: string, initial: AgentConfigInput = {}): Promise<AgentConfig> {
    try {
      return await this.load(agentId)
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error
    }
    const created = await this.save(agentId, { ...defaultConfig(), ...initial })
    this.logFor(agentId).info('config.created', { model: created.model })
    return created
  }

  validate(candidate: unknown): AgentConfig | ValidationError {
    return validateConfig(candidate)
  }

  /** Validates, stamps timestamps and writes atomically. */
  async save(agentId: string, candidate: AgentConfigInput): Promise<AgentConfig> {
    const paths = this.paths(agentId)
    const stamp = this.now().toISOString()
    const result = validateConfig(
      { ...candidate, createdAt: candidate.createdAt ?? stamp, updatedAt: stamp },
      { agentId, operation: 'config.save' }
    )
    if (result instanceof ValidationError) throw result

    try {
      await writeFileAtomic(paths.config, stringifyYaml(result))
    } catch (error) {
      throw new PersistenceError(`Could not save configuration for "${agentId}"`, {
        agentId,
        operation: 'config.save',
        cause: error
      })
    }
    this.logFor(agentId).info('config.saved', { model: result.model, reasoningEffort: result.reasoningEffort })
    return Object.freeze(result)
  }

  /** Load, merge `patch`, validate, save. */
  async update(agentId: string, patch: Partial<AgentConfigInput>): Promise<AgentConfig> {
    const current = await this.loadOrCreate(agentId)
    return this.save(agentId, { ...current, ...patch })
  }

  /** Applies one `key value` edit as typed on the command line. */
  async setValue(agentId: string, key: string, raw: string): Promise<AgentConfig> {
    if (!isEditableKey(key)) {
      throw new ValidationError(`Unknown configuration key "${key}"`, [{ path: key, message: 'not editable' }], {
        agentId,
        operation: 'config.set'
      })
    }
    const current = await this.loadOrCreate(agentId)
    const candidate: Record<string, unknown> = { ...current, [key]: parseConfigValue(key, raw) }
    const result = validateConfig(candidate, { agentId, operation: 'config.set' })
    if (result instanceof ValidationError) throw result
    return this.save(agentId, result)
  }

  private now(): Date {
    return this.options.now?.() ?? new Date()
  }

  private logFor(agentId: string): Logger {
    return this.options.loggerFor?.(agentId) ?? silentLogger
  }
}
