import { existsSync, readFileSync } from 'node:fs'
import { join } from 'node:path'

import { config as loadEnv } from 'dotenv'
import { z } from 'zod'

import { NotFoundError, ValidationError } from '../core/errors.js'
import { issuesFromZod } from './agent-config.js'
import { runtimeConfigSchema, type RuntimeConfig } from './schema.js'

/** Parses an optional integer env value, leaving validation to the schema. */
function parseInteger(input: string | undefined, fallback: number): number {
  if (!input) return fallback
  return Number(input)
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  if (env === process.env) loadEnv()

  const result = runtimeConfigSchema.safeParse({
    agentsRoot: env.CHAT_AGENTS_HOME ?? join(process.cwd(), 'agents'),
    apiKey: env.OPENAI_API_KEY || undefined,
    baseUrl: env.OPENAI_BASE_URL ?? 'https://api.openai.com/v1',
    backupRetention: parseInteger(env.CHAT_AGENTS_BACKUP_RETENTION, 10),
    logLevel: env.CHAT_AGENTS_LOG_LEVEL ?? 'warn'
  })
  if (!result.success) {
    throw new ValidationError('Invalid runtime configuration', issuesFromZod(result.error), {
      operation: 'config.runtime'
    })
  }
  return result.data
}

const secretsSchema = z.object({
  provider: z.string().optional(),
  keys: z.record(z.string(), z.string().min(1)).default({})
})

/**
 * Resolves the API key: environment first, then the agent's `secrets.json`
 * (model-specific key before `default`).
 */
export function resolveApiKey(runtime: RuntimeConfig, agentDir: string, model: string, agentId?: string): string {
  if (runtime.apiKey) return runtime.apiKey

  const secretsFile = join(agentDir, 'secrets.json')
  if (existsSync(secretsFile)) {
    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(secretsFile, 'utf-8'))
    } catch (error) {
      throw new ValidationError('secrets.json is not valid JSON', [], {
        agentId,
        operation: 'config.apiKey',
        cause: error
      })
    }
    const parsed = secretsSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ValidationError('secrets.json has an unexpected shape', issuesFromZod(parsed.error), {
        agentId,
        operation: 'config.apiKey'
      })
    }
    const key = parsed.data.keys[model] ?? parsed.data.keys.default
    if (key) return key
  }

  throw new NotFoundError('No API key found. Set OPENAI_API_KEY or add keys to secrets.json.', {
    agentId,
    operation: 'config.apiKey'
  })
}
