import { z } from 'zod'

import { ValidationError, type ErrorContext, type ValidationIssue } from '../core/errors.js'
import { MODEL_VARIANTS, REASONING_EFFORTS, supportsEffort } from './models.js'

export const REASONING_SUMMARIES = ['auto', 'detailed', 'none'] as const
export const TEXT_VERBOSITIES = ['low', 'medium', 'high'] as const

export const agentConfigSchema = z
  .object({
    model: z.enum(MODEL_VARIANTS).default('gpt-5'),
    temperature: z.number().finite().min(0).max(2).default(1),
    reasoningEffort: z.enum(REASONING_EFFORTS).default('medium'),
    reasoningSummary: z.enum(REASONING_SUMMARIES).default('auto'),
    stream: z.boolean().default(true),
    maxOutputTokens: z.number().int().positive().nullable().default(null),
    maxHistorySize: z.number().int().positive().default(1000),
    systemPrompt: z.string().min(1).nullable().default(null),
    textVerbosity: z.enum(TEXT_VERBOSITIES).default('medium'),
    topP: z.number().finite().min(0).max(1).default(1),
    createdAt: z.string().datetime().optional(),
    updatedAt: z.string().datetime().optional()
  })
  .strict()
  .superRefine((config, ctx) => {
    if (!supportsEffort(config.model, config.reasoningEffort)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['reasoningEffort'],
        message: `${config.model} does not support reasoning effort "${config.reasoningEffort}"`
      })
    }
  })

export type AgentConfig = z.output<typeof agentConfigSchema>
export type AgentConfigInput = z.input<typeof agentConfigSchema>

/** Keys a user may edit; timestamps are maintained by the store. */
export const EDITABLE_KEYS = [
  'model',
  'temperature',
  'reasoningEffort',
  'reasoningSummary',
  'stream',
  'maxOutputTokens',
  'maxHistorySize',
  'systemPrompt',
  'textVerbosity',
  'topP'
] as const

export type EditableKey = (typeof EDITABLE_KEYS)[number]

export function isEditableKey(key: string): key is EditableKey {
  return EDITABLE_KEYS.some((editable) => editable === key)
}

export function issuesFromZod(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message
  }))
}

/**
 * Checks every field's domain and the model/effort pairing. Values outside
 * their domain are rejected, never clamped.
 */
export function validateConfig(candidate: unknown, context: ErrorContext = {}): AgentConfig | ValidationError {
  const result = agentConfigSchema.safeParse(candidate)
  if (result.success) return result.data
  return new ValidationError('Invalid agent configuration', issuesFromZod(result.error), {
    operation: 'config.validate',
    ...context
  })
}

export function defaultConfig(): AgentConfig {
  return agentConfigSchema.parse({})
}

const NULL_WORDS = new Set(['null', 'none', 'unset'])
const NUMERIC_KEYS = new Set<EditableKey>(['temperature', 'topP', 'maxOutputTokens', 'maxHistorySize'])
const NULLABLE_KEYS = new Set<EditableKey>(['maxOutputTokens', 'systemPrompt'])

/**
 * Turns a command-line string into the typed value for `key`. Domain checks
 * are left to `validateConfig`; this only decides the primitive type.
 */
export function parseConfigValue(key: EditableKey, raw: string): unknown {
  const value = raw.trim()

  if (NULLABLE_KEYS.has(key) && NULL_WORDS.has(value.toLowerCase())) return null

  if (NUMERIC_KEYS.has(key)) {
    const parsed = Number(value)
    if (value === '' || Number.isNaN(parsed)) {
      throw new ValidationError(`Expected a number for ${key}`, [{ path: key, message: `"${raw}" is not a number` }])
    }
    return parsed
  }

  if (key === 'stream') {
    const lowered = value.toLowerCase()
    if (['true', 'yes', 'y', 'on'].includes(lowered)) return true
    if (['false', 'no', 'n', 'off'].includes(lowered)) return false
    throw new ValidationError('Expected a boolean for stream', [{ path: key, message: `"${raw}" is not a boolean` }])
  }

  return value
}
