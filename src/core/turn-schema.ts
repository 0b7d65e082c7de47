import { z } from 'zod'

import type { Turn } from './types.js'

const count = z.number().int().nonnegative()

export const turnMetadataSchema = z.object({
  inputTokens: count.optional(),
  outputTokens: count.optional(),
  totalTokens: count.optional(),
  latencyMs: z.number().nonnegative().optional(),
  reasoningSummary: z.string().optional(),
  model: z.string().optional(),
  reasoningEffort: z.string().optional(),
  finishReason: z.string().optional(),
  includedFiles: z.array(z.string()).optional()
})

export const turnSchema = z.object({
  seq: z.number().int().positive(),
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string().datetime({ offset: true }),
  metadata: turnMetadataSchema.optional()
})

export const historySchema = z.array(turnSchema).superRefine((turns, ctx) => {
  for (let index = 1; index < turns.length; index += 1) {
    const previous = turns[index - 1]
    const current = turns[index]
    if (previous && current && current.seq !== previous.seq + 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'seq'],
        message: `expected seq ${previous.seq + 1} after ${previous.seq}, found ${current.seq}`
      })
    }
  }
})

/** Freezes a parsed turn so it cannot be edited after it is appended. */
export function freezeTurn(turn: z.output<typeof turnSchema>): Turn {
  const { metadata, ...rest } = turn
  return Object.freeze(metadata ? { ...rest, metadata: Object.freeze({ ...metadata }) } : rest)
}
