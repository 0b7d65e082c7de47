import { z } from 'zod'

export const runtimeConfigSchema = z.object({
  agentsRoot: z.string().min(1),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url(),
  backupRetention: z.number().int().positive(),
  logLevel: z.enum(['info', 'warn', 'error'])
})

export type RuntimeConfig = z.infer<typeof runtimeConfigSchema>
