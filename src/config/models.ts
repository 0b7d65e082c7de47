export const MODEL_VARIANTS = ['gpt-5', 'gpt-5-mini', 'gpt-5-nano'] as const
export const REASONING_EFFORTS = ['low', 'medium', 'high'] as const

export type ModelVariant = (typeof MODEL_VARIANTS)[number]
export type ReasoningEffort = (typeof REASONING_EFFORTS)[number]

export interface ModelSpec {
  name: string
  tier: 'top' | 'mid' | 'light'
  description: string
  /** Wait window per supported effort, in seconds. */
  reasoningTimeout: Partial<Record<ReasoningEffort, number>>
}

/**
 * Catalogue of model variants. An effort missing from `reasoningTimeout` is
 * not a valid combination for that variant.
 */
export const SUPPORTED_MODELS: Record<ModelVariant, ModelSpec> = {
  'gpt-5': {
    name: 'GPT-5',
    tier: 'top',
    description: 'Full-featured model with advanced reasoning',
    reasoningTimeout: { low: 180, medium: 360, high: 720 }
  },
  'gpt-5-mini': {
    name: 'GPT-5 Mini',
    tier: 'mid',
    description: 'Compact model balancing quality and latency',
    reasoningTimeout: { low: 90, medium: 180, high: 360 }
  },
  'gpt-5-nano': {
    name: 'GPT-5 Nano',
    tier: 'light',
    description: 'Lightweight model optimized for speed',
    reasoningTimeout: { low: 60, medium: 120, high: 240 }
  }
}

export function isModelVariant(value: string): value is ModelVariant {
  return MODEL_VARIANTS.some((variant) => variant === value)
}

export function supportsEffort(model: ModelVariant, effort: ReasoningEffort): boolean {
  return SUPPORTED_MODELS[model].reasoningTimeout[effort] !== undefined
}

export function displayName(model: string): string {
  return isModelVariant(model) ? SUPPORTED_MODELS[model].name : model
}
