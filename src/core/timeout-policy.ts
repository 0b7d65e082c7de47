import {
  REASONING_EFFORTS,
  SUPPORTED_MODELS,
  type ModelVariant,
  type ReasoningEffort
} from '../config/models.js'
import { ValidationError } from './errors.js'

export interface TimeoutWindow {
  timeoutMs: number
  /** Window for the lowest effort the variant supports. */
  floorMs: number
  /** Window for the highest effort the variant supports. */
  ceilingMs: number
}

/**
 * Maps (model variant, reasoning effort) to a bounded wait window. Low effort
 * sits at the variant's floor, high effort at its ceiling.
 */
export function resolveTimeout(model: ModelVariant, effort: ReasoningEffort): TimeoutWindow {
  const table = SUPPORTED_MODELS[model].reasoningTimeout
  const seconds = table[effort]
  if (seconds === undefined) {
    throw new ValidationError(`${model} does not support reasoning effort "${effort}"`, [
      { path: 'reasoningEffort', message: effort }
    ])
  }
  const supported = REASONING_EFFORTS.flatMap((level) => {
    const value = table[level]
    return value === undefined ? [] : [value]
  })
  return {
    timeoutMs: seconds * 1000,
    floorMs: Math.min(...supported) * 1000,
    ceilingMs: Math.max(...supported) * 1000
  }
}

export interface Deadline {
  /** Aborts when the window expires or when the parent signal aborts. */
  readonly signal: AbortSignal
  readonly timeoutMs: number
  readonly expired: boolean
  readonly cancelled: boolean
  clear(): void
}

/**
 * Starts the cancellation timer for one call. `parent` carries a user-initiated
 * cancel (Ctrl+C) so both sources abort the same in-flight request.
 */
export function startDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController()
  let expired = false
  let cancelled = false

  const onParentAbort = (): void => {
    cancelled = true
    controller.abort(parent?.reason)
  }

  const timer = setTimeout(() => {
    expired = true
    controller.abort(new Error(`deadline of ${timeoutMs}ms expired`))
  }, timeoutMs)

  if (parent?.aborted) onParentAbort()
  else parent?.addEventListener('abort', onParentAbort, { once: true })

  return {
    signal: controller.signal,
    timeoutMs,
    get expired() {
      return expired
    },
    get cancelled() {
      return cancelled
    },
    clear() {
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }
  }
}
