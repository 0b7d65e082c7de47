export type ErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'PERSISTENCE'
  | 'CORRUPTION'
  | 'TIMEOUT'
  | 'STREAM_INTERRUPTED'
  | 'EXPORT'
  | 'LOCKED'
  | 'UPSTREAM'

export interface ErrorContext {
  agentId?: string
  operation?: string
  cause?: unknown
}

/**
 * Base class for every failure the session engine surfaces. Carries the agent
 * and operation so callers can report or act on it without string matching.
 */
export class ChatAgentError extends Error {
  readonly code: ErrorCode
  readonly agentId: string | undefined
  readonly operation: string | undefined

  constructor(code: ErrorCode, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause })
    this.name = new.target.name
    this.code = code
    this.agentId = context.agentId
    this.operation = context.operation
  }
}

export interface ValidationIssue {
  path: string
  message: string
}

export class ValidationError extends ChatAgentError {
  readonly issues: ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[] = [], context: ErrorContext = {}) {
    super('VALIDATION', message, context)
    this.issues = issues
  }
}

export class NotFoundError extends ChatAgentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('NOT_FOUND', message, context)
  }
}

/** Durable write failed; the previous on-disk state is untouched. */
export class PersistenceError extends ChatAgentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('PERSISTENCE', message, context)
  }
}

/** Live history could not be parsed; recover from a backup. */
export class CorruptionError extends ChatAgentError {
  readonly filePath: string

  constructor(message: string, filePath: string, context: ErrorContext = {}) {
    super('CORRUPTION', message, context)
    this.filePath = filePath
  }
}

export class TimeoutError extends ChatAgentError {
  readonly timeoutMs: number

  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super(
      'TIMEOUT',
      `Request timed out after ${formatDuration(timeoutMs)}. Try lowering the reasoning effort.`,
      context
    )
    this.timeoutMs = timeoutMs
  }
}

export type InterruptReason = 'ended-early' | 'transport' | 'cancelled'

export class StreamInterruptedError extends ChatAgentError {
  readonly reason: InterruptReason

  constructor(reason: InterruptReason, message: string, context: ErrorContext = {}) {
    super('STREAM_INTERRUPTED', message, context)
    this.reason = reason
  }
}

export class ExportError extends ChatAgentError {
  constructor(message: string, context: ErrorContext = {}) {
    super('EXPORT', message, context)
  }
}

export class LockedError extends ChatAgentError {
  readonly holderPid: number | undefined

  constructor(message: string, holderPid: number | undefined, context: ErrorContext = {}) {
    super('LOCKED', message, context)
    this.holderPid = holderPid
  }
}

export type UpstreamErrorKind = 'rate_limit' | 'auth' | 'server' | 'bad_request' | 'network'

/** Failure reported by the remote endpoint itself, as opposed to a client-side timeout. */
export class UpstreamError extends ChatAgentError {
  readonly kind: UpstreamErrorKind
  readonly status: number | undefined

  constructor(kind: UpstreamErrorKind, message: string, status?: number, context: ErrorContext = {}) {
    super('UPSTREAM', message, context)
    this.kind = kind
    this.status = status
  }
}

/** Maps an HTTP status to the upstream error kind it represents. */
export function classifyStatus(status: number): UpstreamErrorKind {
  if (status === 401 || status === 403) return 'auth'
  if (status === 429) return 'rate_limit'
  if (status >= 500) return 'server'
  return 'bad_request'
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000)
  const minutes = Math.floor(totalSeconds / 60)
  const seconds = totalSeconds % 60
  if (minutes === 0) return `${seconds}s`
  return seconds === 0 ? `${minutes}min` : `${minutes}min ${seconds}s`
}

/** One-line rendering for terminal output. */
export function describeError(error: unknown): string {
  if (error instanceof ChatAgentError) {
    const where = [error.agentId, error.operation].filter(Boolean).join('/')
    const detail =
      error instanceof ValidationError && error.issues.length > 0
        ? ` (${error.issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')})`
        : ''
    return `${error.name}${where ? ` [${where}]` : ''}: ${error.message}${detail}`
  }
  return error instanceof Error ? error.message : String(error)
}

/** True for Node system errors carrying the given `code` (ENOENT, EEXIST, ...). */
export function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
