import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ReadableStream } from 'node:stream/web'

import type { ChatRequest, Completion, ModelClient, StreamEvent } from '../src/core/model-client.js'
import type { Logger } from '../src/core/types.js'

export async function makeTempDir(prefix = 'chat-agents-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export interface LogEntry {
  level: 'info' | 'warn' | 'error'
  event: string
  data?: Record<string, unknown>
}

/** Logger that records entries for assertions. */
export function recordingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = []
  const push =
    (level: LogEntry['level']) =>
    (event: string, data?: Record<string, unknown>): void => {
      entries.push({ level, event, ...(data ? { data } : {}) })
    }
  return { entries, info: push('info'), warn: push('warn'), error: push('error') }
}

export interface FakeScript {
  /** Events yielded by `stream()` before it ends (or hangs). */
  events?: StreamEvent[]
  completion?: Completion
  /** Never settle after the scripted events, until the signal aborts. */
  hang?: boolean
  /** Thrown by `complete()`, or by `stream()` after the scripted events. */
  error?: unknown
}

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) reject(signal.reason)
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

/** In-process stand-in for the remote endpoint. */
export class FakeModelClient implements ModelClient {
  readonly requests: ChatRequest[] = []

  constructor(private readonly script: FakeScript = {}) {}

  async complete(request: ChatRequest, signal: AbortSignal): Promise<Completion> {
    this.requests.push(request)
    if (this.script.hang) return waitForAbort(signal)
    if (this.script.error !== undefined) throw this.script.error
    return this.script.completion ?? { content: '' }
  }

  async *stream(request: ChatRequest, signal: AbortSignal): AsyncGenerator<StreamEvent> {
    this.requests.push(request)
    for (const event of this.script.events ?? []) yield event
    if (this.script.hang) await waitForAbort(signal)
    if (this.script.error !== undefined) throw this.script.error
  }
}

/** A `fetch` response body streamed in the given chunks. */
export function sseResponse(chunks: string[], status = 200): Response {
  const encoder = new TextEncoder()
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk))
      controller.close()
    }
  })
  return new Response(body, { status, headers: { 'Content-Type': 'text/event-stream' } })
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
}
