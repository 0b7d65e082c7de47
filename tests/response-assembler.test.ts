import { afterEach, describe, expect, it, vi } from 'vitest'

import { defaultConfig } from '../src/config/agent-config.js'
import { StreamInterruptedError, TimeoutError, UpstreamError } from '../src/core/errors.js'
import { buildChatRequest } from '../src/core/request-builder.js'
import { ResponseAssembler } from '../src/core/response-assembler.js'
import { FakeModelClient } from './helpers.js'

const request = buildChatRequest(defaultConfig(), [], 'Hello')

function steppingClock(step: number): () => number {
  let now = 1_000
  return () => {
    const value = now
    now += step
    return value
  }
}

describe('ResponseAssembler', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('assembles streamed fragments in order', async () => {
    const client = new FakeModelClient({
      events: [
        { kind: 'reasoning', delta: 'Greeting.' },
        { kind: 'content', delta: 'Hi' },
        { kind: 'content', delta: ' there' },
        { kind: 'done', usage: { inputTokens: 4, outputTokens: 2 }, finishReason: 'stop' }
      ]
    })
    const assembler = new ResponseAssembler(client, undefined, steppingClock(250))
    const fragments: string[] = []
    const reasoning: string[] = []

    const response = await assembler.assemble(request, {
      stream: true,
      timeoutMs: 60_000,
      onFragment: (delta) => fragments.push(delta),
      onReasoning: (delta) => reasoning.push(delta)
    })

    expect(fragments).toEqual(['Hi', ' there'])
    expect(reasoning).toEqual(['Greeting.'])
    expect(response).toEqual({
      content: 'Hi there',
      reasoningSummary: 'Greeting.',
      usage: { inputTokens: 4, outputTokens: 2 },
      finishReason: 'stop',
      latencyMs: 250
    })
    expect(assembler.state).toBe('completed')
  })

  it('wraps a non-streaming completion', async () => {
    const client = new FakeModelClient({ completion: { content: 'Done', usage: { totalTokens: 9 } } })
    const assembler = new ResponseAssembler(client, undefined, steppingClock(100))

    const response = await assembler.assemble(request, { stream: false, timeoutMs: 60_000 })
    expect(response).toEqual({ content: 'Done', usage: { totalTokens: 9 }, latencyMs: 100 })
  })

  it('fails when the stream ends without completion', async () => {
    const client = new FakeModelClient({ events: [{ kind: 'content', delta: 'partial' }] })
    const assembler = new ResponseAssembler(client)

    const failure = assembler.assemble(request, { stream: true, timeoutMs: 60_000 })
    await expect(failure).rejects.toBeInstanceOf(StreamInterruptedError)
    await expect(failure).rejects.toMatchObject({ reason: 'ended-early' })
    expect(assembler.state).toBe('interrupted')
  })

  it('reports a transport failure mid-stream as interrupted', async () => {
    const client = new FakeModelClient({ events: [{ kind: 'content', delta: 'par' }], error: new Error('socket hang up') })
    const assembler = new ResponseAssembler(client)

    await expect(assembler.assemble(request, { stream: true, timeoutMs: 60_000 })).rejects.toMatchObject({
      reason: 'transport'
    })
  })

  it('passes upstream errors through unchanged', async () => {
    const upstream = new UpstreamError('auth', 'Invalid API key', 401)
    const assembler = new ResponseAssembler(new FakeModelClient({ error: upstream }))

    await expect(assembler.assemble(request, { stream: false, timeoutMs: 60_000 })).rejects.toBe(upstream)
  })

  it('times out a stalled stream', async () => {
    vi.useFakeTimers()
    const client = new FakeModelClient({ events: [{ kind: 'content', delta: 'Hi' }], hang: true })
    const assembler = new ResponseAssembler(client)

    const failure = assembler.assemble(request, { stream: true, timeoutMs: 180_000 })
    const assertion = expect(failure).rejects.toBeInstanceOf(TimeoutError)
    await vi.advanceTimersByTimeAsync(180_000)
    await assertion
    expect(assembler.state).toBe('timedOut')
  })

  it('reports a user cancel as cancelled', async () => {
    const controller = new AbortController()
    const client = new FakeModelClient({ hang: true })
    const assembler = new ResponseAssembler(client)

    const failure = assembler.assemble(request, { stream: true, timeoutMs: 60_000, signal: controller.signal })
    controller.abort()
    await expect(failure).rejects.toMatchObject({ reason: 'cancelled' })
    expect(assembler.state).toBe('cancelled')
  })

  it('accepts a new call once the previous one completed', async () => {
    const assembler = new ResponseAssembler(new FakeModelClient({ completion: { content: 'ok' } }))
    await assembler.assemble(request, { stream: false, timeoutMs: 60_000 })
    const second = await assembler.assemble(request, { stream: false, timeoutMs: 60_000 })
    expect(second.content).toBe('ok')
  })
})
