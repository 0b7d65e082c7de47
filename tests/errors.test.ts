import { describe, expect, it } from 'vitest'

import {
  ChatAgentError,
  TimeoutError,
  UpstreamError,
  ValidationError,
  classifyStatus,
  describeError,
  formatDuration,
  isErrorCode
} from '../src/core/errors.js'

describe('classifyStatus', () => {
  it('maps HTTP statuses to upstream kinds', () => {
    expect(classifyStatus(401)).toBe('auth')
    expect(classifyStatus(403)).toBe('auth')
    expect(classifyStatus(429)).toBe('rate_limit')
    expect(classifyStatus(500)).toBe('server')
    expect(classifyStatus(503)).toBe('server')
    expect(classifyStatus(400)).toBe('bad_request')
  })
})

describe('formatDuration', () => {
  it('renders minutes and seconds', () => {
    expect(formatDuration(720_000)).toBe('12min')
    expect(formatDuration(90_000)).toBe('1min 30s')
    expect(formatDuration(45_000)).toBe('45s')
  })
})

describe('error taxonomy', () => {
  it('carries code, context and cause', () => {
    const cause = new Error('boom')
    const error = new UpstreamError('rate_limit', 'slow down', 429, { agentId: 'a1', operation: 'model.request', cause })

    expect(error).toBeInstanceOf(ChatAgentError)
    expect(error.name).toBe('UpstreamError')
    expect(error.code).toBe('UPSTREAM')
    expect(error.kind).toBe('rate_limit')
    expect(error.status).toBe(429)
    expect(error.agentId).toBe('a1')
    expect(error.cause).toBe(cause)
  })

  it('suggests a lower effort on timeout', () => {
    const error = new TimeoutError(180_000)
    expect(error.message).toBe('Request timed out after 3min. Try lowering the reasoning effort.')
    expect(error.timeoutMs).toBe(180_000)
  })

  it('describes errors on one line', () => {
    const error = new ValidationError('Invalid agent configuration', [{ path: 'temperature', message: 'too big' }], {
      agentId: 'a1',
      operation: 'config.set'
    })
    expect(describeError(error)).toBe(
      'ValidationError [a1/config.set]: Invalid agent configuration (temperature: too big)'
    )
    expect(describeError(new Error('plain'))).toBe('plain')
    expect(describeError('text')).toBe('text')
  })

  it('matches system error codes', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' })
    expect(isErrorCode(error, 'ENOENT')).toBe(true)
    expect(isErrorCode(error, 'EEXIST')).toBe(false)
    expect(isErrorCode('ENOENT', 'ENOENT')).toBe(false)
  })
})
