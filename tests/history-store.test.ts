import { readFile, readdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { CorruptionError, NotFoundError, ValidationError } from '../src/core/errors.js'
import { HistoryStore, nextBackupName, parseHistory, serializeHistory } from '../src/core/history-store.js'
import { makeTempDir, removeDir } from './helpers.js'

function fixedClock(start: string, stepMs = 1000): () => Date {
  let current = Date.parse(start)
  return () => {
    const value = new Date(current)
    current += stepMs
    return value
  }
}

describe('nextBackupName', () => {
  it('starts a fresh stamp at counter zero', () => {
    expect(nextBackupName([], 1_736_845_200_000)).toBe('history-1736845200000-0000.json')
    expect(nextBackupName(['history-1736845199000-0003.json'], 1_736_845_200_000)).toBe(
      'history-1736845200000-0000.json'
    )
  })

  it('continues after the newest name when the stamp repeats or goes back', () => {
    expect(nextBackupName(['history-1736845200000-0004.json'], 1_736_845_200_000)).toBe(
      'history-1736845200000-0005.json'
    )
    expect(nextBackupName(['history-1736845200000-0001.json'], 1_736_845_100_000)).toBe(
      'history-1736845200000-0002.json'
    )
    expect(nextBackupName(['history-1736845200000-9999.json'], 1_736_845_200_000)).toBe(
      'history-1736845200001-0000.json'
    )
  })
})

describe('HistoryStore', () => {
  let root: string

  beforeEach(async () => {
    root = await makeTempDir()
  })

  afterEach(async () => {
    await removeDir(root)
  })

  it('returns an empty history for a new agent', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    expect(await store.load('fresh')).toEqual([])
  })

  it('assigns gapless sequence numbers', async () => {
    const store = new HistoryStore({ agentsRoot: root, now: fixedClock('2025-01-14T09:00:00.000Z') })
    for (let i = 0; i < 5; i += 1) {
      await store.append('alpha', { role: i % 2 === 0 ? 'user' : 'assistant', content: `message ${i}` })
    }
    const turns = await store.load('alpha')
    expect(turns.map((turn) => turn.seq)).toEqual([1, 2, 3, 4, 5])
    expect(Object.isFrozen(turns[0])).toBe(true)
  })

  it('serializes concurrent appends', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await Promise.all(
      Array.from({ length: 6 }, (_, i) => store.append('alpha', { role: 'user', content: `parallel ${i}` }))
    )
    expect((await store.load('alpha')).map((turn) => turn.seq)).toEqual([1, 2, 3, 4, 5, 6])
  })

  it('rejects an out-of-order seq and leaves the file alone', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await store.append('alpha', { role: 'user', content: 'one' })
    const before = await readFile(join(root, 'alpha', 'history.json'), 'utf-8')

    await expect(store.append('alpha', { seq: 5, role: 'assistant', content: 'late' })).rejects.toBeInstanceOf(
      ValidationError
    )
    expect(await readFile(join(root, 'alpha', 'history.json'), 'utf-8')).toBe(before)
  })

  it('backs up the previous file before every write', async () => {
    const store = new HistoryStore({ agentsRoot: root, now: fixedClock('2025-01-14T09:00:00.000Z') })
    await store.append('alpha', { role: 'user', content: 'one' })
    await store.append('alpha', { role: 'assistant', content: 'two' })

    const backups = await store.listBackups('alpha')
    expect(backups).toHaveLength(1)
    expect(backups[0]).toMatch(/^history-\d{13}-0000\.json$/)
    expect((await store.readBackup('alpha', backups[0] ?? '')).map((turn) => turn.content)).toEqual(['one'])
  })

  it('keeps only the configured number of backups', async () => {
    const store = new HistoryStore({
      agentsRoot: root,
      backupRetention: 3,
      now: fixedClock('2025-01-14T09:00:00.000Z')
    })
    for (let i = 0; i < 8; i += 1) await store.append('alpha', { role: 'user', content: `m${i}` })

    const backups = await store.listBackups('alpha')
    expect(backups).toHaveLength(3)
    const newest = await store.readBackup('alpha', backups[2] ?? '')
    expect(newest.map((turn) => turn.content)).toEqual(['m0', 'm1', 'm2', 'm3', 'm4', 'm5', 'm6'])
  })

  it('ranks the newest backup last when the clock does not move', async () => {
    const store = new HistoryStore({
      agentsRoot: root,
      backupRetention: 2,
      now: fixedClock('2025-01-14T09:00:00.000Z', 0)
    })
    for (let i = 1; i <= 6; i += 1) await store.append('alpha', { role: 'user', content: `m${i}` })

    const stamp = String(Date.parse('2025-01-14T09:00:00.000Z'))
    expect(await store.listBackups('alpha')).toEqual([`history-${stamp}-0003.json`, `history-${stamp}-0004.json`])
    await writeFile(join(root, 'alpha', 'history.json'), 'not json')
    expect((await store.recoverFromLatestBackup('alpha')).map((turn) => turn.content)).toEqual([
      'm1',
      'm2',
      'm3',
      'm4',
      'm5'
    ])
  })

  it('appends an exchange in one write or not at all', async () => {
    const store = new HistoryStore({ agentsRoot: root, now: fixedClock('2025-01-14T09:00:00.000Z') })
    await store.append('alpha', { role: 'user', content: 'one' })
    const before = await readFile(join(root, 'alpha', 'history.json'), 'utf-8')

    await expect(
      store.appendExchange('alpha', { role: 'user', content: 'two' }, { seq: 9, role: 'assistant', content: 'late' })
    ).rejects.toBeInstanceOf(ValidationError)
    expect(await readFile(join(root, 'alpha', 'history.json'), 'utf-8')).toBe(before)
    expect(await store.listBackups('alpha')).toEqual([])

    const [user, assistant] = await store.appendExchange(
      'alpha',
      { role: 'user', content: 'two' },
      { role: 'assistant', content: 'three' },
      { cap: 2 }
    )
    expect([user.seq, assistant.seq]).toEqual([2, 3])
    expect((await store.load('alpha')).map((turn) => turn.content)).toEqual(['two', 'three'])
    const backups = await store.listBackups('alpha')
    expect(backups).toHaveLength(2)
    const newest = await store.readBackup('alpha', backups[1] ?? '')
    expect(newest.map((turn) => turn.content)).toEqual(['one', 'two', 'three'])
  })

  it('evicts to the cap and keeps the full set in the newest backup', async () => {
    const store = new HistoryStore({ agentsRoot: root, now: fixedClock('2025-01-14T09:00:00.000Z') })
    for (let i = 1; i <= 4; i += 1) {
      await store.append('alpha', { role: 'user', content: `m${i}` }, { cap: 3 })
    }

    const live = await store.load('alpha')
    expect(live.map((turn) => turn.content)).toEqual(['m2', 'm3', 'm4'])
    expect(live.map((turn) => turn.seq)).toEqual([2, 3, 4])

    const backups = await store.listBackups('alpha')
    const newest = await store.readBackup('alpha', backups[backups.length - 1] ?? '')
    expect(newest.map((turn) => turn.content)).toEqual(['m1', 'm2', 'm3', 'm4'])

    const next = await store.append('alpha', { role: 'assistant', content: 'm5' }, { cap: 3 })
    expect(next.seq).toBe(5)
  })

  it('clears to empty with a backup and restarts numbering', async () => {
    const store = new HistoryStore({ agentsRoot: root, now: fixedClock('2025-01-14T09:00:00.000Z') })
    await store.append('alpha', { role: 'user', content: 'one' })
    await store.clear('alpha')

    expect(await store.load('alpha')).toEqual([])
    const backups = await store.listBackups('alpha')
    expect((await store.readBackup('alpha', backups[backups.length - 1] ?? '')).map((t) => t.content)).toEqual([
      'one'
    ])
    expect((await store.append('alpha', { role: 'user', content: 'again' })).seq).toBe(1)
  })

  it('reports a corrupt file and recovers from the latest backup', async () => {
    const clock = fixedClock('2025-01-14T09:00:00.000Z')
    const store = new HistoryStore({ agentsRoot: root, now: clock })
    await store.append('alpha', { role: 'user', content: 'one' })
    await store.append('alpha', { role: 'assistant', content: 'two' })
    await writeFile(join(root, 'alpha', 'history.json'), '{ not json')

    await expect(store.load('alpha')).rejects.toBeInstanceOf(CorruptionError)

    const restored = await store.recoverFromLatestBackup('alpha')
    expect(restored.map((turn) => turn.content)).toEqual(['one'])
    expect((await store.load('alpha')).map((turn) => turn.content)).toEqual(['one'])

    const entries = await readdir(join(root, 'alpha'))
    expect(entries.some((entry) => /^history\.corrupt-\d+\.json$/.test(entry))).toBe(true)
  })

  it('fails recovery when no backup exists', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await expect(store.recoverFromLatestBackup('alpha')).rejects.toBeInstanceOf(NotFoundError)
  })

  it('ignores and cleans up a temp file left by an interrupted write', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await store.append('alpha', { role: 'user', content: 'kept' })
    const dir = join(root, 'alpha')
    await writeFile(join(dir, '.history.json.tmp-deadbeef'), '[{"half":')

    expect((await store.load('alpha')).map((turn) => turn.content)).toEqual(['kept'])

    await store.append('alpha', { role: 'assistant', content: 'next' })
    expect((await readdir(dir)).filter((entry) => entry.includes('.tmp-'))).toEqual([])
  })

  it('searches case-insensitively in order', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await store.append('alpha', { role: 'user', content: 'Tell me about Rust' })
    await store.append('alpha', { role: 'assistant', content: 'rust is a language' })
    await store.append('alpha', { role: 'user', content: 'and Go?' })

    const results = await store.search('alpha', 'RUST')
    expect([...results].map((turn) => turn.seq)).toEqual([1, 2])
    expect([...results].map((turn) => turn.seq)).toEqual([1, 2])
    expect([...(await store.search('alpha', 'python'))]).toEqual([])
    await expect(store.search('alpha', '  ')).rejects.toBeInstanceOf(ValidationError)
  })

  it('caps search results at the limit', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    for (let i = 1; i <= 4; i += 1) await store.append('alpha', { role: 'user', content: `note ${i}` })

    expect([...(await store.search('alpha', 'note', { limit: 2 }))].map((turn) => turn.seq)).toEqual([1, 2])
    await expect(store.search('alpha', 'note', { limit: 0 })).rejects.toBeInstanceOf(ValidationError)
  })

  it('reports counts by role in stats', async () => {
    const store = new HistoryStore({ agentsRoot: root })
    await store.append('alpha', { role: 'user', content: 'Hello' })
    await store.append('alpha', { role: 'assistant', content: 'Hi there' })

    const stats = await store.stats('alpha')
    expect(stats.userTurns).toBe(1)
    expect(stats.assistantTurns).toBe(1)
    expect(stats.totalCharacters).toBe(13)
  })
})

describe('parseHistory', () => {
  it('rejects a gap in sequence numbers', () => {
    const text = serializeHistory([
      { seq: 1, role: 'user', content: 'a', timestamp: '2025-01-14T09:00:00.000Z' },
      { seq: 3, role: 'assistant', content: 'b', timestamp: '2025-01-14T09:00:01.000Z' }
    ])
    expect(() => parseHistory(text, 'history.json')).toThrow(CorruptionError)
  })

  it('rejects a turn without a role', () => {
    expect(() => parseHistory('[{"seq":1,"content":"x","timestamp":"2025-01-14T09:00:00.000Z"}]', 'h.json')).toThrow(
      CorruptionError
    )
  })
})
