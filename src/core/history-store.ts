import { mkdir, readFile, readdir, rename, unlink } from 'node:fs/promises'
import { join } from 'node:path'

import { withAgentLock } from './agent-lock.js'
import { agentPaths, type AgentPaths } from './agent-paths.js'
import { removeStaleTempFiles, writeFileAtomic } from './atomic-write.js'
import {
  ChatAgentError,
  CorruptionError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  isErrorCode
} from './errors.js'
import { computeStats, searchTurns } from './history-query.js'
import { silentLogger } from './logger.js'
import { freezeTurn, historySchema, turnSchema } from './turn-schema.js'
import type { HistoryStats, Logger, NewTurn, Turn } from './types.js'

const BACKUP_PATTERN = /^history-(\d{13})-(\d{4})\.json$/
const MAX_BACKUP_COUNTER = 9999
export const DEFAULT_BACKUP_RETENTION = 10

export interface HistoryStoreOptions {
  agentsRoot: string
  /** Number of backups kept per agent; the oldest are deleted first. */
  backupRetention?: number
  loggerFor?: (agentId: string) => Logger
  now?: () => Date
}

export interface AppendOptions {
  /** Live history bound. Older turns are evicted once it is exceeded. */
  cap?: number
}

export interface SearchOptions {
  /** Stop after this many matches. */
  limit?: number
}

/**
 * Name for the next backup. It always sorts after `existing` (sorted oldest
 * first), even when the clock repeats or steps backwards.
 */
export function nextBackupName(existing: readonly string[], nowMs: number): string {
  let stamp = nowMs
  let counter = 0
  const newest = BACKUP_PATTERN.exec(existing[existing.length - 1] ?? '')
  if (newest) {
    const newestStamp = Number(newest[1])
    if (newestStamp >= stamp) {
      stamp = newestStamp
      counter = Number(newest[2]) + 1
    }
  }
  if (counter > MAX_BACKUP_COUNTER) {
    stamp += 1
    counter = 0
  }
  return `history-${String(stamp).padStart(13, '0')}-${String(counter).padStart(4, '0')}.json`
}

export function serializeHistory(turns: readonly Turn[]): string {
  return `${JSON.stringify(turns, null, 2)}\n`
}

/**
 * Parses the stored representation. Throws `CorruptionError` when the text is
 * not JSON, does not match the turn shape, or breaks the sequence invariant.
 */
export function parseHistory(text: string, filePath: string, agentId?: string): readonly Turn[] {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new CorruptionError(`History file is not valid JSON: ${filePath}`, filePath, {
      agentId,
      operation: 'history.load',
      cause: error
    })
  }
  const result = historySchema.safeParse(raw)
  if (!result.success) {
    const first = result.error.issues[0]
    const detail = first ? ` (${first.path.join('.')}: ${first.message})` : ''
    throw new CorruptionError(`History file has an invalid structure${detail}: ${filePath}`, filePath, {
      agentId,
      operation: 'history.load',
      cause: result.error
    })
  }
  return Object.freeze(result.data.map(freezeTurn))
}

/**
 * Append-only, per-agent conversation log. Every mutation snapshots the
 * current file into `backups/` before atomically replacing it.
 */
export class HistoryStore {
  private readonly queues = new Map<string, Promise<void>>()
  private readonly retention: number

  constructor(private readonly options: HistoryStoreOptions) {
    this.retention = options.backupRetention ?? DEFAULT_BACKUP_RETENTION
    if (!Number.isInteger(this.retention) || this.retention < 1) {
      throw new ValidationError('backupRetention must be a positive integer', [
        { path: 'backupRetention', message: String(options.backupRetention) }
      ])
    }
  }

  paths(agentId: string): AgentPaths {
    return agentPaths(this.options.agentsRoot, agentId)
  }

  async load(agentId: string): Promise<readonly Turn[]> {
    return this.readHistory(this.paths(agentId))
  }

  async append(agentId: string, turn: NewTurn, options: AppendOptions = {}): Promise<Turn> {
    this.checkCap(agentId, options.cap)
    return this.mutate(agentId, 'history.append', async (paths, log) => {
      const current = await this.readHistory(paths)
      const finalized = this.finalize(agentId, current, turn)
      await this.commit(paths, log, [...current, finalized], [finalized], options.cap)
      return finalized
    })
  }

  /**
   * Appends a user turn and its reply in one write. Either both land or the
   * file is left as it was.
   */
  async appendExchange(
    agentId: string,
    userTurn: NewTurn,
    assistantTurn: NewTurn,
    options: AppendOptions = {}
  ): Promise<readonly [Turn, Turn]> {
    this.checkCap(agentId, options.cap)
    return this.mutate(agentId, 'history.append', async (paths, log) => {
      const current = await this.readHistory(paths)
      const user = this.finalize(agentId, current, userTurn)
      const assistant = this.finalize(agentId, [...current, user], assistantTurn)
      await this.commit(paths, log, [...current, user, assistant], [user, assistant], options.cap)
      return [user, assistant] as const
    })
  }

  /** Backs up, then truncates the live history to empty. */
  async clear(agentId: string): Promise<void> {
    await this.mutate(agentId, 'history.clear', async (paths, log) => {
      await this.backupLive(paths)
      await writeFileAtomic(paths.history, serializeHistory([]))
      log.info('history.cleared')
    })
  }

  /**
   * Restores the newest backup that parses. The live file, if any, is kept
   * aside as `history.corrupt-<ms>.json`.
   */
  async recoverFromLatestBackup(agentId: string): Promise<readonly Turn[]> {
    return this.mutate(agentId, 'history.recover', async (paths, log) => {
      const backups = await this.listBackupFiles(paths)
      for (const name of [...backups].reverse()) {
        const file = join(paths.backups, name)
        const text = await readFile(file, 'utf-8')
        let turns: readonly Turn[]
        try {
          turns = parseHistory(text, file, agentId)
        } catch (error) {
          if (!(error instanceof CorruptionError)) throw error
          log.warn('history.backup_unusable', { backup: name, reason: error.message })
          continue
        }

        const aside = join(paths.root, `history.corrupt-${this.now().getTime()}.json`)
        try {
          await rename(paths.history, aside)
          log.warn('history.corrupt_moved', { path: aside })
        } catch (error) {
          if (!isErrorCode(error, 'ENOENT')) throw error
        }
        await writeFileAtomic(paths.history, serializeHistory(turns))
        log.info('history.recovered', { backup: name, turns: turns.length })
        return turns
      }

      throw new NotFoundError(`No usable backup for agent "${agentId}"`, {
        agentId,
        operation: 'history.recover'
      })
    })
  }

  async search(agentId: string, term: string, options: SearchOptions = {}): Promise<Iterable<Turn>> {
    if (term.trim() === '') {
      throw new ValidationError('Search term must not be empty', [{ path: 'term', message: 'empty' }], {
        agentId,
        operation: 'history.search'
      })
    }
    const { limit } = options
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new ValidationError(
        'Search limit must be a positive integer',
        [{ path: 'limit', message: String(limit) }],
        { agentId, operation: 'history.search' }
      )
    }
    return searchTurns(await this.load(agentId), term, limit)
  }

  async stats(agentId: string): Promise<HistoryStats> {
    return computeStats(await this.load(agentId))
  }

  /** Backup file names, oldest first. */
  async listBackups(agentId: string): Promise<string[]> {
    return this.listBackupFiles(this.paths(agentId))
  }

  async readBackup(agentId: string, name: string): Promise<readonly Turn[]> {
    const paths = this.paths(agentId)
    if (!BACKUP_PATTERN.test(name)) {
      throw new ValidationError(`Not a backup file name: ${name}`, [], { agentId, operation: 'history.backup' })
    }
    const file = join(paths.backups, name)
    try {
      return parseHistory(await readFile(file, 'utf-8'), file, agentId)
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        throw new NotFoundError(`Backup not found: ${name}`, { agentId, operation: 'history.backup', cause: error })
      }
      throw error
    }
  }

  private now(): Date {
    return this.options.now?.() ?? new Date()
  }

  private logFor(agentId: string): Logger {
    return this.options.loggerFor?.(agentId) ?? silentLogger
  }

  private checkCap(agentId: string, cap: number | undefined): void {
    if (cap !== undefined && (!Number.isInteger(cap) || cap < 1)) {
      throw new ValidationError('History cap must be a positive integer', [{ path: 'cap', message: String(cap) }], {
        agentId,
        operation: 'history.append'
      })
    }
  }

  /** Validates `turn` as the successor of `current` and assigns its seq. */
  private finalize(agentId: string, current: readonly Turn[], turn: NewTurn): Turn {
    const expectedSeq = (current[current.length - 1]?.seq ?? 0) + 1
    if (turn.seq !== undefined && turn.seq !== expectedSeq) {
      throw new ValidationError(
        `Out-of-order turn: expected seq ${expectedSeq}, got ${turn.seq}`,
        [{ path: 'seq', message: `expected ${expectedSeq}` }],
        { agentId, operation: 'history.append' }
      )
    }

    const parsed = turnSchema.safeParse({
      seq: expectedSeq,
      role: turn.role,
      content: turn.content,
      timestamp: turn.timestamp ?? this.now().toISOString(),
      ...(turn.metadata ? { metadata: turn.metadata } : {})
    })
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid turn',
        parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        { agentId, operation: 'history.append' }
      )
    }
    return freezeTurn(parsed.data)
  }

  private async commit(
    paths: AgentPaths,
    log: Logger,
    next: readonly Turn[],
    added: readonly Turn[],
    cap: number | undefined
  ): Promise<void> {
    await this.backupLive(paths)
    if (cap !== undefined && next.length > cap) {
      // The backup of the uncapped set keeps the evicted turns recoverable.
      await this.writeBackup(paths, serializeHistory(next))
      await writeFileAtomic(paths.history, serializeHistory(next.slice(-cap)))
      log.info('history.evicted', { removed: next.length - cap, cap })
    } else {
      await writeFileAtomic(paths.history, serializeHistory(next))
    }
    for (const turn of added) log.info('history.appended', { seq: turn.seq, role: turn.role })
  }

  private async readHistory(paths: AgentPaths): Promise<readonly Turn[]> {
    let text: string
    try {
      text = await readFile(paths.history, 'utf-8')
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) return Object.freeze([])
      throw new PersistenceError(`Could not read history for agent "${paths.agentId}"`, {
        agentId: paths.agentId,
        operation: 'history.load',
        cause: error
      })
    }
    return parseHistory(text, paths.history, paths.agentId)
  }

  /**
   * Serializes mutations per agent within this process and holds the agent
   * lock against other processes for the duration of `fn`.
   */
  private async mutate<T>(
    agentId: string,
    operation: string,
    fn: (paths: AgentPaths, log: Logger) => Promise<T>
  ): Promise<T> {
    const paths = this.paths(agentId)
    const log = this.logFor(agentId)
    const previous = this.queues.get(agentId) ?? Promise.resolve()

    const run = previous.then(() =>
      withAgentLock(
        paths,
        async () => {
          const stale = await removeStaleTempFiles(paths.history)
          if (stale.length > 0) log.warn('history.temp_removed', { files: stale })
          return fn(paths, log)
        },
        log
      )
    )
    const settled = run.then(
      () => undefined,
      () => undefined
    )
    this.queues.set(agentId, settled)

    try {
      return await run
    } catch (error) {
      if (error instanceof ChatAgentError) throw error
      log.error('history.write_failed', { operation, error: String(error) })
      throw new PersistenceError(`Could not complete ${operation} for agent "${agentId}"`, {
        agentId,
        operation,
        cause: error
      })
    } finally {
      if (this.queues.get(agentId) === settled) this.queues.delete(agentId)
    }
  }

  private async backupLive(paths: AgentPaths): Promise<void> {
    let text: string
    try {
      text = await readFile(paths.history, 'utf-8')
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) return
      throw error
    }
    await this.writeBackup(paths, text)
  }

  private async writeBackup(paths: AgentPaths, text: string): Promise<void> {
    await mkdir(paths.backups, { recursive: true })
    const existing = await this.listBackupFiles(paths)
    const name = nextBackupName(existing, this.now().getTime())
    await writeFileAtomic(join(paths.backups, name), text)

    const all = [...existing, name].sort()
    const excess = all.slice(0, Math.max(0, all.length - this.retention))
    await Promise.all(excess.map((old) => unlink(join(paths.backups, old))))
    this.logFor(paths.agentId).info('history.backup_written', { backup: name, pruned: excess.length })
  }

  private async listBackupFiles(paths: AgentPaths): Promise<string[]> {
    try {
      const entries = await readdir(paths.backups)
      return entries.filter((entry) => BACKUP_PATTERN.test(entry)).sort()
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) return []
      throw error
    }
  }
}
