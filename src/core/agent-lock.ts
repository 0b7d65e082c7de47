import { mkdir, open, readFile, unlink } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { AgentPaths } from './agent-paths.js'
import { LockedError, PersistenceError, isErrorCode } from './errors.js'
import type { Logger } from './types.js'

interface LockRecord {
  pid: number
  acquiredAt: string
}

/** Locks this process holds, by lock path, with their reference counts. */
const heldLocks = new Map<string, number>()

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    return isErrorCode(error, 'EPERM')
  }
}

async function readHolder(lockPath: string): Promise<LockRecord | undefined> {
  try {
    const parsed: unknown = JSON.parse(await readFile(lockPath, 'utf-8'))
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'pid' in parsed &&
      typeof parsed.pid === 'number' &&
      'acquiredAt' in parsed &&
      typeof parsed.acquiredAt === 'string'
    ) {
      return { pid: parsed.pid, acquiredAt: parsed.acquiredAt }
    }
    return undefined
  } catch (error) {
    if (isErrorCode(error, 'ENOENT') || error instanceof SyntaxError) return undefined
    throw error
  }
}

async function createLockFile(lockPath: string): Promise<boolean> {
  try {
    const handle = await open(lockPath, 'wx')
    const record: LockRecord = { pid: process.pid, acquiredAt: new Date().toISOString() }
    try {
      await handle.writeFile(JSON.stringify(record), 'utf-8')
    } finally {
      await handle.close()
    }
    return true
  } catch (error) {
    if (isErrorCode(error, 'EEXIST')) return false
    throw error
  }
}

/**
 * Exclusive access to one agent's on-disk state. Cross-process exclusion uses
 * an exclusively created lock file; within a process the lock is re-entrant.
 */
export class AgentLock {
  private released = false

  private constructor(
    readonly paths: AgentPaths,
    private readonly logger?: Logger
  ) {}

  static isHeld(paths: AgentPaths): boolean {
    return (heldLocks.get(paths.lock) ?? 0) > 0
  }

  static async acquire(paths: AgentPaths, logger?: Logger): Promise<AgentLock> {
    const count = heldLocks.get(paths.lock) ?? 0
    if (count > 0) {
      heldLocks.set(paths.lock, count + 1)
      return new AgentLock(paths, logger)
    }

    try {
      await mkdir(dirname(paths.lock), { recursive: true })
      if (!(await createLockFile(paths.lock))) {
        const holder = await readHolder(paths.lock)
        if (holder && isProcessAlive(holder.pid) && holder.pid !== process.pid) {
          throw new LockedError(
            `Agent "${paths.agentId}" is in use by process ${holder.pid} since ${holder.acquiredAt}`,
            holder.pid,
            { agentId: paths.agentId, operation: 'lock.acquire' }
          )
        }
        logger?.warn('lock.stale_reclaimed', { agentId: paths.agentId, holderPid: holder?.pid })
        await unlink(paths.lock).catch((error: unknown) => {
          if (!isErrorCode(error, 'ENOENT')) throw error
        })
        if (!(await createLockFile(paths.lock))) {
          throw new LockedError(`Agent "${paths.agentId}" was locked by another process`, undefined, {
            agentId: paths.agentId,
            operation: 'lock.acquire'
          })
        }
      }
    } catch (error) {
      if (error instanceof LockedError) throw error
      throw new PersistenceError(`Could not lock agent "${paths.agentId}"`, {
        agentId: paths.agentId,
        operation: 'lock.acquire',
        cause: error
      })
    }

    heldLocks.set(paths.lock, 1)
    logger?.info('lock.acquired', { agentId: paths.agentId })
    return new AgentLock(paths, logger)
  }

  async release(): Promise<void> {
    if (this.released) return
    this.released = true

    const count = heldLocks.get(this.paths.lock) ?? 0
    if (count > 1) {
      heldLocks.set(this.paths.lock, count - 1)
      return
    }
    heldLocks.delete(this.paths.lock)
    try {
      await unlink(this.paths.lock)
    } catch (error) {
      if (!isErrorCode(error, 'ENOENT')) throw error
    }
    this.logger?.info('lock.released', { agentId: this.paths.agentId })
  }
}

/** Runs `fn` while holding the agent lock. */
export async function withAgentLock<T>(paths: AgentPaths, fn: () => Promise<T>, logger?: Logger): Promise<T> {
  const lock = await AgentLock.acquire(paths, logger)
  try {
    return await fn()
  } finally {
    await lock.release()
  }
}
