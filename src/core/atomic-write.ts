import { randomBytes } from 'node:crypto'
import { mkdir, open, readdir, rename, unlink } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

import { isErrorCode } from './errors.js'

const TEMP_MARKER = '.tmp-'

/** Temp files live beside their target so the final rename stays on one filesystem. */
export function tempPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}${TEMP_MARKER}${randomBytes(6).toString('hex')}`)
}

export function isTempFileOf(target: string, candidate: string): boolean {
  return candidate.startsWith(`.${basename(target)}${TEMP_MARKER}`)
}

/**
 * Writes `data` to a temp file, flushes it, then renames it over `target`.
 * Readers see either the old file or the new one, never a partial write.
 */
export async function writeFileAtomic(target: string, data: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true })
  const temp = tempPathFor(target)
  const handle = await open(temp, 'w')
  try {
    await handle.writeFile(data, 'utf-8')
    await handle.sync()
  } catch (error) {
    await handle.close()
    await unlink(temp).catch(() => undefined)
    throw error
  }
  await handle.close()

  try {
    await rename(temp, target)
  } catch (error) {
    await unlink(temp).catch(() => undefined)
    throw error
  }
}

/** Removes temp files left behind by a write interrupted before its rename. */
export async function removeStaleTempFiles(target: string): Promise<string[]> {
  let entries: string[]
  try {
    entries = await readdir(dirname(target))
  } catch (error) {
    if (isErrorCode(error, 'ENOENT')) return []
    throw error
  }
  const stale = entries.filter((entry) => isTempFileOf(target, entry))
  await Promise.all(stale.map((entry) => unlink(join(dirname(target), entry))))
  return stale
}
