import type { Dirent } from 'node:fs'
import { readFile, readdir, stat } from 'node:fs/promises'
import { basename, extname, join, relative, resolve, sep } from 'node:path'

import supported from '../config/supported-extensions.json' with { type: 'json' }
import { NotFoundError, ValidationError, isErrorCode } from './errors.js'
import { silentLogger } from './logger.js'
import type { Logger } from './types.js'

export const MAX_INCLUDE_BYTES = 2 * 1024 * 1024

const PLACEHOLDER_PATTERN = /\{([^{}\s"'`$]+)\}/g
const SUPPORTED_EXTENSIONS = new Set(supported.extensions)
const KNOWN_FILE_NAMES = new Set(supported.fileNames)
const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', 'agents'])

/** Directories searched, in order, for `{path}` placeholders. */
export function defaultSearchRoots(cwd: string, uploadsDir: string): string[] {
  const relativeRoots = ['.', 'src', 'lib', 'scripts', 'data', 'documents', 'files', 'config', 'configs']
  return [...relativeRoots.map((root) => resolve(cwd, root)), uploadsDir]
}

export function isSupportedFile(path: string): boolean {
  const extension = extname(path).toLowerCase()
  if (extension && SUPPORTED_EXTENSIONS.has(extension)) return true
  return KNOWN_FILE_NAMES.has(basename(path).toLowerCase())
}

function looksLikeFileReference(name: string): boolean {
  return isSupportedFile(name) || name.includes('/')
}

export function headerFor(name: string): string {
  const extension = extname(name).toLowerCase()
  const label = extension ? `${name} (${extension})` : name
  switch (extension) {
    case '.py':
    case '.r':
      return `# File: ${label}\n`
    case '.html':
    case '.xml':
      return `<!-- File: ${label} -->\n`
    case '.css':
    case '.scss':
    case '.sass':
      return `/* File: ${label} */\n`
    case '.sql':
      return `-- File: ${label}\n`
    default:
      return `// File: ${label}\n`
  }
}

function decode(buffer: Buffer, name: string, logger: Logger): string {
  try {
    const text = new TextDecoder('utf-8', { fatal: true }).decode(buffer)
    return text.startsWith('\uFEFF') ? text.slice(1) : text
  } catch (error) {
    if (!(error instanceof TypeError)) throw error
    logger.warn('include.non_utf8', { file: name })
    return buffer.toString('latin1')
  }
}

/** First existing file for `name` under the search roots, never outside them. */
async function locate(name: string, roots: string[]): Promise<string | undefined> {
  for (const root of roots) {
    const base = resolve(root)
    const candidate = resolve(base, name)
    if (candidate !== base && !candidate.startsWith(`${base}${sep}`)) continue
    try {
      const info = await stat(candidate)
      if (info.isFile()) return candidate
    } catch (error) {
      if (!isErrorCode(error, 'ENOENT') && !isErrorCode(error, 'ENOTDIR')) throw error
    }
  }
  return undefined
}

export interface InclusionOptions {
  searchRoots: string[]
  logger?: Logger
  agentId?: string
}

export interface InclusionResult {
  text: string
  includedFiles: string[]
}

/**
 * Replaces `{path}` placeholders with the referenced file's contents, each
 * preceded by a one-line header. Braces that do not name a file (code, JSON)
 * are left as they are; a named file that cannot be found is an error.
 */
export async function expandFileInclusions(input: string, options: InclusionOptions): Promise<InclusionResult> {
  const logger = options.logger ?? silentLogger
  const context = { agentId: options.agentId, operation: 'include' }
  const names = [...new Set([...input.matchAll(PLACEHOLDER_PATTERN)].flatMap((match) => (match[1] ? [match[1]] : [])))]
  const replacements = new Map<string, string>()

  for (const name of names) {
    const found = await locate(name, options.searchRoots)
    if (!found) {
      if (!looksLikeFileReference(name)) continue
      throw new NotFoundError(`File ${name} not found`, context)
    }
    if (!isSupportedFile(found)) {
      throw new ValidationError(`Unsupported file type: ${name}`, [{ path: name, message: 'unsupported extension' }], context)
    }

    const info = await stat(found)
    if (info.size > MAX_INCLUDE_BYTES) {
      throw new ValidationError(`File ${name} is too large (max 2MB)`, [{ path: name, message: `${info.size} bytes` }], context)
    }

    const content = decode(await readFile(found), name, logger)
    replacements.set(name, headerFor(name) + content)
    logger.info('include.file', { file: name, characters: content.length })
  }

  const text = input.replace(PLACEHOLDER_PATTERN, (whole: string, name: string) => replacements.get(name) ?? whole)
  return { text, includedFiles: [...replacements.keys()] }
}

export interface IncludableFile {
  path: string
  size: number
}

async function walk(directory: string, found: Map<string, number>): Promise<void> {
  let entries: Dirent[]
  try {
    entries = await readdir(directory, { withFileTypes: true })
  } catch (error) {
    if (isErrorCode(error, 'ENOENT') || isErrorCode(error, 'ENOTDIR')) return
    throw error
  }
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const full = join(directory, entry.name)
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.has(entry.name)) await walk(full, found)
    } else if (entry.isFile() && isSupportedFile(entry.name) && !found.has(full)) {
      found.set(full, (await stat(full)).size)
    }
  }
}

/** Files a placeholder could name, relative to `cwd`, sorted. */
export async function listIncludableFiles(roots: string[], cwd: string): Promise<IncludableFile[]> {
  const found = new Map<string, number>()
  for (const root of roots) await walk(resolve(root), found)
  return [...found.entries()]
    .map(([path, size]) => ({ path: relative(cwd, path), size }))
    .sort((a, b) => a.path.localeCompare(b.path))
}
