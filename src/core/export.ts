import { isAbsolute, join, resolve } from 'node:path'

import { z } from 'zod'

import { writeFileAtomic } from './atomic-write.js'
import { ExportError } from './errors.js'
import type { HistoryStore } from './history-store.js'
import { silentLogger } from './logger.js'
import {
  HISTORY_EXPORT_FORMAT,
  HISTORY_EXPORT_VERSION,
  RENDERERS,
  isExportFormat,
  type ExportFormat
} from './renderers.js'
import { freezeTurn, historySchema } from './turn-schema.js'
import type { Logger, Turn } from './types.js'

export interface ExportArtifact {
  format: ExportFormat
  path: string
  bytes: number
}

export interface ExportOptions {
  /** Absolute, or relative to the agent's `exports/` directory. */
  targetPath?: string
}

export interface HistoryExporterOptions {
  loggerFor?: (agentId: string) => Logger
  now?: () => Date
}

/** `20250114-093005`, UTC. */
export function exportStamp(date: Date): string {
  const iso = date.toISOString()
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`
}

export function defaultExportName(format: ExportFormat, date: Date): string {
  return `conversation-${exportStamp(date)}.${format}`
}

/** Writes History to a file in one of the export formats. Never mutates History. */
export class HistoryExporter {
  constructor(
    private readonly store: HistoryStore,
    private readonly options: HistoryExporterOptions = {}
  ) {}

  async export(agentId: string, format: string, options: ExportOptions = {}): Promise<ExportArtifact> {
    const context = { agentId, operation: 'history.export' }
    if (!isExportFormat(format)) {
      throw new ExportError(`Unsupported export format "${format}" (use json, txt, md or html)`, context)
    }

    const paths = this.store.paths(agentId)
    const log = this.options.loggerFor?.(agentId) ?? silentLogger
    const turns = await this.store.load(agentId)
    const text = RENDERERS[format](agentId, turns)
    const target = options.targetPath
      ? isAbsolute(options.targetPath)
        ? options.targetPath
        : resolve(paths.exports, options.targetPath)
      : join(paths.exports, defaultExportName(format, this.options.now?.() ?? new Date()))

    try {
      await writeFileAtomic(target, text)
    } catch (error) {
      log.error('export.failed', { format, path: target, error: String(error) })
      throw new ExportError(`Could not write export to ${target}`, { ...context, cause: error })
    }

    const bytes = Buffer.byteLength(text, 'utf-8')
    log.info('export.written', { format, path: target, bytes, turns: turns.length })
    return { format, path: target, bytes }
  }
}

const historyExportSchema = z.object({
  format: z.literal(HISTORY_EXPORT_FORMAT),
  version: z.literal(HISTORY_EXPORT_VERSION),
  agentId: z.string(),
  turns: historySchema,
  statistics: z.unknown()
})

export interface ParsedHistoryExport {
  agentId: string
  turns: readonly Turn[]
}

/** Reads a `json` export back into its turn sequence. */
export function parseHistoryExport(text: string): ParsedHistoryExport {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new ExportError('Export is not valid JSON', { operation: 'history.import', cause: error })
  }
  const result = historyExportSchema.safeParse(raw)
  if (!result.success) {
    throw new ExportError('Export does not match the history export format', {
      operation: 'history.import',
      cause: result.error
    })
  }
  return { agentId: result.data.agentId, turns: Object.freeze(result.data.turns.map(freezeTurn)) }
}
