import { isExportFormat, type ExportFormat } from '../core/renderers.js'

export type SlashCommand =
  | { kind: 'help' }
  | { kind: 'history'; count: number }
  | { kind: 'search'; term: string }
  | { kind: 'stats' }
  | { kind: 'config-show' }
  | { kind: 'config-set'; key: string; value: string }
  | { kind: 'export'; format: ExportFormat }
  | { kind: 'clear' }
  | { kind: 'files' }
  | { kind: 'info' }
  | { kind: 'quit' }
  | { kind: 'invalid'; message: string }

export const DEFAULT_HISTORY_COUNT = 10
export const DEFAULT_SEARCH_LIMIT = 10

export const SLASH_HELP: ReadonlyArray<readonly [string, string]> = [
  ['/help', 'Show this list'],
  ['/history [n]', `Show the last n turns (default ${DEFAULT_HISTORY_COUNT})`],
  ['/search <term>', `Find turns containing term (first ${DEFAULT_SEARCH_LIMIT})`],
  ['/stats', 'Conversation statistics'],
  ['/config [key value]', 'Show or change the agent configuration'],
  ['/export <json|txt|md|html>', 'Write the conversation to exports/'],
  ['/clear', 'Clear the history (a backup is kept)'],
  ['/files', 'List files that {path} placeholders can include'],
  ['/info', 'Model, timeout and storage details'],
  ['/quit', 'Leave the chat']
]

export function isSlashCommand(line: string): boolean {
  return line.trimStart().startsWith('/')
}

/** Parses one `/command args` line typed in the chat loop. */
export function parseSlashCommand(line: string): SlashCommand {
  const trimmed = line.trim()
  const space = trimmed.search(/\s/)
  const name = (space === -1 ? trimmed : trimmed.slice(0, space)).toLowerCase()
  const rest = space === -1 ? '' : trimmed.slice(space + 1).trim()

  switch (name) {
    case '/help':
      return { kind: 'help' }
    case '/history': {
      if (rest === '') return { kind: 'history', count: DEFAULT_HISTORY_COUNT }
      const count = Number(rest)
      if (!Number.isInteger(count) || count < 1) {
        return { kind: 'invalid', message: `/history expects a positive number, got "${rest}"` }
      }
      return { kind: 'history', count }
    }
    case '/search':
      return rest === '' ? { kind: 'invalid', message: 'Usage: /search <term>' } : { kind: 'search', term: rest }
    case '/stats':
      return { kind: 'stats' }
    case '/config': {
      if (rest === '') return { kind: 'config-show' }
      const gap = rest.search(/\s/)
      if (gap === -1) return { kind: 'invalid', message: 'Usage: /config <key> <value>' }
      return { kind: 'config-set', key: rest.slice(0, gap), value: rest.slice(gap + 1).trim() }
    }
    case '/export': {
      const format = rest.toLowerCase()
      return isExportFormat(format)
        ? { kind: 'export', format }
        : { kind: 'invalid', message: 'Usage: /export <json|txt|md|html>' }
    }
    case '/clear':
      return { kind: 'clear' }
    case '/files':
      return { kind: 'files' }
    case '/info':
      return { kind: 'info' }
    case '/quit':
    case '/exit':
      return { kind: 'quit' }
    default:
      return { kind: 'invalid', message: `Unknown command ${name}. Type /help for the list.` }
  }
}
