import { computeStats } from './history-query.js'
import type { Turn } from './types.js'

export const EXPORT_FORMATS = ['json', 'txt', 'md', 'html'] as const
export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export const HISTORY_EXPORT_FORMAT = 'chat-agents/history'
export const HISTORY_EXPORT_VERSION = 1

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}

export type Renderer = (agentId: string, turns: readonly Turn[]) => string

function roleTitle(turn: Turn): string {
  return turn.role === 'user' ? 'User' : 'Assistant'
}

export const renderJson: Renderer = (agentId, turns) => {
  const document = {
    format: HISTORY_EXPORT_FORMAT,
    version: HISTORY_EXPORT_VERSION,
    agentId,
    turns,
    statistics: computeStats(turns)
  }
  return `${JSON.stringify(document, null, 2)}\n`
}

export const renderText: Renderer = (_agentId, turns) =>
  turns.map((turn) => `${turn.role}: ${turn.content.split('\n').join('\n  ')}\n`).join('')

export const renderMarkdown: Renderer = (agentId, turns) => {
  const sections = turns.map((turn) => `## ${roleTitle(turn)}\n\n*${turn.timestamp}*\n\n${turn.content}\n`)
  return [`# Conversation: ${agentId}\n`, ...sections].join('\n')
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

/** Escapes `content` and turns ``` fences into `<pre class="code-block">` blocks. */
export function renderContentHtml(content: string): string {
  const parts = content.split(/```[^\n]*\n?/)
  return parts
    .map((part, index) =>
      index % 2 === 1
        ? `<pre class="code-block">${escapeHtml(part.replace(/\n$/, ''))}</pre>`
        : escapeHtml(part).replace(/\n/g, '<br>\n')
    )
    .join('')
}

const STYLE = `
body { font-family: system-ui, sans-serif; max-width: 860px; margin: 2rem auto; padding: 0 1rem; color: #1f2328; }
header { border-bottom: 1px solid #d0d7de; margin-bottom: 1.5rem; }
.turn { border-radius: 8px; padding: 0.75rem 1rem; margin: 1rem 0; }
.turn.user { background: #eef6ff; }
.turn.assistant { background: #f6f8fa; }
.meta { font-size: 0.8rem; color: #57606a; margin-bottom: 0.5rem; }
.code-block { background: #1f2328; color: #f6f8fa; padding: 0.75rem; border-radius: 6px; overflow-x: auto; }
`

export const renderHtml: Renderer = (agentId, turns) => {
  const stats = computeStats(turns)
  const body = turns
    .map(
      (turn) =>
        `<section class="turn ${turn.role}">\n` +
        `<div class="meta"><strong>${roleTitle(turn)}</strong> #${turn.seq} &middot; ${escapeHtml(turn.timestamp)}</div>\n` +
        `<div class="content">${renderContentHtml(turn.content)}</div>\n` +
        `</section>`
    )
    .join('\n')

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    `<title>Conversation: ${escapeHtml(agentId)}</title>`,
    `<style>${STYLE}</style>`,
    '</head>',
    '<body>',
    '<header>',
    `<h1>Conversation: ${escapeHtml(agentId)}</h1>`,
    `<p>${stats.totalTurns} turns (${stats.userTurns} user, ${stats.assistantTurns} assistant)</p>`,
    '</header>',
    '<main>',
    body,
    '</main>',
    '</body>',
    '</html>',
    ''
  ].join('\n')
}

export const RENDERERS: Record<ExportFormat, Renderer> = {
  json: renderJson,
  txt: renderText,
  md: renderMarkdown,
  html: renderHtml
}
