import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { ExportError } from '../src/core/errors.js'
import { HistoryExporter, exportStamp, parseHistoryExport } from '../src/core/export.js'
import { HistoryStore } from '../src/core/history-store.js'
import { escapeHtml, renderContentHtml, renderMarkdown } from '../src/core/renderers.js'
import { makeTempDir, removeDir } from './helpers.js'

describe('HistoryExporter', () => {
  let root: string
  let store: HistoryStore
  let exporter: HistoryExporter
  const now = () => new Date('2025-01-14T09:30:05.000Z')

  beforeEach(async () => {
    root = await makeTempDir()
    store = new HistoryStore({ agentsRoot: root, now })
    exporter = new HistoryExporter(store, { now })
    await store.append('demo', { role: 'user', content: 'Hello' })
    await store.append('demo', { role: 'assistant', content: 'Hi there' })
  })

  afterEach(async () => {
    await removeDir(root)
  })

  it('writes plain text with one line per turn', async () => {
    const artifact = await exporter.export('demo', 'txt')

    expect(artifact.path).toBe(join(root, 'demo', 'exports', 'conversation-20250114-093005.txt'))
    expect(await readFile(artifact.path, 'utf-8')).toBe('user: Hello\nassistant: Hi there\n')
    expect(artifact.bytes).toBe(32)
  })

  it('indents continuation lines in plain text', async () => {
    await store.append('demo', { role: 'user', content: 'line one\nline two' })
    const artifact = await exporter.export('demo', 'txt', { targetPath: 'multi.txt' })
    expect(await readFile(artifact.path, 'utf-8')).toBe(
      'user: Hello\nassistant: Hi there\nuser: line one\n  line two\n'
    )
  })

  it('round-trips the json format', async () => {
    const artifact = await exporter.export('demo', 'json')
    const parsed = parseHistoryExport(await readFile(artifact.path, 'utf-8'))

    expect(parsed.agentId).toBe('demo')
    expect(parsed.turns).toEqual(await store.load('demo'))
  })

  it('produces the same bytes for the same history', async () => {
    const first = await exporter.export('demo', 'html', { targetPath: 'a.html' })
    const second = await exporter.export('demo', 'html', { targetPath: 'b.html' })
    const html = await readFile(first.path, 'utf-8')
    expect(html).toBe(await readFile(second.path, 'utf-8'))
    expect(html).toContain('<p>2 turns (1 user, 1 assistant)</p>')
    expect(html).not.toContain('<link')
  })

  it('does not change history', async () => {
    const before = await readFile(join(root, 'demo', 'history.json'), 'utf-8')
    await exporter.export('demo', 'md')
    expect(await readFile(join(root, 'demo', 'history.json'), 'utf-8')).toBe(before)
  })

  it('rejects unknown formats', async () => {
    await expect(exporter.export('demo', 'pdf')).rejects.toBeInstanceOf(ExportError)
  })

  it('reports a write failure as ExportError', async () => {
    const blocked = join(root, 'demo', 'history.json', 'nested.txt')
    await expect(exporter.export('demo', 'txt', { targetPath: blocked })).rejects.toBeInstanceOf(ExportError)
  })
})

describe('renderers', () => {
  const turns = [
    { seq: 1, role: 'user' as const, content: 'Show <b>code</b>', timestamp: '2025-01-14T09:00:00.000Z' },
    {
      seq: 2,
      role: 'assistant' as const,
      content: 'Here:\n```js\nif (a < b) run()\n```\nDone',
      timestamp: '2025-01-14T09:00:05.000Z'
    }
  ]

  it('renders markdown sections', () => {
    expect(renderMarkdown('demo', turns.slice(0, 1))).toBe(
      '# Conversation: demo\n\n## User\n\n*2025-01-14T09:00:00.000Z*\n\nShow <b>code</b>\n'
    )
  })

  it('escapes html and renders fenced code blocks', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;')
    expect(renderContentHtml(turns[1]?.content ?? '')).toBe(
      'Here:<br>\n<pre class="code-block">if (a &lt; b) run()</pre>Done'
    )
  })

  it('rejects a document that is not an export', () => {
    expect(() => parseHistoryExport('{"format":"other","version":1}')).toThrow(ExportError)
    expect(() => parseHistoryExport('not json')).toThrow(ExportError)
  })

  it('stamps file names in UTC', () => {
    expect(exportStamp(new Date('2025-03-09T23:04:59.000Z'))).toBe('20250309-230459')
  })
})
