import { createInterface } from 'node:readline'

import pc from 'picocolors'

import { ChatSession } from '../core/chat-session.js'
import { CorruptionError, describeError } from '../core/errors.js'
import { listIncludableFiles } from '../core/file-inclusion.js'
import { searchTurns, tail } from '../core/history-query.js'
import type { Workspace } from '../core/workspace.js'
import {
  formatConfig,
  formatError,
  formatInfo,
  formatNotice,
  formatStats,
  formatTurnLine,
  type Write
} from './format.js'
import { DEFAULT_SEARCH_LIMIT, SLASH_HELP, isSlashCommand, parseSlashCommand, type SlashCommand } from './slash-commands.js'

export interface ChatOptions {
  model?: string
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
}

/** Runs one slash command against an open session. Returns false on `/quit`. */
export async function executeSlashCommand(
  command: SlashCommand,
  session: ChatSession,
  workspace: Workspace,
  write: Write
): Promise<boolean> {
  const agentId = session.agentId
  switch (command.kind) {
    case 'help':
      write(SLASH_HELP.map(([usage, text]) => `  ${pc.bold(usage.padEnd(28))} ${text}`).join('\n'))
      return true
    case 'history': {
      const turns = tail(await session.history(), command.count)
      write(turns.length === 0 ? formatNotice('History is empty') : turns.map(formatTurnLine).join('\n'))
      return true
    }
    case 'search': {
      const matches = [...searchTurns(await session.history(), command.term, DEFAULT_SEARCH_LIMIT)]
      write(
        matches.length === 0
          ? formatNotice(`No turns contain "${command.term}"`)
          : [`${matches.length} match(es):`, ...matches.map(formatTurnLine)].join('\n')
      )
      return true
    }
    case 'stats':
      write(formatStats(await workspace.historyStore.stats(agentId)))
      return true
    case 'config-show':
      write(formatConfig(session.configuration))
      return true
    case 'config-set': {
      const updated = await session.setConfigValue(command.key, command.value)
      const entry = Object.entries(updated).find(([key]) => key === command.key)
      write(`${command.key} = ${String(entry?.[1])}`)
      return true
    }
    case 'export': {
      const artifact = await workspace.exporter.export(agentId, command.format)
      write(`Exported ${artifact.bytes} bytes to ${artifact.path}`)
      return true
    }
    case 'clear':
      await workspace.historyStore.clear(agentId)
      write('History cleared (backup kept)')
      return true
    case 'files': {
      const files = await listIncludableFiles(workspace.searchRoots(session.paths), workspace.cwd)
      write(
        files.length === 0
          ? formatNotice('No includable files found')
          : files.map((file) => `  ${file.path} ${pc.dim(`(${file.size} bytes)`)}`).join('\n')
      )
      return true
    }
    case 'info':
      write(formatInfo(agentId, session.paths.root, session.configuration, session.timeoutWindow))
      return true
    case 'quit':
      return false
    case 'invalid':
      write(formatError(command.message))
      return true
  }
}

async function ask(rl: ReturnType<typeof createInterface>, question: string): Promise<string> {
  return new Promise((resolve) => rl.question(question, resolve))
}

async function openWithRecovery(
  workspace: Workspace,
  agentId: string,
  rl: ReturnType<typeof createInterface>,
  write: Write
): Promise<ChatSession | undefined> {
  try {
    return await workspace.openSession(agentId)
  } catch (error) {
    if (!(error instanceof CorruptionError)) throw error
    write(formatError(describeError(error)))
    const answer = await ask(rl, 'Restore the latest usable backup? (y/N) ')
    if (answer.trim().toLowerCase() !== 'y') return undefined
    const turns = await workspace.historyStore.recoverFromLatestBackup(agentId)
    write(formatNotice(`Restored ${turns.length} turns from backup`))
    return workspace.openSession(agentId)
  }
}

/**
 * Interactive chat loop. Ctrl+C cancels the call in flight; with nothing in
 * flight it leaves the chat.
 */
export async function runChat(workspace: Workspace, agentId: string, options: ChatOptions = {}): Promise<void> {
  const output = options.output ?? process.stdout
  const write: Write = (text) => output.write(`${text}\n`)
  const rl = createInterface({ input: options.input ?? process.stdin, output })
  let inFlight: AbortController | undefined

  rl.on('SIGINT', () => {
    if (inFlight) inFlight.abort(new Error('cancelled by user'))
    else rl.close()
  })

  const session = await openWithRecovery(workspace, agentId, rl, write)
  if (!session) {
    rl.close()
    return
  }

  try {
    if (options.model && options.model !== session.configuration.model) {
      await session.setConfigValue('model', options.model)
    }
    write(formatInfo(agentId, session.paths.root, session.configuration, session.timeoutWindow))
    write(pc.dim('Type /help for commands, /quit to leave.'))
    rl.setPrompt(pc.cyan('you> '))
    rl.prompt()

    for await (const line of rl) {
      if (line.trim() === '') {
        rl.prompt()
        continue
      }

      try {
        if (isSlashCommand(line)) {
          const keepGoing = await executeSlashCommand(parseSlashCommand(line), session, workspace, write)
          if (!keepGoing) break
        } else {
          inFlight = new AbortController()
          const showReasoning = session.configuration.reasoningSummary !== 'none'
          output.write(pc.green('assistant> '))
          const turn = await session.send(line, {
            signal: inFlight.signal,
            onFragment: (delta) => output.write(delta),
            ...(showReasoning ? { onReasoning: (delta: string) => output.write(pc.dim(delta)) } : {})
          })
          if (!session.configuration.stream) output.write(turn.content)
          output.write('\n')
        }
      } catch (error) {
        output.write('\n')
        write(formatError(describeError(error)))
      } finally {
        inFlight = undefined
      }
      rl.prompt()
    }
  } finally {
    await session.close()
    rl.close()
  }
}
