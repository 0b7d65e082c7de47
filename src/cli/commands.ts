import type { Command } from 'commander'
import pc from 'picocolors'

import { EDITABLE_KEYS } from '../config/agent-config.js'
import { NotFoundError, ValidationError } from '../core/errors.js'
import { resolveTimeout } from '../core/timeout-policy.js'
import type { Workspace } from '../core/workspace.js'
import { runChat } from './chat.js'
import { DEFAULT_SEARCH_LIMIT } from './slash-commands.js'
import { formatConfig, formatInfo, formatNotice, formatStats, formatTurnLine, type Write } from './format.js'

export type WorkspaceProvider = () => Workspace

export function registerCommands(program: Command, getWorkspace: WorkspaceProvider, write: Write): void {
  program
    .command('chat <agentId>')
    .description('Start an interactive chat with an agent (created on first use)')
    .option('-m, --model <model>', 'Switch the agent to this model variant first')
    .action(async (agentId: string, options: { model?: string }) => {
      await runChat(getWorkspace(), agentId, options.model ? { model: options.model } : {})
    })

  program
    .command('list')
    .description('List agents')
    .action(async () => {
      const agents = await getWorkspace().listAgents()
      write(agents.length === 0 ? formatNotice('No agents yet') : agents.join('\n'))
    })

  program
    .command('info <agentId>')
    .description('Show model, timeout window and storage location')
    .action(async (agentId: string) => {
      const workspace = getWorkspace()
      const config = await workspace.configStore.load(agentId)
      const paths = workspace.configStore.paths(agentId)
      write(formatInfo(agentId, paths.root, config, resolveTimeout(config.model, config.reasoningEffort)))
      const backups = await workspace.historyStore.listBackups(agentId)
      write(`${pc.bold('Backups:')}  ${backups.length}`)
    })

  program
    .command('export <agentId> <format>')
    .description('Export the conversation as json, txt, md or html')
    .option('-o, --output <path>', 'Target file (default: exports/conversation-<timestamp>.<format>)')
    .action(async (agentId: string, format: string, options: { output?: string }) => {
      const artifact = await getWorkspace().exporter.export(
        agentId,
        format,
        options.output ? { targetPath: options.output } : {}
      )
      write(`Exported ${artifact.bytes} bytes to ${artifact.path}`)
    })

  program
    .command('stats <agentId>')
    .description('Show conversation statistics')
    .action(async (agentId: string) => {
      write(formatStats(await getWorkspace().historyStore.stats(agentId)))
    })

  program
    .command('search <agentId> <term>')
    .description('Find turns containing a term (case-insensitive)')
    .option('-n, --limit <count>', 'Show at most this many matches', String(DEFAULT_SEARCH_LIMIT))
    .action(async (agentId: string, term: string, options: { limit: string }) => {
      const limit = Number(options.limit)
      const matches = [...(await getWorkspace().historyStore.search(agentId, term, { limit }))]
      write(matches.length === 0 ? formatNotice(`No turns contain "${term}"`) : matches.map(formatTurnLine).join('\n'))
    })

  program
    .command('clear <agentId>')
    .description('Clear the conversation history (a backup is kept)')
    .option('--yes', 'Confirm clearing')
    .action(async (agentId: string, options: { yes?: boolean }) => {
      if (!options.yes) {
        throw new ValidationError('Refusing to clear without --yes', [{ path: 'yes', message: 'required' }], {
          agentId,
          operation: 'history.clear'
        })
      }
      await getWorkspace().historyStore.clear(agentId)
      write(`History for ${agentId} cleared`)
    })

  program
    .command('config <agentId> [key] [value]')
    .description(`Show or set configuration (${EDITABLE_KEYS.join(', ')})`)
    .action(async (agentId: string, key: string | undefined, value: string | undefined) => {
      const store = getWorkspace().configStore
      if (key === undefined) {
        write(formatConfig(await store.loadOrCreate(agentId)))
        return
      }
      if (value === undefined) {
        throw new ValidationError(`Missing value for ${key}`, [{ path: key, message: 'value required' }], {
          agentId,
          operation: 'config.set'
        })
      }
      write(formatConfig(await store.setValue(agentId, key, value)))
    })

  program
    .command('recover <agentId>')
    .description('Restore the history from the newest usable backup')
    .action(async (agentId: string) => {
      const store = getWorkspace().historyStore
      const backups = await store.listBackups(agentId)
      if (backups.length === 0) {
        throw new NotFoundError(`Agent "${agentId}" has no backups`, { agentId, operation: 'history.recover' })
      }
      const turns = await store.recoverFromLatestBackup(agentId)
      write(`Restored ${turns.length} turns for ${agentId}`)
    })
}
