#!/usr/bin/env node
import { Command } from 'commander'

import { registerCommands } from './cli/commands.js'
import { formatError } from './cli/format.js'
import { loadRuntimeConfig } from './config/load.js'
import { describeError } from './core/errors.js'
import { createWorkspace, type Workspace } from './core/workspace.js'

let workspace: Workspace | undefined

function getWorkspace(): Workspace {
  workspace ??= createWorkspace(loadRuntimeConfig())
  return workspace
}

const program = new Command()

program
  .name('chat-agents')
  .description('Persistent, per-agent chat sessions with reasoning models')
  .version('0.1.0')

registerCommands(program, getWorkspace, (text) => process.stdout.write(`${text}\n`))

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`${formatError(describeError(error))}\n`)
  process.exitCode = 1
})
