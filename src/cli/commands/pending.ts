/**
 * `gauntlet pending` command group: statements queued for a later run.
 *
 * Subcommands:
 *   - `gauntlet pending add <statement>` : queue a statement, with an optional note
 *   - `gauntlet pending list`            : queued statements, oldest first
 */

import type { Command } from 'commander'
import { InvalidInputError } from '../../core/errors.js'
import { renderPending } from '../formatters/session-formatter.js'
import { EXIT_SUCCESS, pickConfigDirs, withConfigDirOptions, withRuntime } from '../utils/command-context.js'
import type { CommandContextOptions } from '../utils/command-context.js'

export interface PendingAddOptions extends CommandContextOptions {
  note?: string
}

export interface PendingListOptions extends CommandContextOptions {
  json?: boolean
}

export async function runPendingAdd(statement: string, opts: PendingAddOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    if (statement.trim() === '') {
      throw new InvalidInputError('statement must not be empty')
    }
    const receipt = await runtime.history.addPending(statement, opts.note)
    process.stdout.write(`Queued ${receipt.id}\n`)
    return EXIT_SUCCESS
  })
}

export async function runPendingList(opts: PendingListOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    const ideas = await runtime.history.listPending()
    process.stdout.write(opts.json === true ? JSON.stringify(ideas, null, 2) + '\n' : renderPending(ideas) + '\n')
    return EXIT_SUCCESS
  })
}

export function registerPendingCommand(program: Command): void {
  const pendingCmd = program.command('pending').description('Queue statements for a later evaluation')

  withConfigDirOptions(
    pendingCmd
      .command('add <statement>')
      .description('Queue a statement')
      .option('--note <note>', 'Free-form note stored with the statement')
  ).action(async (statement: string, opts: { note?: string; projectConfigDir?: string; globalConfigDir?: string }) => {
    process.exit(
      await runPendingAdd(statement, { ...pickConfigDirs(opts), ...(opts.note !== undefined && { note: opts.note }) })
    )
  })

  withConfigDirOptions(
    pendingCmd.command('list').description('List queued statements').option('--json', 'Output as JSON')
  ).action(async (opts: { json?: boolean; projectConfigDir?: string; globalConfigDir?: string }) => {
    process.exit(await runPendingList({ ...pickConfigDirs(opts), ...(opts.json === true && { json: true }) }))
  })
}
