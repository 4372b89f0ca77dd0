/**
 * `gauntlet status <sessionId>`: show the last recorded state of a session.
 *
 * Reads the newest `session_state` record from the context store, so it
 * works for sessions run by other processes and for finished sessions.
 */

import type { Command } from 'commander'
import { SessionNotFoundError } from '../../core/errors.js'
import { parseSessionDocument } from '../../modules/session/session-schema.js'
import { renderSessionHuman } from '../formatters/session-formatter.js'
import { EXIT_SUCCESS, pickConfigDirs, withConfigDirOptions, withRuntime } from '../utils/command-context.js'
import type { CommandContextOptions } from '../utils/command-context.js'

export interface StatusOptions extends CommandContextOptions {
  json?: boolean
}

export async function runStatus(sessionId: string, opts: StatusOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    const records = await runtime.store.query({ session_id: sessionId, type: 'session_state', order: 'desc', limit: 1 })
    const latest = records[0]
    const doc = latest !== undefined ? parseSessionDocument(latest.content) : null
    if (doc === null) {
      throw new SessionNotFoundError(sessionId)
    }

    if (opts.json === true) {
      process.stdout.write(JSON.stringify(doc, null, 2) + '\n')
    } else {
      process.stdout.write(renderSessionHuman(doc) + '\n')
    }
    return EXIT_SUCCESS
  })
}

export function registerStatusCommand(program: Command): void {
  withConfigDirOptions(
    program
      .command('status <sessionId>')
      .description('Show the latest recorded state of a session')
      .option('--json', 'Print the session document as JSON')
  ).action(async (sessionId: string, opts: { json?: boolean; projectConfigDir?: string; globalConfigDir?: string }) => {
    const exitCode = await runStatus(sessionId, { ...pickConfigDirs(opts), ...(opts.json === true && { json: true }) })
    process.exit(exitCode)
  })
}
