/**
 * Commander program for the `gauntlet` CLI.
 */

import { readFile } from 'node:fs/promises'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { z } from 'zod'
import { registerConfigCommand } from './commands/config.js'
import { registerEvaluateCommand } from './commands/evaluate.js'
import { registerHistoryCommand } from './commands/history.js'
import { registerPacksCommand } from './commands/packs.js'
import { registerPendingCommand } from './commands/pending.js'
import { registerStatusCommand } from './commands/status.js'

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string().optional() })

/** Version from the nearest package.json; checks several levels since this runs from src/ or dist/ */
export async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  const candidates = [
    resolve(here, '../../package.json'),
    resolve(here, '../../../package.json'),
    resolve(here, '../package.json'),
  ]

  for (const pkgPath of candidates) {
    let raw: unknown
    try {
      raw = JSON.parse(await readFile(pkgPath, 'utf-8'))
    } catch {
      continue
    }
    const parsed = PackageJsonSchema.safeParse(raw)
    if (parsed.success && parsed.data.name === 'idea-gauntlet' && parsed.data.version !== undefined) {
      return parsed.data.version
    }
  }
  return '0.0.0'
}

export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('gauntlet')
    .description('Staged evaluation pipeline for problem statements')
    .version(version, '-v, --version', 'Output the current version')

  registerEvaluateCommand(program)
  registerStatusCommand(program)
  registerHistoryCommand(program)
  registerPendingCommand(program)
  registerPacksCommand(program)
  registerConfigCommand(program)

  return program
}
