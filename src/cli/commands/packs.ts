/**
 * `gauntlet packs`: list the built-in pipeline packs.
 */

import type { Command } from 'commander'
import { builtInPacksDir, createPackLoader } from '../../modules/pipeline-pack/pack-loader.js'
import { renderPacks } from '../formatters/session-formatter.js'
import { EXIT_SUCCESS, reportCommandError } from '../utils/command-context.js'

export interface PacksOptions {
  /** Directory to scan instead of the built-in packs */
  packsDir?: string
  json?: boolean
}

export async function runPacks(opts: PacksOptions = {}): Promise<number> {
  try {
    const packs = await createPackLoader().discover(opts.packsDir ?? builtInPacksDir())
    process.stdout.write(opts.json === true ? JSON.stringify(packs, null, 2) + '\n' : renderPacks(packs) + '\n')
    return EXIT_SUCCESS
  } catch (err) {
    return reportCommandError(err)
  }
}

export function registerPacksCommand(program: Command): void {
  program
    .command('packs')
    .description('List available pipeline packs')
    .option('--dir <dir>', 'Scan a directory of packs instead of the built-in ones')
    .option('--json', 'Output as JSON')
    .action(async (opts: { dir?: string; json?: boolean }) => {
      process.exit(
        await runPacks({
          ...(opts.dir !== undefined && { packsDir: opts.dir }),
          ...(opts.json === true && { json: true }),
        })
      )
    })
}
