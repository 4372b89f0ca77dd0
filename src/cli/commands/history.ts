/**
 * `gauntlet history` command group: read past evaluations.
 *
 * Subcommands:
 *   - `gauntlet history list`                : recorded outcomes, newest first
 *   - `gauntlet history search <query>`      : outcomes ranked by text similarity
 *   - `gauntlet history similar <statement>` : has something like this been evaluated?
 *   - `gauntlet history insights <query>`    : stage outputs of the best-matching sessions
 */

import type { Command } from 'commander'
import { InvalidInputError, errorMessage } from '../../core/errors.js'
import {
  renderInsights,
  renderOutcomes,
  renderSearchResults,
  renderSimilar,
} from '../formatters/session-formatter.js'
import { EXIT_SUCCESS, EXIT_USAGE, parsePositiveInt, pickConfigDirs, withConfigDirOptions, withRuntime } from '../utils/command-context.js'
import type { CommandContextOptions } from '../utils/command-context.js'

export interface HistoryOptions extends CommandContextOptions {
  limit?: number
  json?: boolean
}

export interface HistoryListOptions extends HistoryOptions {
  status?: string
}

export interface HistorySimilarOptions extends HistoryOptions {
  /** Minimum similarity in [0, 1]; defaults to the configured value */
  threshold?: number
}

function print(json: boolean | undefined, value: unknown, human: string): void {
  process.stdout.write(json === true ? JSON.stringify(value, null, 2) + '\n' : human + '\n')
}

function requireText(value: string, name: string): string {
  const trimmed = value.trim()
  if (trimmed === '') throw new InvalidInputError(`${name} must not be empty`)
  return trimmed
}

export async function runHistoryList(opts: HistoryListOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    const outcomes = await runtime.history.listOutcomes({
      ...(opts.status !== undefined && { status: opts.status }),
      ...(opts.limit !== undefined && { limit: opts.limit }),
    })
    print(opts.json, outcomes, renderOutcomes(outcomes))
    return EXIT_SUCCESS
  })
}

export async function runHistorySearch(query: string, opts: HistoryOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    const results = await runtime.history.searchOutcomes(requireText(query, 'query'), opts.limit)
    print(opts.json, results, renderSearchResults(results))
    return EXIT_SUCCESS
  })
}

export async function runHistorySimilar(statement: string, opts: HistorySimilarOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime, config) => {
    const matches = await runtime.history.findSimilar(requireText(statement, 'statement'), {
      threshold: opts.threshold ?? config.similarity.threshold,
      limit: opts.limit ?? config.similarity.limit,
    })
    print(opts.json, matches, renderSimilar(matches))
    return EXIT_SUCCESS
  })
}

export async function runHistoryInsights(query: string, opts: HistoryOptions = {}): Promise<number> {
  return withRuntime(opts, async (runtime) => {
    const insights = await runtime.history.getInsights(requireText(query, 'query'), opts.limit)
    print(opts.json, insights, renderInsights(insights))
    return EXIT_SUCCESS
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface HistoryCliOptions {
  limit?: string
  status?: string
  threshold?: string
  json?: boolean
  projectConfigDir?: string
  globalConfigDir?: string
}

function common(opts: HistoryCliOptions): HistoryOptions {
  return {
    ...pickConfigDirs(opts),
    ...(opts.json === true && { json: true }),
  }
}

/**
 * Parse `--limit`, exiting with a usage error when it is not a positive integer.
 */
function limitOption(opts: HistoryCliOptions): { limit?: number } {
  try {
    const limit = parsePositiveInt(opts.limit, '--limit')
    return limit !== undefined ? { limit } : {}
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    process.exit(EXIT_USAGE)
  }
}

export function registerHistoryCommand(program: Command): void {
  const historyCmd = program.command('history').description('Browse past evaluations')

  withConfigDirOptions(
    historyCmd
      .command('list')
      .description('List recorded outcomes, newest first')
      .option('--status <status>', 'Only outcomes with this status (complete, failed, cancelled)')
      .option('-n, --limit <n>', 'Maximum number of outcomes')
      .option('--json', 'Output as JSON')
  ).action(async (opts: HistoryCliOptions) => {
    const exitCode = await runHistoryList({
      ...common(opts),
      ...limitOption(opts),
      ...(opts.status !== undefined && { status: opts.status }),
    })
    process.exit(exitCode)
  })

  withConfigDirOptions(
    historyCmd
      .command('search <query>')
      .description('Search past outcomes by text similarity')
      .option('-n, --limit <n>', 'Maximum number of results', '10')
      .option('--json', 'Output as JSON')
  ).action(async (query: string, opts: HistoryCliOptions) => {
    process.exit(await runHistorySearch(query, { ...common(opts), ...limitOption(opts) }))
  })

  withConfigDirOptions(
    historyCmd
      .command('similar <statement>')
      .description('Check whether a similar statement was evaluated before')
      .option('--threshold <value>', 'Minimum similarity between 0 and 1')
      .option('-n, --limit <n>', 'Maximum number of matches')
      .option('--json', 'Output as JSON')
  ).action(async (statement: string, opts: HistoryCliOptions) => {
    let threshold: number | undefined
    if (opts.threshold !== undefined) {
      threshold = Number(opts.threshold)
      if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        process.stderr.write(`Error: --threshold must be between 0 and 1, got "${opts.threshold}"\n`)
        process.exit(EXIT_USAGE)
      }
    }
    process.exit(
      await runHistorySimilar(statement, {
        ...common(opts),
        ...limitOption(opts),
        ...(threshold !== undefined && { threshold }),
      })
    )
  })

  withConfigDirOptions(
    historyCmd
      .command('insights <query>')
      .description('Show stage outputs of past sessions that match a query')
      .option('-n, --limit <n>', 'Maximum number of sessions', '3')
      .option('--json', 'Output as JSON')
  ).action(async (query: string, opts: HistoryCliOptions) => {
    process.exit(await runHistoryInsights(query, { ...common(opts), ...limitOption(opts) }))
  })
}
