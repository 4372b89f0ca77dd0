/**
 * `gauntlet evaluate <statements...>`: run statements through the pipeline.
 *
 * Statements are evaluated one after another, each in its own session.
 * Progress goes to stderr; the result (human summary or JSON) to stdout.
 * SIGINT cancels the running session and skips the remaining statements.
 *
 * Exit codes: 0 every session complete, 1 any session failed or cancelled
 * (or a system error), 2 invalid invocation.
 */

import type { Command } from 'commander'
import { errorMessage } from '../../core/errors.js'
import type { PartialGauntletConfig } from '../../modules/config/config-schema.js'
import type { EvaluateOptions } from '../../modules/orchestrator/orchestrator.js'
import type { EliminationPolicy, SessionDocument } from '../../modules/session/session-types.js'
import { createLogger } from '../../utils/logger.js'
import { createProgressRenderer } from '../formatters/progress-renderer.js'
import { renderSessionHuman } from '../formatters/session-formatter.js'
import {
  EXIT_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE,
  pickConfigDirs,
  withConfigDirOptions,
  withRuntime,
} from '../utils/command-context.js'
import type { CommandContextOptions } from '../utils/command-context.js'

const logger = createLogger('evaluate-cmd')

export interface EvaluateCommandOptions extends CommandContextOptions {
  threshold?: number
  problemOnly?: boolean
  /** Built-in pack name or pack directory */
  pack?: string
  policy?: EliminationPolicy
  /** Report output directory */
  output?: string
  /** No progress output */
  quiet?: boolean
  /** Print the final session documents as JSON */
  json?: boolean
}

function buildOverrides(opts: EvaluateCommandOptions): PartialGauntletConfig {
  const overrides: PartialGauntletConfig = { ...opts.cliOverrides }
  if (opts.pack !== undefined) {
    overrides.pipeline = { ...overrides.pipeline, pack: opts.pack }
  }
  if (opts.output !== undefined) {
    overrides.report = { ...overrides.report, output_dir: opts.output }
  }
  return overrides
}

export async function runEvaluate(statements: string[], opts: EvaluateCommandOptions = {}): Promise<number> {
  if (statements.length === 0) {
    process.stderr.write('Error: at least one statement is required\n')
    return EXIT_USAGE
  }

  const evaluateOptions: EvaluateOptions = {
    ...(opts.threshold !== undefined && { threshold: opts.threshold }),
    ...(opts.problemOnly === true && { problemOnly: true }),
    ...(opts.policy !== undefined && { policy: opts.policy }),
  }

  return withRuntime({ ...opts, cliOverrides: buildOverrides(opts) }, async (runtime) => {
    const pack = await runtime.loadPack()
    const orchestrator = runtime.createOrchestrator(pack)

    const renderer = opts.quiet === true || opts.json === true ? null : createProgressRenderer(process.stderr)
    renderer?.attach(runtime.eventBus)

    let interrupted = false
    let activeSessionId: string | null = null
    const onSigint = (): void => {
      interrupted = true
      if (activeSessionId === null) return
      try {
        orchestrator.cancel(activeSessionId)
      } catch (err) {
        logger.warn({ err: errorMessage(err), sessionId: activeSessionId }, 'Cancel failed')
      }
    }
    process.on('SIGINT', onSigint)

    const results: SessionDocument[] = []
    try {
      for (const statement of statements) {
        if (interrupted) break
        const started = orchestrator.start(statement, evaluateOptions)
        activeSessionId = started.sessionId
        results.push(await started.done)
        activeSessionId = null
      }
    } finally {
      process.off('SIGINT', onSigint)
      renderer?.detach()
    }

    if (opts.json === true) {
      process.stdout.write(JSON.stringify(results, null, 2) + '\n')
    } else {
      process.stdout.write(results.map(renderSessionHuman).join('\n\n') + '\n')
    }

    const allComplete = results.length === statements.length && results.every((doc) => doc.status === 'complete')
    return allComplete ? EXIT_SUCCESS : EXIT_ERROR
  })
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface EvaluateCliOptions {
  threshold?: string
  problemOnly?: boolean
  pack?: string
  policy?: string
  output?: string
  quiet?: boolean
  json?: boolean
  projectConfigDir?: string
  globalConfigDir?: string
}

function isPolicy(value: string): value is EliminationPolicy {
  return value === 'early' || value === 'full'
}

export function registerEvaluateCommand(program: Command): void {
  withConfigDirOptions(
    program
      .command('evaluate <statements...>')
      .description('Evaluate one or more problem statements')
      .option('-t, --threshold <score>', 'Pass bar for the combined score, 1-10')
      .option('--problem-only', 'Skip the solution phase')
      .option('--pack <pack>', 'Pipeline pack name or directory')
      .option('--policy <policy>', 'Elimination policy: early or full')
      .option('-o, --output <dir>', 'Report output directory')
      .option('-q, --quiet', 'Suppress progress output')
      .option('--json', 'Print session documents as JSON')
  ).action(async (statements: string[], opts: EvaluateCliOptions) => {
    let threshold: number | undefined
    if (opts.threshold !== undefined) {
      threshold = Number(opts.threshold)
      if (!Number.isFinite(threshold)) {
        process.stderr.write(`Error: --threshold must be a number, got "${opts.threshold}"\n`)
        process.exit(EXIT_USAGE)
      }
    }
    let policy: EliminationPolicy | undefined
    if (opts.policy !== undefined) {
      if (!isPolicy(opts.policy)) {
        process.stderr.write(`Error: --policy must be early or full, got "${opts.policy}"\n`)
        process.exit(EXIT_USAGE)
      }
      policy = opts.policy
    }

    const exitCode = await runEvaluate(statements, {
      ...pickConfigDirs(opts),
      ...(threshold !== undefined && { threshold }),
      ...(opts.problemOnly === true && { problemOnly: true }),
      ...(opts.pack !== undefined && { pack: opts.pack }),
      ...(policy !== undefined && { policy }),
      ...(opts.output !== undefined && { output: opts.output }),
      ...(opts.quiet === true && { quiet: true }),
      ...(opts.json === true && { json: true }),
    })
    process.exit(exitCode)
  })
}
