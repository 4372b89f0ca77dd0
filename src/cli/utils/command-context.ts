/**
 * Shared plumbing for commands that need configuration and a runtime.
 */

import type { Command } from 'commander'
import {
  ConfigError,
  InvalidInputError,
  PipelineDefinitionError,
  SessionNotFoundError,
  errorMessage,
} from '../../core/errors.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem, ConfigSystemOptions } from '../../modules/config/config-system.js'
import type { GauntletConfig } from '../../modules/config/config-schema.js'
import { createLogger } from '../../utils/logger.js'
import { createRuntime } from '../runtime.js'
import type { Runtime, RuntimeOverrides } from '../runtime.js'

const logger = createLogger('cli')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

/**
 * Options every runtime-backed command accepts in addition to its own.
 */
export interface CommandContextOptions extends ConfigSystemOptions {
  /** In-process replacements for the capability, notifier or report sink */
  runtimeOverrides?: RuntimeOverrides
}

/** Errors caused by the invocation rather than the system */
export function isUsageError(err: unknown): boolean {
  return (
    err instanceof ConfigError ||
    err instanceof InvalidInputError ||
    err instanceof PipelineDefinitionError ||
    err instanceof SessionNotFoundError
  )
}

/**
 * Print an error and map it to an exit code.
 */
export function reportCommandError(err: unknown): number {
  if (isUsageError(err)) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return EXIT_USAGE
  }
  logger.error({ err }, 'Command failed')
  process.stderr.write(`Error: ${errorMessage(err)}\n`)
  return EXIT_ERROR
}

function configOptions(opts: ConfigSystemOptions): ConfigSystemOptions {
  return {
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.cliOverrides !== undefined && { cliOverrides: opts.cliOverrides }),
    ...(opts.env !== undefined && { env: opts.env }),
  }
}

/**
 * Load configuration; returns an exit code instead of throwing.
 */
export async function loadConfigSystem(opts: ConfigSystemOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem(configOptions(opts))
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return EXIT_USAGE
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error loading configuration: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
}

/**
 * Load config, open a runtime, run `action`, and always shut the runtime down.
 */
export async function withRuntime(
  opts: CommandContextOptions,
  action: (runtime: Runtime, config: GauntletConfig) => Promise<number>
): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system
  const config = system.getConfig()

  let runtime: Runtime
  try {
    runtime = await createRuntime(config, opts.runtimeOverrides)
  } catch (err) {
    return reportCommandError(err)
  }

  try {
    return await action(runtime, config)
  } catch (err) {
    return reportCommandError(err)
  } finally {
    await runtime.shutdown()
  }
}

/**
 * Add the config directory options shared by every command.
 */
export function withConfigDirOptions(command: Command): Command {
  return command
    .option('--project-config-dir <dir>', 'Path to the project .gauntlet/ directory')
    .option('--global-config-dir <dir>', 'Path to the global .gauntlet/ directory')
}

export function pickConfigDirs(opts: { projectConfigDir?: string; globalConfigDir?: string }): ConfigSystemOptions {
  return {
    ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
  }
}

/**
 * Parse a positive integer option; undefined when absent.
 * @throws {InvalidInputError} when present but not a positive integer
 */
export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined
  const n = Number(value)
  if (!Number.isInteger(n) || n <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer, got "${value}"`)
  }
  return n
}
