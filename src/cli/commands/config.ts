/**
 * `gauntlet config` command group
 *
 * Subcommands:
 *   - `gauntlet config show [key]` : display the merged config, or one value (credentials masked)
 *   - `gauntlet config export`     : write the merged config to stdout or a file
 */

import { writeFile } from 'node:fs/promises'
import type { Command } from 'commander'
import yaml from 'js-yaml'
import { errorMessage } from '../../core/errors.js'
import { getByPath } from '../../modules/config/config-system-impl.js'
import type { ConfigSystemOptions } from '../../modules/config/config-system.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE, loadConfigSystem, pickConfigDirs, withConfigDirOptions } from '../utils/command-context.js'

export type ConfigFormat = 'yaml' | 'json'

function isConfigFormat(value: string): value is ConfigFormat {
  return value === 'yaml' || value === 'json'
}

function serialize(value: unknown, format: ConfigFormat): string {
  if (format === 'json') return JSON.stringify(value, null, 2) + '\n'
  if (value === null || typeof value !== 'object') return `${String(value)}\n`
  return yaml.dump(value)
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigSystemOptions {
  key?: string
  format?: ConfigFormat
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  const format = opts.format ?? 'yaml'

  if (opts.key !== undefined) {
    const value = getByPath(masked, opts.key)
    if (value === undefined) {
      process.stderr.write(`Unknown configuration key: ${opts.key}\n`)
      return EXIT_USAGE
    }
    process.stdout.write(serialize(value, format))
    return EXIT_SUCCESS
  }

  if (format === 'yaml') {
    process.stdout.write('# Gauntlet configuration (credentials masked)\n\n')
  }
  process.stdout.write(serialize(masked, format))
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config export` action
// ---------------------------------------------------------------------------

export interface ConfigExportOptions extends ConfigSystemOptions {
  output?: string
  format?: ConfigFormat
}

export async function runConfigExport(opts: ConfigExportOptions = {}): Promise<number> {
  const system = await loadConfigSystem(opts)
  if (typeof system === 'number') return system

  const serialized = serialize(system.getMasked(), opts.format ?? 'yaml')
  if (opts.output === undefined) {
    process.stdout.write(serialized)
    return EXIT_SUCCESS
  }

  try {
    await writeFile(opts.output, serialized, 'utf-8')
  } catch (err) {
    process.stderr.write(`Error: Failed to write file: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
  process.stdout.write(`Configuration exported to ${opts.output}\n`)
  return EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// Commander registration
// ---------------------------------------------------------------------------

interface ConfigCliOptions {
  format: string
  output?: string
  projectConfigDir?: string
  globalConfigDir?: string
}

function parseFormat(raw: string): ConfigFormat | null {
  if (isConfigFormat(raw)) return raw
  process.stderr.write(`Error: --format must be yaml or json, got "${raw}"\n`)
  return null
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('Inspect gauntlet configuration')

  withConfigDirOptions(
    configCmd
      .command('show [key]')
      .description('Display the merged configuration, or one dot-notation key, with credentials masked')
      .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
  ).action(async (key: string | undefined, opts: ConfigCliOptions) => {
    const format = parseFormat(opts.format)
    if (format === null) process.exit(EXIT_USAGE)
    const exitCode = await runConfigShow({ ...pickConfigDirs(opts), format, ...(key !== undefined && { key }) })
    process.exit(exitCode)
  })

  withConfigDirOptions(
    configCmd
      .command('export')
      .description('Export the merged configuration (credentials masked)')
      .option('-o, --output <file>', 'Write to a file instead of stdout')
      .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
  ).action(async (opts: ConfigCliOptions) => {
    const format = parseFormat(opts.format)
    if (format === null) process.exit(EXIT_USAGE)
    const exitCode = await runConfigExport({
      ...pickConfigDirs(opts),
      format,
      ...(opts.output !== undefined && { output: opts.output }),
    })
    process.exit(exitCode)
  })
}
