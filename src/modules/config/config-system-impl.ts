/**
 * ConfigSystem implementation: loads configuration in hierarchy order.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.gauntlet/config.yaml)
 *     → project config      (./.gauntlet/config.yaml)
 *     → environment vars    (GAUNTLET_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 */

import { access, readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import yaml from 'js-yaml'
import { ConfigError, errorMessage } from '../../core/errors.js'
import { deepMask } from '../../cli/utils/masking.js'
import { isPlainObject } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { GauntletConfigSchema, PartialGauntletConfigSchema } from './config-schema.js'
import type { GauntletConfig, PartialGauntletConfig } from './config-schema.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
import { DEFAULT_CONFIG, DEFAULT_CONFIG_DIR_NAME } from './defaults.js'

const logger = createLogger('config')

export const CONFIG_FILE_NAME = 'config.yaml'

type ConfigTree = Record<string, unknown>

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base }
  for (const [key, val] of Object.entries(override)) {
    const current = result[key]
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val)
    } else if (val !== undefined) {
      result[key] = val
    }
  }
  return result
}

function setPath(tree: ConfigTree, path: readonly string[], value: unknown): void {
  const [head, ...rest] = path
  if (head === undefined) return
  if (rest.length === 0) {
    tree[head] = value
    return
  }
  const child = tree[head]
  const next: ConfigTree = isPlainObject(child) ? child : {}
  tree[head] = next
  setPath(next, rest, value)
}

function formatIssues(issues: ReadonlyArray<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * GAUNTLET_ environment variables and the config paths they override.
 * Scalars only.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  GAUNTLET_LOG_LEVEL: 'log_level',
  GAUNTLET_PACK: 'pipeline.pack',
  GAUNTLET_THRESHOLD: 'pipeline.threshold',
  GAUNTLET_ELIMINATION_POLICY: 'pipeline.elimination_policy',
  GAUNTLET_ELIMINATION_BAR: 'pipeline.elimination_bar',
  GAUNTLET_STAGE_TIMEOUT_MS: 'pipeline.stage_timeout_ms',
  GAUNTLET_DATABASE_PATH: 'store.database_path',
  GAUNTLET_CLAUDE_BINARY: 'capability.binary',
  GAUNTLET_MODEL: 'capability.model',
  GAUNTLET_NOTIFY: 'notify.kind',
  GAUNTLET_SLACK_CHANNEL: 'notify.channel',
  GAUNTLET_REPORT_DIR: 'report.output_dir',
}

function coerceEnvValue(raw: string): string | number | boolean {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

/**
 * Overlay built from GAUNTLET_* variables. Invalid values are dropped with a
 * warning rather than failing the whole load.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): PartialGauntletConfig {
  const overrides: ConfigTree = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const raw = env[envKey]
    if (raw === undefined || raw === '') continue
    setPath(overrides, configPath.split('.'), coerceEnvValue(raw))
  }

  const parsed = PartialGauntletConfigSchema.safeParse(overrides)
  if (!parsed.success) {
    logger.warn({ errors: parsed.error.issues }, 'Invalid environment variable overrides ignored')
    return {}
  }
  return parsed.data
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor
// ---------------------------------------------------------------------------

/** Value at a dot-notation path, or undefined */
export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/** Expand a leading `~` to the home directory */
export function expandHome(filePath: string): string {
  if (filePath === '~') return homedir()
  if (filePath.startsWith('~/')) return join(homedir(), filePath.slice(2))
  return filePath
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: GauntletConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: PartialGauntletConfig
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = resolve(options.projectConfigDir ?? join(process.cwd(), DEFAULT_CONFIG_DIR_NAME))
    this._globalConfigDir = resolve(options.globalConfigDir ?? join(homedir(), DEFAULT_CONFIG_DIR_NAME))
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    const layers: Array<{ source: string; values: PartialGauntletConfig | null }> = [
      { source: 'global', values: await this._loadYamlFile(join(this._globalConfigDir, CONFIG_FILE_NAME)) },
      { source: 'project', values: await this._loadYamlFile(join(this._projectConfigDir, CONFIG_FILE_NAME)) },
      { source: 'env', values: readEnvOverrides(this._env) },
      { source: 'cli', values: this._cliOverrides },
    ]

    let merged: ConfigTree = structuredClone(DEFAULT_CONFIG)
    for (const layer of layers) {
      if (layer.values === null) continue
      merged = deepMerge(merged, layer.values)
      logger.trace({ source: layer.source }, 'Applied config layer')
    }

    const result = GauntletConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = {
      ...result.data,
      store: { ...result.data.store, database_path: expandHome(result.data.store.database_path) },
      report: { output_dir: expandHome(result.data.report.output_dir) },
    }
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): GauntletConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  getMasked(): unknown {
    return deepMask(this.getConfig())
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath)
      return true
    } catch {
      return false
    }
  }

  private async _loadYamlFile(filePath: string): Promise<PartialGauntletConfig | null> {
    if (!(await this._fileExists(filePath))) return null

    let parsed: unknown
    try {
      parsed = yaml.load(await readFile(filePath, 'utf-8'))
    } catch (err) {
      throw new ConfigError(`Failed to read config file at ${filePath}: ${errorMessage(err)}`, { filePath })
    }
    // An empty file is an empty layer
    if (parsed === undefined || parsed === null) return {}

    const result = PartialGauntletConfigSchema.safeParse(parsed)
    if (!result.success) {
      throw new ConfigError(`Invalid config file at ${filePath}:\n${formatIssues(result.error.issues)}`, {
        filePath,
        issues: result.error.issues,
      })
    }
    return result.data
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
