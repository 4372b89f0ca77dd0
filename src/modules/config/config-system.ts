/**
 * ConfigSystem interface: public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { GauntletConfig, PartialGauntletConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Project-level config directory (default: <cwd>/.gauntlet) */
  projectConfigDir?: string
  /** User-level config directory (default: ~/.gauntlet) */
  globalConfigDir?: string
  /** Values from CLI flags; override every other layer */
  cliOverrides?: PartialGauntletConfig
  /** Environment to read GAUNTLET_* overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * @throws {ConfigError} when a file cannot be read or the merged config is invalid
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called
   */
  getConfig(): GauntletConfig

  /**
   * A single value by dot-notation key (e.g. "pipeline.pack"), or undefined.
   */
  get(key: string): unknown

  /** Merged config with credential values masked, safe to print */
  getMasked(): unknown

  readonly isLoaded: boolean
}
