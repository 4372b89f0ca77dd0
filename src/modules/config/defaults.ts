/**
 * Built-in configuration defaults, the lowest layer of the hierarchy.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import type { GauntletConfig } from './config-schema.js'

export const DEFAULT_CONFIG_DIR_NAME = '.gauntlet'

export const DEFAULT_CONFIG: GauntletConfig = {
  log_level: 'warn',
  pipeline: {
    pack: 'two-phase',
    out_of_range: 'reject',
  },
  store: {
    database_path: join(homedir(), DEFAULT_CONFIG_DIR_NAME, 'gauntlet.db'),
    retry: {
      attempts: 3,
      base_delay_ms: 200,
      max_delay_ms: 5_000,
    },
    visibility: {
      timeout_ms: 30_000,
      poll_interval_ms: 250,
      max_poll_interval_ms: 5_000,
    },
  },
  capability: {
    kind: 'claude-cli',
    binary: 'claude',
  },
  similarity: {
    threshold: 0.5,
    limit: 3,
  },
  notify: {
    kind: 'none',
    token_env: 'SLACK_BOT_TOKEN',
  },
  report: {
    output_dir: 'reports',
  },
}
